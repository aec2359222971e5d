/**
 * @since 1.0.0
 * Route registry - first-match resolution with a not-found fallback
 */
import { Array, Effect, Option } from "effect";
import * as Debug from "../debug/debug.js";
import { RouteConfigError } from "./errors.js";
import { matches } from "./route.js";
import type { RouteDefinition } from "./route.js";

/**
 * Read-only view of the configured routes.
 * @since 1.0.0
 */
export interface Registry {
  readonly definitions: ReadonlyArray<RouteDefinition>;
  /** Definition every unmatched path resolves to. */
  readonly notFound: RouteDefinition;
  /**
   * First definition, in declaration order, whose pattern matches `path`.
   * Falls back to {@link Registry.notFound}.
   */
  readonly resolve: (path: string) => Effect.Effect<RouteDefinition>;
}

/**
 * First definition whose pattern matches `path`, in declaration order.
 * @since 1.0.0
 */
export const find = (
  definitions: ReadonlyArray<RouteDefinition>,
  path: string,
): Option.Option<RouteDefinition> => Array.findFirst(definitions, (definition) => matches(definition, path));

/**
 * Build a registry. Fails with {@link RouteConfigError} when `notFoundPath`
 * itself matches no definition.
 * @since 1.0.0
 */
export const make = (
  definitions: ReadonlyArray<RouteDefinition>,
  notFoundPath: string,
): Effect.Effect<Registry, RouteConfigError> =>
  Effect.gen(function* () {
    const notFound = yield* Option.match(find(definitions, notFoundPath), {
      onNone: () => Effect.fail(new RouteConfigError({ path: notFoundPath })),
      onSome: Effect.succeed,
    });

    const resolve = (path: string): Effect.Effect<RouteDefinition> =>
      Option.match(find(definitions, path), {
        onNone: () =>
          Effect.as(
            Debug.log({
              event: "router.resolve.notfound",
              path,
              route_pattern: notFound.path,
            }),
            notFound,
          ),
        onSome: (definition) =>
          Effect.as(
            Debug.log({ event: "router.resolve", path, route_pattern: definition.path }),
            definition,
          ),
      });

    return { definitions, notFound, resolve };
  });
