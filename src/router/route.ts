/**
 * @since 1.0.0
 * Route Builder
 *
 * Pipeable data structure for defining routes: a path pattern, the content
 * factory that produces the route's UI, and the middleware that gates navigation to it.
 *
 * @example
 * ```ts
 * import { Route } from "routestack"
 *
 * Route.make("/users/:id")
 *   .content(({ id }) => UserProfile(id))
 *   .middleware(() => requireSession)
 * ```
 */
import { Option, Pipeable } from "effect";
import { compile } from "./matching.js";
import type { RouteParams } from "./matching.js";
import type { Middleware, MiddlewareFactory } from "./middleware.js";

// =============================================================================
// Route Definition (Internal Representation)
// =============================================================================

/**
 * Produces a route's content from the parameters decoded from its path.
 * The content itself is opaque to the router.
 * @since 1.0.0
 */
export type ContentFactory = (params: RouteParams) => unknown;

/**
 * Immutable route definition produced by the builder.
 * Shared by reference between the registry and every ActiveRoute that uses it.
 * @since 1.0.0
 */
export interface RouteDefinition {
  readonly _tag: "RouteDefinition";
  readonly path: string;
  readonly content: ContentFactory | undefined;
  /** Middleware factories, in execution order. Instantiated afresh on every navigation attempt. */
  readonly middleware: ReadonlyArray<MiddlewareFactory>;
  /** Decode the params of a concrete path, or `None` when the pattern does not match it. */
  readonly decode: (path: string) => Option.Option<RouteParams>;
}

/**
 * Whether the definition's pattern matches a concrete path.
 * @since 1.0.0
 */
export const matches = (definition: RouteDefinition, path: string): boolean =>
  Option.isSome(definition.decode(path));

/**
 * Build fresh middleware instances for one navigation attempt.
 * @since 1.0.0
 */
export const instantiateMiddleware = (
  definition: RouteDefinition,
): ReadonlyArray<Middleware> => definition.middleware.map((factory) => factory());

// =============================================================================
// Route Builder
// =============================================================================

/** @internal */
export const RouteBuilderTypeId: unique symbol = Symbol.for("routestack/router/RouteBuilder");
export type RouteBuilderTypeId = typeof RouteBuilderTypeId;

/**
 * Route builder - accumulates configuration for a route.
 * @since 1.0.0
 */
export interface RouteBuilder<Path extends string> extends Pipeable.Pipeable {
  readonly _tag: "RouteBuilder";
  readonly [RouteBuilderTypeId]: RouteBuilderTypeId;
  readonly definition: RouteDefinition;

  /** Set the content factory for this route. */
  readonly content: (factory: ContentFactory) => RouteBuilder<Path>;

  /**
   * Add a middleware factory to this route.
   * Middleware runs in the order it was added.
   */
  readonly middleware: (factory: MiddlewareFactory) => RouteBuilder<Path>;
}

/** @internal */
const makeBuilder = <Path extends string>(def: RouteDefinition): RouteBuilder<Path> => ({
  _tag: "RouteBuilder",
  [RouteBuilderTypeId]: RouteBuilderTypeId,
  definition: def,

  content: (factory) =>
    makeBuilder<Path>({
      ...def,
      content: factory,
    }),

  middleware: (factory) =>
    makeBuilder<Path>({
      ...def,
      middleware: [...def.middleware, factory],
    }),

  pipe() {
    return Pipeable.pipeArguments(this, arguments);
  },
});

/** @internal */
const emptyDefinition = (path: string): RouteDefinition => ({
  _tag: "RouteDefinition",
  path,
  content: undefined,
  middleware: [],
  decode: compile(path).match,
});

// =============================================================================
// Public API
// =============================================================================

/**
 * Create a route with a path pattern.
 *
 * Path patterns support:
 * - Static segments: `/about`
 * - Dynamic params: `/users/:id` or `/users/[id]`
 * - Catch-all: `/files/*` or `/files/[...path]`
 *
 * @since 1.0.0
 */
export const make = <Path extends string>(path: Path): RouteBuilder<Path> =>
  makeBuilder<Path>(emptyDefinition(path));

/**
 * Check if a value is a RouteBuilder.
 * @since 1.0.0
 */
export const isRouteBuilder = (value: unknown): value is RouteBuilder<string> =>
  typeof value === "object" && value !== null && RouteBuilderTypeId in value;
