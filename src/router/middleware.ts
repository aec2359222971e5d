/**
 * @since 1.0.0
 * Middleware pipeline
 *
 * A middleware guards navigation to a route. It receives the route definition and a
 * continuation; calling the continuation lets the navigation proceed, never calling it
 * aborts the attempt. An abort raises nothing and changes nothing.
 *
 * @example
 * ```ts
 * import { Effect } from "effect"
 * import { Middleware } from "routestack"
 *
 * const requireSession = Middleware.make((definition, next) =>
 *   Effect.gen(function* () {
 *     const session = yield* Ref.get(sessionRef)
 *     if (Option.isSome(session)) yield* next(definition)
 *   }),
 * )
 * ```
 */
import { Effect, Option, Ref } from "effect";
import * as Debug from "../debug/debug.js";
import { instantiateMiddleware } from "./route.js";
import type { RouteDefinition } from "./route.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Continuation handed to a middleware. Runs the rest of the chain.
 * @since 1.0.0
 */
export type Next = (definition: RouteDefinition) => Effect.Effect<void>;

/**
 * A navigation guard.
 * @since 1.0.0
 */
export interface Middleware {
  readonly handle: (definition: RouteDefinition, next: Next) => Effect.Effect<void>;
}

/**
 * Builds one middleware instance. Called once per navigation attempt so instances
 * never share state across attempts.
 * @since 1.0.0
 */
export type MiddlewareFactory = () => Middleware;

/**
 * Outcome of one pipeline run.
 * - Proceed: the chain reached its end and the continuation's value is attached
 * - Abort: some middleware withheld its continuation
 * @since 1.0.0
 */
export type PipelineOutcome<A> =
  | { readonly _tag: "Proceed"; readonly value: A }
  | { readonly _tag: "Abort" };

/** @since 1.0.0 */
export const proceed = <A>(value: A): PipelineOutcome<A> => ({ _tag: "Proceed", value });

/** @since 1.0.0 */
export const abort: PipelineOutcome<never> = { _tag: "Abort" };

// =============================================================================
// Constructors
// =============================================================================

/**
 * Create a middleware from its handler.
 * @since 1.0.0
 */
export const make = (handle: Middleware["handle"]): Middleware => ({ handle });

/**
 * Middleware that always continues.
 * @since 1.0.0
 */
export const pass: MiddlewareFactory = () => make((definition, next) => next(definition));

/**
 * Middleware that never continues.
 * @since 1.0.0
 */
export const block: MiddlewareFactory = () => make(() => Effect.void);

/**
 * Middleware that continues only while `predicate` holds.
 * The predicate is evaluated on every attempt.
 * @since 1.0.0
 */
export const when =
  (predicate: Effect.Effect<boolean>): MiddlewareFactory =>
  () =>
    make((definition, next) =>
      Effect.flatMap(predicate, (allowed) => (allowed ? next(definition) : Effect.void)),
    );

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Run a route's middleware, then `onProceed` if every middleware continued.
 *
 * Middleware is composed right to left: each instance receives the remainder of the
 * chain as its continuation, and the last continuation is `onProceed`. `onProceed`
 * receives the definition handed to the final continuation and runs at most once,
 * even if a middleware continues twice.
 *
 * @since 1.0.0
 */
export const run = <A>(
  definition: RouteDefinition,
  onProceed: (definition: RouteDefinition) => Effect.Effect<A>,
): Effect.Effect<PipelineOutcome<A>> =>
  Effect.gen(function* () {
    const middleware = instantiateMiddleware(definition);
    const reached = yield* Ref.make(Option.none<A>());

    yield* Debug.log({
      event: "router.middleware.start",
      route_pattern: definition.path,
      middleware_count: middleware.length,
    });

    const terminal: Next = (resolved) =>
      Effect.gen(function* () {
        if (Option.isSome(yield* Ref.get(reached))) return;
        const value = yield* onProceed(resolved);
        yield* Ref.set(reached, Option.some(value));
      });

    const chain = middleware.reduceRight<Next>(
      (next, current) => (resolved) => current.handle(resolved, next),
      terminal,
    );

    yield* chain(definition);

    const result = yield* Ref.get(reached);
    if (Option.isNone(result)) {
      yield* Debug.log({ event: "router.middleware.abort", route_pattern: definition.path });
      return abort;
    }

    yield* Debug.log({ event: "router.middleware.proceed", route_pattern: definition.path });
    return proceed(result.value);
  });
