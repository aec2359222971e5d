/**
 * @since 1.0.0
 * Router service for routestack
 *
 * Owns the active route stack and the index counter. Forward navigation
 * (push, replace, removeAllAndPush, removeUntilAndPush) is gated by the target
 * route's middleware; pop and remove are not. Committed push, pop and replace
 * emit a {@link RouterEvent} at the next frame.
 */
import { Array, Context, Effect, Layer, Option, Ref, Stream } from "effect";
import type { Predicate, Scope } from "effect";
import * as Debug from "../debug/debug.js";
import * as Metrics from "../debug/metrics.js";
import { Host } from "../platform/host.js";
import type { Frame } from "../platform/frame.js";
import type { RouterConfig } from "../config.js";
import * as ActiveRoute from "./active-route.js";
import { ActiveRouteNotFoundError, StackInvariantError } from "./errors.js";
import type { RestorationError, RouteConfigError } from "./errors.js";
import { RouterEvent } from "./events.js";
import * as Middleware from "./middleware.js";
import * as Notifier from "./notifier.js";
import * as Registry from "./registry.js";
import * as Restoration from "./restoration.js";
import { definitionsOf } from "./routes.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Result of a gated navigation: the new entry, or an abort by middleware.
 * @since 1.0.0
 */
export type NavigationOutcome = Middleware.PipelineOutcome<ActiveRoute.ActiveRoute>;

/**
 * Result of a pop.
 * - Popped: the entry left the stack
 * - Exited: it was the last entry, so the host was asked to exit instead
 * @since 1.0.0
 */
export type PopOutcome =
  | { readonly _tag: "Popped"; readonly activeRoute: ActiveRoute.ActiveRoute }
  | { readonly _tag: "Exited" };

/**
 * Entries, oldest first. Never empty.
 * @since 1.0.0
 */
export type Stack = Array.NonEmptyReadonlyArray<ActiveRoute.ActiveRoute>;

/**
 * @since 1.0.0
 */
export interface RouterService {
  readonly registry: Registry.Registry;

  /** Entries, oldest first. */
  readonly activeRoutes: Effect.Effect<Stack>;
  /** Top entry. */
  readonly current: Effect.Effect<ActiveRoute.ActiveRoute>;
  readonly currentPath: Effect.Effect<string>;

  /** Append a new entry for `path`. */
  readonly push: (path: string, id?: string) => Effect.Effect<NavigationOutcome>;
  /** Swap the top entry for a new entry for `path`. */
  readonly replace: (path: string, id?: string) => Effect.Effect<NavigationOutcome>;
  /** Clear the stack, then push. Only the push is observable as an event. */
  readonly removeAllAndPush: (path: string, id?: string) => Effect.Effect<NavigationOutcome>;
  /**
   * Remove entries from the top until `predicate` holds for the top entry (or the
   * stack is exhausted), then push. Only the push is observable as an event.
   */
  readonly removeUntilAndPush: (
    predicate: Predicate.Predicate<ActiveRoute.ActiveRoute>,
    path: string,
    id?: string,
  ) => Effect.Effect<NavigationOutcome>;

  /** Remove the top entry with `result`, or exit the host if it is the only one. */
  readonly pop: (result?: unknown) => Effect.Effect<PopOutcome>;
  /** Pop the most recent entry the host knows by `reference`. */
  readonly popByHostReference: (
    reference: string,
    result?: unknown,
  ) => Effect.Effect<PopOutcome, ActiveRouteNotFoundError>;
  /** Silently remove the most recent entry for `path`, wherever it sits. */
  readonly remove: (
    path: string,
  ) => Effect.Effect<ActiveRoute.ActiveRoute, ActiveRouteNotFoundError | StackInvariantError>;

  /** Serializable projection of the stack. */
  readonly snapshot: Effect.Effect<ReadonlyArray<Restoration.RestorablePageInformation>>;
  /** Replace the stack from records, without middleware or events. */
  readonly restore: (
    records: ReadonlyArray<Restoration.RestorablePageInformation>,
  ) => Effect.Effect<void, RestorationError>;
  /** Validate raw input, then {@link RouterService.restore}. */
  readonly restoreUnknown: (input: unknown) => Effect.Effect<void, RestorationError>;

  readonly events: Stream.Stream<RouterEvent>;
  readonly subscribe: (handler: Notifier.EventHandler) => Effect.Effect<void, never, Scope.Scope>;
  readonly latestEvent: Effect.Effect<Option.Option<RouterEvent>>;
  /** Close the event channel. Also runs when the router's scope closes. */
  readonly shutdown: Effect.Effect<void>;
}

// =============================================================================
// Tag
// =============================================================================

/**
 * @since 1.0.0
 */
export class Router extends Context.Tag("@routestack/Router")<Router, RouterService>() {}

/** Id given to the entry created at construction. */
export const INITIAL_ID = "initial";

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a router: resolve the not-found route (failing on a misconfiguration),
 * create the initial entry at index 0, and close the event channel with the scope.
 * @since 1.0.0
 */
export const make = (
  config: RouterConfig,
): Effect.Effect<RouterService, RouteConfigError, Frame | Host | Scope.Scope> =>
  Effect.gen(function* () {
    const host = yield* Host;
    const definitions = definitionsOf(config.routes);
    const registry = yield* Registry.make(definitions, config.notFoundPath);
    const notifier = yield* Notifier.make;

    const initialPath = config.initialPath?.() ?? "/";
    const initial = ActiveRoute.make(
      yield* registry.resolve(initialPath),
      initialPath,
      0,
      Option.some(INITIAL_ID),
    );

    const stack = yield* Ref.make<Stack>([initial]);
    const nextIndex = yield* Ref.make(1);

    yield* Debug.log({
      event: "router.init",
      path: initialPath,
      index: initial.index,
      route_count: definitions.length,
    });

    yield* Effect.addFinalizer(() => notifier.shutdown);

    // --- Gated navigation ---

    const gate = (
      path: string,
      id: string | undefined,
      commit: (route: ActiveRoute.ActiveRoute) => Effect.Effect<void>,
    ): Effect.Effect<NavigationOutcome> =>
      Debug.withTrace(
        Effect.gen(function* () {
          const definition = yield* registry.resolve(path);

          const outcome = yield* Middleware.run(definition, (resolved) =>
            Effect.gen(function* () {
              // An abort never consumes an index
              const index = yield* Ref.getAndUpdate(nextIndex, (n) => n + 1);
              const route = ActiveRoute.make(resolved, path, index, Option.fromNullable(id));
              yield* commit(route);
              yield* Metrics.recordCommitted;
              yield* Metrics.recordStackDepth((yield* Ref.get(stack)).length);
              return route;
            }),
          );

          if (outcome._tag === "Abort") {
            yield* Metrics.recordAborted;
          }
          return outcome;
        }),
      );

    const commitPush =
      (
        operation: "push" | "removeAllAndPush" | "removeUntilAndPush",
        keep: (current: Stack) => ReadonlyArray<ActiveRoute.ActiveRoute>,
      ) =>
      (route: ActiveRoute.ActiveRoute): Effect.Effect<void> =>
        Effect.gen(function* () {
          const current = yield* Ref.get(stack);
          const kept = keep(current);
          yield* Ref.set(stack, Array.append(kept, route));
          yield* Debug.log({
            event: "router.push",
            operation,
            path: route.path,
            index: route.index,
            removed: current.length - kept.length,
          });
          yield* notifier.emit(RouterEvent.Push({ activeRoute: route }));
        });

    const commitReplace = (route: ActiveRoute.ActiveRoute): Effect.Effect<void> =>
      Effect.gen(function* () {
        const current = yield* Ref.get(stack);
        const oldRoute = Array.lastNonEmpty(current);
        yield* Ref.set(stack, Array.append(Array.initNonEmpty(current), route));
        yield* Debug.log({
          event: "router.replace",
          path: route.path,
          index: route.index,
          old_path: oldRoute.path,
          old_index: oldRoute.index,
        });
        yield* notifier.emit(RouterEvent.Replace({ activeRoute: route, oldRoute }));
      });

    // --- Ungated removal ---

    const findByPath = (current: Stack, path: string) =>
      Array.findLast(current, (route) => route.path === path);

    const findByHostReference = (current: Stack, reference: string) =>
      Array.findLast(current, (route) => route.hostReference === reference);

    const popEntry = (
      target: ActiveRoute.ActiveRoute,
      result: unknown,
    ): Effect.Effect<PopOutcome> =>
      Effect.gen(function* () {
        const current = yield* Ref.get(stack);
        const remaining = Array.filter(current, (route) => route.index !== target.index);

        if (current.length === 1 || !Array.isNonEmptyReadonlyArray(remaining)) {
          yield* Debug.log({ event: "router.pop.exit", path: target.path });
          yield* Metrics.recordHostExit;
          yield* host.exit;
          return { _tag: "Exited" } as const;
        }

        yield* Ref.set(stack, remaining);
        yield* Debug.log({ event: "router.pop", path: target.path, index: target.index });
        yield* Metrics.recordPop;
        yield* Metrics.recordStackDepth(remaining.length);
        yield* notifier.emit(RouterEvent.Pop({ activeRoute: target, result }));
        return { _tag: "Popped", activeRoute: target } as const;
      });

    // --- Restoration ---

    const restore = (records: ReadonlyArray<Restoration.RestorablePageInformation>) =>
      Effect.gen(function* () {
        const restored = yield* Restoration.rebuild(registry, records);
        yield* Ref.set(stack, restored.routes);
        yield* Ref.set(nextIndex, restored.nextIndex);
        yield* Debug.log({
          event: "router.restore",
          count: restored.routes.length,
          next_index: restored.nextIndex,
        });
      });

    return Router.of({
      registry,

      activeRoutes: Ref.get(stack),
      current: Effect.map(Ref.get(stack), Array.lastNonEmpty),
      currentPath: Effect.map(Ref.get(stack), (current) => Array.lastNonEmpty(current).path),

      push: Effect.fn("RouterService.push")(function* (path: string, id?: string) {
        return yield* gate(path, id, commitPush("push", (current) => current));
      }),

      replace: Effect.fn("RouterService.replace")(function* (path: string, id?: string) {
        return yield* gate(path, id, commitReplace);
      }),

      removeAllAndPush: Effect.fn("RouterService.removeAllAndPush")(function* (
        path: string,
        id?: string,
      ) {
        return yield* gate(path, id, commitPush("removeAllAndPush", () => []));
      }),

      removeUntilAndPush: Effect.fn("RouterService.removeUntilAndPush")(function* (
        predicate: Predicate.Predicate<ActiveRoute.ActiveRoute>,
        path: string,
        id?: string,
      ) {
        return yield* gate(
          path,
          id,
          commitPush("removeUntilAndPush", (current) =>
            Option.match(Array.findLastIndex(current, predicate), {
              onNone: () => [],
              onSome: (index) => current.slice(0, index + 1),
            }),
          ),
        );
      }),

      pop: Effect.fn("RouterService.pop")(function* (result?: unknown) {
        const current = yield* Ref.get(stack);
        return yield* Debug.withTrace(popEntry(Array.lastNonEmpty(current), result));
      }),

      popByHostReference: Effect.fn("RouterService.popByHostReference")(function* (
        reference: string,
        result?: unknown,
      ) {
        const target = findByHostReference(yield* Ref.get(stack), reference);
        if (Option.isNone(target)) {
          return yield* new ActiveRouteNotFoundError({ operation: "popByHostReference", reference });
        }
        return yield* Debug.withTrace(popEntry(target.value, result));
      }),

      remove: Effect.fn("RouterService.remove")(function* (path: string) {
        const current = yield* Ref.get(stack);
        const target = findByPath(current, path);
        if (Option.isNone(target)) {
          return yield* new ActiveRouteNotFoundError({ operation: "remove", reference: path });
        }

        const remaining = Array.filter(current, (route) => route.index !== target.value.index);
        if (!Array.isNonEmptyReadonlyArray(remaining)) {
          return yield* new StackInvariantError({
            operation: "remove",
            reason: "cannot remove the only active route",
          });
        }

        yield* Ref.set(stack, remaining);
        yield* Debug.log({ event: "router.remove", path, index: target.value.index });
        return target.value;
      }),

      snapshot: Effect.map(Ref.get(stack), (current) => Array.map(current, Restoration.toRecord)),

      restore: Effect.fn("RouterService.restore")(function* (
        records: ReadonlyArray<Restoration.RestorablePageInformation>,
      ) {
        yield* restore(records);
      }),

      restoreUnknown: Effect.fn("RouterService.restoreUnknown")(function* (input: unknown) {
        yield* restore(yield* Restoration.decode(input));
      }),

      events: notifier.events,
      subscribe: notifier.subscribe,
      latestEvent: notifier.latest,
      shutdown: notifier.shutdown,
    });
  });

// =============================================================================
// Layers
// =============================================================================

/**
 * Router layer. The event channel closes when the layer's scope closes.
 * @since 1.0.0
 */
export const layer = (config: RouterConfig): Layer.Layer<Router, RouteConfigError, Frame | Host> =>
  Layer.scoped(Router, make(config));

// =============================================================================
// Accessors
// =============================================================================

/** @since 1.0.0 */
export const get: Effect.Effect<RouterService, never, Router> = Router;

/** @since 1.0.0 */
export const activeRoutes: Effect.Effect<Stack, never, Router> = Effect.flatMap(
  Router,
  (router) => router.activeRoutes,
);

/** @since 1.0.0 */
export const current: Effect.Effect<ActiveRoute.ActiveRoute, never, Router> = Effect.flatMap(
  Router,
  (router) => router.current,
);

/** @since 1.0.0 */
export const currentPath: Effect.Effect<string, never, Router> = Effect.flatMap(
  Router,
  (router) => router.currentPath,
);

/** @since 1.0.0 */
export const push = (path: string, id?: string): Effect.Effect<NavigationOutcome, never, Router> =>
  Effect.flatMap(Router, (router) => router.push(path, id));

/** @since 1.0.0 */
export const replace = (
  path: string,
  id?: string,
): Effect.Effect<NavigationOutcome, never, Router> =>
  Effect.flatMap(Router, (router) => router.replace(path, id));

/** @since 1.0.0 */
export const removeAllAndPush = (
  path: string,
  id?: string,
): Effect.Effect<NavigationOutcome, never, Router> =>
  Effect.flatMap(Router, (router) => router.removeAllAndPush(path, id));

/** @since 1.0.0 */
export const removeUntilAndPush = (
  predicate: Predicate.Predicate<ActiveRoute.ActiveRoute>,
  path: string,
  id?: string,
): Effect.Effect<NavigationOutcome, never, Router> =>
  Effect.flatMap(Router, (router) => router.removeUntilAndPush(predicate, path, id));

/** @since 1.0.0 */
export const pop = (result?: unknown): Effect.Effect<PopOutcome, never, Router> =>
  Effect.flatMap(Router, (router) => router.pop(result));

/** @since 1.0.0 */
export const popByHostReference = (
  reference: string,
  result?: unknown,
): Effect.Effect<PopOutcome, ActiveRouteNotFoundError, Router> =>
  Effect.flatMap(Router, (router) => router.popByHostReference(reference, result));

/** @since 1.0.0 */
export const remove = (
  path: string,
): Effect.Effect<ActiveRoute.ActiveRoute, ActiveRouteNotFoundError | StackInvariantError, Router> =>
  Effect.flatMap(Router, (router) => router.remove(path));

/** @since 1.0.0 */
export const snapshot: Effect.Effect<
  ReadonlyArray<Restoration.RestorablePageInformation>,
  never,
  Router
> = Effect.flatMap(Router, (router) => router.snapshot);

/** @since 1.0.0 */
export const restore = (
  records: ReadonlyArray<Restoration.RestorablePageInformation>,
): Effect.Effect<void, RestorationError, Router> =>
  Effect.flatMap(Router, (router) => router.restore(records));

/** @since 1.0.0 */
export const restoreUnknown = (input: unknown): Effect.Effect<void, RestorationError, Router> =>
  Effect.flatMap(Router, (router) => router.restoreUnknown(input));

/** @since 1.0.0 */
export const events: Stream.Stream<RouterEvent, never, Router> = Stream.unwrap(
  Effect.map(Router, (router) => router.events),
);

/** @since 1.0.0 */
export const subscribe = (
  handler: Notifier.EventHandler,
): Effect.Effect<void, never, Router | Scope.Scope> =>
  Effect.flatMap(Router, (router) => router.subscribe(handler));

/** @since 1.0.0 */
export const latestEvent: Effect.Effect<Option.Option<RouterEvent>, never, Router> =
  Effect.flatMap(Router, (router) => router.latestEvent);

/** @since 1.0.0 */
export const shutdown: Effect.Effect<void, never, Router> = Effect.flatMap(
  Router,
  (router) => router.shutdown,
);
