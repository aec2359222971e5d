/**
 * @since 1.0.0
 * Route listeners
 *
 * React to router events for particular routes, matched by path or by the id
 * given at navigation time.
 *
 * @example
 * ```ts
 * import { Effect } from "effect"
 * import { Listeners } from "routestack"
 *
 * yield* Listeners.listen(
 *   Listeners.path("/checkout", {
 *     onPop: (_route, result) => Effect.log("checkout closed with", result),
 *   }),
 * )
 * ```
 */
import { Effect, Option } from "effect";
import type { Scope } from "effect";
import type { ActiveRoute } from "./active-route.js";
import { RouterEvent } from "./events.js";
import { Router } from "./service.js";

/**
 * @since 1.0.0
 */
export interface ListenerCallbacks {
  readonly onPush?: (activeRoute: ActiveRoute) => Effect.Effect<void>;
  readonly onPop?: (activeRoute: ActiveRoute, result: unknown) => Effect.Effect<void>;
  readonly onReplace?: (activeRoute: ActiveRoute, oldRoute: ActiveRoute) => Effect.Effect<void>;
}

/**
 * Callbacks plus the predicate selecting the events they receive.
 * An event matches on its `activeRoute` (the new entry for a replace).
 * @since 1.0.0
 */
export interface RouteListener extends ListenerCallbacks {
  readonly isMatch: (activeRoute: ActiveRoute) => boolean;
}

/**
 * Listen to one path (exact string equality).
 * @since 1.0.0
 */
export const path = (target: string, callbacks: ListenerCallbacks): RouteListener => ({
  ...callbacks,
  isMatch: (activeRoute) => activeRoute.path === target,
});

/**
 * Listen to one navigation id.
 * @since 1.0.0
 */
export const id = (target: string, callbacks: ListenerCallbacks): RouteListener => ({
  ...callbacks,
  isMatch: (activeRoute) => Option.exists(activeRoute.id, (value) => value === target),
});

/**
 * Listen to any of several paths or ids.
 * @since 1.0.0
 */
export const multi = (
  targets: { readonly paths?: ReadonlyArray<string>; readonly ids?: ReadonlyArray<string> },
  callbacks: ListenerCallbacks,
): RouteListener => ({
  ...callbacks,
  isMatch: (activeRoute) =>
    (targets.paths?.includes(activeRoute.path) ?? false) ||
    Option.exists(activeRoute.id, (value) => targets.ids?.includes(value) ?? false),
});

/**
 * Run the callback matching `event`, if the listener matches it.
 * @since 1.0.0
 */
export const dispatch = (listener: RouteListener, event: RouterEvent): Effect.Effect<void> => {
  if (!listener.isMatch(event.activeRoute)) return Effect.void;

  return RouterEvent.$match(event, {
    Push: ({ activeRoute }) => listener.onPush?.(activeRoute) ?? Effect.void,
    Pop: ({ activeRoute, result }) => listener.onPop?.(activeRoute, result) ?? Effect.void,
    Replace: ({ activeRoute, oldRoute }) =>
      listener.onReplace?.(activeRoute, oldRoute) ?? Effect.void,
  });
};

/**
 * Subscribe `listener` to the router for the lifetime of the current scope.
 * @since 1.0.0
 */
export const listen = (listener: RouteListener): Effect.Effect<void, never, Router | Scope.Scope> =>
  Effect.flatMap(Router, (router) => router.subscribe((event) => dispatch(listener, event)));
