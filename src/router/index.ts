/**
 * @since 1.0.0
 * Router module for routestack
 *
 * A stack of active routes with middleware-gated navigation, deferred
 * push/pop/replace events and restoration from serialized records.
 *
 * ## Quick Start
 *
 * ```ts
 * import { Effect, Layer } from "effect"
 * import * as Router from "routestack/router"
 * import { Frame, Host } from "routestack"
 *
 * const routes = Router.Routes.make()
 *   .add(Router.Route.make("/").content(() => "home"))
 *   .add(Router.Route.make("/users/:id").content(({ id }) => `user ${id}`))
 *   .add(Router.Route.make("/not-found").content(() => "not found"))
 *
 * const RouterLive = Router.layer({ routes, notFoundPath: "/not-found" }).pipe(
 *   Layer.provide(Layer.mergeAll(Frame.live, Host.node)),
 * )
 *
 * Effect.runPromise(
 *   Router.push("/users/42").pipe(Effect.provide(RouterLive)),
 * )
 * ```
 *
 * @module routestack/router
 */

// Route definitions
export * as Route from "./route.js";
export * as Routes from "./routes.js";
export type { RouteDefinition, RouteBuilder, ContentFactory } from "./route.js";
export type { RoutesCollection, RoutesManifest } from "./routes.js";
export { compile, stripQuery, type PathPattern, type RouteParams } from "./matching.js";

// Resolution
export * as Registry from "./registry.js";

// Middleware
export * as Middleware from "./middleware.js";
export type { Next, PipelineOutcome, MiddlewareFactory } from "./middleware.js";

// Active routes and events
export { ActiveRoute, renderContent } from "./active-route.js";
export { RouterEvent, Push, Pop, Replace } from "./events.js";

// Event channel
export * as Notifier from "./notifier.js";
export type { EventHandler } from "./notifier.js";

// Listeners
export * as Listeners from "./listeners.js";
export type { ListenerCallbacks, RouteListener } from "./listeners.js";

// Restoration
export {
  RestorablePageInformation,
  RestorablePageInformationList,
  toRecord,
} from "./restoration.js";

// Errors
export {
  RouteConfigError,
  ActiveRouteNotFoundError,
  StackInvariantError,
  RestorationError,
} from "./errors.js";

// Router service
export {
  Router,
  INITIAL_ID,
  type RouterService,
  type NavigationOutcome,
  type PopOutcome,
  type Stack,
  make,
  layer,
  get,
  activeRoutes,
  current,
  currentPath,
  push,
  replace,
  removeAllAndPush,
  removeUntilAndPush,
  pop,
  popByHostReference,
  remove,
  snapshot,
  restore,
  restoreUnknown,
  events,
  subscribe,
  latestEvent,
  shutdown,
} from "./service.js";
