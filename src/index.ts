/**
 * @since 1.0.0
 * routestack - an Effect-native navigation stack controller
 *
 * ## Key Concepts
 *
 * - **Route stack**: an ordered list of active routes, oldest first, never empty
 * - **Middleware**: guards that let a navigation continue or silently drop it
 * - **Events**: push, pop and replace notifications delivered at the next frame
 * - **Restoration**: rebuild the stack from `{ path, index, id }` records
 *
 * ## Core Exports
 *
 * - {@link Router} - The router service, its layer and accessors
 * - {@link Route} / {@link Routes} - Route builders
 * - {@link Debug} - Wide-event debug logging
 * - {@link Metrics} - Navigation counters
 *
 * @module routestack
 */

export * as Router from "./router/index.js";
export { Route, Routes, Middleware, Listeners, RouterEvent, ActiveRoute } from "./router/index.js";
export type { RouteDefinition, RouterService } from "./router/index.js";

export { Frame, Host } from "./platform/index.js";
export * as Platform from "./platform/index.js";

export * as Debug from "./debug/debug.js";
export * as Metrics from "./debug/metrics.js";

export { defineConfig, debugConfig, type RouterConfig } from "./config.js";
