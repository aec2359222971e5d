/**
 * @since 1.0.0
 * Type-safe configuration for routestack
 *
 * Provides `defineConfig` for the router configuration and the Effect `Config`
 * descriptors the library reads from the environment.
 */
import { Config } from "effect";
import type { Option } from "effect";
import type { RouteDefinition } from "./router/route.js";
import type { RoutesCollection } from "./router/routes.js";

/**
 * Router configuration, supplied once when the router layer is built.
 * @since 1.0.0
 */
export interface RouterConfig {
  /** Route definitions, in priority order (first match wins). */
  readonly routes: RoutesCollection | ReadonlyArray<RouteDefinition>;
  /** Path of the route used for every path that matches nothing. Must itself be registered. */
  readonly notFoundPath: string;
  /** Supplies the path of the first stack entry. Defaults to `"/"`. */
  readonly initialPath?: () => string;
}

/**
 * Define a router configuration with full type safety.
 *
 * @example
 * ```ts
 * import { defineConfig, Route, Routes } from "routestack"
 *
 * export default defineConfig({
 *   routes: Routes.make()
 *     .add(Route.make("/").content(() => "home"))
 *     .add(Route.make("/not-found").content(() => "not found")),
 *   notFoundPath: "/not-found",
 * })
 * ```
 *
 * @since 1.0.0
 */
export const defineConfig = (config: RouterConfig): RouterConfig => config;

/**
 * `ROUTESTACK_DEBUG` - debug event filter read by `Debug.initFromEnvironment`.
 * @since 1.0.0
 */
export const debugConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.string("ROUTESTACK_DEBUG"),
);
