/**
 * @since 1.0.0
 * Routes Collection
 *
 * Collects route definitions in priority order. Earlier routes win when patterns overlap.
 *
 * @example
 * ```ts
 * import { Routes, Route } from "routestack"
 *
 * export const routes = Routes.make()
 *   .add(Route.make("/").content(() => "home"))
 *   .add(Route.make("/users/:id").content(({ id }) => `user ${id}`))
 *   .add(Route.make("/not-found").content(() => "not found"))
 * ```
 */
import type { RouteBuilder, RouteDefinition } from "./route.js";

// =============================================================================
// Routes Manifest (Internal)
// =============================================================================

/**
 * Manifest produced by the Routes collection and consumed by the registry.
 * @since 1.0.0
 */
export interface RoutesManifest {
  readonly routes: ReadonlyArray<RouteDefinition>;
}

// =============================================================================
// Routes Collection Type
// =============================================================================

/**
 * Routes collection that accumulates route definitions.
 * @since 1.0.0
 */
export interface RoutesCollection {
  readonly _tag: "RoutesCollection";

  /** Add a route after every route already in the collection. */
  readonly add: <Path extends string>(route: RouteBuilder<Path>) => RoutesCollection;

  readonly manifest: RoutesManifest;
}

// =============================================================================
// Implementation
// =============================================================================

/** @internal */
const makeCollection = (manifest: RoutesManifest): RoutesCollection => ({
  _tag: "RoutesCollection",

  add: (route) =>
    makeCollection({
      ...manifest,
      routes: [...manifest.routes, route.definition],
    }),

  manifest,
});

// =============================================================================
// Public API
// =============================================================================

/**
 * Create an empty routes collection.
 * @since 1.0.0
 */
export const make = (): RoutesCollection => makeCollection({ routes: [] });

/**
 * Check if a value is a RoutesCollection.
 * @since 1.0.0
 */
export const isRoutesCollection = (value: unknown): value is RoutesCollection =>
  typeof value === "object" && value !== null && "_tag" in value && value._tag === "RoutesCollection";

/**
 * Normalize either form of route configuration to the ordered definition list.
 * @since 1.0.0
 */
export const definitionsOf = (
  routes: RoutesCollection | ReadonlyArray<RouteDefinition>,
): ReadonlyArray<RouteDefinition> => (isRoutesCollection(routes) ? routes.manifest.routes : routes);
