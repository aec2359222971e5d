/**
 * @since 1.0.0
 * Active route - one entry of the navigation stack
 */
import { Data, Option } from "effect";
import type { RouteParams } from "./matching.js";
import type { RouteDefinition } from "./route.js";

/**
 * A resolved, indexed instantiation of a route definition.
 *
 * `index` is unique for the router's lifetime and survives restoration.
 * `id` is caller supplied and only used to match listeners.
 *
 * @since 1.0.0
 */
export class ActiveRoute extends Data.Class<{
  readonly definition: RouteDefinition;
  readonly path: string;
  readonly index: number;
  readonly id: Option.Option<string>;
  readonly params: RouteParams;
}> {
  /**
   * Name the host navigator knows this entry by.
   * `popByHostReference` matches against it.
   */
  get hostReference(): string {
    return `${this.index}:${this.path}`;
  }
}

/**
 * Create an active route, decoding params from the concrete path.
 * A path the definition does not match (the not-found fallback) yields no params.
 * @since 1.0.0
 */
export const make = (
  definition: RouteDefinition,
  path: string,
  index: number,
  id: Option.Option<string>,
): ActiveRoute =>
  new ActiveRoute({
    definition,
    path,
    index,
    id,
    params: Option.getOrElse(definition.decode(path), (): RouteParams => ({})),
  });

/**
 * Invoke the route's content factory with its params.
 * `None` when the definition declares no content.
 * @since 1.0.0
 */
export const renderContent = (activeRoute: ActiveRoute): Option.Option<unknown> =>
  activeRoute.definition.content === undefined
    ? Option.none()
    : Option.some(activeRoute.definition.content(activeRoute.params));
