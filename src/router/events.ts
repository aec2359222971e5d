/**
 * @since 1.0.0
 * Router events
 *
 * Emitted after every committed push, pop and replace. Silent removals
 * (`remove`, the removals of `removeAllAndPush`/`removeUntilAndPush`) and
 * restoration emit nothing.
 */
import { Data } from "effect";
import type { ActiveRoute } from "./active-route.js";

/**
 * @since 1.0.0
 */
export type RouterEvent = Data.TaggedEnum<{
  Push: { readonly activeRoute: ActiveRoute };
  Pop: { readonly activeRoute: ActiveRoute; readonly result: unknown };
  Replace: { readonly activeRoute: ActiveRoute; readonly oldRoute: ActiveRoute };
}>;

/**
 * Constructors, guards and `$match` for {@link RouterEvent}.
 * @since 1.0.0
 */
export const RouterEvent = Data.taggedEnum<RouterEvent>();

/** @since 1.0.0 */
export const Push = RouterEvent.Push;
/** @since 1.0.0 */
export const Pop = RouterEvent.Pop;
/** @since 1.0.0 */
export const Replace = RouterEvent.Replace;
