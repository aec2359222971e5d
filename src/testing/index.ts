/**
 * @since 1.0.0
 * Testing utilities for routestack
 *
 * A router over manual frames and a recording host. Works with @effect/vitest.
 *
 * @example
 * ```ts
 * it.scoped("pushes", () =>
 *   Effect.gen(function* () {
 *     yield* Router.push("/a")
 *     yield* Testing.flush
 *   }).pipe(Effect.provide(Testing.testLayer(config))),
 * )
 * ```
 */
import { Effect, Layer } from "effect";
import type { RouterConfig } from "../config.js";
import * as Frame from "../platform/frame.js";
import * as Host from "../platform/host.js";
import * as Platform from "../platform/index.js";
import type { RouteConfigError } from "../router/errors.js";
import { Router, layer } from "../router/service.js";

/**
 * Router plus the test platform it runs on. Tests drive frames with {@link flush}
 * and read exits with {@link exitCount}.
 * @since 1.0.0
 */
export const testLayer = (
  config: RouterConfig,
): Layer.Layer<Router | Frame.Frame | Frame.TestFrame | Host.Host | Host.TestHost, RouteConfigError> =>
  layer(config).pipe(Layer.provideMerge(Platform.test));

/**
 * Deliver every event scheduled so far.
 * Runs frames until none is pending, so deliveries that schedule more work settle too.
 * @since 1.0.0
 */
export const flush: Effect.Effect<void, never, Frame.TestFrame> = Effect.gen(function* () {
  while ((yield* Frame.pending) > 0) {
    yield* Frame.flush;
  }
});

/**
 * Number of tasks waiting for the next frame.
 * @since 1.0.0
 */
export const pending: Effect.Effect<number, never, Frame.TestFrame> = Frame.pending;

/**
 * Number of host exits recorded so far.
 * @since 1.0.0
 */
export const exitCount: Effect.Effect<number, never, Host.TestHost> = Host.exitCount;
