/**
 * @since 1.0.0
 * Host Service
 *
 * The environment the router runs in. Popping the last stack entry asks the host
 * to exit instead of emptying the stack.
 */
import { Context, Effect, Layer, Ref } from "effect";
import * as Debug from "../debug/debug.js";

// =============================================================================
// Service interface
// =============================================================================

export interface HostService {
  readonly exit: Effect.Effect<void>;
}

export interface TestHostService {
  readonly exitCount: Effect.Effect<number>;
}

// =============================================================================
// Tags
// =============================================================================

export class Host extends Context.Tag("routestack/platform/Host")<Host, HostService>() {}

export class TestHost extends Context.Tag("routestack/platform/TestHost")<
  TestHost,
  TestHostService
>() {}

// =============================================================================
// Layers
// =============================================================================

/**
 * Host layer running `onExit` when the router leaves the application.
 * @since 1.0.0
 */
export const layer = (onExit: Effect.Effect<void>): Layer.Layer<Host> =>
  Layer.succeed(
    Host,
    Host.of({
      exit: Effect.zipRight(Debug.log({ event: "host.exit" }), onExit),
    }),
  );

/**
 * Node host: exits the process.
 * @since 1.0.0
 */
export const node: Layer.Layer<Host> = layer(
  Effect.sync(() => {
    process.exit(0);
  }),
);

/**
 * Records exits instead of performing them.
 * @since 1.0.0
 */
export const test: Layer.Layer<Host | TestHost> = Layer.effectContext(
  Effect.gen(function* () {
    const exits = yield* Ref.make(0);

    const host = Host.of({
      exit: Effect.zipRight(Debug.log({ event: "host.exit" }), Ref.update(exits, (n) => n + 1)),
    });

    const testHost = TestHost.of({ exitCount: Ref.get(exits) });

    return Context.make(Host, host).pipe(Context.add(TestHost, testHost));
  }),
);

/**
 * Number of exits the test host has recorded.
 * @since 1.0.0
 */
export const exitCount: Effect.Effect<number, never, TestHost> = Effect.flatMap(
  TestHost,
  (host) => host.exitCount,
);
