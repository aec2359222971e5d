/**
 * Frame Service Tests
 *
 * The manual test layer, and the host-driven layer over a hand-cranked
 * frame callback.
 */
import { assert, describe, it } from "@effect/vitest";
import { Deferred, Effect } from "effect";
import * as Frame from "../frame.js";

const manualFrames = () => {
  const callbacks: Array<() => void> = [];
  const state = { cancelled: 0 };
  const request: Frame.RequestFrame = (callback) => {
    callbacks.push(callback);
    return () => {
      state.cancelled += 1;
    };
  };
  return { callbacks, state, layer: Frame.make(request) };
};

const note = (order: Array<string>, label: string) =>
  Effect.sync(() => {
    order.push(label);
  });

const fire = (callbacks: ReadonlyArray<() => void>, n: number) =>
  Effect.sync(() => {
    callbacks[n]?.();
  });

// =============================================================================
// Test layer
// Scope: frames run only when flushed
// =============================================================================

describe("Frame.test", () => {
  it.effect("holds tasks until flushed", () =>
    Effect.gen(function* () {
      const frame = yield* Frame.Frame;
      const order: Array<string> = [];

      yield* frame.schedule(note(order, "a"));
      yield* frame.schedule(note(order, "b"));

      assert.deepStrictEqual(order, []);
      assert.strictEqual(yield* Frame.pending, 2);

      yield* Frame.flush;

      assert.deepStrictEqual(order, ["a", "b"]);
      assert.strictEqual(yield* Frame.pending, 0);
    }).pipe(Effect.provide(Frame.test)),
  );

  it.effect("leaves work scheduled during a flush for the next frame", () =>
    Effect.gen(function* () {
      const frame = yield* Frame.Frame;
      const order: Array<string> = [];

      yield* frame.schedule(
        Effect.zipRight(
          note(order, "outer"),
          frame.schedule(note(order, "inner")),
        ),
      );
      yield* Frame.flush;

      assert.deepStrictEqual(order, ["outer"]);
      assert.strictEqual(yield* Frame.pending, 1);

      yield* Frame.flush;

      assert.deepStrictEqual(order, ["outer", "inner"]);
    }).pipe(Effect.provide(Frame.test)),
  );
});

// =============================================================================
// Host-driven layer
// Scope: one outstanding request, cancelled with the scope
// =============================================================================

describe("Frame.make", () => {
  it.effect("keeps a single frame request outstanding", () => {
    const frames = manualFrames();
    return Effect.gen(function* () {
      const frame = yield* Frame.Frame;
      const done = yield* Deferred.make<void>();
      const order: Array<string> = [];

      yield* frame.schedule(note(order, "a"));
      yield* frame.schedule(
        Effect.zipRight(
          note(order, "b"),
          Deferred.succeed(done, undefined),
        ),
      );

      assert.strictEqual(frames.callbacks.length, 1);

      yield* fire(frames.callbacks, 0);
      yield* Deferred.await(done);

      assert.deepStrictEqual(order, ["a", "b"]);
    }).pipe(Effect.provide(frames.layer));
  });

  it.effect("requests a new frame for work scheduled during a flush", () => {
    const frames = manualFrames();
    return Effect.gen(function* () {
      const frame = yield* Frame.Frame;
      const outerDone = yield* Deferred.make<void>();
      const innerDone = yield* Deferred.make<void>();
      const order: Array<string> = [];

      yield* frame.schedule(
        Effect.gen(function* () {
          order.push("outer");
          yield* frame.schedule(
            Effect.zipRight(
              note(order, "inner"),
              Deferred.succeed(innerDone, undefined),
            ),
          );
          yield* Deferred.succeed(outerDone, undefined);
        }),
      );

      yield* fire(frames.callbacks, 0);
      yield* Deferred.await(outerDone);

      assert.deepStrictEqual(order, ["outer"]);
      assert.strictEqual(frames.callbacks.length, 2);

      yield* fire(frames.callbacks, 1);
      yield* Deferred.await(innerDone);

      assert.deepStrictEqual(order, ["outer", "inner"]);
    }).pipe(Effect.provide(frames.layer));
  });

  it.effect("starts a frame only after the previous frame has finished", () => {
    const frames = manualFrames();
    return Effect.gen(function* () {
      const frame = yield* Frame.Frame;
      const release = yield* Deferred.make<void>();
      const done = yield* Deferred.make<void>();
      const order: Array<string> = [];

      yield* frame.schedule(Effect.zipRight(Deferred.await(release), note(order, "first")));
      yield* fire(frames.callbacks, 0);

      yield* frame.schedule(
        Effect.zipRight(
          note(order, "second"),
          Deferred.succeed(done, undefined),
        ),
      );
      yield* fire(frames.callbacks, 1);

      for (let i = 0; i < 10; i++) {
        yield* Effect.yieldNow();
      }
      assert.deepStrictEqual(order, []);

      yield* Deferred.succeed(release, undefined);
      yield* Deferred.await(done);

      assert.deepStrictEqual(order, ["first", "second"]);
    }).pipe(Effect.provide(frames.layer));
  });

  it.effect("cancels the outstanding request when the scope closes", () => {
    const frames = manualFrames();
    return Effect.gen(function* () {
      yield* Effect.flatMap(Frame.Frame, (frame) => frame.schedule(Effect.void)).pipe(
        Effect.provide(frames.layer),
      );

      assert.strictEqual(frames.callbacks.length, 1);
      assert.strictEqual(frames.state.cancelled, 1);
    });
  });

  it.effect("cancels nothing when no frame was requested", () => {
    const frames = manualFrames();
    return Effect.gen(function* () {
      yield* Effect.provide(Frame.Frame, frames.layer);

      assert.strictEqual(frames.state.cancelled, 0);
    });
  });
});
