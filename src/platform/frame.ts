/**
 * @since 1.0.0
 * Frame Service
 *
 * Defers work to the next frame boundary. Everything scheduled before a frame
 * flushes runs in that flush, in scheduling order. Work scheduled while a flush
 * is running waits for the following frame.
 */
import { Context, Effect, Layer, Queue } from "effect";
import * as Debug from "../debug/debug.js";

// =============================================================================
// Service interface
// =============================================================================

export interface FrameService {
  readonly schedule: (task: Effect.Effect<void>) => Effect.Effect<void>;
}

// =============================================================================
// Test-only interface
// =============================================================================

export interface TestFrameService {
  /** Run one frame: every task pending when called. */
  readonly flush: Effect.Effect<void>;
  readonly pending: Effect.Effect<number>;
}

// =============================================================================
// Tags
// =============================================================================

export class Frame extends Context.Tag("routestack/platform/Frame")<Frame, FrameService>() {}

export class TestFrame extends Context.Tag("routestack/platform/TestFrame")<
  TestFrame,
  TestFrameService
>() {}

// =============================================================================
// Shared flush
// =============================================================================

const runTasks = (tasks: ReadonlyArray<Effect.Effect<void>>): Effect.Effect<void> =>
  Effect.zipRight(
    Debug.log({ event: "frame.flush", task_count: tasks.length }),
    Effect.forEach(tasks, (task) => task, { discard: true }),
  );

// =============================================================================
// Host-driven layer
// =============================================================================

/**
 * Request a callback at the next frame. Returns a function that cancels the request.
 * @since 1.0.0
 */
export type RequestFrame = (callback: () => void) => () => void;

/**
 * Frame layer driven by a host's frame callback.
 * At most one frame request is outstanding at a time, and a frame starts only
 * after the previous one has finished. Closing the layer's scope cancels the
 * request and drops whatever is still queued.
 * @since 1.0.0
 */
export const make = (requestFrame: RequestFrame): Layer.Layer<Frame> =>
  Layer.scoped(
    Frame,
    Effect.gen(function* () {
      const batches = yield* Queue.unbounded<ReadonlyArray<Effect.Effect<void>>>();
      let queue: Array<Effect.Effect<void>> = [];
      let cancel: (() => void) | undefined;

      // Frames run one at a time, in request order
      yield* Queue.take(batches).pipe(Effect.flatMap(runTasks), Effect.forever, Effect.forkScoped);

      const flush = () => {
        cancel = undefined;
        const tasks = queue;
        queue = [];
        Queue.unsafeOffer(batches, tasks);
      };

      yield* Effect.addFinalizer(() =>
        Effect.sync(() => {
          cancel?.();
          cancel = undefined;
          queue = [];
        }),
      );

      return Frame.of({
        schedule: (task) =>
          Effect.sync(() => {
            queue.push(task);
            if (cancel === undefined) {
              cancel = requestFrame(flush);
            }
          }),
      });
    }),
  );

/**
 * Timer-driven frames: a frame flushes once the current macrotask completes.
 * @since 1.0.0
 */
export const live: Layer.Layer<Frame> = make((callback) => {
  const handle = setTimeout(callback, 0);
  return () => {
    clearTimeout(handle);
  };
});

// =============================================================================
// Test layer
// =============================================================================

/**
 * Frames flush only when a test calls `TestFrame.flush`.
 * @since 1.0.0
 */
export const test: Layer.Layer<Frame | TestFrame> = Layer.effectContext(
  Effect.sync(() => {
    let queue: Array<Effect.Effect<void>> = [];

    const frame = Frame.of({
      schedule: (task) =>
        Effect.sync(() => {
          queue.push(task);
        }),
    });

    const testFrame = TestFrame.of({
      flush: Effect.suspend(() => {
        const tasks = queue;
        queue = [];
        return runTasks(tasks);
      }),
      pending: Effect.sync(() => queue.length),
    });

    return Context.make(Frame, frame).pipe(Context.add(TestFrame, testFrame));
  }),
);

/**
 * Run one test frame.
 * @since 1.0.0
 */
export const flush: Effect.Effect<void, never, TestFrame> = Effect.flatMap(
  TestFrame,
  (frame) => frame.flush,
);

/**
 * Number of tasks waiting for the next test frame.
 * @since 1.0.0
 */
export const pending: Effect.Effect<number, never, TestFrame> = Effect.flatMap(
  TestFrame,
  (frame) => frame.pending,
);
