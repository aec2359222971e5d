/**
 * @since 1.0.0
 * Event notifier - replay-latest broadcast of router events
 *
 * Emission is deferred to the next frame through the {@link Frame} service, so
 * subscribers never observe a stack that is mid-mutation. Events are delivered in
 * the order they were emitted. The channel closes once; afterwards every emission
 * is dropped.
 */
import { Cause, Effect, Option, Ref, Stream } from "effect";
import type { Scope } from "effect";
import * as Debug from "../debug/debug.js";
import * as Metrics from "../debug/metrics.js";
import { Frame } from "../platform/frame.js";
import type { RouterEvent } from "./events.js";

/**
 * Receives router events. A defect raised here is reported and does not reach
 * other subscribers or the router.
 * @since 1.0.0
 */
export type EventHandler = (event: RouterEvent) => Effect.Effect<void>;

/**
 * @since 1.0.0
 */
export interface Notifier {
  /** Schedule `event` for delivery at the next frame. */
  readonly emit: (event: RouterEvent) => Effect.Effect<void>;
  /**
   * Register `handler` for the lifetime of the current scope.
   * The most recently delivered event, if any, is replayed to it immediately.
   */
  readonly subscribe: (handler: EventHandler) => Effect.Effect<void, never, Scope.Scope>;
  /** Stream of delivered events, starting with the replayed one. Ends when the channel closes. */
  readonly events: Stream.Stream<RouterEvent>;
  /** The most recently delivered event. */
  readonly latest: Effect.Effect<Option.Option<RouterEvent>>;
  readonly subscriberCount: Effect.Effect<number>;
  readonly isClosed: Effect.Effect<boolean>;
  /** Close the channel. Safe to call more than once. */
  readonly shutdown: Effect.Effect<void>;
}

interface Subscriber {
  readonly handler: EventHandler;
  readonly onClose: Effect.Effect<void>;
}

/**
 * Create a notifier scheduling through the current {@link Frame}.
 * @since 1.0.0
 */
export const make: Effect.Effect<Notifier, never, Frame> = Effect.gen(function* () {
  const frame = yield* Frame;
  const latest = yield* Ref.make(Option.none<RouterEvent>());
  const closed = yield* Ref.make(false);
  const subscribers = new Map<number, Subscriber>();
  let nextSubscriberId = 0;

  const invoke = (handler: EventHandler, event: RouterEvent): Effect.Effect<void> =>
    handler(event).pipe(
      Effect.catchAllCause((cause) =>
        Debug.log({
          event: "router.listener.error",
          event_tag: event._tag,
          cause: Cause.pretty(cause),
        }),
      ),
    );

  const deliver = (event: RouterEvent): Effect.Effect<void> =>
    Effect.gen(function* () {
      if (yield* Ref.get(closed)) {
        yield* Debug.log({ event: "router.event.dropped", event_tag: event._tag, reason: "closed" });
        return;
      }

      yield* Ref.set(latest, Option.some(event));
      const targets = Array.from(subscribers.values());

      yield* Debug.log({
        event: "router.event.emit",
        event_tag: event._tag,
        path: event.activeRoute.path,
        subscriber_count: targets.length,
      });

      for (const subscriber of targets) {
        yield* invoke(subscriber.handler, event);
      }
      yield* Metrics.recordDelivered;
    });

  const emit = (event: RouterEvent): Effect.Effect<void> =>
    Effect.gen(function* () {
      if (yield* Ref.get(closed)) {
        yield* Debug.log({ event: "router.event.dropped", event_tag: event._tag, reason: "closed" });
        return;
      }
      yield* Debug.log({
        event: "router.event.schedule",
        event_tag: event._tag,
        path: event.activeRoute.path,
      });
      yield* frame.schedule(deliver(event));
    });

  const register = (
    handler: EventHandler,
    onClose: Effect.Effect<void>,
  ): Effect.Effect<boolean, never, Scope.Scope> =>
    Effect.gen(function* () {
      if (yield* Ref.get(closed)) return false;

      const id = nextSubscriberId++;
      subscribers.set(id, { handler, onClose });
      yield* Effect.addFinalizer(() =>
        Effect.suspend(() => {
          subscribers.delete(id);
          return Debug.log({ event: "router.unsubscribe", subscriber_count: subscribers.size });
        }),
      );

      const replay = yield* Ref.get(latest);
      yield* Debug.log({
        event: "router.subscribe",
        subscriber_count: subscribers.size,
        replayed: Option.isSome(replay),
      });
      if (Option.isSome(replay)) {
        yield* invoke(handler, replay.value);
      }
      return true;
    });

  const subscribe = (handler: EventHandler): Effect.Effect<void, never, Scope.Scope> =>
    Effect.asVoid(register(handler, Effect.void));

  const events: Stream.Stream<RouterEvent> = Stream.asyncScoped<RouterEvent>((emitter) =>
    Effect.gen(function* () {
      const registered = yield* register(
        (event) => Effect.asVoid(Effect.promise(() => emitter.single(event))),
        Effect.asVoid(Effect.promise(() => emitter.end())),
      );
      if (!registered) {
        yield* Effect.asVoid(Effect.promise(() => emitter.end()));
      }
    }),
  );

  const shutdown: Effect.Effect<void> = Effect.gen(function* () {
    const alreadyClosed = yield* Ref.getAndSet(closed, true);
    yield* Debug.log({ event: "router.shutdown", already_closed: alreadyClosed });
    if (alreadyClosed) return;

    const targets = Array.from(subscribers.values());
    subscribers.clear();
    for (const subscriber of targets) {
      yield* subscriber.onClose;
    }
  });

  return {
    emit,
    subscribe,
    events,
    latest: Ref.get(latest),
    subscriberCount: Effect.sync(() => subscribers.size),
    isClosed: Ref.get(closed),
    shutdown,
  };
});
