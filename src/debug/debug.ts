/**
 * @since 1.0.0
 * Debug logging for routestack
 *
 * Uses wide event pattern - one structured log per operation with full context.
 * Disabled by default. Enable programmatically or through the `ROUTESTACK_DEBUG`
 * environment variable (see {@link initFromEnvironment}).
 *
 * @example
 * ```ts
 * import { Debug } from "routestack"
 *
 * Debug.enable("router.middleware")
 * Debug.registerPlugin(Debug.createPlugin("audit", (event) => audit.write(event)))
 * ```
 */
import { createConsola } from "consola";
import { Effect, FiberRef, GlobalValue, Layer, Option } from "effect";
import { debugConfig } from "../config.js";

/** Base fields for all events */
interface BaseEvent {
  readonly timestamp: string;
  readonly duration_ms?: number;
  /** Trace ID for correlating events across one navigation attempt */
  readonly traceId?: string;
}

/** Resolution events */
type RouterInitEvent = BaseEvent & {
  readonly event: "router.init";
  readonly path: string;
  readonly index: number;
  readonly route_count: number;
};

type RouterResolveEvent = BaseEvent & {
  readonly event: "router.resolve";
  readonly path: string;
  readonly route_pattern: string;
};

type RouterResolveNotFoundEvent = BaseEvent & {
  readonly event: "router.resolve.notfound";
  readonly path: string;
  readonly route_pattern: string;
};

/** Middleware events */
type RouterMiddlewareStartEvent = BaseEvent & {
  readonly event: "router.middleware.start";
  readonly route_pattern: string;
  readonly middleware_count: number;
};

type RouterMiddlewareProceedEvent = BaseEvent & {
  readonly event: "router.middleware.proceed";
  readonly route_pattern: string;
};

type RouterMiddlewareAbortEvent = BaseEvent & {
  readonly event: "router.middleware.abort";
  readonly route_pattern: string;
};

/** Stack mutation events */
type RouterPushEvent = BaseEvent & {
  readonly event: "router.push";
  readonly operation: "push" | "removeAllAndPush" | "removeUntilAndPush";
  readonly path: string;
  readonly index: number;
  readonly removed: number;
};

type RouterReplaceEvent = BaseEvent & {
  readonly event: "router.replace";
  readonly path: string;
  readonly index: number;
  readonly old_path: string;
  readonly old_index: number;
};

type RouterPopEvent = BaseEvent & {
  readonly event: "router.pop";
  readonly path: string;
  readonly index: number;
};

type RouterPopExitEvent = BaseEvent & {
  readonly event: "router.pop.exit";
  readonly path: string;
};

type RouterRemoveEvent = BaseEvent & {
  readonly event: "router.remove";
  readonly path: string;
  readonly index: number;
};

type RouterRestoreEvent = BaseEvent & {
  readonly event: "router.restore";
  readonly count: number;
  readonly next_index: number;
};

/** Event channel events */
type RouterEventScheduleEvent = BaseEvent & {
  readonly event: "router.event.schedule";
  readonly event_tag: string;
  readonly path: string;
};

type RouterEventEmitEvent = BaseEvent & {
  readonly event: "router.event.emit";
  readonly event_tag: string;
  readonly path: string;
  readonly subscriber_count: number;
};

type RouterEventDroppedEvent = BaseEvent & {
  readonly event: "router.event.dropped";
  readonly event_tag: string;
  readonly reason: string;
};

type RouterSubscribeEvent = BaseEvent & {
  readonly event: "router.subscribe";
  readonly subscriber_count: number;
  readonly replayed: boolean;
};

type RouterUnsubscribeEvent = BaseEvent & {
  readonly event: "router.unsubscribe";
  readonly subscriber_count: number;
};

type RouterListenerErrorEvent = BaseEvent & {
  readonly event: "router.listener.error";
  readonly event_tag: string;
  readonly cause: string;
};

type RouterShutdownEvent = BaseEvent & {
  readonly event: "router.shutdown";
  readonly already_closed: boolean;
};

/** Platform events */
type FrameFlushEvent = BaseEvent & {
  readonly event: "frame.flush";
  readonly task_count: number;
};

type HostExitEvent = BaseEvent & {
  readonly event: "host.exit";
};

/** All debug events as discriminated union */
export type DebugEvent =
  | RouterInitEvent
  | RouterResolveEvent
  | RouterResolveNotFoundEvent
  | RouterMiddlewareStartEvent
  | RouterMiddlewareProceedEvent
  | RouterMiddlewareAbortEvent
  | RouterPushEvent
  | RouterReplaceEvent
  | RouterPopEvent
  | RouterPopExitEvent
  | RouterRemoveEvent
  | RouterRestoreEvent
  | RouterEventScheduleEvent
  | RouterEventEmitEvent
  | RouterEventDroppedEvent
  | RouterSubscribeEvent
  | RouterUnsubscribeEvent
  | RouterListenerErrorEvent
  | RouterShutdownEvent
  | FrameFlushEvent
  | HostExitEvent;

/** Extract event type from DebugEvent */
export type EventType = DebugEvent["event"];

/** @internal */
type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * Input accepted by {@link log}: any debug event without the fields the logger stamps itself.
 * @since 1.0.0
 */
export type LogInput = DistributiveOmit<DebugEvent, "timestamp" | "traceId">;

// --- Plugin System ---

/**
 * Debug plugin interface.
 * Plugins receive structured events and can output them to any destination.
 * @since 1.0.0
 */
export interface DebugPlugin {
  /** Unique plugin identifier */
  readonly name: string;

  /**
   * Handle a debug event.
   * Errors thrown here are caught and reported through the console logger
   * so one plugin cannot break the others.
   */
  readonly handle: (event: DebugEvent) => void;
}

/**
 * Create a debug plugin.
 * @since 1.0.0
 */
export const createPlugin = (name: string, handle: (event: DebugEvent) => void): DebugPlugin => ({
  name,
  handle,
});

// --- Internal State ---

let _enabled = false;
let _filter: Set<string> | null = null;
const _plugins: Map<string, DebugPlugin> = new Map();

const debugLogger = createConsola({ defaults: { tag: "routestack" } });

// --- Trace ID Generation ---

/** Generate unique trace ID for correlating events across a navigation attempt */
let traceCounter = 0;
export const nextTraceId = (): string => `trace_${++traceCounter}`;

/**
 * FiberRef for current trace ID.
 * Set by the router at the start of every navigation attempt.
 * Uses GlobalValue to ensure single instance even with module duplication.
 * @since 1.0.0
 */
export const CurrentTraceId: FiberRef.FiberRef<string | undefined> = GlobalValue.globalValue(
  Symbol.for("routestack/Debug/CurrentTraceId"),
  () => FiberRef.unsafeMake<string | undefined>(undefined),
);

/**
 * Run an effect under a fresh trace ID.
 * @since 1.0.0
 */
export const withTrace = <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
  Effect.locally(effect, CurrentTraceId, nextTraceId());

// --- Enable/Disable API ---

/**
 * Enable debug logging.
 *
 * @param filter - Optional filter for event types
 *   - undefined: log all events
 *   - string: log events matching prefix (e.g., "router" matches "router.push")
 *   - string[]: log events matching any prefix
 */
export const enable = (filter?: string | ReadonlyArray<string>): void => {
  _enabled = true;
  if (filter === undefined) {
    _filter = null;
  } else if (typeof filter === "string") {
    _filter = new Set([filter]);
  } else {
    _filter = new Set(filter);
  }
};

/**
 * Disable debug logging.
 */
export const disable = (): void => {
  _enabled = false;
  _filter = null;
};

export const isEnabled = (): boolean => _enabled;

export const getFilter = (): ReadonlyArray<string> | null => {
  return _filter !== null ? Array.from(_filter) : null;
};

// --- Plugin Registration ---

/**
 * Register a debug plugin.
 * Each registered plugin receives every event that passes the current filter.
 * @since 1.0.0
 */
export const registerPlugin = (plugin: DebugPlugin): void => {
  _plugins.set(plugin.name, plugin);
};

/**
 * Unregister a debug plugin by name.
 * @since 1.0.0
 */
export const unregisterPlugin = (name: string): void => {
  _plugins.delete(name);
};

export const getPlugins = (): ReadonlyArray<string> => {
  return Array.from(_plugins.keys());
};

export const hasPlugin = (name: string): boolean => {
  return _plugins.has(name);
};

// --- Environment Detection ---

/**
 * Initialize debug state from the `ROUTESTACK_DEBUG` environment variable.
 *
 * - unset: leaves the current state alone
 * - `""` or `"true"`: log all events
 * - `"router.middleware,frame"`: log events matching any listed prefix
 *
 * @since 1.0.0
 */
export const initFromEnvironment: Effect.Effect<void> = Effect.gen(function* () {
  const setting = yield* debugConfig.pipe(Effect.orElseSucceed(() => Option.none<string>()));
  if (Option.isNone(setting)) return;
  if (setting.value === "" || setting.value === "true") {
    enable();
  } else {
    enable(setting.value.split(",").map((prefix) => prefix.trim()));
  }
});

// --- Logging ---

const shouldLog = (event: EventType): boolean => {
  if (!_enabled) return false;
  if (_filter === null) return true;

  for (const prefix of _filter) {
    if (event === prefix || event.startsWith(prefix + ".")) {
      return true;
    }
  }
  return false;
};

// --- Console Formatting ---

const formatDetails = (event: DebugEvent): string => {
  const parts: Array<string> = [];
  const e: Record<string, unknown> = { ...event };

  if ("operation" in e) parts.push(`${e.operation}`);
  if ("event_tag" in e) parts.push(`${e.event_tag}`);
  if ("old_path" in e && "path" in e) parts.push(`${e.old_path} → ${e.path}`);
  else if ("path" in e) parts.push(`${e.path}`);
  if ("index" in e) parts.push(`#${e.index}`);
  if ("route_pattern" in e) parts.push(`pattern:${e.route_pattern}`);
  if ("middleware_count" in e) parts.push(`middleware:${e.middleware_count}`);
  if ("subscriber_count" in e) parts.push(`subscribers:${e.subscriber_count}`);
  if ("removed" in e && e.removed !== 0) parts.push(`removed:${e.removed}`);
  if ("count" in e) parts.push(`count:${e.count}`);
  if ("task_count" in e) parts.push(`tasks:${e.task_count}`);
  if ("reason" in e) parts.push(`${e.reason}`);
  if ("cause" in e) parts.push(`cause:${e.cause}`);
  if (e.traceId !== undefined) parts.push(`[${e.traceId}]`);

  return parts.join("  ");
};

const formatEvent = (event: DebugEvent): void => {
  const dotIdx = event.event.indexOf(".");
  const category = dotIdx > 0 ? event.event.slice(0, dotIdx) : event.event;
  const subtype = dotIdx > 0 ? event.event.slice(dotIdx + 1) : "";
  const duration = event.duration_ms !== undefined ? ` ${event.duration_ms.toFixed(2)}ms` : "";

  debugLogger.withTag(category).log(`${subtype}  ${formatDetails(event)}${duration}`);
};

// --- Built-in Plugins ---

/**
 * Console plugin - prints one line per event through consola, tagged by category.
 * This is the default plugin used when no custom plugins are registered.
 * @since 1.0.0
 */
export const consolePlugin: DebugPlugin = createPlugin("console", formatEvent);

/**
 * Create a plugin that collects events into an array.
 * Useful for testing or building custom event processors.
 * @since 1.0.0
 */
export const createCollectorPlugin = (name: string, events: DebugEvent[]): DebugPlugin =>
  createPlugin(name, (event) => {
    events.push(event);
  });

const dispatchToPlugins = (fullEvent: DebugEvent): void => {
  if (_plugins.size > 0) {
    for (const plugin of _plugins.values()) {
      try {
        plugin.handle(fullEvent);
      } catch (error) {
        debugLogger.error(`Plugin "${plugin.name}" error:`, error);
      }
    }
  } else {
    consolePlugin.handle(fullEvent);
  }
};

/**
 * Log a wide event (Effect-based).
 * Reads the trace ID from its FiberRef and dispatches to plugins.
 * No-op if debug is disabled or event is filtered out.
 * @since 1.0.0
 */
export const log: (event: LogInput) => Effect.Effect<void> = Effect.fnUntraced(function* (
  event: LogInput,
) {
  if (!shouldLog(event.event)) return;

  const traceId = yield* FiberRef.get(CurrentTraceId);

  const fullEvent: DebugEvent = {
    timestamp: new Date().toISOString(),
    ...(traceId !== undefined ? { traceId } : {}),
    ...event,
  };

  dispatchToPlugins(fullEvent);
});

/**
 * Measure duration of an effect and log it.
 * No-op if debug is disabled or event is filtered out.
 * @since 1.0.0
 */
export const measure = <A, E, R>(
  event: LogInput,
  effect: Effect.Effect<A, E, R>,
): Effect.Effect<A, E, R> =>
  Effect.gen(function* () {
    if (!shouldLog(event.event)) {
      return yield* effect;
    }

    const start = performance.now();
    const result = yield* effect;
    const duration_ms = performance.now() - start;

    yield* log({ ...event, duration_ms });
    return result;
  });

// --- Layers ---

/**
 * Debug layer that registers the console plugin for the lifetime of the layer.
 *
 * ```ts
 * program.pipe(Effect.provide(Debug.defaultLayer))
 * ```
 *
 * @since 1.0.0
 */
export const defaultLayer: Layer.Layer<never> = Layer.scopedDiscard(
  Effect.gen(function* () {
    registerPlugin(consolePlugin);

    yield* Effect.addFinalizer(() =>
      Effect.sync(() => {
        unregisterPlugin(consolePlugin.name);
      }),
    );
  }),
);

/**
 * Layer that applies {@link initFromEnvironment} when built.
 * @since 1.0.0
 */
export const environmentLayer: Layer.Layer<never> = Layer.effectDiscard(initFromEnvironment);
