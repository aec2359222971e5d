/**
 * @since 1.0.0
 * Metrics for routestack observability
 *
 * Counters for navigation outcomes and event delivery, and a histogram of stack depth.
 * All metric names use the `routestack.` prefix.
 *
 * @example
 * ```ts
 * import { Metrics } from "routestack"
 *
 * const snapshot = yield* Metrics.snapshot
 * snapshot.committedCount
 * ```
 */
import { createConsola } from "consola";
import { Effect, Metric, MetricBoundaries } from "effect";
import type { MetricState } from "effect";

const metricsLogger = createConsola({ defaults: { tag: "routestack" } });

// --- Naming Convention ---
// Format: routestack.<category>.<metric_name>

// --- Counters ---

/**
 * Navigations that passed their middleware and mutated the stack.
 * @since 1.0.0
 */
export const committedCounter: Metric.Metric.Counter<number> = Metric.counter(
  "routestack.router.commit.count",
  { description: "Total number of committed navigations", incremental: true },
);

/**
 * Navigations a middleware withheld its continuation from.
 * @since 1.0.0
 */
export const abortedCounter: Metric.Metric.Counter<number> = Metric.counter(
  "routestack.router.abort.count",
  { description: "Total number of aborted navigations", incremental: true },
);

/**
 * Pops that removed a stack entry.
 * @since 1.0.0
 */
export const popCounter: Metric.Metric.Counter<number> = Metric.counter(
  "routestack.router.pop.count",
  { description: "Total number of pops", incremental: true },
);

/**
 * Pops of the last entry, delegated to the host.
 * @since 1.0.0
 */
export const hostExitCounter: Metric.Metric.Counter<number> = Metric.counter(
  "routestack.host.exit.count",
  { description: "Total number of host exits", incremental: true },
);

/**
 * Events handed to subscribers.
 * @since 1.0.0
 */
export const deliveredCounter: Metric.Metric.Counter<number> = Metric.counter(
  "routestack.event.delivered.count",
  { description: "Total number of router events delivered", incremental: true },
);

// --- Histograms ---

/**
 * Buckets: 1, 2, 3, 5, 8, 13, 21, 34
 * @since 1.0.0
 */
export const stackDepthBoundaries: MetricBoundaries.MetricBoundaries =
  MetricBoundaries.fromIterable([1, 2, 3, 5, 8, 13, 21, 34]);

/**
 * Stack length after each committed mutation.
 * @since 1.0.0
 */
export const stackDepthHistogram: Metric.Metric.Histogram<number> = Metric.histogram(
  "routestack.router.stack_depth",
  stackDepthBoundaries,
  "Distribution of route stack lengths after committed mutations",
);

// --- Metric Recording API ---

/** @since 1.0.0 */
export const recordCommitted: Effect.Effect<void> = Metric.increment(committedCounter);

/** @since 1.0.0 */
export const recordAborted: Effect.Effect<void> = Metric.increment(abortedCounter);

/** @since 1.0.0 */
export const recordPop: Effect.Effect<void> = Metric.increment(popCounter);

/** @since 1.0.0 */
export const recordHostExit: Effect.Effect<void> = Metric.increment(hostExitCounter);

/** @since 1.0.0 */
export const recordDelivered: Effect.Effect<void> = Metric.increment(deliveredCounter);

/**
 * Record the stack length after a mutation.
 * @since 1.0.0
 */
export const recordStackDepth = (depth: number): Effect.Effect<void> =>
  Effect.sync(() => {
    stackDepthHistogram.unsafeUpdate(depth, []);
  });

// --- Snapshot API ---

/**
 * Current values of every routestack metric.
 * @since 1.0.0
 */
export interface MetricsSnapshot {
  readonly committedCount: number;
  readonly abortedCount: number;
  readonly popCount: number;
  readonly hostExitCount: number;
  readonly deliveredCount: number;
  readonly stackDepthHistogram: {
    readonly count: number;
    readonly min: number;
    readonly max: number;
    readonly sum: number;
    readonly buckets: ReadonlyArray<readonly [number, number]>;
  };
}

const extractCounterValue = (state: MetricState.MetricState.Counter<number>): number => state.count;

const extractHistogramValue = (
  state: MetricState.MetricState.Histogram,
): MetricsSnapshot["stackDepthHistogram"] => ({
  count: state.count,
  min: state.min,
  max: state.max,
  sum: state.sum,
  buckets: state.buckets,
});

/**
 * @since 1.0.0
 */
export const snapshot: Effect.Effect<MetricsSnapshot> = Effect.gen(function* () {
  const committed = yield* Metric.value(committedCounter);
  const aborted = yield* Metric.value(abortedCounter);
  const pops = yield* Metric.value(popCounter);
  const exits = yield* Metric.value(hostExitCounter);
  const delivered = yield* Metric.value(deliveredCounter);
  const depth = yield* Metric.value(stackDepthHistogram);

  return {
    committedCount: extractCounterValue(committed),
    abortedCount: extractCounterValue(aborted),
    popCount: extractCounterValue(pops),
    hostExitCount: extractCounterValue(exits),
    deliveredCount: extractCounterValue(delivered),
    stackDepthHistogram: extractHistogramValue(depth),
  };
});

// --- Export Sink API ---

/**
 * Metrics sink interface.
 * Implement this to export metrics to external systems.
 * @since 1.0.0
 */
export interface MetricsSink {
  readonly name: string;
  readonly export: (snapshot: MetricsSnapshot) => Effect.Effect<void>;
}

/** @since 1.0.0 */
export const createSink = (
  name: string,
  exportFn: (snapshot: MetricsSnapshot) => Effect.Effect<void>,
): MetricsSink => ({ name, export: exportFn });

const _sinks: Map<string, MetricsSink> = new Map();

/** @since 1.0.0 */
export const registerSink = (sink: MetricsSink): void => {
  _sinks.set(sink.name, sink);
};

/** @since 1.0.0 */
export const unregisterSink = (name: string): void => {
  _sinks.delete(name);
};

export const getSinks = (): ReadonlyArray<string> => Array.from(_sinks.keys());

export const hasSink = (name: string): boolean => _sinks.has(name);

/**
 * Export the current snapshot to every registered sink.
 * A failing sink is reported through the console logger and does not stop the others.
 * @since 1.0.0
 */
export const exportToSinks: Effect.Effect<void> = Effect.gen(function* () {
  if (_sinks.size === 0) return;

  const currentSnapshot = yield* snapshot;

  for (const sink of _sinks.values()) {
    yield* sink.export(currentSnapshot).pipe(
      Effect.catchAllCause((cause) =>
        Effect.sync(() => {
          metricsLogger.error(`Metrics sink "${sink.name}" error:`, cause);
        }),
      ),
    );
  }
});

// --- Built-in Sinks ---

/**
 * Console sink - logs the snapshot through consola.
 * @since 1.0.0
 */
export const consoleSink: MetricsSink = createSink("console", (s) =>
  Effect.sync(() => {
    metricsLogger.withTag("metrics").log({
      committed: s.committedCount,
      aborted: s.abortedCount,
      pops: s.popCount,
      exits: s.hostExitCount,
      delivered: s.deliveredCount,
      stackDepth: {
        count: s.stackDepthHistogram.count,
        max: s.stackDepthHistogram.max,
        avg: s.stackDepthHistogram.count > 0 ? s.stackDepthHistogram.sum / s.stackDepthHistogram.count : 0,
      },
    });
  }),
);

/**
 * Sink that appends each snapshot to `snapshots`.
 * @since 1.0.0
 */
export const createCollectorSink = (name: string, snapshots: MetricsSnapshot[]): MetricsSink =>
  createSink(name, (s) =>
    Effect.sync(() => {
      snapshots.push(s);
    }),
  );
