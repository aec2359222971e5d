/**
 * @since 1.0.0
 * Restoration - rebuild the stack from serialized {path, index, id} records
 *
 * Only the path, index and id of each entry are persisted. Definitions are
 * re-resolved from the path on restore, with the same not-found fallback as
 * navigation.
 */
import { Array, Effect, Option, Schema } from "effect";
import * as ActiveRoute from "./active-route.js";
import { RestorationError } from "./errors.js";
import type { Registry } from "./registry.js";

// =============================================================================
// Record Schema
// =============================================================================

/**
 * @since 1.0.0
 */
export const RestorablePageInformation = Schema.Struct({
  path: Schema.String,
  index: Schema.Int.pipe(Schema.nonNegative()),
  id: Schema.optional(Schema.String),
});

/**
 * @since 1.0.0
 */
export type RestorablePageInformation = Schema.Schema.Type<typeof RestorablePageInformation>;

/**
 * @since 1.0.0
 */
export const RestorablePageInformationList = Schema.Array(RestorablePageInformation);

// =============================================================================
// Projection
// =============================================================================

/**
 * Serializable projection of an active route.
 * @since 1.0.0
 */
export const toRecord = (activeRoute: ActiveRoute.ActiveRoute): RestorablePageInformation =>
  Option.match(activeRoute.id, {
    onNone: () => ({ path: activeRoute.path, index: activeRoute.index }),
    onSome: (id) => ({ path: activeRoute.path, index: activeRoute.index, id }),
  });

/**
 * Validate raw input (for example parsed JSON) as a record list.
 * @since 1.0.0
 */
export const decode = (
  input: unknown,
): Effect.Effect<ReadonlyArray<RestorablePageInformation>, RestorationError> =>
  Schema.decodeUnknown(RestorablePageInformationList)(input).pipe(
    Effect.mapError((cause) => new RestorationError({ reason: "malformed records", cause })),
  );

// =============================================================================
// Rebuild
// =============================================================================

/**
 * A rebuilt stack and the index the next navigation must take.
 * @since 1.0.0
 */
export interface Restored {
  readonly routes: Array.NonEmptyReadonlyArray<ActiveRoute.ActiveRoute>;
  readonly nextIndex: number;
}

/**
 * Rebuild active routes from records, keeping their order, indices and ids.
 *
 * Fails when a record's index is not a non-negative integer, when there are no
 * records (the stack may never be empty) or when two records share an index.
 *
 * @since 1.0.0
 */
export const rebuild = (
  registry: Registry,
  records: ReadonlyArray<RestorablePageInformation>,
): Effect.Effect<Restored, RestorationError> =>
  Effect.gen(function* () {
    yield* Schema.validate(RestorablePageInformationList)(records).pipe(
      Effect.mapError((cause) => new RestorationError({ reason: "malformed records", cause })),
    );

    const seen = new Set<number>();
    for (const record of records) {
      if (seen.has(record.index)) {
        return yield* new RestorationError({ reason: `duplicate index ${record.index}` });
      }
      seen.add(record.index);
    }

    const routes = yield* Effect.forEach(records, (record) =>
      Effect.map(registry.resolve(record.path), (definition) =>
        ActiveRoute.make(definition, record.path, record.index, Option.fromNullable(record.id)),
      ),
    );

    if (!Array.isNonEmptyReadonlyArray(routes)) {
      return yield* new RestorationError({ reason: "no records" });
    }

    return {
      routes,
      nextIndex: Array.reduce(routes, 0, (max, route) => Math.max(max, route.index)) + 1,
    };
  });
