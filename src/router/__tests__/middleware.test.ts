/**
 * Middleware Pipeline Tests
 *
 * Continuation-or-silence semantics of Middleware.run: ordering, aborts,
 * fresh instances per attempt and the definition handed to the continuation.
 */
import { assert, describe, it } from "@effect/vitest";
import { Effect, Ref } from "effect";
import * as Middleware from "../middleware.js";
import * as Route from "../route.js";

const recording =
  (log: Array<string>, name: string): Middleware.MiddlewareFactory =>
  () =>
    Middleware.make((definition, next) =>
      Effect.gen(function* () {
        log.push(name);
        yield* next(definition);
      }),
    );

const blocking =
  (log: Array<string>, name: string): Middleware.MiddlewareFactory =>
  () =>
    Middleware.make(() =>
      Effect.sync(() => {
        log.push(name);
      }),
    );

// =============================================================================
// Proceed
// Scope: every middleware continues
// =============================================================================

describe("Middleware.run proceed", () => {
  it.effect("runs onProceed directly without middleware", () =>
    Effect.gen(function* () {
      const definition = Route.make("/").definition;

      const outcome = yield* Middleware.run(definition, () => Effect.succeed("committed"));

      assert.deepStrictEqual(outcome, { _tag: "Proceed", value: "committed" });
    }),
  );

  it.effect("runs middleware in declaration order before onProceed", () =>
    Effect.gen(function* () {
      const log: Array<string> = [];
      const definition = Route.make("/")
        .middleware(recording(log, "first"))
        .middleware(recording(log, "second"))
        .middleware(recording(log, "third")).definition;

      const outcome = yield* Middleware.run(definition, () =>
        Effect.sync(() => {
          log.push("commit");
          return 1;
        }),
      );

      assert.strictEqual(outcome._tag, "Proceed");
      assert.deepStrictEqual(log, ["first", "second", "third", "commit"]);
    }),
  );

  it.effect("hands onProceed the definition passed to the last continuation", () =>
    Effect.gen(function* () {
      const substitute = Route.make("/login").definition;
      const definition = Route.make("/account").middleware(() =>
        Middleware.make((_definition, next) => next(substitute)),
      ).definition;

      const outcome = yield* Middleware.run(definition, (resolved) => Effect.succeed(resolved.path));

      assert.deepStrictEqual(outcome, { _tag: "Proceed", value: "/login" });
    }),
  );

  it.effect("runs onProceed once when a middleware continues twice", () =>
    Effect.gen(function* () {
      const commits = yield* Ref.make(0);
      const definition = Route.make("/").middleware(() =>
        Middleware.make((definition, next) => Effect.zipRight(next(definition), next(definition))),
      ).definition;

      yield* Middleware.run(definition, () => Ref.update(commits, (n) => n + 1));

      assert.strictEqual(yield* Ref.get(commits), 1);
    }),
  );
});

// =============================================================================
// Abort
// Scope: a middleware withholds its continuation
// =============================================================================

describe("Middleware.run abort", () => {
  it.effect("aborts silently when a middleware never continues", () =>
    Effect.gen(function* () {
      const commits = yield* Ref.make(0);
      const definition = Route.make("/admin").middleware(Middleware.block).definition;

      const outcome = yield* Middleware.run(definition, () => Ref.update(commits, (n) => n + 1));

      assert.deepStrictEqual(outcome, { _tag: "Abort" });
      assert.strictEqual(yield* Ref.get(commits), 0);
    }),
  );

  it.effect("skips every middleware after the one that aborts", () =>
    Effect.gen(function* () {
      const log: Array<string> = [];
      const definition = Route.make("/")
        .middleware(recording(log, "first"))
        .middleware(blocking(log, "guard"))
        .middleware(recording(log, "never")).definition;

      const outcome = yield* Middleware.run(definition, () => Effect.void);

      assert.strictEqual(outcome._tag, "Abort");
      assert.deepStrictEqual(log, ["first", "guard"]);
    }),
  );

  it.effect("when() consults its predicate on every attempt", () =>
    Effect.gen(function* () {
      const allowed = yield* Ref.make(false);
      const definition = Route.make("/").middleware(Middleware.when(Ref.get(allowed))).definition;

      const first = yield* Middleware.run(definition, () => Effect.void);
      yield* Ref.set(allowed, true);
      const second = yield* Middleware.run(definition, () => Effect.void);

      assert.strictEqual(first._tag, "Abort");
      assert.strictEqual(second._tag, "Proceed");
    }),
  );
});

// =============================================================================
// Instances
// Scope: factories are called once per attempt
// =============================================================================

describe("Middleware instances", () => {
  it.effect("builds fresh instances for every attempt", () =>
    Effect.gen(function* () {
      const seen: Array<number> = [];
      let created = 0;

      // Each instance lets only its first call through
      const oncePerInstance: Middleware.MiddlewareFactory = () => {
        const instance = ++created;
        let used = false;
        return Middleware.make((definition, next) =>
          Effect.gen(function* () {
            seen.push(instance);
            if (used) return;
            used = true;
            yield* next(definition);
          }),
        );
      };
      const definition = Route.make("/").middleware(oncePerInstance).definition;

      const first = yield* Middleware.run(definition, () => Effect.void);
      const second = yield* Middleware.run(definition, () => Effect.void);

      assert.strictEqual(first._tag, "Proceed");
      assert.strictEqual(second._tag, "Proceed");
      assert.deepStrictEqual(seen, [1, 2]);
    }),
  );
});
