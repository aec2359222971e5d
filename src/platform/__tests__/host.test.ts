/**
 * Host Service Tests
 */
import { assert, describe, it } from "@effect/vitest";
import { Effect, Ref } from "effect";
import * as Host from "../host.js";

describe("Host", () => {
  it.effect("layer runs the exit effect it was given", () =>
    Effect.gen(function* () {
      const exits = yield* Ref.make(0);

      yield* Effect.flatMap(Host.Host, (host) => host.exit).pipe(
        Effect.provide(Host.layer(Ref.update(exits, (n) => n + 1))),
      );

      assert.strictEqual(yield* Ref.get(exits), 1);
    }),
  );

  it.effect("test layer counts exits", () =>
    Effect.gen(function* () {
      const host = yield* Host.Host;

      assert.strictEqual(yield* Host.exitCount, 0);

      yield* host.exit;
      yield* host.exit;

      assert.strictEqual(yield* Host.exitCount, 2);
    }).pipe(Effect.provide(Host.test)),
  );
});
