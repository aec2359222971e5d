/**
 * Path Pattern Tests
 *
 * compile(pattern).match: static segments, named params in both syntaxes,
 * wildcards, query stripping and percent-decoding.
 */
import { assert, describe, it } from "@effect/vitest";
import { Option } from "effect";
import { compile, stripQuery } from "../matching.js";

// =============================================================================
// Static and param segments
// Scope: one segment per path part, whole path consumed
// =============================================================================

describe("compile", () => {
  it("matches a static path exactly", () => {
    const pattern = compile("/about");

    assert.deepStrictEqual(pattern.match("/about"), Option.some({}));
    assert.isTrue(Option.isNone(pattern.match("/about/team")));
    assert.isTrue(Option.isNone(pattern.match("/")));
  });

  it("matches the root path", () => {
    const pattern = compile("/");

    assert.deepStrictEqual(pattern.match("/"), Option.some({}));
    assert.isTrue(Option.isNone(pattern.match("/a")));
  });

  it("ignores leading and trailing slashes", () => {
    const pattern = compile("/users/");

    assert.isTrue(Option.isSome(pattern.match("users")));
    assert.isTrue(Option.isSome(pattern.match("/users/")));
  });

  it("decodes :param segments", () => {
    const pattern = compile("/users/:id/posts/:postId");

    assert.deepStrictEqual(pattern.match("/users/42/posts/7"), Option.some({ id: "42", postId: "7" }));
  });

  it("decodes [param] segments", () => {
    const pattern = compile("/users/[id]");

    assert.deepStrictEqual(pattern.match("/users/ada"), Option.some({ id: "ada" }));
  });

  it("rejects paths with a missing param", () => {
    assert.isTrue(Option.isNone(compile("/users/:id").match("/users")));
  });

  it("percent-decodes param values", () => {
    assert.deepStrictEqual(
      compile("/tags/:tag").match("/tags/a%20b"),
      Option.some({ tag: "a b" }),
    );
  });

  it("keeps malformed percent-encoding as is", () => {
    assert.deepStrictEqual(compile("/tags/:tag").match("/tags/%E0%A4%A"), Option.some({ tag: "%E0%A4%A" }));
  });
});

// =============================================================================
// Wildcards
// Scope: * and [...rest] consume the remainder of the path
// =============================================================================

describe("wildcards", () => {
  it("* captures the rest under the * key", () => {
    assert.deepStrictEqual(
      compile("/files/*").match("/files/a/b/c.txt"),
      Option.some({ "*": "a/b/c.txt" }),
    );
  });

  it("[...rest] captures the rest under its name", () => {
    assert.deepStrictEqual(
      compile("/docs/[...slug]").match("/docs/guide/intro"),
      Option.some({ slug: "guide/intro" }),
    );
  });

  it("matches an empty remainder", () => {
    assert.deepStrictEqual(compile("/files/*").match("/files"), Option.some({ "*": "" }));
  });
});

// =============================================================================
// Query and fragment
// =============================================================================

describe("stripQuery", () => {
  it("drops the query string and fragment", () => {
    assert.strictEqual(stripQuery("/a?x=1#top"), "/a");
    assert.strictEqual(stripQuery("/a#top"), "/a");
    assert.strictEqual(stripQuery("/a"), "/a");
  });

  it("matching ignores the query string", () => {
    assert.deepStrictEqual(compile("/users/:id").match("/users/9?tab=posts"), Option.some({ id: "9" }));
  });
});
