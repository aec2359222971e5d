/**
 * Route Builder Unit Tests
 *
 * Route.make, .content, .middleware, the Pipeable protocol and the
 * Routes collection that orders definitions.
 */
import { assert, describe, it } from "@effect/vitest";
import { Option } from "effect";
import * as ActiveRoute from "../active-route.js";
import * as Middleware from "../middleware.js";
import * as Route from "../route.js";
import * as Routes from "../routes.js";

// =============================================================================
// Route.make
// =============================================================================

describe("Route.make", () => {
  it("should create route with path and no content", () => {
    const route = Route.make("/about");

    assert.strictEqual(route._tag, "RouteBuilder");
    assert.strictEqual(route.definition._tag, "RouteDefinition");
    assert.strictEqual(route.definition.path, "/about");
    assert.strictEqual(route.definition.content, undefined);
    assert.strictEqual(route.definition.middleware.length, 0);
  });

  it("should store content factory", () => {
    const content = () => "about";
    const route = Route.make("/about").content(content);

    assert.strictEqual(route.definition.content, content);
  });

  it("should append middleware in order", () => {
    const first = Middleware.pass;
    const second = Middleware.block;
    const route = Route.make("/admin").middleware(first).middleware(second);

    assert.deepStrictEqual(route.definition.middleware, [first, second]);
  });

  it("should not mutate the previous builder", () => {
    const base = Route.make("/a");
    base.middleware(Middleware.pass);

    assert.strictEqual(base.definition.middleware.length, 0);
  });

  it("should support pipe", () => {
    const route = Route.make("/x").pipe((builder) => builder.content(() => 1));

    assert.strictEqual(route.definition.content?.({}), 1);
  });

  it("isRouteBuilder distinguishes builders", () => {
    assert.isTrue(Route.isRouteBuilder(Route.make("/")));
    assert.isFalse(Route.isRouteBuilder({ _tag: "RouteBuilder" }));
    assert.isFalse(Route.isRouteBuilder(null));
  });
});

// =============================================================================
// Matching through the definition
// =============================================================================

describe("RouteDefinition matching", () => {
  it("matches decides by pattern", () => {
    const definition = Route.make("/users/:id").definition;

    assert.isTrue(Route.matches(definition, "/users/1"));
    assert.isFalse(Route.matches(definition, "/users"));
  });

  it("instantiateMiddleware calls every factory", () => {
    let built = 0;
    const factory = () => {
      built++;
      return Middleware.make((definition, next) => next(definition));
    };
    const definition = Route.make("/").middleware(factory).middleware(factory).definition;

    const instances = Route.instantiateMiddleware(definition);

    assert.strictEqual(instances.length, 2);
    assert.strictEqual(built, 2);
    assert.notStrictEqual(instances[0], instances[1]);
  });
});

// =============================================================================
// Content rendering
// =============================================================================

describe("renderContent", () => {
  it("passes decoded params to the content factory", () => {
    const definition = Route.make("/users/:id").content(({ id }) => `user ${id}`).definition;
    const active = ActiveRoute.make(definition, "/users/42", 3, Option.none());

    assert.deepStrictEqual(active.params, { id: "42" });
    assert.deepStrictEqual(ActiveRoute.renderContent(active), Option.some("user 42"));
  });

  it("returns None without a content factory", () => {
    const active = ActiveRoute.make(Route.make("/").definition, "/", 0, Option.none());

    assert.isTrue(Option.isNone(ActiveRoute.renderContent(active)));
  });

  it("gives an unmatched path (not-found fallback) empty params", () => {
    const definition = Route.make("/not-found").content((params) => Object.keys(params).length);
    const active = ActiveRoute.make(definition.definition, "/missing/page", 1, Option.none());

    assert.deepStrictEqual(active.params, {});
    assert.deepStrictEqual(ActiveRoute.renderContent(active), Option.some(0));
  });

  it("hostReference combines index and path", () => {
    const active = ActiveRoute.make(Route.make("/a").definition, "/a", 5, Option.none());

    assert.strictEqual(active.hostReference, "5:/a");
  });
});

// =============================================================================
// Routes collection
// =============================================================================

describe("Routes.make", () => {
  it("should start empty", () => {
    assert.strictEqual(Routes.make().manifest.routes.length, 0);
  });

  it("should keep declaration order", () => {
    const home = Route.make("/");
    const users = Route.make("/users");
    const routes = Routes.make().add(home).add(users);

    assert.deepStrictEqual(
      routes.manifest.routes.map((definition) => definition.path),
      ["/", "/users"],
    );
    assert.strictEqual(routes.manifest.routes[0], home.definition);
  });

  it("definitionsOf accepts a collection or a plain list", () => {
    const home = Route.make("/").definition;

    assert.deepStrictEqual(Routes.definitionsOf([home]), [home]);
    assert.strictEqual(Routes.definitionsOf(Routes.make().add(Route.make("/"))).length, 1);
  });
});
