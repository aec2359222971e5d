/**
 * @since 1.0.0
 * Path pattern matching for routestack
 *
 * The router treats a definition's pattern as a black-box `match(path)` capability.
 * This module provides the default one.
 */
import { Option } from "effect";

/**
 * Parameters decoded from a concrete path.
 * @since 1.0.0
 */
export type RouteParams = Readonly<Record<string, string>>;

/**
 * Parsed path segment
 * @internal
 */
interface PathSegment {
  readonly type: "static" | "param" | "wildcard";
  readonly value: string;
}

/**
 * Compiled path pattern.
 * @since 1.0.0
 */
export interface PathPattern {
  readonly pattern: string;
  readonly match: (path: string) => Option.Option<RouteParams>;
}

/** @internal */
const splitSegments = (path: string): ReadonlyArray<string> =>
  path.replace(/^\/|\/$/g, "").split("/").filter(Boolean);

/**
 * Parse a path pattern into segments
 *
 * Examples:
 * - "/users" → [{ type: "static", value: "users" }]
 * - "/users/:id" → [{ type: "static", value: "users" }, { type: "param", value: "id" }]
 * - "/files/*" → [{ type: "static", value: "files" }, { type: "wildcard", value: "*" }]
 * - "/files/[...path]" → [{ type: "static", value: "files" }, { type: "wildcard", value: "path" }]
 *
 * @internal
 */
const parsePattern = (pattern: string): ReadonlyArray<PathSegment> =>
  splitSegments(pattern).map((part): PathSegment => {
    if (part.startsWith(":")) {
      return { type: "param", value: part.slice(1) };
    }
    if (part.startsWith("[...") && part.endsWith("]")) {
      return { type: "wildcard", value: part.slice(4, -1) };
    }
    if (part.startsWith("[") && part.endsWith("]")) {
      return { type: "param", value: part.slice(1, -1) };
    }
    if (part === "*") {
      return { type: "wildcard", value: "*" };
    }
    return { type: "static", value: part };
  });

/**
 * Strip the query string and fragment from a concrete path.
 * @since 1.0.0
 */
export const stripQuery = (path: string): string => path.split(/[?#]/)[0] ?? path;

/**
 * Decode a percent-encoded segment, keeping it raw when the encoding is malformed.
 * @internal
 */
const decodeSegment = (segment: string): string => {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
};

/** @internal */
const matchSegments = (
  segments: ReadonlyArray<PathSegment>,
  pathParts: ReadonlyArray<string>,
): Option.Option<RouteParams> => {
  const params: Record<string, string> = {};
  let pathIndex = 0;

  for (const segment of segments) {
    if (segment.type === "wildcard") {
      // Wildcard consumes the rest of the path
      params[segment.value] = pathParts.slice(pathIndex).join("/");
      return Option.some(params);
    }

    const pathPart = pathParts[pathIndex];
    if (pathPart === undefined) return Option.none();

    if (segment.type === "static") {
      if (pathPart !== segment.value) return Option.none();
    } else {
      params[segment.value] = decodeSegment(pathPart);
    }

    pathIndex++;
  }

  return pathIndex === pathParts.length ? Option.some(params) : Option.none();
};

/**
 * Compile a path pattern.
 *
 * @example
 * ```ts
 * const pattern = compile("/users/:id")
 * pattern.match("/users/42") // Option.some({ id: "42" })
 * pattern.match("/posts")    // Option.none()
 * ```
 *
 * @since 1.0.0
 */
export const compile = (pattern: string): PathPattern => {
  const segments = parsePattern(pattern);
  return {
    pattern,
    match: (path) => matchSegments(segments, splitSegments(stripQuery(path))),
  };
};
