/**
 * @since 1.0.0
 * Router errors
 */
import { Data } from "effect";

/**
 * The configured not-found path matches no registered route.
 * Raised while the router layer is built.
 * @since 1.0.0
 */
export class RouteConfigError extends Data.TaggedError("RouteConfigError")<{
  readonly path: string;
}> {
  override get message(): string {
    return `Path ${this.path} not found. Is it registered?`;
  }
}

/**
 * No active route matches the given path or host reference.
 * @since 1.0.0
 */
export class ActiveRouteNotFoundError extends Data.TaggedError("ActiveRouteNotFoundError")<{
  readonly operation: "popByHostReference" | "remove";
  readonly reference: string;
}> {
  override get message(): string {
    return `${this.operation}: no active route for ${this.reference}`;
  }
}

/**
 * An operation would leave the stack in a state it may never reach.
 * @since 1.0.0
 */
export class StackInvariantError extends Data.TaggedError("StackInvariantError")<{
  readonly operation: string;
  readonly reason: string;
}> {
  override get message(): string {
    return `${this.operation}: ${this.reason}`;
  }
}

/**
 * Restoration data is empty or malformed.
 * @since 1.0.0
 */
export class RestorationError extends Data.TaggedError("RestorationError")<{
  readonly reason: string;
  readonly cause?: unknown;
}> {
  override get message(): string {
    return `Cannot restore routes: ${this.reason}`;
  }
}
