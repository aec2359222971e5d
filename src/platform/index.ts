/**
 * @since 1.0.0
 * Platform Services
 *
 * The router's view of its host: frame scheduling and application exit.
 */
import { Layer } from "effect";
import * as Frame from "./frame.js";
import * as Host from "./host.js";

export { Frame, Host };
export type { FrameService, TestFrameService, RequestFrame } from "./frame.js";
export type { HostService, TestHostService } from "./host.js";

/**
 * Combined test layer for all platform services.
 * @since 1.0.0
 */
export const test: Layer.Layer<Frame.Frame | Frame.TestFrame | Host.Host | Host.TestHost> =
  Layer.mergeAll(Frame.test, Host.test);

/**
 * Node platform: timer-driven frames, exiting the process on the final pop.
 * @since 1.0.0
 */
export const node: Layer.Layer<Frame.Frame | Host.Host> = Layer.mergeAll(Frame.live, Host.node);
