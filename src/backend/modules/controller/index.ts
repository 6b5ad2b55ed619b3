// Controller — named, pollable button/axis state over a raw event source

export { createGameController } from "./controller.js";
export type {
  GameController,
  GameControllerOptions,
  ControllerStatus,
  ControllerEvents,
  ControllerHandler,
  PollResult,
} from "./controller.js";
export { createControllerState } from "./state.js";
export type { ControllerState, ControllerSnapshot } from "./state.js";

export { createEvdevSource } from "../event-reader/index.js";
export type { EventSource, RawEvent } from "../event-reader/index.js";
export { CONTROLLER_FAMILIES, DEFAULT_FAMILY } from "../mapping/index.js";
export type { ControllerFamily, MappingTable } from "../mapping/index.js";
export type { NormalizedInput } from "../normalizer/index.js";
export { ConfigError, SourceReadError } from "../../errors.js";
