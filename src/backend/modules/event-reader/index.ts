export type { RawEvent, EventSource, RunFlag } from "./types.js";
export { createEvdevSource } from "./evdev-source.js";
export type { EvdevSourceOptions } from "./evdev-source.js";
export {
  decodeInputEvents,
  defaultEventSize,
  EV_SYN,
  EV_KEY,
  EV_ABS,
  EVENT_SIZE_32,
  EVENT_SIZE_64,
} from "./evdev-decoder.js";
export type { InputEventRecord, DecodeResult } from "./evdev-decoder.js";
export { runEventReader, createRunFlag, YIELD_EVERY } from "./reader.js";
export type { ReaderExit, ReaderOptions, EventSink } from "./reader.js";
