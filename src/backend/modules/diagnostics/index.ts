export {
  createEventRateMeter,
  measureEventRate,
  summarizeRates,
  DEFAULT_WINDOW_SIZE,
  DEFAULT_WINDOWS,
  DEFAULT_TIMEOUT_MS,
} from "./event-rate.js";
export type { EventRateMeter, EventRateOptions, EventRateReport, MeasureOptions } from "./event-rate.js";
export { attachPassthroughLog } from "./passthrough.js";
