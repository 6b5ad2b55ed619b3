/**
 * ============================================================
 *  Event Rate — events received per second
 * ============================================================
 *
 * Counts raw events (mapped or not) in fixed-size windows and
 * reports the rate of each window. After the configured number
 * of windows the measurement is complete and a report is built
 * from the best half of the samples, so a slow start (stick not
 * moving yet) does not drag the score down.
 *
 * Read-only: a meter attaches to the controller's "raw" hook and
 * never touches the mapping table or the controller state.
 * ============================================================
 */
import { performance } from "perf_hooks";
import { MeasurementAbortedError, MeasurementTimeoutError } from "../../errors.js";
import { logger } from "../../logger.js";
import type { GameController } from "../controller/controller.js";

const log = logger.child({ module: "event-rate" });

export const DEFAULT_WINDOW_SIZE = 1000;
export const DEFAULT_WINDOWS = 10;
export const DEFAULT_TIMEOUT_MS = 60_000;

export interface EventRateOptions {
  /** Events per sampling window. */
  windowSize?: number;
  /** Windows to sample before the measurement completes. */
  windows?: number;
  /** Millisecond clock; defaults to performance.now. */
  now?: () => number;
}

export interface MeasureOptions extends EventRateOptions {
  /** Give up when the windows are not all sampled by then. */
  timeoutMs?: number;
}

export interface EventRateReport {
  /** Events per second of every window, in the order they were taken. */
  samples: number[];
  /** Best window rate. */
  max: number;
  /** Mean of the best half of the windows. */
  average: number;
}

export interface EventRateMeter {
  /** Counts one event. Returns the window's rate when this event closes a window. */
  record(): number | null;
  readonly complete: boolean;
  report(): EventRateReport;
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/**
 * Builds a report from window samples: max and mean over the best half.
 *
 * @example
 *   summarizeRates([100, 400, 200, 300]) → { max: 400, average: 350, samples: [...] }
 */
export function summarizeRates(samples: readonly number[]): EventRateReport {
  if (samples.length === 0) return { samples: [], max: 0, average: 0 };

  const best = [...samples].sort((a, b) => a - b).slice(Math.floor(samples.length / 2));
  const total = best.reduce((sum, rate) => sum + rate, 0);

  return {
    samples: [...samples],
    max: best[best.length - 1] ?? 0,
    average: total / best.length,
  };
}

// ---------------------------------------------------------------------------
// Meter
// ---------------------------------------------------------------------------

export function createEventRateMeter(options: EventRateOptions = {}): EventRateMeter {
  const windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE;
  const windows = options.windows ?? DEFAULT_WINDOWS;
  const now = options.now ?? (() => performance.now());

  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
  }
  if (!Number.isInteger(windows) || windows < 1) {
    throw new RangeError(`windows must be a positive integer, got ${windows}`);
  }

  const samples: number[] = [];
  let count = 0;
  let windowStart = now();

  return {
    record() {
      if (samples.length >= windows) return null;
      if (++count < windowSize) return null;

      const end = now();
      // Clock resolution floor: a window always spans at least 1 ms
      const elapsedMs = Math.max(end - windowStart, 1);
      const rate = (count * 1000) / elapsedMs;

      samples.push(rate);
      count = 0;
      windowStart = end;
      return rate;
    },

    get complete() {
      return samples.length >= windows;
    },

    report() {
      return summarizeRates(samples);
    },
  };
}

// ---------------------------------------------------------------------------
// Controller measurement
// ---------------------------------------------------------------------------

/**
 * Measures a controller's event rate until the meter completes.
 * Rejects with MeasurementAbortedError if the controller stops first, and
 * with MeasurementTimeoutError if the pad stays idle past `timeoutMs`.
 */
export function measureEventRate(
  controller: GameController,
  options: MeasureOptions = {}
): Promise<EventRateReport> {
  return new Promise<EventRateReport>((resolve, reject) => {
    if (controller.status === "stopped") {
      reject(new MeasurementAbortedError());
      return;
    }

    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1) {
      reject(new RangeError(`timeoutMs must be a positive integer, got ${timeoutMs}`));
      return;
    }

    const meter = createEventRateMeter(options);

    const timer = setTimeout(() => {
      detach();
      log.warn({ timeoutMs, windows: meter.report().samples.length }, "Event-rate measurement timed out");
      reject(new MeasurementTimeoutError(timeoutMs));
    }, timeoutMs);

    const detach = () => {
      clearTimeout(timer);
      controller.off("raw", onRaw);
      controller.off("stopped", onStopped);
    };

    const onRaw = () => {
      const rate = meter.record();
      if (rate === null) return;

      log.info({ eventsPerSecond: Math.round(rate) }, "Events per second");
      if (!meter.complete) return;

      detach();
      const report = meter.report();
      log.info({ max: Math.round(report.max), average: Math.round(report.average) }, "Event rate measured");
      resolve(report);
    };

    const onStopped = () => {
      detach();
      reject(new MeasurementAbortedError());
    };

    controller.on("raw", onRaw);
    controller.on("stopped", onStopped);
  });
}
