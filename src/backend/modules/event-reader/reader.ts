/**
 * reader.ts — The producer loop
 *
 * read → sink → read → … until the source ends, fails, or the signal is
 * aborted. Whatever the reason, the RunFlag is cleared on the way out and
 * the loop never retries: re-pairing a controller is a manual step.
 */

import { setImmediate as yieldToEventLoop } from "timers/promises";
import { SourceReadError } from "../../errors.js";
import { logger } from "../../logger.js";
import type { EventSource, RawEvent, RunFlag } from "./types.js";

const log = logger.child({ module: "event-reader" });

/**
 * A source that always has data ready would otherwise keep the loop on the
 * microtask queue and starve timers, sockets and pollers.
 */
export const YIELD_EVERY = 256;

export type ReaderExit = "ended" | "failed" | "stopped";

export type EventSink = (event: RawEvent) => void;

export interface ReaderOptions {
  signal: AbortSignal;
  runFlag: RunFlag;
  yieldEvery?: number;
}

export function createRunFlag(): RunFlag {
  let running = true;
  return {
    get running() {
      return running;
    },
    clear() {
      running = false;
    },
  };
}

/**
 * Drives `source` until it stops producing. Resolves with the reason;
 * never rejects.
 */
export async function runEventReader(
  source: EventSource,
  sink: EventSink,
  options: ReaderOptions
): Promise<ReaderExit> {
  const { signal, runFlag } = options;
  const yieldEvery = options.yieldEvery ?? YIELD_EVERY;

  let exit: ReaderExit = "stopped";
  let sinceYield = 0;

  try {
    while (!signal.aborted) {
      const event = await source.read(signal);
      if (event === null) {
        if (!signal.aborted) exit = "ended";
        break;
      }

      sink(event);

      if (++sinceYield >= yieldEvery) {
        sinceYield = 0;
        await yieldToEventLoop();
      }
    }
  } catch (err) {
    exit = "failed";
    if (err instanceof SourceReadError) {
      log.warn({ err }, "Event source failed; likely lost connection with the controller");
    } else {
      log.error({ err }, "Event pipeline crashed");
    }
  } finally {
    runFlag.clear();
  }

  if (exit === "ended") log.warn("Event source ended; controller disconnected");
  else if (exit === "stopped") log.info("Event reader stopped");
  return exit;
}
