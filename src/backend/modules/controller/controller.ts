/**
 * controller.ts — The polling facade
 *
 * Wires one EventSource through the normalizer into a ControllerState and
 * exposes `poll()` to the control loop.
 *
 * Usage:
 *   const controller = createGameController({ source, family: "xbox" });
 *   controller.start();
 *   setInterval(() => {
 *     const { state, running } = controller.poll();
 *     if (!running) return shutdown();
 *     drive(state.LEFT_STICK_X, state.A);
 *   }, 20);
 *
 * Lifecycle:
 *   constructed ──start()──▶ running ──source ends / fails / stop()──▶ stopped
 *   `stopped` is terminal; start() after it is a no-op.
 *
 * Design notes:
 *   • The mapping is resolved in the factory. A bad mapping throws
 *     ConfigError there and no controller exists.
 *   • poll() only reads the current snapshot and the run flag. It cannot
 *     throw and never waits on the producer.
 *   • "input" and "raw" observers see every event but cannot change the
 *     table or the state; a throwing observer is logged and skipped.
 */

import { logger } from "../../logger.js";
import { resolveMappingTable, type MappingSelection } from "../mapping/table.js";
import type { MappingTable } from "../mapping/types.js";
import { normalizeEvent, type NormalizedInput } from "../normalizer/index.js";
import { createRunFlag, runEventReader, type ReaderExit } from "../event-reader/reader.js";
import type { EventSource, RawEvent } from "../event-reader/types.js";
import { createControllerState, type ControllerSnapshot } from "./state.js";

const log = logger.child({ module: "controller" });

// ── Types ─────────────────────────────────────────────────────────────────

export type ControllerStatus = "constructed" | "running" | "stopped";

export interface PollResult {
  state: ControllerSnapshot;
  running: boolean;
}

export interface ControllerEvents {
  /** A mapped event after normalization. */
  input: NormalizedInput;
  /** Every event read from the source, mapped or not. */
  raw: RawEvent;
  /** The producer has exited. */
  stopped: ReaderExit;
}

export type ControllerHandler<K extends keyof ControllerEvents> = (payload: ControllerEvents[K]) => void;

export interface GameControllerOptions extends MappingSelection {
  source: EventSource;
}

export interface GameController {
  readonly table: MappingTable;
  readonly status: ControllerStatus;
  /** Settles when the producer exits; null if it never started. */
  readonly done: Promise<ReaderExit | null>;
  start(): void;
  stop(): Promise<void>;
  poll(): PollResult;
  on<K extends keyof ControllerEvents>(event: K, handler: ControllerHandler<K>): void;
  off<K extends keyof ControllerEvents>(event: K, handler: ControllerHandler<K>): void;
}

// ── Factory ───────────────────────────────────────────────────────────────

/**
 * Create a controller over `source`.
 * Does not read anything until `.start()` is called.
 */
export function createGameController(options: GameControllerOptions): GameController {
  const { source } = options;
  const table = resolveMappingTable(options);
  const state = createControllerState(table.names);
  const runFlag = createRunFlag();
  const abort = new AbortController();

  const handlers: { [K in keyof ControllerEvents]: Set<ControllerHandler<K>> } = {
    input:   new Set(),
    raw:     new Set(),
    stopped: new Set(),
  };

  let status: ControllerStatus = "constructed";
  let producer: Promise<ReaderExit> | null = null;

  // ── Emit helper ───────────────────────────────────────────────────────

  function emit<K extends keyof ControllerEvents>(event: K, payload: ControllerEvents[K]): void {
    for (const handler of handlers[event]) {
      try {
        handler(payload);
      } catch (err) {
        log.warn({ err, event }, "Controller observer threw");
      }
    }
  }

  // ── Pipeline ──────────────────────────────────────────────────────────

  function sink(event: RawEvent): void {
    if (handlers.raw.size > 0) emit("raw", event);

    const input = normalizeEvent(event, table);
    if (!input) return;

    state.apply(input.name, input.value);
    if (handlers.input.size > 0) emit("input", input);
  }

  function finish(exit: ReaderExit): ReaderExit {
    status = "stopped";
    source.close();
    log.info({ exit, family: table.family }, "Controller stopped");
    emit("stopped", exit);
    return exit;
  }

  log.info({ family: table.family, controls: table.names.length }, "Controller created");

  // ── GameController implementation ─────────────────────────────────────

  return {
    table,

    get status() {
      return runFlag.running ? status : "stopped";
    },

    get done() {
      return producer ?? Promise.resolve(null);
    },

    start() {
      if (status === "running") return;
      if (status === "stopped") {
        log.warn("Controller is stopped and cannot be restarted");
        return;
      }

      status = "running";
      producer = runEventReader(source, sink, { signal: abort.signal, runFlag }).then(finish);
      log.info({ family: table.family }, "Controller started");
    },

    async stop() {
      runFlag.clear();
      abort.abort();

      if (producer) {
        await producer;
        return;
      }
      if (status === "constructed") finish("stopped");
    },

    poll(): PollResult {
      return { state: state.snapshot(), running: runFlag.running };
    },

    on<K extends keyof ControllerEvents>(event: K, handler: ControllerHandler<K>) {
      handlers[event].add(handler);
    },

    off<K extends keyof ControllerEvents>(event: K, handler: ControllerHandler<K>) {
      handlers[event].delete(handler);
    },
  };
}
