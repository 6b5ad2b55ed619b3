/**
 * evdev-source.ts — EventSource backed by a Linux input device
 *
 * Reads /dev/input/eventN through a Node read stream and yields the
 * EV_KEY / EV_ABS records as RawEvents, in the order the kernel wrote them.
 * EV_SYN, EV_MSC and the rest are dropped here; they carry no control state.
 *
 * Usage:
 *   const source = createEvdevSource("/dev/input/event3");
 *   const event = await source.read(signal);   // null once the device is gone
 *   source.close();
 *
 * Notes:
 *   • The device path is supplied by the caller. Finding it, pairing the
 *     controller and reconnecting after a drop are left to the OS.
 *   • A read blocks until the kernel has data; nothing spins. close() or an
 *     abort settles a blocked read with null at once, without waiting on it.
 *   • The first read error is kept: every later read rejects with it.
 *   • The stream's own backpressure applies: chunks are only pulled when
 *     the decoded queue is empty.
 */

import { createReadStream, type ReadStream } from "fs";
import { SourceReadError } from "../../errors.js";
import { logger } from "../../logger.js";
import { decodeInputEvents, defaultEventSize, EV_ABS, EV_KEY } from "./evdev-decoder.js";
import type { EventSource, RawEvent } from "./types.js";

const log = logger.child({ module: "evdev-source" });

/** Records pulled from the device per read syscall, at most. */
const READ_BATCH = 64;

const CLOSED = Symbol("closed");

export interface EvdevSourceOptions {
  /** Size of struct input_event; defaults to the host's (24 on 64-bit). */
  eventSize?: number;
  /** Bytes requested per read; defaults to 64 records. Need not be a record multiple. */
  chunkSize?: number;
}

export function createEvdevSource(path: string, options: EvdevSourceOptions = {}): EventSource {
  const eventSize = options.eventSize ?? defaultEventSize();
  const chunkSize = options.chunkSize ?? eventSize * READ_BATCH;

  const queue: RawEvent[] = [];
  let rest: Buffer = Buffer.alloc(0);
  let closed = false;
  let failure: SourceReadError | null = null;
  let stream: ReadStream | null = null;
  let chunks: AsyncIterator<Buffer> | null = null;

  // Settles the read in flight on close(); a read blocked in the kernel is abandoned, not awaited
  let wakeReader: ((value: typeof CLOSED) => void) | null = null;

  // Opened on the first read, so an open error always has a reader to land on
  function open(): AsyncIterator<Buffer> {
    if (chunks) return chunks;
    stream = createReadStream(path, { highWaterMark: chunkSize });
    chunks = stream[Symbol.asyncIterator]();
    log.debug({ path, eventSize }, "Device stream opened");
    return chunks;
  }

  function close(): void {
    if (closed) return;
    closed = true;
    wakeReader?.(CLOSED);
    stream?.destroy();
    log.debug({ path }, "Device stream closed");
  }

  function enqueue(chunk: Buffer): void {
    const decoded = decodeInputEvents(rest.length > 0 ? Buffer.concat([rest, chunk]) : chunk, eventSize);
    rest = decoded.rest;
    for (const record of decoded.events) {
      if (record.type === EV_KEY || record.type === EV_ABS) {
        queue.push({ code: record.code, value: record.value });
      }
    }
  }

  async function read(signal?: AbortSignal): Promise<RawEvent | null> {
    if (failure) throw failure;
    if (closed || signal?.aborted) return null;

    const device = open();
    const onAbort = () => close();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      while (queue.length === 0) {
        let next: IteratorResult<Buffer> | typeof CLOSED;
        const closing = new Promise<typeof CLOSED>((resolve) => {
          wakeReader = resolve;
        });
        try {
          next = await Promise.race([device.next(), closing]);
        } catch (err) {
          if (closed) return null;
          failure = new SourceReadError(`Read from ${path} failed`, { cause: err });
          throw failure;
        } finally {
          wakeReader = null;
        }

        // A chunk that lands after close() is dropped with the stream
        if (next === CLOSED) return null;

        if (next.done) {
          if (!closed && rest.length > 0) {
            log.warn({ path, bytes: rest.length }, "Device stream ended mid-record");
          }
          return null;
        }
        enqueue(next.value);
      }
      return queue.shift() ?? null;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  return { read, close };
}
