/**
 * Shared types for the event-reader module.
 */

/** One unprocessed (code, value) pair from the controller's driver stack. */
export interface RawEvent {
  code: number;
  value: number;
}

/**
 * A sequential, blocking-style event source.
 *
 * `read()` settles with the next event in arrival order, `null` at end of
 * stream (device gone, or the signal was aborted), and rejects with
 * SourceReadError when the device read fails. Only one read is outstanding
 * at a time.
 */
export interface EventSource {
  read(signal?: AbortSignal): Promise<RawEvent | null>;
  close(): void;
}

/** One-way liveness flag owned by a single controller. */
export interface RunFlag {
  readonly running: boolean;
  clear(): void;
}
