/**
 * evdev-decoder.ts — struct input_event parsing
 *
 * Pure module: Buffer in, records out.
 *
 *   struct input_event {
 *     struct timeval time;   // 16 bytes on 64-bit hosts, 8 on 32-bit; skipped
 *     __u16 type;
 *     __u16 code;
 *     __s32 value;
 *   };
 *
 * Records are little-endian on every host Node ships for.
 */

export const EV_SYN = 0x00;
export const EV_KEY = 0x01;
export const EV_ABS = 0x03;

export const EVENT_SIZE_64 = 24;
export const EVENT_SIZE_32 = 16;

export interface InputEventRecord {
  type: number;
  code: number;
  value: number;
}

export interface DecodeResult {
  events: InputEventRecord[];
  /** Trailing bytes of an incomplete record, to prepend to the next chunk. */
  rest: Buffer;
}

/** Record size for the running host's `struct timeval`. */
export function defaultEventSize(arch: string = process.arch): number {
  return arch === "arm" || arch === "ia32" ? EVENT_SIZE_32 : EVENT_SIZE_64;
}

export function decodeInputEvents(buffer: Buffer, eventSize: number = EVENT_SIZE_64): DecodeResult {
  if (eventSize !== EVENT_SIZE_64 && eventSize !== EVENT_SIZE_32) {
    throw new RangeError(`Unsupported input_event size ${eventSize}`);
  }

  const events: InputEventRecord[] = [];
  const whole = buffer.length - (buffer.length % eventSize);

  // type, code and value follow the timeval
  const timeval = eventSize - 8;

  for (let offset = 0; offset < whole; offset += eventSize) {
    events.push({
      type:  buffer.readUInt16LE(offset + timeval),
      code:  buffer.readUInt16LE(offset + timeval + 2),
      value: buffer.readInt32LE(offset + timeval + 4),
    });
  }

  return { events, rest: buffer.subarray(whole) };
}
