/**
 * normalizer — RawEvent + MappingEntry → (logical name, value)
 *
 * Pure module: no I/O, no logging.
 *
 *   Buttons:  0 → 0, anything else → 1
 *             (covers evdev key repeat = 2 and drivers that report -1)
 *
 *   Axes:     the entry's steps run in declaration order
 *               passthrough  v
 *               scale        clamp(v, min, max) mapped onto [outMin, outMax]
 *               invert       -v
 *               deadzone     |v| < threshold → 0
 *             A deadzone threshold is written in raw units; after a scale
 *             step it is converted with the same factor as the value.
 */

import type { RawEvent } from "../event-reader/types.js";
import type {
  AxisEntry,
  MappingEntry,
  MappingTable,
  NormalizationStep,
} from "../mapping/types.js";

export interface NormalizedInput {
  name: string;
  value: number;
  code: number;
}

// ── Buttons ───────────────────────────────────────────────────────────────

export function collapseButton(raw: number): 0 | 1 {
  return raw === 0 ? 0 : 1;
}

// ── Axes ──────────────────────────────────────────────────────────────────

function clamp(value: number, lo: number, hi: number): number {
  return value < lo ? lo : value > hi ? hi : value;
}

/**
 * Runs a list of normalization steps over a raw axis value.
 * An empty list passes the value through.
 */
export function applySteps(raw: number, steps: readonly Readonly<NormalizationStep>[]): number {
  let value = raw;
  // Output units per raw unit; deadzone thresholds are scaled by it.
  let gain = 1;

  for (const step of steps) {
    switch (step.type) {
      case "passthrough":
        break;
      case "scale": {
        const span = step.outMax - step.outMin;
        const range = step.max - step.min;
        // Multiply before dividing so min and max land exactly on outMin and outMax
        value = step.outMin + ((clamp(value, step.min, step.max) - step.min) * span) / range;
        gain *= span / range;
        break;
      }
      case "invert":
        value = -value;
        break;
      case "deadzone":
        if (Math.abs(value) < step.threshold * gain) value = 0;
        break;
    }
  }

  // -0 would leak out of invert(0); callers compare with ===
  return value === 0 ? 0 : value;
}

export function normalizeAxis(raw: number, entry: AxisEntry): number {
  return applySteps(raw, entry.normalization);
}

// ── Entry points ──────────────────────────────────────────────────────────

/** Normalizes one raw event against the entry its code maps to. */
export function normalize(event: RawEvent, entry: MappingEntry): NormalizedInput {
  const value = entry.kind === "button" ? collapseButton(event.value) : normalizeAxis(event.value, entry);
  return { name: entry.name, value, code: event.code };
}

/**
 * Looks the event's code up and normalizes it.
 * Returns null for codes the table does not map; this path does nothing
 * but the lookup.
 */
export function normalizeEvent(event: RawEvent, table: MappingTable): NormalizedInput | null {
  const entry = table.lookup(event.code);
  return entry ? normalize(event, entry) : null;
}
