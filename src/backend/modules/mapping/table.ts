/**
 * ============================================================
 *  Mapping Table — raw event code → logical control
 * ============================================================
 *
 * A table is built once, validated as a whole, frozen, and never
 * mutated afterwards. There is no API to patch a live table: a new
 * mapping means a new controller.
 *
 * Sources, in order of precedence (see resolveMappingTable):
 *   1. a structured value passed by the caller
 *   2. a JSON file path passed by the caller
 *   3. the built-in table of the selected controller family
 *
 * Built-in tables live in <repo>/mappings/<family>.json.
 * ============================================================
 */
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { join } from "path";
import { ConfigError } from "../../errors.js";
import { logger } from "../../logger.js";
import { MappingConfigSchema } from "./schema.js";
import {
  CONTROLLER_FAMILIES,
  DEFAULT_FAMILY,
  type ControllerFamily,
  type MappingEntry,
  type MappingTable,
} from "./types.js";

const log = logger.child({ module: "mapping" });

// src/backend/modules/mapping/ → <repo>/mappings/ (same depth under dist/)
const FAMILIES_DIR = fileURLToPath(new URL("../../../../mappings/", import.meta.url));

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/**
 * Formats a code the way evtest and the kernel headers print it.
 *
 * @example
 *   formatCode(0x130) → "0x130"
 *   formatCode(3)     → "0x3"
 */
export function formatCode(code: number): string {
  return `0x${code.toString(16)}`;
}

export function isControllerFamily(value: string): value is ControllerFamily {
  return (CONTROLLER_FAMILIES as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Validates a mapping configuration and builds an immutable table.
 *
 * Throws ConfigError, listing every problem found, when the value does not
 * match MappingConfigSchema, a code appears twice, a logical name is used
 * with two kinds, or a scale step has an empty range.
 */
export function loadMappingTable(config: unknown, label = "inline mapping"): MappingTable {
  const parsed = MappingConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new ConfigError(`Invalid mapping (${label})`, issues);
  }

  const byCode = new Map<number, MappingEntry>();
  const names: string[] = [];
  const seenNames = new Set<string>();

  for (const entry of parsed.data.entries) {
    const frozen: MappingEntry =
      entry.kind === "axis"
        ? Object.freeze({
            code: entry.code,
            name: entry.name,
            kind: entry.kind,
            normalization: Object.freeze(entry.normalization.map((step) => Object.freeze({ ...step }))),
          })
        : Object.freeze({ code: entry.code, name: entry.name, kind: entry.kind });

    byCode.set(frozen.code, frozen);
    if (!seenNames.has(frozen.name)) {
      seenNames.add(frozen.name);
      names.push(frozen.name);
    }
  }

  const family = parsed.data.family ?? label;
  log.debug({ family, entries: byCode.size, controls: names.length }, "Mapping table loaded");

  return Object.freeze({
    family,
    names: Object.freeze(names),
    size: byCode.size,
    lookup: (code: number) => byCode.get(code),
    entries: () => byCode.values(),
  });
}

/**
 * Reads a JSON mapping file and builds a table from it.
 * Unreadable files and malformed JSON are reported as ConfigError too.
 */
export function loadMappingFile(path: string): MappingTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read mapping file "${path}"`, [reason]);
  }
  return loadMappingTable(raw, path);
}

/** Returns the built-in table for a controller family. */
export function defaultMappingTable(family: ControllerFamily = DEFAULT_FAMILY): MappingTable {
  if (!isControllerFamily(family)) {
    throw new ConfigError(`Unknown controller family "${String(family)}"`, [
      `expected one of: ${CONTROLLER_FAMILIES.join(", ")}`,
    ]);
  }
  return loadMappingFile(join(FAMILIES_DIR, `${family}.json`));
}

export interface MappingSelection {
  /** A structured mapping value, or the path of a JSON mapping file. */
  mapping?: unknown;
  /** Built-in family used when no mapping is given. Defaults to "wiiu". */
  family?: ControllerFamily;
}

/**
 * Picks the table a controller should use: an explicit mapping (value or
 * file path) wins over the family default.
 */
export function resolveMappingTable(selection: MappingSelection = {}): MappingTable {
  const { mapping, family } = selection;
  if (mapping === undefined || mapping === null) return defaultMappingTable(family);
  if (typeof mapping === "string") return loadMappingFile(mapping);
  return loadMappingTable(mapping);
}
