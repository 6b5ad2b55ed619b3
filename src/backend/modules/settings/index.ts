import { readFileSync, existsSync, copyFileSync, mkdirSync } from "fs";
import { resolve, dirname } from "path";
import { z } from "zod";
import { logger } from "../../logger.js";
import { CONTROLLER_FAMILIES, DEFAULT_FAMILY } from "../mapping/types.js";

const log = logger.child({ module: "settings" });

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * Validates a filesystem path: must be a non-empty absolute Unix path.
 * Rejects empty strings and Windows-style or relative paths.
 */
export const AbsolutePath = z
  .string()
  .min(1, "Path must not be empty")
  .refine((p) => p.startsWith("/"), {
    message: "Path must be absolute, starting with /",
  });

export const SettingsSchema = z.object({
  /** The controller's evdev node, e.g. /dev/input/event3. Pairing happens outside btpad. */
  devicePath: AbsolutePath.default("/dev/input/event0"),
  /** Built-in mapping used when mappingPath is unset. */
  family: z.enum(CONTROLLER_FAMILIES).default(DEFAULT_FAMILY),
  /** JSON mapping file that replaces the family default. */
  mappingPath: AbsolutePath.optional(),
  /** Log every normalized input at debug level. */
  passthrough: z.boolean().default(false),
  host: z.string().trim().min(1).default("127.0.0.1"),
  port: z.number().int().min(1).max(65535).default(9430),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------
const DEFAULT_SETTINGS_PATH = resolve(process.cwd(), "config", "settings.json");
const EXAMPLE_PATH = resolve(process.cwd(), "config.example.json");

export function settingsPath(): string {
  return process.env.BTPAD_SETTINGS ? resolve(process.env.BTPAD_SETTINGS) : DEFAULT_SETTINGS_PATH;
}

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------
const _settings = new Map<string, Settings>();

function ensureConfigExists(path: string): void {
  if (existsSync(path) || !existsSync(EXAMPLE_PATH)) return;
  mkdirSync(dirname(path), { recursive: true });
  copyFileSync(EXAMPLE_PATH, path);
  log.info({ path }, "Created settings from example template");
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Loads settings from disk, creating config/settings.json from the example
 * template if it does not exist yet. A missing file with no template yields
 * the schema defaults. Cached in memory per path after first load.
 */
export function loadSettings(path: string = settingsPath()): Settings {
  const cached = _settings.get(path);
  if (cached) return cached;

  ensureConfigExists(path);

  const raw: unknown = existsSync(path) ? JSON.parse(readFileSync(path, "utf-8")) : {};
  const settings = SettingsSchema.parse(raw);
  _settings.set(path, settings);
  log.debug({ path, family: settings.family }, "Settings loaded");
  return settings;
}
