/**
 * ============================================================
 *  Mapping Module — Public API
 * ============================================================
 *
 * Built-in families: wiiu (default), ps3, xbox.
 * Custom tables come from a JSON file or a structured value with the
 * same shape as mappings/<family>.json.
 * ============================================================
 */

export {
  CONTROLLER_FAMILIES,
  DEFAULT_FAMILY,
} from "./types.js";
export type {
  ControllerFamily,
  ControlKind,
  NormalizationStep,
  ScaleStep,
  DeadzoneStep,
  ButtonEntry,
  AxisEntry,
  MappingEntry,
  MappingTable,
} from "./types.js";
export { MappingConfigSchema, NormalizationStepSchema, RawCode } from "./schema.js";
export type { MappingConfig, MappingConfigInput } from "./schema.js";
export {
  loadMappingTable,
  loadMappingFile,
  defaultMappingTable,
  resolveMappingTable,
  isControllerFamily,
  formatCode,
} from "./table.js";
export type { MappingSelection } from "./table.js";
