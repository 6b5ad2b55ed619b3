/**
 * Shared types for the mapping module.
 * Imported by schema, table and the normalizer, never from index.ts,
 * so there are no circular dependencies between the sub-modules.
 */

/** Controller families that ship with a built-in mapping table. */
export const CONTROLLER_FAMILIES = ["wiiu", "ps3", "xbox"] as const;

export type ControllerFamily = (typeof CONTROLLER_FAMILIES)[number];

export const DEFAULT_FAMILY: ControllerFamily = "wiiu";

export type ControlKind = "button" | "axis";

export interface PassthroughStep {
  type: "passthrough";
}

/** Linear map of [min, max] onto [outMin, outMax]; raw values outside are clamped. */
export interface ScaleStep {
  type: "scale";
  min: number;
  max: number;
  outMin: number;
  outMax: number;
}

export interface InvertStep {
  type: "invert";
}

/**
 * Values with |v| < threshold become exactly 0.
 * `threshold` is in the entry's raw units; a preceding scale step converts it.
 */
export interface DeadzoneStep {
  type: "deadzone";
  threshold: number;
}

export type NormalizationStep = PassthroughStep | ScaleStep | InvertStep | DeadzoneStep;

export interface ButtonEntry {
  readonly code: number;
  readonly name: string;
  readonly kind: "button";
}

export interface AxisEntry {
  readonly code: number;
  readonly name: string;
  readonly kind: "axis";
  readonly normalization: readonly Readonly<NormalizationStep>[];
}

export type MappingEntry = ButtonEntry | AxisEntry;

export interface MappingTable {
  /** Family name, or the label given in the configuration. */
  readonly family: string;
  /** Every logical name the table can produce, in first-declared order. */
  readonly names: readonly string[];
  readonly size: number;
  lookup(code: number): MappingEntry | undefined;
  entries(): Iterable<MappingEntry>;
}
