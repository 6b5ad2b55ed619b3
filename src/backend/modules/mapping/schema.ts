import { z } from "zod";

// ---------------------------------------------------------------------------
// Raw codes
// ---------------------------------------------------------------------------

/**
 * An event code: a non-negative integer, or a hex string as printed by
 * `evtest` and the kernel headers (e.g. "0x130" for BTN_SOUTH).
 */
export const RawCode = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .regex(/^0x[0-9a-f]+$/i, "Code strings must be hex, e.g. \"0x130\"")
    .transform((s) => parseInt(s, 16)),
]);

// ---------------------------------------------------------------------------
// Normalization steps
// ---------------------------------------------------------------------------

export const NormalizationStepSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("passthrough") }).strict(),
  z
    .object({
      type: z.literal("scale"),
      min: z.number().int(),
      max: z.number().int(),
      outMin: z.number().default(-1),
      outMax: z.number().default(1),
    })
    .strict(),
  z.object({ type: z.literal("invert") }).strict(),
  z
    .object({
      type: z.literal("deadzone"),
      threshold: z.number().nonnegative(),
    })
    .strict(),
]);

// ---------------------------------------------------------------------------
// Entries
// ---------------------------------------------------------------------------

const LogicalName = z.string().trim().min(1, "Logical name must not be empty");

export const MappingEntrySchema = z.discriminatedUnion("kind", [
  z
    .object({
      code: RawCode,
      name: LogicalName,
      kind: z.literal("button"),
    })
    .strict(),
  z
    .object({
      code: RawCode,
      name: LogicalName,
      kind: z.literal("axis"),
      normalization: z.array(NormalizationStepSchema).default([]),
    })
    .strict(),
]);

/**
 * A full mapping configuration. Cross-entry rules (unique codes, one kind per
 * logical name, non-empty scale ranges) are checked here so that every
 * problem is reported in one pass.
 */
export const MappingConfigSchema = z
  .object({
    family: z.string().trim().min(1).optional(),
    entries: z.array(MappingEntrySchema).min(1, "A mapping needs at least one entry"),
  })
  .strict()
  .superRefine((config, ctx) => {
    const byCode = new Map<number, string>();
    const kindByName = new Map<string, string>();

    config.entries.forEach((entry, i) => {
      const owner = byCode.get(entry.code);
      if (owner !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entries", i, "code"],
          message: `Duplicate code 0x${entry.code.toString(16)} (already mapped to "${owner}")`,
        });
      } else {
        byCode.set(entry.code, entry.name);
      }

      const kind = kindByName.get(entry.name);
      if (kind !== undefined && kind !== entry.kind) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entries", i, "name"],
          message: `"${entry.name}" is already mapped as a ${kind}`,
        });
      } else {
        kindByName.set(entry.name, entry.kind);
      }

      if (entry.kind !== "axis") return;
      entry.normalization.forEach((step, j) => {
        if (step.type !== "scale") return;
        if (step.min >= step.max) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["entries", i, "normalization", j],
            message: "scale.min must be below scale.max",
          });
        }
        if (step.outMin >= step.outMax) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["entries", i, "normalization", j],
            message: "scale.outMin must be below scale.outMax",
          });
        }
      });
    });
  });

export type MappingConfigInput = z.input<typeof MappingConfigSchema>;
export type MappingConfig = z.output<typeof MappingConfigSchema>;
