/**
 * passthrough.ts — Log every normalized input as it happens
 *
 * Debug aid for figuring out which code a button sends and what the
 * normalizer makes of it. Returns a function that detaches the logger.
 */

import type { Logger } from "pino";
import { logger } from "../../logger.js";
import type { GameController } from "../controller/controller.js";
import { formatCode } from "../mapping/table.js";
import type { NormalizedInput } from "../normalizer/index.js";

export function attachPassthroughLog(
  controller: GameController,
  log: Logger = logger.child({ module: "passthrough" })
): () => void {
  const onInput = (input: NormalizedInput) => {
    log.debug({ control: input.name, value: input.value, code: formatCode(input.code) }, "Input");
  };

  controller.on("input", onInput);
  return () => controller.off("input", onInput);
}
