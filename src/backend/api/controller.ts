/**
 * controller.ts — Controller state over HTTP and WebSocket
 *
 * Routes:
 *   GET  /api/controller/state    → { state, running }   (one poll())
 *   POST /api/controller/profile  → EventRateReport      (move the sticks!)
 *                                   408 when too few events arrive in time
 *
 * Bridge:
 *   Every normalized input is broadcast to WebSocket clients as
 *     { type: "input", name, value, code, timestamp }
 *   and the end of the producer as
 *     { type: "controller_stopped", exit, timestamp }
 *
 * The controller instance is passed in; there is no module-level registry.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { GameController } from "../modules/controller/index.js";
import type { NormalizedInput } from "../modules/normalizer/index.js";
import type { ReaderExit } from "../modules/event-reader/index.js";
import { measureEventRate } from "../modules/diagnostics/index.js";
import { MeasurementAbortedError, MeasurementTimeoutError } from "../errors.js";
import { broadcast } from "./ws.js";
import { logger } from "../logger.js";

const log = logger.child({ module: "controller-api" });

export const ProfileRequestSchema = z
  .object({
    windowSize: z.number().int().min(1).max(100_000).optional(),
    windows: z.number().int().min(1).max(100).optional(),
    timeoutMs: z.number().int().min(1).max(600_000).optional(),
  })
  .strict();

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export async function registerControllerRoutes(app: FastifyInstance, controller: GameController) {
  // GET /api/controller/state
  app.get("/api/controller/state", async () => {
    return controller.poll();
  });

  // POST /api/controller/profile
  app.post("/api/controller/profile", async (request, reply) => {
    const parsed = ProfileRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.flatten() });
    }
    if (controller.status === "stopped") {
      return reply.status(409).send({ error: "Controller is stopped" });
    }

    log.info(parsed.data, "Measuring event rate");
    try {
      return await measureEventRate(controller, parsed.data);
    } catch (err) {
      if (err instanceof MeasurementAbortedError) {
        return reply.status(409).send({ error: err.message });
      }
      if (err instanceof MeasurementTimeoutError) {
        return reply.status(408).send({ error: err.message });
      }
      throw err;
    }
  });
}

// ---------------------------------------------------------------------------
// WebSocket bridge
// ---------------------------------------------------------------------------

/**
 * Broadcasts the controller's inputs and its stop to WebSocket clients.
 * Returns a function that detaches the bridge.
 */
export function attachControllerBridge(controller: GameController): () => void {
  const onInput = (input: NormalizedInput) => {
    broadcast({ type: "input", ...input, timestamp: Date.now() });
  };
  const onStopped = (exit: ReaderExit) => {
    broadcast({ type: "controller_stopped", exit, timestamp: Date.now() });
  };

  controller.on("input", onInput);
  controller.on("stopped", onStopped);
  log.info("Controller bridge attached");

  return () => {
    controller.off("input", onInput);
    controller.off("stopped", onStopped);
    log.info("Controller bridge detached");
  };
}
