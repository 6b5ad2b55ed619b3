import Fastify from "fastify";
import fastifyWebSocket from "@fastify/websocket";
import { fileURLToPath } from "url";
import { logger, loggerOptions } from "./logger.js";
import { loadSettings } from "./modules/settings/index.js";
import { createGameController, type GameController } from "./modules/controller/index.js";
import { createEvdevSource } from "./modules/event-reader/index.js";
import { attachPassthroughLog } from "./modules/diagnostics/index.js";
import { registerControllerRoutes, attachControllerBridge } from "./api/controller.js";
import { registerWsRoutes } from "./api/ws.js";

export const VERSION = "0.1.0";

export async function buildServer(controller: GameController) {
  const app = Fastify({ logger: loggerOptions });

  // WebSocket support
  await app.register(fastifyWebSocket);

  // Health check
  app.get("/api/health", async () => ({
    status: "ok",
    version: VERSION,
    family: controller.table.family,
    running: controller.poll().running,
    timestamp: Date.now(),
  }));

  // Register route modules
  await registerControllerRoutes(app, controller);
  await registerWsRoutes(app);

  return app;
}

async function main() {
  const settings = loadSettings();

  const controller = createGameController({
    source: createEvdevSource(settings.devicePath),
    family: settings.family,
    mapping: settings.mappingPath,
  });

  const app = await buildServer(controller);
  const detachBridge = attachControllerBridge(controller);
  const detachPassthrough = settings.passthrough ? attachPassthroughLog(controller) : null;

  try {
    await app.listen({ port: settings.port, host: settings.host });
    logger.info(
      { url: `http://${settings.host}:${settings.port}`, device: settings.devicePath },
      "btpad ready"
    );
    controller.start();
  } catch (err) {
    logger.error({ err }, "Failed to start server");
    process.exit(1);
  }

  // Graceful shutdown: stop the producer before closing sockets
  const shutdown = () => {
    detachPassthrough?.();
    controller
      .stop()
      .then(() => {
        detachBridge();
        return app.close();
      })
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT",  shutdown);
  process.once("SIGTERM", shutdown);
}

// Only run when executed directly, not when imported by tests
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err) => {
    logger.error({ err }, "btpad failed to start");
    process.exit(1);
  });
}
