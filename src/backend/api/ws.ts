import type { FastifyInstance } from "fastify";
import type { WebSocket } from "@fastify/websocket";

// ---------------------------------------------------------------------------
// Connected clients registry
// Used by the controller bridge to broadcast inputs and lifecycle changes
// without holding a reference to every socket itself.
// ---------------------------------------------------------------------------
const clients = new Set<WebSocket>();

export function broadcast(payload: unknown): void {
  const message = JSON.stringify(payload);
  for (const ws of clients) {
    if (ws.readyState === 1 /* OPEN */) {
      ws.send(message);
    }
  }
}

export function clientCount(): number {
  return clients.size;
}

/** The `type` field of a client message; undefined for malformed messages. */
export function messageType(raw: string): unknown {
  try {
    const msg: unknown = JSON.parse(raw);
    return typeof msg === "object" && msg !== null && "type" in msg ? msg.type : undefined;
  } catch {
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Route
// ---------------------------------------------------------------------------
export async function registerWsRoutes(app: FastifyInstance) {
  app.get("/ws", { websocket: true }, (socket) => {
    clients.add(socket);

    socket.send(
      JSON.stringify({ type: "connected", timestamp: Date.now() })
    );

    socket.on("message", (raw) => {
      // Clients can send ping to keep the connection alive; anything else is ignored
      if (messageType(raw.toString()) === "ping") {
        socket.send(JSON.stringify({ type: "pong", timestamp: Date.now() }));
      }
    });

    socket.on("close", () => {
      clients.delete(socket);
    });

    socket.on("error", () => {
      clients.delete(socket);
    });
  });
}
