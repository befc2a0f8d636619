import type { IncomingMessage, Server } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import { errorMessage } from "./errors.js";
import { createLogger } from "./log.js";

const log = createLogger("ws");

const CLOSE_GOING_AWAY = 1001;

function rawText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * Real-time channel at `/api/ws`. Each text message is echoed to its sender
 * and then broadcast to every open client.
 */
export class SocketHub {
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly clients = new Set<WebSocket>();
  private closed = false;

  constructor(private readonly path = "/api/ws") {
    this.wss.on("connection", (ws: WebSocket) => this.join(ws));
  }

  /** Take over HTTP upgrades for this hub's path on `server`. */
  attach(server: Server): void {
    server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
      if (pathname !== this.path) {
        socket.destroy();
        return;
      }
      this.wss.handleUpgrade(req, socket, head, (ws) => {
        this.wss.emit("connection", ws, req);
      });
    });
  }

  get size(): number {
    return this.clients.size;
  }

  broadcast(message: string): void {
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) client.send(message);
    }
  }

  /** Close every client with 1001, waiting at most `timeoutMs` before dropping stragglers. */
  async close(timeoutMs = 2_000): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const closing = [...this.clients].map(
      (ws) =>
        new Promise<void>((resolve) => {
          const timer = setTimeout(() => {
            ws.terminate();
            resolve();
          }, timeoutMs);
          ws.once("close", () => {
            clearTimeout(timer);
            resolve();
          });
          ws.close(CLOSE_GOING_AWAY, "Server shutting down");
        }),
    );
    await Promise.all(closing);
    this.clients.clear();
    await new Promise<void>((resolve, reject) => this.wss.close((err) => (err ? reject(err) : resolve())));
    log.info("ws_closed", { clients: closing.length });
  }

  private join(ws: WebSocket): void {
    this.clients.add(ws);
    log.debug("ws_connected", { clients: this.clients.size });

    ws.on("message", (data: RawData) => {
      const text = rawText(data);
      ws.send(`You sent: ${text}`);
      this.broadcast(`Client says: ${text}`);
    });
    ws.on("error", (error: Error) => {
      log.warn("ws_error", { error: errorMessage(error) });
    });
    ws.on("close", () => {
      this.clients.delete(ws);
      log.debug("ws_disconnected", { clients: this.clients.size });
      this.broadcast("A client disconnected");
    });
  }
}
