import { WebSocketServer, WebSocket, type RawData } from "ws";
import type Logger from "bunyan";
import type { ConnectionId, ITransport, TransportEvent } from "./Transport";
import defaultLog from "../logger";

export interface WsTransportOptions {
  heartbeatIntervalMs: number;
  log?: Logger;
}

interface WsConnection {
  ws: WebSocket;
  events: TransportEvent[];
  awaitingPong: boolean;
}

function toBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (Buffer.isBuffer(data)) return data;
  return Buffer.from(data);
}

/**
 * WebSocket transport: one binary message per frame. Socket callbacks only
 * enqueue; the server loop pulls everything out through accept/popEvent.
 */
export class WsTransport implements ITransport {
  private wss: WebSocketServer | null = null;
  private connections = new Map<ConnectionId, WsConnection>();
  private pendingAccepts: ConnectionId[] = [];
  private nextId = 1;
  private lastHeartbeatAt = 0;
  private readonly heartbeatIntervalMs: number;
  private readonly log: Logger;

  constructor(opts: WsTransportOptions) {
    this.heartbeatIntervalMs = opts.heartbeatIntervalMs;
    this.log = opts.log ?? defaultLog;
  }

  listen(port: number, host: string): Promise<number> {
    if (this.wss) {
      return Promise.reject(new Error("WsTransport is already listening"));
    }

    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port, host });

      const onBindError = (err: Error) => {
        wss.close();
        reject(err);
      };
      wss.once("error", onBindError);

      wss.once("listening", () => {
        wss.off("error", onBindError);
        wss.on("error", (err) => {
          this.log.error({ err: err.message }, "WebSocket server error");
        });
        wss.on("connection", (ws) => this.handleConnection(ws));

        this.wss = wss;
        this.lastHeartbeatAt = Date.now();
        const address = wss.address();
        resolve(typeof address === "string" ? port : address.port);
      });
    });
  }

  update(now: number = Date.now()): void {
    if (now - this.lastHeartbeatAt < this.heartbeatIntervalMs) return;
    this.lastHeartbeatAt = now;

    for (const [id, conn] of this.connections) {
      if (conn.ws.readyState !== WebSocket.OPEN) continue;
      if (conn.awaitingPong) {
        this.log.info({ connection: id }, "Heartbeat missed, terminating connection");
        conn.ws.terminate();
        continue;
      }
      conn.awaitingPong = true;
      conn.ws.ping();
    }
  }

  accept(): ConnectionId | null {
    let id = this.pendingAccepts.shift();
    while (id !== undefined) {
      const conn = this.connections.get(id);
      if (conn && conn.ws.readyState === WebSocket.OPEN) {
        return id;
      }
      // Closed before the server got to it
      this.connections.delete(id);
      id = this.pendingAccepts.shift();
    }
    return null;
  }

  popEvent(id: ConnectionId): TransportEvent | null {
    const conn = this.connections.get(id);
    if (!conn) return null;

    const event = conn.events.shift();
    if (!event) return null;

    if (event.type === "disconnect") {
      this.connections.delete(id);
    }
    return event;
  }

  send(id: ConnectionId, payload: Uint8Array): boolean {
    const conn = this.connections.get(id);
    if (!conn || conn.ws.readyState !== WebSocket.OPEN) {
      return false;
    }

    conn.ws.send(payload, { binary: true }, (err) => {
      if (err) {
        this.log.warn({ connection: id, err: err.message }, "Send failed");
      }
    });
    return true;
  }

  isLive(id: ConnectionId): boolean {
    return this.connections.has(id);
  }

  disconnect(id: ConnectionId): void {
    const conn = this.connections.get(id);
    if (!conn) return;
    this.connections.delete(id);
    conn.ws.close();
  }

  async close(): Promise<void> {
    for (const conn of this.connections.values()) {
      conn.ws.terminate();
    }
    this.connections.clear();
    this.pendingAccepts = [];

    const wss = this.wss;
    this.wss = null;
    if (!wss) return;

    for (const ws of wss.clients) {
      ws.terminate();
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  }

  private handleConnection(ws: WebSocket): void {
    const id = this.nextId++;
    const conn: WsConnection = { ws, events: [], awaitingPong: false };
    this.connections.set(id, conn);
    this.pendingAccepts.push(id);

    ws.on("message", (data) => {
      if (this.connections.get(id) !== conn) return;
      conn.events.push({ type: "data", payload: toBuffer(data) });
    });

    ws.on("pong", () => {
      conn.awaitingPong = false;
    });

    ws.on("close", () => {
      if (this.connections.get(id) !== conn) return;
      conn.events.push({ type: "disconnect" });
    });

    ws.on("error", (err) => {
      this.log.error({ connection: id, err: err.message }, "WebSocket error");
    });
  }
}
