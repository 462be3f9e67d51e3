import type { ConnectionId, ITransport, TransportEvent } from "./Transport";

/** Ports held by every MemoryTransport in the process. */
const boundPorts = new Set<number>();

interface MemoryConnection {
  client: MemoryClient;
  events: TransportEvent[];
}

/**
 * The peer side of an in-process connection.
 */
export class MemoryClient {
  /** Frames delivered by the server, in order. */
  readonly received: Buffer[] = [];
  /** When set, server sends to this client report failure. */
  failSends = false;
  open = true;

  constructor(
    readonly id: ConnectionId,
    private transport: MemoryTransport
  ) {}

  send(payload: Uint8Array): void {
    this.transport.deliver(this.id, Buffer.from(payload));
  }

  disconnect(): void {
    this.transport.hangUp(this.id);
  }

  /** Take and clear everything received so far. */
  drain(): Buffer[] {
    return this.received.splice(0, this.received.length);
  }
}

/**
 * Transport with no sockets. Clients live in the same process and are
 * created with connectClient().
 */
export class MemoryTransport implements ITransport {
  private connections = new Map<ConnectionId, MemoryConnection>();
  private pendingAccepts: ConnectionId[] = [];
  private nextId = 1;
  private port: number | null = null;
  updates = 0;

  listen(port: number, _host: string): Promise<number> {
    if (this.port !== null) {
      return Promise.reject(new Error("MemoryTransport is already listening"));
    }
    if (boundPorts.has(port)) {
      return Promise.reject(new Error(`listen EADDRINUSE: port ${port} already bound`));
    }
    boundPorts.add(port);
    this.port = port;
    return Promise.resolve(port);
  }

  connectClient(): MemoryClient {
    if (this.port === null) {
      throw new Error("MemoryTransport is not listening");
    }
    const id = this.nextId++;
    const client = new MemoryClient(id, this);
    this.connections.set(id, { client, events: [] });
    this.pendingAccepts.push(id);
    return client;
  }

  /** @internal client to server */
  deliver(id: ConnectionId, payload: Buffer): void {
    const conn = this.connections.get(id);
    if (!conn || !conn.client.open) return;
    conn.events.push({ type: "data", payload });
  }

  /** @internal client-initiated close */
  hangUp(id: ConnectionId): void {
    const conn = this.connections.get(id);
    if (!conn || !conn.client.open) return;
    conn.client.open = false;
    conn.events.push({ type: "disconnect" });
  }

  update(): void {
    this.updates++;
  }

  accept(): ConnectionId | null {
    let id = this.pendingAccepts.shift();
    while (id !== undefined) {
      const conn = this.connections.get(id);
      if (conn && conn.client.open) {
        return id;
      }
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
    if (!conn || !conn.client.open || conn.client.failSends) {
      return false;
    }
    conn.client.received.push(Buffer.from(payload));
    return true;
  }

  isLive(id: ConnectionId): boolean {
    return this.connections.has(id);
  }

  disconnect(id: ConnectionId): void {
    const conn = this.connections.get(id);
    if (!conn) return;
    conn.client.open = false;
    this.connections.delete(id);
  }

  close(): Promise<void> {
    for (const conn of this.connections.values()) {
      conn.client.open = false;
    }
    this.connections.clear();
    this.pendingAccepts = [];
    if (this.port !== null) {
      boundPorts.delete(this.port);
      this.port = null;
    }
    return Promise.resolve();
  }
}
