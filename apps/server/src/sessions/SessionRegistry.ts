import type { ConnectionId, ITransport } from "../transport/Transport";

export interface BroadcastResult {
  sent: number;
  failed: number;
}

/**
 * Tracks the connections admitted to the game. Order is irrelevant,
 * so removal swaps the last entry into the freed slot.
 */
export class SessionRegistry {
  private connections: ConnectionId[] = [];

  constructor(
    private transport: ITransport,
    readonly maxConnections: number
  ) {}

  get size(): number {
    return this.connections.length;
  }

  has(conn: ConnectionId): boolean {
    return this.connections.includes(conn);
  }

  /** Returns false when full or already admitted. */
  admit(conn: ConnectionId): boolean {
    if (this.connections.length >= this.maxConnections) return false;
    if (this.has(conn)) return false;
    this.connections.push(conn);
    return true;
  }

  /** Remove every connection the transport no longer reports live. */
  prune(): number {
    let removed = 0;
    for (let i = 0; i < this.connections.length; i++) {
      if (!this.transport.isLive(this.connections[i])) {
        this.removeAtSwapBack(i);
        i--;
        removed++;
      }
    }
    return removed;
  }

  forEachLive(fn: (conn: ConnectionId) => void): void {
    for (const conn of this.connections) {
      if (this.transport.isLive(conn)) {
        fn(conn);
      }
    }
  }

  /** Send to every live connection. A failed send is counted, never retried. */
  broadcast(payload: Uint8Array): BroadcastResult {
    const result: BroadcastResult = { sent: 0, failed: 0 };
    this.forEachLive((conn) => {
      if (this.transport.send(conn, payload)) {
        result.sent++;
      } else {
        result.failed++;
      }
    });
    return result;
  }

  list(): ConnectionId[] {
    return [...this.connections];
  }

  private removeAtSwapBack(index: number): void {
    const last = this.connections.pop();
    if (last !== undefined && index < this.connections.length) {
      this.connections[index] = last;
    }
  }
}
