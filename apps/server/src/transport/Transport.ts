/** Opaque per-peer handle. Ids are never reused within one transport. */
export type ConnectionId = number;

export type TransportEvent =
  | { type: "data"; payload: Buffer }
  | { type: "disconnect" };

/**
 * Non-blocking, poll-driven view of a connection-oriented transport.
 * Delivery order is preserved per connection; nothing is assumed across
 * connections.
 *
 * A connection stays live until its disconnect event has been popped (or
 * the server closed it), so data queued ahead of a disconnect is still
 * drained.
 */
export interface ITransport {
  /** Bind and start accepting. Resolves with the bound port, rejects if binding fails. */
  listen(port: number, host: string): Promise<number>;

  /** Housekeeping run once at the start of every tick. */
  update(): void;

  /** Returns at most one newly accepted connection, or null. */
  accept(): ConnectionId | null;

  /** Next pending event for the connection, or null when drained. */
  popEvent(conn: ConnectionId): TransportEvent | null;

  /** Best-effort send. Returns false if the payload could not be queued. */
  send(conn: ConnectionId, payload: Uint8Array): boolean;

  isLive(conn: ConnectionId): boolean;

  /** Server-initiated close. The connection is not live afterwards. */
  disconnect(conn: ConnectionId): void;

  /** Drop every connection and stop listening. */
  close(): Promise<void>;
}
