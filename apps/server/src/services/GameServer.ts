import type Logger from "bunyan";
import { type GameSnapshot, type ServerMessage, decodeClientCommand, encodeServerMessage } from "@tttserver/core";
import { TicTacToeGame } from "@tttserver/game-tictactoe";
import type { ConnectionId, ITransport } from "../transport/Transport";
import { SessionRegistry } from "../sessions/SessionRegistry";
import defaultLog from "../logger";

export interface GameServerOptions {
  transport: ITransport;
  port: number;
  host: string;
  maxConnections: number;
  log?: Logger;
}

export interface TickStats {
  pruned: number;
  accepted: number;
  refused: number;
  messages: number;
  malformed: number;
  movesApplied: number;
  movesRejected: number;
}

function emptyStats(): TickStats {
  return { pruned: 0, accepted: 0, refused: 0, messages: 0, malformed: 0, movesApplied: 0, movesRejected: 0 };
}

/**
 * Drives one shared tic-tac-toe game over a poll-based transport.
 * Everything runs inside tick(), so moves are applied one at a time.
 */
export class GameServer {
  private readonly transport: ITransport;
  private readonly registry: SessionRegistry;
  private readonly game = new TicTacToeGame();
  private readonly log: Logger;

  constructor(private opts: GameServerOptions) {
    this.transport = opts.transport;
    this.registry = new SessionRegistry(opts.transport, opts.maxConnections);
    this.log = opts.log ?? defaultLog;
  }

  /** Bind the transport. Rejects (after logging) when the port cannot be bound. */
  async init(): Promise<number> {
    this.game.reset();

    let port: number;
    try {
      port = await this.transport.listen(this.opts.port, this.opts.host);
    } catch (err) {
      this.log.error(
        { port: this.opts.port, err: err instanceof Error ? err.message : String(err) },
        "Failed to bind to port"
      );
      throw err;
    }

    this.log.info({ port, maxConnections: this.registry.maxConnections }, "Game server listening");
    return port;
  }

  tick(): TickStats {
    const stats = emptyStats();

    // 1. Transport housekeeping
    this.transport.update();

    // 2. Reclaim slots of connections that went away
    stats.pruned = this.registry.prune();

    // 3. Admit everything waiting
    for (let conn = this.transport.accept(); conn !== null; conn = this.transport.accept()) {
      if (this.registry.admit(conn)) {
        stats.accepted++;
        this.log.info({ connection: conn, sessions: this.registry.size }, "Accepted a client connection");
      } else {
        stats.refused++;
        this.transport.disconnect(conn);
        this.log.warn({ connection: conn, max: this.registry.maxConnections }, "Connection limit reached, refusing client");
      }
    }

    // 4. Drain each connection completely before moving on
    this.registry.forEachLive((conn) => {
      for (let event = this.transport.popEvent(conn); event !== null; event = this.transport.popEvent(conn)) {
        if (event.type === "disconnect") {
          this.log.info({ connection: conn }, "Client has disconnected from server");
          break;
        }
        stats.messages++;
        this.handlePayload(conn, event.payload, stats);
      }
    });

    return stats;
  }

  async shutdown(): Promise<void> {
    await this.transport.close();
    this.registry.prune();
    this.log.info("Game server stopped");
  }

  /** Operator reset: clear the board and tell everyone. */
  resetGame(): void {
    this.game.reset();
    this.log.info("Game reset");
    this.broadcast(this.game.toMessage());
  }

  snapshot(): GameSnapshot {
    return this.game.snapshot();
  }

  get sessionCount(): number {
    return this.registry.size;
  }

  private handlePayload(conn: ConnectionId, payload: Buffer, stats: TickStats): void {
    const decoded = decodeClientCommand(payload);
    if (!decoded.ok) {
      stats.malformed++;
      this.log.debug({ connection: conn, error: decoded.error }, "Ignoring malformed message");
      return;
    }

    const { player, x, y } = decoded.value;
    this.log.debug({ connection: conn, player, x, y }, "Msg received");

    const outcome = this.game.applyMove(player, x, y);
    switch (outcome.kind) {
      case "rejected":
        stats.movesRejected++;
        this.log.debug({ connection: conn, player, x, y, reason: outcome.reason }, "Move rejected");
        return;
      case "won":
        this.log.info({ player: outcome.player }, "Game won");
        this.broadcast({ type: "WIN", player: outcome.player });
        break;
      case "drawn":
        this.log.info("Game drawn");
        this.broadcast({ type: "DRAW" });
        break;
      case "continued":
        break;
    }

    stats.movesApplied++;
    this.broadcast(this.game.toMessage());
  }

  private broadcast(message: ServerMessage): void {
    const { sent, failed } = this.registry.broadcast(encodeServerMessage(message));
    if (failed > 0) {
      this.log.debug({ type: message.type, sent, failed }, "Broadcast had failed sends");
    }
  }
}
