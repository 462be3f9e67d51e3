import {
  type GameSnapshot,
  type MoveOutcome,
  type PlayerNumber,
  type StateMessage,
  formatServerMessage,
} from "@tttserver/core";
import { cellIndex, emptyBoard, hasWon, isBoardFull, otherPlayer } from "./state";
import { findRejectReason } from "./actions";

/**
 * Owns the single authoritative board. All mutation goes through
 * applyMove or reset; callers only ever see copies.
 */
export class TicTacToeGame {
  private state: GameSnapshot = TicTacToeGame.initialState();

  private static initialState(): GameSnapshot {
    return {
      board: emptyBoard(),
      currentMover: 1,
      active: true,
      moveCount: 0,
    };
  }

  reset(): void {
    this.state = TicTacToeGame.initialState();
  }

  snapshot(): GameSnapshot {
    return { ...this.state, board: [...this.state.board] };
  }

  get currentMover(): PlayerNumber {
    return this.state.currentMover;
  }

  get active(): boolean {
    return this.state.active;
  }

  applyMove(player: number, x: number, y: number): MoveOutcome {
    const reason = findRejectReason(this.state, player, x, y);
    if (reason !== null) {
      return { kind: "rejected", reason };
    }

    // findRejectReason guarantees player === currentMover
    const mover = this.state.currentMover;
    this.state.board[cellIndex(x, y)] = mover;
    this.state.moveCount++;

    if (hasWon(this.state.board, mover)) {
      this.state.active = false;
      return { kind: "won", player: mover };
    }

    if (isBoardFull(this.state.board)) {
      this.state.active = false;
      return { kind: "drawn" };
    }

    this.state.currentMover = otherPlayer(mover);
    return { kind: "continued" };
  }

  toMessage(): StateMessage {
    const { board, currentMover, active } = this.snapshot();
    return { type: "STATE", board, currentMover, active };
  }

  /** Canonical `rows|mover|active` string for the current state. */
  serialize(): string {
    return formatServerMessage(this.toMessage());
  }
}
