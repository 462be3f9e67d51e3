import type { GameSnapshot, RejectReason } from "@tttserver/core";
import { cellIndex, isInBounds } from "./state";

/**
 * Check move preconditions in order. Returns the first one that fails,
 * or null if the move may be applied.
 */
export function findRejectReason(
  state: GameSnapshot,
  player: number,
  x: number,
  y: number
): RejectReason | null {
  if (!state.active) {
    return "game_over";
  }

  if (!isInBounds(x, y)) {
    return "out_of_range";
  }

  if (state.board[cellIndex(x, y)] !== 0) {
    return "occupied";
  }

  if (player !== state.currentMover) {
    return "not_your_turn";
  }

  return null;
}
