/** Player numbers as they appear on the wire */
export type PlayerNumber = 1 | 2;

/** 0 = empty, 1 = Player 1, 2 = Player 2 */
export type CellValue = 0 | PlayerNumber;

/** 3x3 board represented as a flat array of 9 cells (row-major, index = x * 3 + y) */
export type Board = [
  CellValue, CellValue, CellValue,
  CellValue, CellValue, CellValue,
  CellValue, CellValue, CellValue,
];

export const BOARD_SIZE = 3;

export interface GameSnapshot {
  board: Board;
  currentMover: PlayerNumber;
  active: boolean;
  moveCount: number;
}

export type RejectReason = "game_over" | "out_of_range" | "occupied" | "not_your_turn";

export type MoveOutcome =
  | { kind: "rejected"; reason: RejectReason }
  | { kind: "continued" }
  | { kind: "won"; player: PlayerNumber }
  | { kind: "drawn" };
