import { BOARD_SIZE, type Board, type PlayerNumber } from "@tttserver/core";

/** All possible winning lines (indices into the flat board array) */
export const WIN_LINES: [number, number, number][] = [
  // Rows
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  // Columns
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  // Diagonals
  [0, 4, 8],
  [2, 4, 6],
];

export function emptyBoard(): Board {
  return [0, 0, 0, 0, 0, 0, 0, 0, 0];
}

export function cellIndex(x: number, y: number): number {
  return x * BOARD_SIZE + y;
}

export function isInBounds(x: number, y: number): boolean {
  return x >= 0 && x < BOARD_SIZE && y >= 0 && y < BOARD_SIZE;
}

/**
 * Count the lines that `player` fully occupies. Every line is inspected,
 * so callers can also detect impossible double wins in tests.
 */
export function countWinningLines(board: Board, player: PlayerNumber): number {
  let count = 0;
  for (const [a, b, c] of WIN_LINES) {
    if (board[a] === player && board[b] === player && board[c] === player) {
      count++;
    }
  }
  return count;
}

export function hasWon(board: Board, player: PlayerNumber): boolean {
  return countWinningLines(board, player) > 0;
}

export function isBoardFull(board: Board): boolean {
  return board.every((cell) => cell !== 0);
}

export function otherPlayer(player: PlayerNumber): PlayerNumber {
  return player === 1 ? 2 : 1;
}
