export { TicTacToeGame } from "./rules";
export { findRejectReason } from "./actions";
export { WIN_LINES, emptyBoard, cellIndex, isInBounds, countWinningLines, hasWon, isBoardFull, otherPlayer } from "./state";
