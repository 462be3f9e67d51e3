import type { Board, PlayerNumber } from "./game";

/** Commands sent by clients. MOVE is the only one. */
export interface MoveCommand {
  type: "MOVE";
  player: number;
  x: number;
  y: number;
}

export type ClientCommand = MoveCommand;

export interface StateMessage {
  type: "STATE";
  board: Board;
  currentMover: PlayerNumber;
  active: boolean;
}

export interface WinMessage {
  type: "WIN";
  player: PlayerNumber;
}

export interface DrawMessage {
  type: "DRAW";
}

export type ServerMessage = StateMessage | WinMessage | DrawMessage;

/** Result of decoding untrusted input. Decoders never throw. */
export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: string };
