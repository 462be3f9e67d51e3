import { BOARD_SIZE, type Board, type CellValue, type PlayerNumber } from "../types/game";
import type { ClientCommand, DecodeResult, ServerMessage } from "../types/protocol";
import { decodeFrame, encodeFrame } from "./Encoding";

const FIELD_SEPARATOR = "|";
const ROW_SEPARATOR = ";";
const CELL_SEPARATOR = ",";

const INT_RE = /^[+-]?\d+$/;
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export function isPlayerNumber(value: number): value is PlayerNumber {
  return value === 1 || value === 2;
}

function isCellValue(value: number): value is CellValue {
  return value === 0 || isPlayerNumber(value);
}

function parseInt32(token: string): number | null {
  const trimmed = token.trim();
  if (!INT_RE.test(trimmed)) return null;
  const value = Number(trimmed);
  if (value < INT32_MIN || value > INT32_MAX) return null;
  return value;
}

function formatBool(value: boolean): string {
  return value ? "True" : "False";
}

/** Rows joined by ";", cells by "," */
export function formatBoard(board: Board): string {
  const rows: string[] = [];
  for (let x = 0; x < BOARD_SIZE; x++) {
    rows.push(board.slice(x * BOARD_SIZE, (x + 1) * BOARD_SIZE).join(CELL_SEPARATOR));
  }
  return rows.join(ROW_SEPARATOR);
}

function parseBoard(text: string): Board | null {
  const rows = text.split(ROW_SEPARATOR);
  if (rows.length !== BOARD_SIZE) return null;

  const cells: CellValue[] = [];
  for (const row of rows) {
    const values = row.split(CELL_SEPARATOR);
    if (values.length !== BOARD_SIZE) return null;
    for (const raw of values) {
      const value = parseInt32(raw);
      if (value === null || !isCellValue(value)) return null;
      cells.push(value);
    }
  }

  const [c0, c1, c2, c3, c4, c5, c6, c7, c8] = cells;
  return [c0, c1, c2, c3, c4, c5, c6, c7, c8];
}

/**
 * Parse `MOVE|<player>|<x>|<y>`. Range checks are left to the game rules.
 */
export function parseClientCommand(text: string): DecodeResult<ClientCommand> {
  const parts = text.split(FIELD_SEPARATOR);

  if (parts[0] !== "MOVE") {
    return { ok: false, error: `unrecognized verb "${parts[0]}"` };
  }
  if (parts.length !== 4) {
    return { ok: false, error: `expected 4 fields, got ${parts.length}` };
  }

  const player = parseInt32(parts[1]);
  const x = parseInt32(parts[2]);
  const y = parseInt32(parts[3]);
  if (player === null || x === null || y === null) {
    return { ok: false, error: "non-integer field" };
  }

  return { ok: true, value: { type: "MOVE", player, x, y } };
}

export function formatClientCommand(command: ClientCommand): string {
  return [command.type, command.player, command.x, command.y].join(FIELD_SEPARATOR);
}

export function formatServerMessage(message: ServerMessage): string {
  switch (message.type) {
    case "STATE":
      return [formatBoard(message.board), message.currentMover, formatBool(message.active)].join(FIELD_SEPARATOR);
    case "WIN":
      return `WIN${FIELD_SEPARATOR}${message.player}`;
    case "DRAW":
      return "DRAW";
  }
}

/** Client-side counterpart of formatServerMessage. */
export function parseServerMessage(text: string): DecodeResult<ServerMessage> {
  if (text === "DRAW") {
    return { ok: true, value: { type: "DRAW" } };
  }

  const parts = text.split(FIELD_SEPARATOR);

  if (parts[0] === "WIN") {
    const player = parts.length === 2 ? parseInt32(parts[1]) : null;
    if (player === null || !isPlayerNumber(player)) {
      return { ok: false, error: "malformed WIN message" };
    }
    return { ok: true, value: { type: "WIN", player } };
  }

  if (parts.length !== 3) {
    return { ok: false, error: `expected 3 state fields, got ${parts.length}` };
  }

  const board = parseBoard(parts[0]);
  if (!board) {
    return { ok: false, error: "malformed board" };
  }

  const currentMover = parseInt32(parts[1]);
  if (currentMover === null || !isPlayerNumber(currentMover)) {
    return { ok: false, error: "malformed current mover" };
  }

  if (parts[2] !== "True" && parts[2] !== "False") {
    return { ok: false, error: "malformed active flag" };
  }

  return { ok: true, value: { type: "STATE", board, currentMover, active: parts[2] === "True" } };
}

export function encodeServerMessage(message: ServerMessage): Buffer {
  return encodeFrame(formatServerMessage(message));
}

export function encodeClientCommand(command: ClientCommand): Buffer {
  return encodeFrame(formatClientCommand(command));
}

export function decodeClientCommand(payload: Uint8Array): DecodeResult<ClientCommand> {
  const frame = decodeFrame(payload);
  return frame.ok ? parseClientCommand(frame.value) : frame;
}

export function decodeServerMessage(payload: Uint8Array): DecodeResult<ServerMessage> {
  const frame = decodeFrame(payload);
  return frame.ok ? parseServerMessage(frame.value) : frame;
}
