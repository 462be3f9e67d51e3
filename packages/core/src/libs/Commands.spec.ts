import { strict as assert } from "assert";
import type { Board } from "../types/game";
import {
  parseClientCommand,
  formatClientCommand,
  formatServerMessage,
  parseServerMessage,
  formatBoard,
  decodeClientCommand,
  decodeServerMessage,
  encodeClientCommand,
  encodeServerMessage,
} from "./Commands";
import { encodeFrame } from "./Encoding";

const EMPTY: Board = [0, 0, 0, 0, 0, 0, 0, 0, 0];

describe("Commands", () => {
  describe("parseClientCommand", () => {
    it("should parse a well-formed MOVE", () => {
      assert.deepEqual(parseClientCommand("MOVE|1|0|2"), {
        ok: true,
        value: { type: "MOVE", player: 1, x: 0, y: 2 },
      });
    });

    it("should pass out-of-range coordinates through to the rules", () => {
      assert.deepEqual(parseClientCommand("MOVE|1|9|0"), {
        ok: true,
        value: { type: "MOVE", player: 1, x: 9, y: 0 },
      });
    });

    it("should accept negative integers and surrounding whitespace", () => {
      assert.deepEqual(parseClientCommand("MOVE| 2 |-1|0"), {
        ok: true,
        value: { type: "MOVE", player: 2, x: -1, y: 0 },
      });
    });

    it("should accept an explicit plus sign", () => {
      assert.deepEqual(parseClientCommand("MOVE|+1|0|+2"), {
        ok: true,
        value: { type: "MOVE", player: 1, x: 0, y: 2 },
      });
    });

    it("should reject the wrong token count", () => {
      assert.equal(parseClientCommand("MOVE|1|0").ok, false);
      assert.equal(parseClientCommand("MOVE|1|0|0|0").ok, false);
    });

    it("should reject non-integer fields", () => {
      assert.equal(parseClientCommand("MOVE|one|0|0").ok, false);
      assert.equal(parseClientCommand("MOVE|1|0.5|0").ok, false);
      assert.equal(parseClientCommand("MOVE|1||0").ok, false);
    });

    it("should reject integers outside int32", () => {
      assert.equal(parseClientCommand("MOVE|1|2147483648|0").ok, false);
      assert.equal(parseClientCommand("MOVE|1|2147483647|0").ok, true);
    });

    it("should reject unrecognized verbs", () => {
      assert.equal(parseClientCommand("JUMP|1|0|0").ok, false);
      assert.equal(parseClientCommand("MOVES|1|0|0").ok, false);
      assert.equal(parseClientCommand("").ok, false);
    });
  });

  describe("formatClientCommand", () => {
    it("should produce the pipe-delimited grammar", () => {
      assert.equal(formatClientCommand({ type: "MOVE", player: 2, x: 1, y: 0 }), "MOVE|2|1|0");
    });
  });

  describe("formatBoard", () => {
    it("should join rows with ; and cells with ,", () => {
      assert.equal(formatBoard([1, 0, 0, 0, 2, 0, 0, 0, 1]), "1,0,0;0,2,0;0,0,1");
    });
  });

  describe("formatServerMessage", () => {
    it("should format the initial state", () => {
      const text = formatServerMessage({ type: "STATE", board: EMPTY, currentMover: 1, active: true });
      assert.equal(text, "0,0,0;0,0,0;0,0,0|1|True");
    });

    it("should capitalize the inactive flag", () => {
      const text = formatServerMessage({ type: "STATE", board: [1, 1, 1, 2, 2, 0, 0, 0, 0], currentMover: 1, active: false });
      assert.equal(text, "1,1,1;2,2,0;0,0,0|1|False");
    });

    it("should format terminal events", () => {
      assert.equal(formatServerMessage({ type: "WIN", player: 2 }), "WIN|2");
      assert.equal(formatServerMessage({ type: "DRAW" }), "DRAW");
    });
  });

  describe("parseServerMessage", () => {
    it("should read a state snapshot", () => {
      assert.deepEqual(parseServerMessage("1,0,0;0,0,0;0,0,0|2|True"), {
        ok: true,
        value: { type: "STATE", board: [1, 0, 0, 0, 0, 0, 0, 0, 0], currentMover: 2, active: true },
      });
    });

    it("should read terminal events", () => {
      assert.deepEqual(parseServerMessage("WIN|1"), { ok: true, value: { type: "WIN", player: 1 } });
      assert.deepEqual(parseServerMessage("DRAW"), { ok: true, value: { type: "DRAW" } });
    });

    it("should reject malformed snapshots", () => {
      assert.equal(parseServerMessage("WIN|3").ok, false);
      assert.equal(parseServerMessage("0,0,0;0,0,0|1|True").ok, false);
      assert.equal(parseServerMessage("0,0,0;0,0,0;0,0,3|1|True").ok, false);
      assert.equal(parseServerMessage("0,0,0;0,0,0;0,0,0|0|True").ok, false);
      assert.equal(parseServerMessage("0,0,0;0,0,0;0,0,0|1|true").ok, false);
    });
  });

  describe("framed helpers", () => {
    it("should decode a framed client command", () => {
      const frame = encodeClientCommand({ type: "MOVE", player: 1, x: 2, y: 2 });
      assert.deepEqual(decodeClientCommand(frame), {
        ok: true,
        value: { type: "MOVE", player: 1, x: 2, y: 2 },
      });
    });

    it("should decode a framed server message", () => {
      const frame = encodeServerMessage({ type: "WIN", player: 1 });
      assert.deepEqual(decodeServerMessage(frame), { ok: true, value: { type: "WIN", player: 1 } });
    });

    it("should report a broken frame without parsing its text", () => {
      assert.deepEqual(decodeClientCommand(Buffer.from([0xff])), { ok: false, error: "frame shorter than header" });
    });

    it("should report a well-framed but malformed command", () => {
      assert.equal(decodeClientCommand(encodeFrame("HELLO")).ok, false);
    });
  });
});
