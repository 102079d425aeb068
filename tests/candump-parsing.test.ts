import { describe, expect, it } from "vitest";

import { IdentifierOutOfRangeError, MalformedLogLineError } from "../src/errors.js";
import {
  formatCandumpFrame,
  formatCandumpLine,
  parseCandumpLine,
} from "../src/infrastructure/parsing/candump.js";

describe("candump line parsing", () => {
  it("parses timestamp, channel, identifier and payload", () => {
    const frame = parseCandumpLine("(1553794338.014188) vcan0 0C20130B#FCFFFA77FFFFFFFF");

    expect(frame).toEqual({
      timestamp: 1553794338.014188,
      channel: "vcan0",
      id: 0x0c20130b,
      extended: true,
      payload: [0xfc, 0xff, 0xfa, 0x77, 0xff, 0xff, 0xff, 0xff],
    });
  });

  it("reproduces the identifier and payload hex when re-serialized", () => {
    const samples = [
      "0C20130B#FCFFFA77FFFFFFFF",
      "18EEFF0B#0102030405060708",
      "18EAFFF9#00EE00",
      "0CF00400#",
      "123#DEAD",
    ];

    for (const sample of samples) {
      const frame = parseCandumpLine(`(1553794338.000001) can1 ${sample}`);
      expect(formatCandumpFrame(frame)).toBe(sample);
    }
  });

  it("formats a full candump line with microsecond timestamps", () => {
    const frame = parseCandumpLine("  (1553794338.5)   can0   18FECA00#0A0b  ");
    expect(frame.payload).toEqual([0x0a, 0x0b]);
    expect(formatCandumpLine(frame)).toBe("(1553794338.500000) can0 18FECA00#0A0B");
  });

  it("treats short identifiers as standard frames", () => {
    const frame = parseCandumpLine("(10.25) can0 7DF#0201");
    expect(frame.extended).toBe(false);
    expect(frame.id).toBe(0x7df);
    expect(frame.timestamp).toBe(10.25);

    const padded = parseCandumpLine("(10.25) can0 000007DF#0201");
    expect(padded.extended).toBe(true);
    expect(formatCandumpFrame(padded)).toBe("000007DF#0201");
  });

  it("accepts frames without payload", () => {
    expect(parseCandumpLine("(1.0) can0 18EAFFF9#").payload).toEqual([]);
  });

  it.each([
    ["missing timestamp parentheses", "1553794338.014188 vcan0 0C20130B#00"],
    ["missing separator", "(1.0) can0 0C20130B00"],
    ["non-hex identifier", "(1.0) can0 0C2G130B#00"],
    ["non-hex payload", "(1.0) can0 0C20130B#ZZ"],
    ["odd-length payload", "(1.0) can0 0C20130B#ABC"],
    ["payload longer than eight bytes", "(1.0) can0 0C20130B#000102030405060708"],
    ["empty identifier", "(1.0) can0 #00"],
    ["trailing token", "(1.0) can0 0C20130B#00 R"],
    ["empty line", ""],
  ])("rejects a line with %s", (_label, line) => {
    expect(() => parseCandumpLine(line, 4)).toThrow(MalformedLogLineError);
  });

  it("reports the offending line number and text", () => {
    let caught: unknown;
    try {
      parseCandumpLine("(1.0) can0 0C20130B#ABC", 7);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedLogLineError);
    if (!(caught instanceof MalformedLogLineError)) return;
    expect(caught.lineNumber).toBe(7);
    expect(caught.line).toBe("(1.0) can0 0C20130B#ABC");
    expect(caught.reason).toBe("data has an odd number of hex digits");
    expect(caught.message).toBe("Malformed candump line 7: data has an odd number of hex digits");
  });

  it("rejects identifiers that do not fit in 29 bits as malformed lines", () => {
    for (const line of ["(1.0) can0 20000000#00", "(1.0) can0 00C20130B#00"]) {
      let caught: unknown;
      try {
        parseCandumpLine(line, 2);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(IdentifierOutOfRangeError);
      expect(caught).toBeInstanceOf(MalformedLogLineError);
    }
  });
});
