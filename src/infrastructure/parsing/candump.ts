import { IdentifierOutOfRangeError, MalformedLogLineError } from "../../errors.js";

import type { Frame } from "../../interfaces/index.js";

import { MAX_EXTENDED_ID } from "./j1939.js";

const CANDUMP_LINE = /^\((\d+(?:\.\d*)?)\)\s+(\S+)\s+(\S+)$/;
const HEX = /^[0-9A-Fa-f]*$/;

const MAX_ID_DIGITS = 8;
const MAX_STANDARD_ID_DIGITS = 3;
const MAX_STANDARD_ID = 0x7ff;
const MAX_PAYLOAD_BYTES = 8;

function parsePayload(hex: string): number[] {
  const bytes: number[] = [];
  for (let index = 0; index < hex.length; index += 2) {
    bytes.push(Number.parseInt(hex.slice(index, index + 2), 16));
  }
  return bytes;
}

/**
 * Parses one candump log line, e.g. `(1553794338.014188) vcan0 0C20130B#FCFFFA77FFFFFFFF`.
 *
 * Identifiers of up to three hex digits (and at most 0x7FF) are treated as standard 11-bit
 * frames, anything longer as extended 29-bit frames.
 */
export function parseCandumpLine(line: string, lineNumber = 0): Frame {
  const trimmed = line.trim();
  const match = CANDUMP_LINE.exec(trimmed);
  if (!match) {
    throw new MalformedLogLineError(
      lineNumber,
      line,
      "expected \"(<timestamp>) <channel> <id>#<data>\"",
    );
  }

  const [, timestampText, channel, message] = match;
  const separator = message.indexOf("#");
  if (separator === -1) {
    throw new MalformedLogLineError(lineNumber, line, "missing \"#\" between identifier and data");
  }

  const idText = message.slice(0, separator);
  const dataText = message.slice(separator + 1);

  if (idText.length === 0 || !HEX.test(idText)) {
    throw new MalformedLogLineError(lineNumber, line, `identifier "${idText}" is not hexadecimal`);
  }
  if (!HEX.test(dataText)) {
    throw new MalformedLogLineError(lineNumber, line, `data "${dataText}" is not hexadecimal`);
  }
  if (dataText.length % 2 !== 0) {
    throw new MalformedLogLineError(lineNumber, line, "data has an odd number of hex digits");
  }
  if (dataText.length / 2 > MAX_PAYLOAD_BYTES) {
    throw new MalformedLogLineError(
      lineNumber,
      line,
      `data is ${dataText.length / 2} bytes, at most ${MAX_PAYLOAD_BYTES} allowed`,
    );
  }

  const id = Number.parseInt(idText, 16);
  if (idText.length > MAX_ID_DIGITS || id > MAX_EXTENDED_ID) {
    throw new IdentifierOutOfRangeError(lineNumber, line, idText);
  }

  return {
    timestamp: Number.parseFloat(timestampText),
    channel,
    id,
    extended: idText.length > MAX_STANDARD_ID_DIGITS || id > MAX_STANDARD_ID,
    payload: parsePayload(dataText),
  };
}

export function formatPayload(payload: readonly number[]): string {
  return payload.map((byte) => byte.toString(16).toUpperCase().padStart(2, "0")).join("");
}

/** `<ID>#<DATA>` in uppercase hex, the identifier padded to its frame width. */
export function formatCandumpFrame(frame: Frame): string {
  const width = frame.extended ? MAX_ID_DIGITS : MAX_STANDARD_ID_DIGITS;
  const id = frame.id.toString(16).toUpperCase().padStart(width, "0");
  return `${id}#${formatPayload(frame.payload)}`;
}

export function formatCandumpLine(frame: Frame): string {
  return `(${frame.timestamp.toFixed(6)}) ${frame.channel} ${formatCandumpFrame(frame)}`;
}
