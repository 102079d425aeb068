import { ConfigurationError } from "../errors.js";

import type { J1939Id, PgnFilterSet } from "../interfaces/index.js";

const MAX_PGN = 0xffff;

function parsePgn(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isInteger(value) ? value : undefined;
  if (typeof value !== "string") return undefined;

  const trimmed = value.trim();
  if (/^0x[0-9a-f]+$/i.test(trimmed)) return Number.parseInt(trimmed.slice(2), 16);
  if (/^\d+$/.test(trimmed)) return Number.parseInt(trimmed, 10);
  return undefined;
}

/**
 * Builds the set of PGNs of interest from CLI arguments or configuration values.
 * Accepts integers and decimal or `0x`-prefixed hexadecimal strings.
 */
export function createPgnFilterSet(values: Iterable<unknown> = []): PgnFilterSet {
  const interest = new Set<number>();

  for (const value of values) {
    const pgn = parsePgn(value);
    if (pgn === undefined || pgn < 0 || pgn > MAX_PGN) {
      throw new ConfigurationError(
        `Invalid PGN ${JSON.stringify(value)}. Expected an integer between 0 and ${MAX_PGN}.`,
      );
    }
    interest.add(pgn);
  }

  return interest;
}

export function matchesPgn(decoded: Pick<J1939Id, "pgn">, interest: PgnFilterSet): boolean {
  return interest.size === 0 || interest.has(decoded.pgn);
}
