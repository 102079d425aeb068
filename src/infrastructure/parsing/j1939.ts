import { BROADCAST, type DestinationAddress, type J1939Id } from "../../interfaces/index.js";

export const MAX_EXTENDED_ID = 0x1fffffff;

/** PDU format values at or above this are PDU2 (broadcast). */
export const PDU2_THRESHOLD = 240;

/** Address Claim, which carries the 64-bit NAME of the claiming ECU. */
export const ADDRESS_CLAIM_PGN = 0xee00;

/**
 * Splits a 29-bit CAN identifier into its J1939 fields.
 *
 * Layout, most significant first: priority (3) | EDP (1) | DP (1) | PF (8) | PS (8) | SA (8).
 * For PDU1 the PS byte is the destination address and the PGN carries a zero low byte;
 * for PDU2 the PS byte is the group extension and the message is broadcast.
 */
export function decodeIdentifier(id: number): J1939Id {
  const priority = (id >> 26) & 0x7;
  const extendedDataPage = (id >> 25) & 0x1;
  const dataPage = (id >> 24) & 0x1;
  const pduFormat = (id >> 16) & 0xff;
  const pduSpecific = (id >> 8) & 0xff;
  const sourceAddress = id & 0xff;

  if (pduFormat < PDU2_THRESHOLD) {
    return {
      priority,
      extendedDataPage,
      dataPage,
      pduFormat,
      pduSpecific,
      pduType: 1,
      sourceAddress,
      pgn: pduFormat << 8,
      destinationAddress: pduSpecific,
    };
  }

  return {
    priority,
    extendedDataPage,
    dataPage,
    pduFormat,
    pduSpecific,
    pduType: 2,
    sourceAddress,
    pgn: (pduFormat << 8) | pduSpecific,
    destinationAddress: BROADCAST,
  };
}

export type EncodeIdentifierInput = {
  priority: number;
  pgn: number;
  sourceAddress: number;
  destinationAddress?: DestinationAddress;
  dataPage?: number;
  extendedDataPage?: number;
};

function assertField(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new RangeError(`${name} must be an integer between 0 and ${max}, got ${value}`);
  }
}

export function encodeIdentifier(input: EncodeIdentifierInput): number {
  const dataPage = input.dataPage ?? 0;
  const extendedDataPage = input.extendedDataPage ?? 0;

  assertField("priority", input.priority, 0x7);
  assertField("pgn", input.pgn, 0xffff);
  assertField("sourceAddress", input.sourceAddress, 0xff);
  assertField("dataPage", dataPage, 1);
  assertField("extendedDataPage", extendedDataPage, 1);

  const pduFormat = (input.pgn >> 8) & 0xff;
  let pduSpecific = input.pgn & 0xff;

  if (pduFormat >= PDU2_THRESHOLD) {
    if (input.destinationAddress !== undefined && input.destinationAddress !== BROADCAST) {
      throw new RangeError(
        `PGN ${input.pgn} is broadcast (PDU2) and cannot carry destinationAddress ${input.destinationAddress}`,
      );
    }
  } else {
    if (pduSpecific !== 0) {
      throw new RangeError(
        `PGN ${input.pgn} is peer-to-peer (PDU1) and must have a zero low byte`,
      );
    }
    const destination = input.destinationAddress ?? 0xff;
    if (destination === BROADCAST) {
      pduSpecific = 0xff;
    } else {
      assertField("destinationAddress", destination, 0xff);
      pduSpecific = destination;
    }
  }

  return (
    ((input.priority << 26) |
      (extendedDataPage << 25) |
      (dataPage << 24) |
      (pduFormat << 16) |
      (pduSpecific << 8) |
      input.sourceAddress) >>>
    0
  );
}

export function formatIdentifier(id: number): string {
  return id.toString(16).toUpperCase().padStart(8, "0");
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

export function describeIdentifier(id: number): string {
  const decoded = decodeIdentifier(id);
  const destination =
    decoded.destinationAddress === BROADCAST ? "BC" : pad(decoded.destinationAddress, 2);

  return `${formatIdentifier(id)}    ${pad(decoded.priority, 2)} ${pad(decoded.pgn, 5)} ${pad(
    decoded.sourceAddress,
    2,
  )} --> ${destination}`;
}
