import { ADDRESS_CLAIM_PGN, decodeIdentifier } from "../infrastructure/parsing/j1939.js";

import {
  type Aggregation,
  type AggregationLeaf,
  type AggregationTree,
  BROADCAST,
  type DestinationAddress,
  type Frame,
} from "../interfaces/index.js";

export function createAggregation(): Aggregation {
  return {
    tree: new Map(),
    names: new Map(),
    framesRecorded: 0,
  };
}

/**
 * Counts one frame under source → destination → PGN. Address Claim frames also
 * replace the NAME payload held for their source address.
 *
 * Standard 11-bit frames are not J1939 messages; they are left out and `false` is returned.
 */
export function recordFrame(aggregation: Aggregation, frame: Frame): boolean {
  if (!frame.extended) return false;

  const { sourceAddress, destinationAddress, pgn } = decodeIdentifier(frame.id);

  let destinations = aggregation.tree.get(sourceAddress);
  if (!destinations) {
    destinations = new Map();
    aggregation.tree.set(sourceAddress, destinations);
  }

  let pgns = destinations.get(destinationAddress);
  if (!pgns) {
    pgns = new Map();
    destinations.set(destinationAddress, pgns);
  }

  pgns.set(pgn, (pgns.get(pgn) ?? 0) + 1);
  aggregation.framesRecorded++;

  if (pgn === ADDRESS_CLAIM_PGN) {
    aggregation.names.set(sourceAddress, [...frame.payload]);
  }

  return true;
}

function destinationOrder(destination: DestinationAddress): number {
  return destination === BROADCAST ? Number.POSITIVE_INFINITY : destination;
}

export function compareDestinations(a: DestinationAddress, b: DestinationAddress): number {
  const left = destinationOrder(a);
  const right = destinationOrder(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function sortedKeys<K>(map: Map<K, unknown>, compare: (a: K, b: K) => number): K[] {
  return [...map.keys()].sort(compare);
}

const ascending = (a: number, b: number) => a - b;

export function* walkAggregationTree(tree: AggregationTree): Generator<AggregationLeaf> {
  for (const sourceAddress of sortedKeys(tree, ascending)) {
    const destinations = tree.get(sourceAddress);
    if (!destinations) continue;

    for (const destinationAddress of sortedKeys(destinations, compareDestinations)) {
      const pgns = destinations.get(destinationAddress);
      if (!pgns) continue;

      for (const pgn of sortedKeys(pgns, ascending)) {
        yield { sourceAddress, destinationAddress, pgn, count: pgns.get(pgn) ?? 0 };
      }
    }
  }
}

export type AggregationTreeObject = Record<string, Record<string, Record<string, number>>>;

export function aggregationTreeToObject(tree: AggregationTree): AggregationTreeObject {
  const result: AggregationTreeObject = {};

  for (const leaf of walkAggregationTree(tree)) {
    const source = String(leaf.sourceAddress);
    const destination = String(leaf.destinationAddress);
    result[source] ??= {};
    result[source][destination] ??= {};
    result[source][destination][String(leaf.pgn)] = leaf.count;
  }

  return result;
}
