import { describe, expect, it } from "vitest";

import { parseCandumpLine } from "../src/infrastructure/parsing/candump.js";
import type { Frame } from "../src/interfaces/index.js";
import {
  aggregationTreeToObject,
  createAggregation,
  recordFrame,
  walkAggregationTree,
} from "../src/usecases/aggregation.js";

function frame(id: number, payload: number[] = [0, 0, 0, 0, 0, 0, 0, 0], timestamp = 1): Frame {
  return { timestamp, channel: "can0", id, extended: true, payload };
}

const CLAIM_FROM_0B = 0x18eeff0b;

function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

describe("message aggregation", () => {
  it("counts frames by source, destination and PGN and keeps the latest NAME claim", () => {
    const claim = [0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08];
    const aggregation = createAggregation();

    recordFrame(aggregation, frame(0x0c20130b));
    recordFrame(aggregation, frame(0x0c20130b));
    recordFrame(aggregation, frame(CLAIM_FROM_0B, claim));

    expect(aggregationTreeToObject(aggregation.tree)).toEqual({
      "11": {
        "19": { "8192": 2 },
        "255": { "60928": 1 },
      },
    });
    expect(aggregation.names).toEqual(new Map([[11, claim]]));
    expect(aggregation.framesRecorded).toBe(3);
  });

  it("keys broadcast messages under the broadcast destination", () => {
    const aggregation = createAggregation();
    recordFrame(aggregation, frame(0x18feca00));

    expect(aggregation.tree.get(0)?.get("broadcast")?.get(65226)).toBe(1);
  });

  it("produces the same counts for any processing order", () => {
    const frames = [
      frame(0x0c20130b),
      frame(0x18feca00),
      frame(0x0c20130b),
      frame(0x18f0040b),
      frame(0x0cea000b),
      frame(0x18feca00),
      frame(0x18feca20),
    ];
    const orders = [
      frames,
      [...frames].reverse(),
      [...frames.slice(3), ...frames.slice(0, 3)],
      [frames[6], frames[0], frames[4], frames[2], frames[5], frames[1], frames[3]],
    ];

    const trees = orders.map((order) => {
      const aggregation = createAggregation();
      for (const item of order) recordFrame(aggregation, item);
      return aggregationTreeToObject(aggregation.tree);
    });

    for (const tree of trees) {
      expect(tree).toEqual(trees[0]);
    }
    expect(trees[0]["0"].broadcast["65226"]).toBe(2);
  });

  it("produces the same counts for shuffled orders of a larger log", () => {
    const ids = [0x0c20130b, 0x18feca00, 0x18f0040b, 0x0cea000b, 0x18feca20, 0x0c20050b, 0x18eb2017];
    const frames: Frame[] = [];
    ids.forEach((id, index) => {
      for (let copy = 0; copy <= index; copy++) frames.push(frame(id));
    });

    const inOrder = createAggregation();
    for (const item of frames) recordFrame(inOrder, item);
    const expected = aggregationTreeToObject(inOrder.tree);
    expect(inOrder.framesRecorded).toBe(28);
    expect(expected["23"]["32"]["60160"]).toBe(7);

    const random = seededRandom(0x5eed);
    for (let run = 0; run < 50; run++) {
      const aggregation = createAggregation();
      for (const item of shuffle(frames, random)) recordFrame(aggregation, item);
      expect(aggregationTreeToObject(aggregation.tree)).toEqual(expected);
    }
  });

  it("leaves standard 11-bit frames out of the tree", () => {
    const aggregation = createAggregation();

    expect(recordFrame(aggregation, parseCandumpLine("(1.000000) can0 7DF#0201"))).toBe(false);
    expect(recordFrame(aggregation, frame(0x18feca00))).toBe(true);

    expect(aggregationTreeToObject(aggregation.tree)).toEqual({ "0": { broadcast: { "65226": 1 } } });
    expect(aggregation.framesRecorded).toBe(1);
  });

  it("keeps whichever NAME claim was recorded last", () => {
    const first = [0x11, 0x11, 0x11, 0x11, 0x11, 0x11, 0x11, 0x11];
    const second = [0x22, 0x22, 0x22, 0x22, 0x22, 0x22, 0x22, 0x22];

    const forward = createAggregation();
    recordFrame(forward, frame(CLAIM_FROM_0B, first));
    recordFrame(forward, frame(CLAIM_FROM_0B, second));
    expect(forward.names.get(11)).toEqual(second);

    const backward = createAggregation();
    recordFrame(backward, frame(CLAIM_FROM_0B, second));
    recordFrame(backward, frame(CLAIM_FROM_0B, first));
    expect(backward.names.get(11)).toEqual(first);
  });

  it("walks the tree in ascending order with broadcast after numeric destinations", () => {
    const aggregation = createAggregation();
    for (const id of [0x18feca20, 0x18f0040b, 0x0c20130b, 0x0c20050b, 0x0cea000b, 0x0c20130b]) {
      recordFrame(aggregation, frame(id));
    }

    expect([...walkAggregationTree(aggregation.tree)]).toEqual([
      { sourceAddress: 11, destinationAddress: 0, pgn: 59904, count: 1 },
      { sourceAddress: 11, destinationAddress: 5, pgn: 8192, count: 1 },
      { sourceAddress: 11, destinationAddress: 19, pgn: 8192, count: 2 },
      { sourceAddress: 11, destinationAddress: "broadcast", pgn: 61444, count: 1 },
      { sourceAddress: 32, destinationAddress: "broadcast", pgn: 65226, count: 1 },
    ]);
  });

  it("only contains observed keys", () => {
    const aggregation = createAggregation();
    expect([...walkAggregationTree(aggregation.tree)]).toEqual([]);
    expect(aggregationTreeToObject(aggregation.tree)).toEqual({});
    expect(aggregation.names.size).toBe(0);
  });
});
