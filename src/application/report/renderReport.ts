import { formatPayload } from "../../infrastructure/parsing/candump.js";

import type { BreakdownSummary, NameTable, ReadReport } from "../../interfaces/index.js";

import {
  type AggregationTreeObject,
  aggregationTreeToObject,
  walkAggregationTree,
} from "../../usecases/aggregation.js";

export type JsonSummary = {
  names: Record<string, string>;
  tree: AggregationTreeObject;
  framesRecorded: number;
  matches: Array<{ lineNumber: number; line: string }>;
  report: ReadReport;
};

function namesToObject(names: NameTable): Record<string, string> {
  const result: Record<string, string> = {};
  for (const source of [...names.keys()].sort((a, b) => a - b)) {
    const payload = names.get(source);
    if (payload) result[String(source)] = formatPayload(payload);
  }
  return result;
}

export function renderNameTable(names: NameTable): string[] {
  const entries = Object.entries(namesToObject(names));
  if (entries.length === 0) return ["NAME messages seen by src address: none", ""];
  return [
    "NAME messages seen by src address:",
    ...entries.map(([source, payload]) => `  ${source}: ${payload}`),
    "",
  ];
}

/**
 * Renders the indented src → da → pgn → count listing, ascending at every level,
 * followed by the lines whose PGN was asked for.
 */
export function renderBreakdown(summary: BreakdownSummary): string {
  const lines = [
    ...renderNameTable(summary.aggregation.names),
    "Breakdown of messages in log",
    "src\tda\tpgn\tmsg_count",
    "=================================",
  ];

  let currentSource: number | undefined;
  let currentDestination: string | undefined;

  for (const leaf of walkAggregationTree(summary.aggregation.tree)) {
    const destination = String(leaf.destinationAddress);

    if (leaf.sourceAddress !== currentSource) {
      currentSource = leaf.sourceAddress;
      currentDestination = undefined;
      lines.push(String(leaf.sourceAddress), "|-------|");
    }

    if (destination !== currentDestination) {
      currentDestination = destination;
      lines.push(`\t${destination}`, "\t |");
    }

    lines.push(`\t |--- ${leaf.pgn}`, `\t |\t|---- ${leaf.count}`);
  }

  if (summary.interest.size > 0) {
    const pgns = [...summary.interest].sort((a, b) => a - b).join(", ");
    lines.push("", `Messages with PGN ${pgns}: ${summary.matches.length}`);
    for (const match of summary.matches) lines.push(match.line);
  }

  return `${lines.join("\n")}\n`;
}

export function renderJsonSummary(summary: BreakdownSummary): JsonSummary {
  return {
    names: namesToObject(summary.aggregation.names),
    tree: aggregationTreeToObject(summary.aggregation.tree),
    framesRecorded: summary.aggregation.framesRecorded,
    matches: summary.matches.map((match) => ({ lineNumber: match.lineNumber, line: match.line })),
    report: summary.report,
  };
}
