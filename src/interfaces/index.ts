export const BROADCAST = "broadcast";

export type Broadcast = typeof BROADCAST;

export type DestinationAddress = number | Broadcast;

export type PduType = 1 | 2;

export type Frame = {
  timestamp: number;
  channel: string;
  id: number;
  extended: boolean;
  payload: readonly number[];
};

export type J1939Id = {
  priority: number;
  extendedDataPage: number;
  dataPage: number;
  pduFormat: number;
  pduSpecific: number;
  pduType: PduType;
  sourceAddress: number;
  pgn: number;
  destinationAddress: DestinationAddress;
};

export type CandumpEntry = {
  lineNumber: number;
  line: string;
  frame: Frame;
};

export type PgnFilterSet = ReadonlySet<number>;

export type AggregationTree = Map<number, Map<DestinationAddress, Map<number, number>>>;

export type NameTable = Map<number, readonly number[]>;

export type Aggregation = {
  tree: AggregationTree;
  names: NameTable;
  framesRecorded: number;
};

export type AggregationLeaf = {
  sourceAddress: number;
  destinationAddress: DestinationAddress;
  pgn: number;
  count: number;
};

export type ReadReport = {
  source: string;
  linesScanned: number;
  blankLines: number;
  framesParsed: number;
  standardFrames: number;
  parseErrors: number;
  startedAt: string;
  finishedAt: string;
};

export type BreakdownSummary = {
  aggregation: Aggregation;
  interest: PgnFilterSet;
  matches: CandumpEntry[];
  report: ReadReport;
};

export type FilterSummary = {
  linesEmitted: number;
  report: ReadReport;
};

export type OutputFormat = "text" | "json";
