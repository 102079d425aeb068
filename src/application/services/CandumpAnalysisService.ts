import { formatCandumpFrame } from "../../infrastructure/parsing/candump.js";
import { decodeIdentifier } from "../../infrastructure/parsing/j1939.js";
import type { CandumpReader } from "../../infrastructure/reading/CandumpReader.js";

import type {
  BreakdownSummary,
  CandumpEntry,
  FilterSummary,
  PgnFilterSet,
} from "../../interfaces/index.js";

import { createAggregation, recordFrame } from "../../usecases/aggregation.js";
import { matchesPgn } from "../../usecases/pgnFilter.js";

export type FilterOptions = {
  /** Emit only `<ID>#<DATA>` instead of the full candump line. */
  frameOnly?: boolean;
};

export class CandumpAnalysisService {
  constructor(private readonly reader: CandumpReader) {}

  /**
   * Folds a whole log into the source/destination/PGN tree. Frames whose PGN is in
   * `interest` are also collected for separate printing; an empty set collects nothing.
   */
  async breakdown(path: string, interest: PgnFilterSet): Promise<BreakdownSummary> {
    const aggregation = createAggregation();
    const matches: CandumpEntry[] = [];

    const report = await this.reader.readFile(path, (entry) => {
      recordFrame(aggregation, entry.frame);
      if (interest.size > 0 && matchesPgn(decodeIdentifier(entry.frame.id), interest)) {
        matches.push(entry);
      }
    });

    return { aggregation, interest, matches, report };
  }

  async filter(
    path: string,
    interest: PgnFilterSet,
    emit: (line: string) => void,
    options: FilterOptions = {},
  ): Promise<FilterSummary> {
    let linesEmitted = 0;

    const report = await this.reader.readFile(path, (entry) => {
      if (!matchesPgn(decodeIdentifier(entry.frame.id), interest)) return;
      emit(options.frameOnly ? formatCandumpFrame(entry.frame) : entry.line);
      linesEmitted++;
    });

    return { linesEmitted, report };
  }
}
