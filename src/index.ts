export {
  type CanScopeOptions,
  resolveCanScopeOptions,
  resolveConfigFilePath,
} from "./application/config/resolveCanScopeOptions.js";
export { renderBreakdown, renderJsonSummary } from "./application/report/renderReport.js";
export { CandumpAnalysisService } from "./application/services/CandumpAnalysisService.js";

export {
  ConfigurationError,
  IdentifierOutOfRangeError,
  LogSourceUnavailableError,
  MalformedLogLineError,
} from "./errors.js";

export {
  formatCandumpFrame,
  formatCandumpLine,
  parseCandumpLine,
} from "./infrastructure/parsing/candump.js";
export {
  ADDRESS_CLAIM_PGN,
  decodeIdentifier,
  describeIdentifier,
  encodeIdentifier,
  formatIdentifier,
} from "./infrastructure/parsing/j1939.js";
export { CandumpReader, type CandumpReaderOptions } from "./infrastructure/reading/CandumpReader.js";

export * from "./interfaces/index.js";

export {
  aggregationTreeToObject,
  createAggregation,
  recordFrame,
  walkAggregationTree,
} from "./usecases/aggregation.js";
export { createPgnFilterSet, matchesPgn } from "./usecases/pgnFilter.js";
