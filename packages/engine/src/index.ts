// Pipeline
export {
  ProgressionPipeline,
  type ProgressionPipelineOptions,
  type RunSummary,
} from "./ProgressionPipeline";

// Note aggregation
export {
  aggregateChords,
  aggregateNotes,
  createAggregatorState,
  flushAggregator,
  stepAggregator,
  DEFAULT_AGGREGATION_CONFIG,
  type AggregationStep,
  type AggregatorState,
} from "./aggregation/NoteAggregator";

// Chord identification
export {
  ChordIdentifier,
  identifyChords,
  type ChordCandidate,
  type ChordIdentifierConfig,
} from "./identification/ChordIdentifier";

// Music theory
export * from "./theory/key";
export * from "./theory/chords";

// Validation
export { ProgressionValidator, type ValidatorState } from "./validation/ProgressionValidator";
export * from "./validation/rules";

// Scores
export { applyScore, loadScoreNotes, parseMusicXml } from "./score/MusicXmlScore";

// Reporting
export {
  VerdictReporter,
  formatVerdict,
  type VerdictReporterOptions,
} from "./reporting/VerdictReporter";

// Configuration
export * from "./config/config";

// Logging
export * from "./logging/logger";
