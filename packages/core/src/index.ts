// Main exports
export { normalizeEvents, expandPerspectives, coerceOccurredAt } from './normalizer';
export type { NormalizeOptions, PerspectiveOptions } from './normalizer';
export {
  detectRuns,
  summarizeRuns,
  longestRuns,
  RunAccumulator,
  StreamingRunDetector,
} from './runs';
export type { RunOptions, SummaryOptions, LongestRunsOptions } from './runs';
export { computeTemporalPoints, createTemporalStream, LagWindow } from './temporal';
export type { TemporalOptions, TemporalStream } from './temporal';
export {
  aggregateMatchups,
  canonicalizeMatchup,
  classifyDominance,
  findUpsets,
} from './pairwise';
export type {
  AllowListMode,
  CanonicalizeOptions,
  IdentifierComparator,
  MatchupOptions,
  UpsetOptions,
} from './pairwise';
export { classify, createClassifier, matchesCondition } from './classify';
export type { Classifier } from './classify';

// Numeric helpers
export {
  roundHalfAwayFromZero,
  safeDivide,
  ratioPct,
  percentChange,
  roundedRatio,
  RATE_PRECISION,
  RATIO_PRECISION,
} from './numeric';

// Configuration, errors and logging
export {
  checkConfig,
  parseConfig,
  resetConfigCache,
  DEFAULT_DOMINANCE_FACTOR,
  DEFAULT_OUTCOMES,
} from './config';
export type { ConfigSchemaName } from './config';
export {
  ErrorCodes,
  SeqLensError,
  ValidationError,
  ConfigurationError,
  isSeqLensError,
} from './errors';
export type { ErrorCode, ValidationErrorDetails } from './errors';
export {
  createConsoleLogger,
  createEnvLogger,
  resolveLogLevel,
  silentLogger,
} from './logger';
export type { EngineLogger, LogLevel, ConsoleLoggerConfig } from './logger';
export {
  compareOccurredAt,
  compareIdentifiers,
  normalizeIdentifier,
  partitionByEntity,
} from './ordering';
export { readPath, readField, toNumberOrNull } from './fields';

// Type exports
export type {
  OccurredAt,
  IdentifierCase,
  FieldValue,
  Event,
  OccurredAtCoercion,
  FieldCoercion,
  FieldRule,
  OccurredAtRule,
  FieldCategoryRule,
  RulesCategoryRule,
  CategoryRule,
  EventSchemaDescriptor,
  Run,
  StreakSummary,
  SeriesPoint,
  PeakMode,
  TemporalPoint,
  FieldCondition,
  LabelRule,
  LabelTable,
  MatchupKey,
  MatchupOutcome,
  OutcomeMap,
  MatchupAggregate,
  DominanceStatus,
  DominanceVerdict,
  Upset,
} from './types';
