/**
 * Types for the SeqLens sequential-event analytics engine.
 * @module types
 */

// Shared Types

/** Ordering key of an event: a `Date`, an epoch number, or a sortable string such as an ISO date. */
export type OccurredAt = Date | number | string;

/** Case policy applied to entity and participant identifiers before comparison. */
export type IdentifierCase = 'lower' | 'upper' | 'exact';

/** A primitive field value as seen by label tables. */
export type FieldValue = string | number | boolean | null;

// Event Types

/**
 * The unit of input for every component.
 *
 * Events for a given `entityId` are totally ordered by `occurredAt`, with ties
 * broken by `sequence` (the record's position in the input batch).
 */
export interface Event<C extends string = string> {
  /** Subject being tracked (player username, tag name, or "global") */
  entityId: string;
  /** Ordering key, never null */
  occurredAt: OccurredAt;
  /** Bounded categorical outcome, e.g. `win` or `gloomy` */
  category: C;
  /** Optional numeric measure; `null` when absent or not numeric */
  value: number | null;
  /** Two participants of a matchup-style event; `category` is seen from the first */
  participants?: readonly [string, string];
  /** Position in the input batch */
  sequence: number;
  /** Pass-through fields such as time class or ratings */
  attributes?: Record<string, FieldValue>;
}

// Normalizer Types

/** Coercion applied to the `occurredAt` field. */
export type OccurredAtCoercion = 'timestamp' | 'epoch-seconds' | 'iso-date' | 'number' | 'string';

/** Coercion applied to a mapped field. */
export type FieldCoercion = 'string' | 'number' | 'boolean';

/** Where to read a field from, using a dotted path such as `white.username`. */
export interface FieldRule {
  from: string;
  coerce?: FieldCoercion;
}

export interface OccurredAtRule {
  from: string;
  coerce: OccurredAtCoercion;
}

/** Reads the category from one field, optionally through a value map. */
export interface FieldCategoryRule {
  kind: 'field';
  from: string;
  /** Maps raw values to categories; unmapped values pass through unchanged */
  map?: Record<string, string>;
  /** Category used when the field is missing or null */
  fallback?: string;
}

/** Derives the category from a label table evaluated over the record's fields. */
export interface RulesCategoryRule {
  kind: 'rules';
  table: LabelTable;
}

export type CategoryRule = FieldCategoryRule | RulesCategoryRule;

/**
 * Field mapping and coercion rules for turning raw records into events.
 *
 * Descriptors are plain JSON and are validated before use.
 */
export interface EventSchemaDescriptor {
  /** Declared categorical domain; anything else is rejected */
  domain: string[];
  entityId: FieldRule;
  occurredAt: OccurredAtRule;
  category: CategoryRule;
  value?: FieldRule;
  participants?: [FieldRule, FieldRule];
  attributes?: Record<string, FieldRule>;
  /** Keep only the latest record per value of this path */
  dedupeBy?: string;
  /** Override for identifier normalization (default 'exact') */
  identifierCase?: IdentifierCase;
}

// Run Types

/** A maximal contiguous subsequence of one entity's events sharing the same category. */
export interface Run<C extends string = string> {
  readonly entityId: string;
  readonly category: C;
  /** Number of events in the run, always >= 1 */
  readonly length: number;
  /** `occurredAt` of the first event */
  readonly start: OccurredAt;
  /** `occurredAt` of the last event */
  readonly end: OccurredAt;
  /** Zero-based position of the run within its entity */
  readonly ordinal: number;
}

/** Longest run and threshold counts for one entity. */
export interface StreakSummary {
  entityId: string;
  /** Longest run per category; 0 when the category never occurs */
  longest: Record<string, number>;
  /** Number of runs per category with `length >= threshold` */
  atLeastThreshold: Record<string, number>;
}

// Temporal Types

/** One input row of a monthly or daily series. */
export interface SeriesPoint {
  /** Month or day key, unique per series */
  period: string | number;
  value: number | null;
  /** Series key such as a tag name; absent for a single global series */
  group?: string;
  /** Extra fields visible to the label table */
  fields?: Record<string, FieldValue>;
}

export type PeakMode = 'global' | 'to-date';

/** One output row of the temporal normalizer. */
export interface TemporalPoint {
  group?: string;
  period: string | number;
  value: number | null;
  /** Global or running maximum, depending on the peak mode */
  peak: number | null;
  pctOfPeak: number | null;
  periodOverPeriodPct: number | null;
  /** Era or category label; `null` when no rule matched */
  label: string | null;
}

// Classification Types

/** Comparison applied to one field. All present operators must hold. */
export interface FieldCondition {
  eq?: FieldValue;
  in?: FieldValue[];
  lt?: string | number;
  lte?: string | number;
  gt?: string | number;
  gte?: string | number;
}

/** One rule; a rule without `when` always matches. */
export interface LabelRule {
  label: string;
  when?: Record<string, FieldCondition>;
}

/** Ordered rules, evaluated top to bottom, first match wins. */
export interface LabelTable {
  rules: LabelRule[];
  /** Label when nothing matches (the ELSE branch); `null` when omitted */
  otherwise?: string;
}

// Pairwise Types

/** Canonical unordered pair: `first` sorts before `second`. */
export interface MatchupKey {
  readonly first: string;
  readonly second: string;
}

/** Outcome of a matchup event credited to a canonical slot. */
export type MatchupOutcome = 'first' | 'second' | 'draw';

/** Maps event categories (seen from `participants[0]`) to outcomes. */
export interface OutcomeMap {
  win: string;
  loss: string;
  draw: string;
}

export interface MatchupAggregate {
  key: MatchupKey;
  /** Value of the `groupBy` attribute, when grouping */
  group?: string;
  firstWins: number;
  secondWins: number;
  draws: number;
  total: number;
  /** Games with a winner */
  decisive: number;
  /** First wins as a share of decisive games; `null` when none were decisive */
  firstWinPct: number | null;
  winDifferential: number;
  firstAt: OccurredAt;
  lastAt: OccurredAt;
}

export type DominanceStatus = 'first-dominates' | 'second-dominates' | 'close-rivalry';

export interface DominanceVerdict {
  status: DominanceStatus;
  /** Identifier of the dominating participant */
  dominant: string | null;
  /** Display label, e.g. `alice DOMINATES` or `CLOSE RIVALRY` */
  label: string;
}

export interface Upset {
  winner: string;
  loser: string;
  winnerRating: number;
  loserRating: number;
  ratingGap: number;
  occurredAt: OccurredAt;
  attributes?: Record<string, FieldValue>;
}
