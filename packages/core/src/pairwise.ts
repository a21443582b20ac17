import { checkConfig, DEFAULT_DOMINANCE_FACTOR, DEFAULT_OUTCOMES } from './config';
import { ErrorCodes, ValidationError } from './errors';
import { silentLogger, type EngineLogger } from './logger';
import { RATE_PRECISION, ratioPct } from './numeric';
import {
  compareIdentifiers,
  compareOccurredAt,
  createAllowList,
  normalizeIdentifier,
} from './ordering';
import type {
  DominanceVerdict,
  Event,
  IdentifierCase,
  MatchupAggregate,
  MatchupKey,
  MatchupOutcome,
  OccurredAt,
  OutcomeMap,
  Upset,
} from './types';

export type IdentifierComparator = (a: string, b: string) => number;

export interface CanonicalizeOptions {
  /** Case policy applied before comparison (default 'lower') */
  identifierCase?: IdentifierCase;
  /** Total order on identifiers (default: code unit order) */
  compare?: IdentifierComparator;
}

/**
 * Canonical key for an unordered pair: `(min(a, b), max(a, b))`.
 *
 * @throws ValidationError when both sides are the same identifier after case normalization
 */
export function canonicalizeMatchup(
  a: string,
  b: string,
  options: CanonicalizeOptions = {}
): MatchupKey {
  const mode = options.identifierCase ?? 'lower';
  const compare = options.compare ?? compareIdentifiers;
  const left = normalizeIdentifier(a, mode);
  const right = normalizeIdentifier(b, mode);
  const order = compare(left, right);
  if (order === 0) {
    throw new ValidationError(
      ErrorCodes.DEGENERATE_PAIR,
      `A matchup needs two distinct participants, got '${a}' and '${b}'`,
      { field: 'participants' }
    );
  }
  return order < 0 ? { first: left, second: right } : { first: right, second: left };
}

export type AllowListMode = 'either' | 'both';

export interface MatchupOptions extends CanonicalizeOptions {
  /** Pairs with fewer games are dropped */
  minGames: number;
  /** Tracked entities; all pairs when omitted */
  entities?: readonly string[];
  /** Keep a pair when one (default) or both participants are tracked */
  allowListMode?: AllowListMode;
  /** Attribute that splits a pair into separate aggregates, e.g. `timeClass` */
  groupBy?: string;
  /** Ignore draws entirely */
  decisiveOnly?: boolean;
  /** Categories, seen from `participants[0]`, meaning win, loss and draw */
  outcomes?: OutcomeMap;
  /** Decimal places for `firstWinPct` (default 1) */
  precision?: number;
  logger?: EngineLogger;
}

interface PairTally {
  key: MatchupKey;
  group?: string;
  firstWins: number;
  secondWins: number;
  draws: number;
  firstAt: OccurredAt;
  lastAt: OccurredAt;
}

function requireParticipants(event: Event): readonly [string, string] {
  if (!event.participants) {
    throw new ValidationError(ErrorCodes.MISSING_FIELD, 'Matchup event has no participants', {
      recordIndex: event.sequence,
      field: 'participants',
    });
  }
  return event.participants;
}

function withRecordIndex(error: unknown, event: Event): unknown {
  if (error instanceof ValidationError && error.recordIndex === undefined) {
    return new ValidationError(error.code, error.reason, {
      recordIndex: event.sequence,
      field: error.field,
    });
  }
  return error;
}

/** The participant the event's category credits with the win, `null` for a draw. */
function winnerOf(event: Event, outcomes: OutcomeMap): string | null {
  const [first, second] = requireParticipants(event);
  switch (event.category) {
    case outcomes.win:
      return first;
    case outcomes.loss:
      return second;
    case outcomes.draw:
      return null;
    default:
      throw new ValidationError(
        ErrorCodes.CATEGORY_OUT_OF_DOMAIN,
        `Category '${event.category}' is not a matchup outcome`,
        { recordIndex: event.sequence, field: 'category' }
      );
  }
}

function slotOf(winner: string | null, key: MatchupKey, mode: IdentifierCase): MatchupOutcome {
  if (winner === null) return 'draw';
  return normalizeIdentifier(winner, mode) === key.first ? 'first' : 'second';
}

function groupOf(event: Event, groupBy: string | undefined): string | undefined {
  if (groupBy === undefined) return undefined;
  const value = event.attributes?.[groupBy];
  return value === undefined || value === null ? undefined : String(value);
}

function compareGroups(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return -1;
  if (b === undefined) return 1;
  return compareIdentifiers(a, b);
}

/**
 * Head-to-head records per canonical pair.
 *
 * Each outcome is credited to the canonical first or second slot; which side
 * played white or black (home or away) is discarded. Output keeps pairs with
 * `total >= minGames`, ordered by total descending, then key, then group.
 *
 * @throws ValidationError for a self-pair, a missing participant, or an
 * unknown outcome category
 */
export function aggregateMatchups(
  events: Iterable<Event>,
  options: MatchupOptions
): MatchupAggregate[] {
  const checked = checkConfig('MatchupOptions', options);
  const mode = checked.identifierCase ?? 'lower';
  const compare = checked.compare ?? compareIdentifiers;
  const outcomes = checked.outcomes ?? DEFAULT_OUTCOMES;
  const precision = checked.precision ?? RATE_PRECISION;
  const allowListMode = checked.allowListMode ?? 'either';
  const logger = checked.logger ?? silentLogger;
  const allowed = createAllowList(checked.entities, mode);

  const tallies = new Map<string, PairTally>();
  let skipped = 0;

  for (const event of events) {
    const [a, b] = requireParticipants(event);
    let key: MatchupKey;
    try {
      key = canonicalizeMatchup(a, b, { identifierCase: mode, compare });
    } catch (error) {
      throw withRecordIndex(error, event);
    }

    if (allowed) {
      const tracked = [allowed(a), allowed(b)].filter(Boolean).length;
      if (tracked === 0 || (allowListMode === 'both' && tracked < 2)) {
        skipped++;
        continue;
      }
    }

    const slot = slotOf(winnerOf(event, outcomes), key, mode);
    if (slot === 'draw' && checked.decisiveOnly) {
      skipped++;
      continue;
    }

    const group = groupOf(event, checked.groupBy);
    const bucketKey = JSON.stringify([key.first, key.second, group ?? null]);
    let tally = tallies.get(bucketKey);
    if (!tally) {
      tally = {
        key,
        firstWins: 0,
        secondWins: 0,
        draws: 0,
        firstAt: event.occurredAt,
        lastAt: event.occurredAt,
      };
      if (group !== undefined) tally.group = group;
      tallies.set(bucketKey, tally);
    }

    if (slot === 'first') tally.firstWins++;
    else if (slot === 'second') tally.secondWins++;
    else tally.draws++;

    if (compareOccurredAt(event.occurredAt, tally.firstAt) < 0) tally.firstAt = event.occurredAt;
    if (compareOccurredAt(event.occurredAt, tally.lastAt) > 0) tally.lastAt = event.occurredAt;
  }

  const aggregates: MatchupAggregate[] = [];
  for (const tally of tallies.values()) {
    const total = tally.firstWins + tally.secondWins + tally.draws;
    if (total < checked.minGames) continue;
    const decisive = tally.firstWins + tally.secondWins;
    const aggregate: MatchupAggregate = {
      key: tally.key,
      firstWins: tally.firstWins,
      secondWins: tally.secondWins,
      draws: tally.draws,
      total,
      decisive,
      firstWinPct: ratioPct(tally.firstWins, decisive, precision),
      winDifferential: tally.firstWins - tally.secondWins,
      firstAt: tally.firstAt,
      lastAt: tally.lastAt,
    };
    if (tally.group !== undefined) aggregate.group = tally.group;
    aggregates.push(aggregate);
  }

  aggregates.sort(
    (x, y) =>
      y.total - x.total ||
      compare(x.key.first, y.key.first) ||
      compare(x.key.second, y.key.second) ||
      compareGroups(x.group, y.group)
  );

  logger.debug('Aggregated matchups', {
    pairs: tallies.size,
    kept: aggregates.length,
    skippedEvents: skipped,
  });
  return aggregates;
}

/**
 * Label a pairing by whether one side's wins exceed the other's by `factor`.
 * Operates on a finished aggregate only.
 */
export function classifyDominance(
  aggregate: Pick<MatchupAggregate, 'key' | 'firstWins' | 'secondWins'>,
  factor: number = DEFAULT_DOMINANCE_FACTOR
): DominanceVerdict {
  checkConfig('DominanceOptions', { factor });
  const { key, firstWins, secondWins } = aggregate;
  if (firstWins > secondWins * factor) {
    return { status: 'first-dominates', dominant: key.first, label: `${key.first} DOMINATES` };
  }
  if (secondWins > firstWins * factor) {
    return { status: 'second-dominates', dominant: key.second, label: `${key.second} DOMINATES` };
  }
  return { status: 'close-rivalry', dominant: null, label: 'CLOSE RIVALRY' };
}

export interface UpsetOptions {
  /** The winner must be rated more than this many points below the loser */
  minRatingGap: number;
  limit?: number;
  /** Tracked entities; games with at least one tracked participant are kept */
  entities?: readonly string[];
  identifierCase?: IdentifierCase;
  /** Attributes holding the ratings of `participants[0]` and `participants[1]` */
  ratingAttributes?: [string, string];
  outcomes?: OutcomeMap;
}

function readRating(event: Event, attribute: string): number | null {
  const value = event.attributes?.[attribute];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Decided games won by the lower-rated side by more than `minRatingGap`,
 * largest gap first. Games without both ratings are skipped.
 *
 * @throws ValidationError for a self-pair or a missing participant
 */
export function findUpsets(events: Iterable<Event>, options: UpsetOptions): Upset[] {
  const checked = checkConfig('UpsetOptions', options);
  const outcomes = checked.outcomes ?? DEFAULT_OUTCOMES;
  const [firstRatingAttr, secondRatingAttr] = checked.ratingAttributes ?? [
    'firstRating',
    'secondRating',
  ];
  const mode = checked.identifierCase ?? 'lower';
  const allowed = createAllowList(checked.entities, mode);

  const upsets: Array<Upset & { sequence: number }> = [];
  for (const event of events) {
    const [first, second] = requireParticipants(event);
    try {
      canonicalizeMatchup(first, second, { identifierCase: mode });
    } catch (error) {
      throw withRecordIndex(error, event);
    }
    if (allowed && !allowed(first) && !allowed(second)) continue;

    const winner = winnerOf(event, outcomes);
    if (winner === null) continue;

    const firstRating = readRating(event, firstRatingAttr);
    const secondRating = readRating(event, secondRatingAttr);
    if (firstRating === null || secondRating === null) continue;

    const firstWon = winner === first;
    const winnerRating = firstWon ? firstRating : secondRating;
    const loserRating = firstWon ? secondRating : firstRating;
    if (!(winnerRating < loserRating - checked.minRatingGap)) continue;

    const upset: Upset & { sequence: number } = {
      winner,
      loser: firstWon ? second : first,
      winnerRating,
      loserRating,
      ratingGap: Math.abs(firstRating - secondRating),
      occurredAt: event.occurredAt,
      sequence: event.sequence,
    };
    if (event.attributes) upset.attributes = event.attributes;
    upsets.push(upset);
  }

  upsets.sort(
    (a, b) =>
      b.ratingGap - a.ratingGap ||
      compareOccurredAt(a.occurredAt, b.occurredAt) ||
      a.sequence - b.sequence
  );
  const limited = checked.limit === undefined ? upsets : upsets.slice(0, checked.limit);
  return limited.map(({ sequence: _sequence, ...upset }) => upset);
}
