import { checkConfig } from './config';
import { ErrorCodes, SeqLensError, ValidationError } from './errors';
import { compareOccurredAt, createAllowList, partitionByEntity } from './ordering';
import type { Event, IdentifierCase, OccurredAt, Run, StreakSummary } from './types';

export interface RunOptions {
  /** Declared categorical domain; events outside it are rejected */
  domain?: readonly string[];
  /** Allow-list of entities to track; all entities when omitted */
  entities?: readonly string[];
  /** Case policy for matching `entities` (default 'exact') */
  identifierCase?: IdentifierCase;
}

interface OpenRun<C extends string> {
  category: C;
  runId: number;
  length: number;
  start: OccurredAt;
  end: OccurredAt;
}

function assertInDomain(event: Event, domain: ReadonlySet<string> | null): void {
  if (domain && !domain.has(event.category)) {
    throw new ValidationError(
      ErrorCodes.CATEGORY_OUT_OF_DOMAIN,
      `Category '${event.category}' is outside the run domain`,
      { recordIndex: event.sequence, field: 'category' }
    );
  }
}

/**
 * Scans one entity's events in order and emits maximal runs.
 *
 * Each event gets its position `i` in the entity's sequence and its position
 * `j` among the entity's events of the same category. `i - j` stays constant
 * inside a maximal run and changes exactly at a category transition, so a run
 * closes when `(category, i - j)` changes. State is the open run plus one
 * counter per category.
 */
export class RunAccumulator<C extends string = string> {
  readonly entityId: string;
  private current: OpenRun<C> | null = null;
  private position = 0;
  private ordinal = 0;
  private lastAt: OccurredAt | null = null;
  private readonly seen = new Map<C, number>();

  constructor(entityId: string) {
    this.entityId = entityId;
  }

  /**
   * Add the next event. Returns the run this event closed, if any.
   * @throws ValidationError when the event is older than the previous one
   */
  push(event: Event<C>): Run<C> | null {
    if (this.lastAt !== null && compareOccurredAt(event.occurredAt, this.lastAt) < 0) {
      throw new ValidationError(
        ErrorCodes.OUT_OF_ORDER,
        `Event for ${this.entityId} arrived before its predecessor`,
        { recordIndex: event.sequence, field: 'occurredAt' }
      );
    }
    this.lastAt = event.occurredAt;

    const i = this.position++;
    const j = this.seen.get(event.category) ?? 0;
    this.seen.set(event.category, j + 1);
    const runId = i - j;

    const open = this.current;
    if (open && open.category === event.category && open.runId === runId) {
      open.length++;
      open.end = event.occurredAt;
      return null;
    }

    const closed = open ? this.seal(open) : null;
    this.current = {
      category: event.category,
      runId,
      length: 1,
      start: event.occurredAt,
      end: event.occurredAt,
    };
    return closed;
  }

  /** Close the open run at end of input. */
  flush(): Run<C> | null {
    const open = this.current;
    this.current = null;
    return open ? this.seal(open) : null;
  }

  private seal(open: OpenRun<C>): Run<C> {
    return Object.freeze({
      entityId: this.entityId,
      category: open.category,
      length: open.length,
      start: open.start,
      end: open.end,
      ordinal: this.ordinal++,
    });
  }
}

/**
 * Partition events per entity and emit every maximal run of constant category.
 *
 * Output is grouped by entity in order of first appearance, runs in
 * chronological order. The longest run is not special-cased: callers pick
 * the maximum length they need.
 *
 * @example
 * ```typescript
 * const runs = detectRuns(events, { domain: ['win', 'loss', 'draw'] });
 * const longestWin = Math.max(0, ...runs.filter((r) => r.category === 'win').map((r) => r.length));
 * ```
 */
export function detectRuns<C extends string>(
  events: Iterable<Event<C>>,
  options: RunOptions = {}
): Run<C>[] {
  const { domain, entities, identifierCase } = checkConfig('RunOptions', options);
  const allowed = createAllowList(entities, identifierCase);
  const domainSet = domain ? new Set<string>(domain) : null;

  const runs: Run<C>[] = [];
  for (const [entityId, partition] of partitionByEntity(events)) {
    if (allowed && !allowed(entityId)) continue;
    const accumulator = new RunAccumulator<C>(entityId);
    for (const event of partition) {
      assertInDomain(event, domainSet);
      const closed = accumulator.push(event);
      if (closed) runs.push(closed);
    }
    const last = accumulator.flush();
    if (last) runs.push(last);
  }
  return runs;
}

/**
 * Run detection over a stream that arrives in order per entity.
 *
 * A run is reported once a different category arrives for its entity, or at
 * {@link StreamingRunDetector.end}; before that it cannot be known to be maximal.
 */
export class StreamingRunDetector<C extends string = string> {
  private readonly partitions = new Map<string, RunAccumulator<C>>();
  private readonly allowed: ((id: string) => boolean) | null;
  private readonly domain: ReadonlySet<string> | null;
  private closed = false;

  constructor(options: RunOptions = {}) {
    const { domain, entities, identifierCase } = checkConfig('RunOptions', options);
    this.allowed = createAllowList(entities, identifierCase);
    this.domain = domain ? new Set<string>(domain) : null;
  }

  /** Feed one event; returns the run it completed, if any. */
  push(event: Event<C>): Run<C> | null {
    if (this.closed) {
      throw new SeqLensError(ErrorCodes.STREAM_CLOSED, 'Cannot push after end()');
    }
    if (this.allowed && !this.allowed(event.entityId)) return null;
    assertInDomain(event, this.domain);

    let accumulator = this.partitions.get(event.entityId);
    if (!accumulator) {
      accumulator = new RunAccumulator<C>(event.entityId);
      this.partitions.set(event.entityId, accumulator);
    }
    return accumulator.push(event);
  }

  /** Finalize every partition and return the runs still open. */
  end(): Run<C>[] {
    this.closed = true;
    const remaining: Run<C>[] = [];
    for (const accumulator of this.partitions.values()) {
      const run = accumulator.flush();
      if (run) remaining.push(run);
    }
    return remaining;
  }
}

export interface SummaryOptions {
  /** Categories to report, e.g. `['win', 'loss']` */
  categories: readonly string[];
  /** Minimum length counted in `atLeastThreshold` */
  threshold: number;
}

/**
 * Longest run per category and the number of runs reaching a threshold, per entity.
 */
export function summarizeRuns(runs: readonly Run[], options: SummaryOptions): StreakSummary[] {
  const { categories, threshold } = checkConfig('SummaryOptions', options);
  const summaries = new Map<string, StreakSummary>();

  for (const run of runs) {
    let summary = summaries.get(run.entityId);
    if (!summary) {
      summary = { entityId: run.entityId, longest: {}, atLeastThreshold: {} };
      for (const category of categories) {
        summary.longest[category] = 0;
        summary.atLeastThreshold[category] = 0;
      }
      summaries.set(run.entityId, summary);
    }
    if (!categories.includes(run.category)) continue;
    summary.longest[run.category] = Math.max(summary.longest[run.category], run.length);
    if (run.length >= threshold) {
      summary.atLeastThreshold[run.category] += 1;
    }
  }

  return [...summaries.values()];
}

export interface LongestRunsOptions {
  category: string;
  limit?: number;
}

/** Runs of one category, longest first; equal lengths by earliest start, then entity. */
export function longestRuns<C extends string>(
  runs: readonly Run<C>[],
  options: LongestRunsOptions
): Run<C>[] {
  const sorted = runs
    .filter((run) => run.category === options.category)
    .sort(
      (a, b) =>
        b.length - a.length ||
        compareOccurredAt(a.start, b.start) ||
        (a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0)
    );
  return options.limit === undefined ? sorted : sorted.slice(0, options.limit);
}
