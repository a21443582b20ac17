import { createClassifier, type Classifier } from './classify';
import { checkConfig } from './config';
import { ErrorCodes, SeqLensError, ValidationError } from './errors';
import { percentChange, ratioPct, RATE_PRECISION } from './numeric';
import { compareOccurredAt } from './ordering';
import type { LabelTable, PeakMode, SeriesPoint, TemporalPoint } from './types';

export interface TemporalOptions {
  /** Positions back for the period-over-period change; no change is computed when omitted */
  lag?: number;
  /** Decimal places for percentages (default 1) */
  precision?: number;
  /** Peak over the whole series (default) or the running maximum */
  peakMode?: PeakMode;
  /** Era or category labels, evaluated over `period`, `value`, `group` and `fields` */
  labels?: LabelTable;
}

interface ResolvedTemporalOptions {
  lag: number | null;
  precision: number;
  peakMode: PeakMode;
  classify: Classifier | null;
}

function resolveOptions(options: TemporalOptions): ResolvedTemporalOptions {
  const { lag, precision, peakMode, labels } = checkConfig('TemporalOptions', options);
  return {
    lag: lag ?? null,
    precision: precision ?? RATE_PRECISION,
    peakMode: peakMode ?? 'global',
    classify: labels ? createClassifier(labels) : null,
  };
}

function groupKey(point: SeriesPoint): string {
  return point.group ?? '';
}

function maxValue(values: Array<number | null>): number | null {
  let peak: number | null = null;
  for (const value of values) {
    if (value !== null && (peak === null || value > peak)) peak = value;
  }
  return peak;
}

function buildPoint(
  point: SeriesPoint,
  peak: number | null,
  prior: number | null | undefined,
  options: ResolvedTemporalOptions
): TemporalPoint {
  const { period, value, group } = point;
  const result: TemporalPoint = {
    period,
    value,
    peak,
    pctOfPeak: value === null ? null : ratioPct(value, peak, options.precision),
    periodOverPeriodPct: prior === undefined ? null : percentChange(value, prior, options.precision),
    label: options.classify ? options.classify({ ...point.fields, period, value, group }) : null,
  };
  if (group !== undefined) result.group = group;
  return result;
}

function sortSeries(points: Array<{ point: SeriesPoint; index: number }>): SeriesPoint[] {
  points.sort((a, b) => compareOccurredAt(a.point.period, b.point.period) || a.index - b.index);
  for (let i = 1; i < points.length; i++) {
    if (compareOccurredAt(points[i - 1].point.period, points[i].point.period) === 0) {
      throw new ValidationError(
        ErrorCodes.DUPLICATE_PERIOD,
        `Period ${String(points[i].point.period)} appears more than once`,
        { recordIndex: points[i].index, field: 'period' }
      );
    }
  }
  return points.map((entry) => entry.point);
}

function normalizeSeries(series: SeriesPoint[], options: ResolvedTemporalOptions): TemporalPoint[] {
  const globalPeak = maxValue(series.map((point) => point.value));
  let runningPeak: number | null = null;

  return series.map((point, i) => {
    if (point.value !== null && (runningPeak === null || point.value > runningPeak)) {
      runningPeak = point.value;
    }
    const peak = options.peakMode === 'global' ? globalPeak : runningPeak;
    const prior =
      options.lag !== null && i >= options.lag ? series[i - options.lag].value : undefined;
    return buildPoint(point, peak, prior, options);
  });
}

/**
 * Peak-relative percentages and period-over-period change for one or more series.
 *
 * Points are partitioned by `group` (in order of first appearance) and sorted
 * by period. The lag is positional: a missing month shifts which earlier value
 * is compared, exactly like `LAG(x, 12) OVER (ORDER BY month)`. Any ratio with a
 * zero or unknown denominator is `null`.
 *
 * @throws ValidationError when a period repeats within a series
 */
export function computeTemporalPoints(
  series: readonly SeriesPoint[],
  options: TemporalOptions = {}
): TemporalPoint[] {
  const resolved = resolveOptions(options);
  const groups = new Map<string, Array<{ point: SeriesPoint; index: number }>>();
  series.forEach((point, index) => {
    const key = groupKey(point);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push({ point, index });
    } else {
      groups.set(key, [{ point, index }]);
    }
  });

  const output: TemporalPoint[] = [];
  for (const bucket of groups.values()) {
    output.push(...normalizeSeries(sortSeries(bucket), resolved));
  }
  return output;
}

/**
 * Fixed-size window over the last `lag` values of a series.
 */
export class LagWindow {
  private readonly values: Array<number | null> = [];
  private head = 0;

  constructor(private readonly lag: number) {}

  /** The value `lag` positions before the next one, or `undefined` while filling. */
  lagged(): number | null | undefined {
    return this.values.length < this.lag ? undefined : this.values[this.head];
  }

  push(value: number | null): void {
    if (this.values.length < this.lag) {
      this.values.push(value);
      return;
    }
    this.values[this.head] = value;
    this.head = (this.head + 1) % this.lag;
  }
}

interface StreamPartition {
  lastPeriod: string | number | null;
  peak: number | null;
  window: LagWindow | null;
}

export interface TemporalStream {
  /** Feed the next point of its series; returns points ready to emit. */
  push(point: SeriesPoint): TemporalPoint[];
  /** Flush buffered partitions. */
  end(): TemporalPoint[];
}

/**
 * Streaming form of {@link computeTemporalPoints} for points arriving in period order.
 *
 * In `to-date` mode each point is emitted as it arrives, keeping only the
 * running peak and a lag window per series. In `global` mode the peak is
 * unknown until the series ends, so points are buffered and emitted by `end()`.
 */
export function createTemporalStream(options: TemporalOptions = {}): TemporalStream {
  const resolved = resolveOptions(options);
  const partitions = new Map<string, StreamPartition>();
  const buffered: SeriesPoint[] = [];
  let closed = false;
  let received = 0;

  function admit(point: SeriesPoint): StreamPartition {
    const key = groupKey(point);
    let partition = partitions.get(key);
    if (!partition) {
      partition = {
        lastPeriod: null,
        peak: null,
        window: resolved.lag !== null ? new LagWindow(resolved.lag) : null,
      };
      partitions.set(key, partition);
    }
    if (partition.lastPeriod !== null) {
      const order = compareOccurredAt(point.period, partition.lastPeriod);
      if (order === 0) {
        throw new ValidationError(
          ErrorCodes.DUPLICATE_PERIOD,
          `Period ${String(point.period)} appears more than once`,
          { recordIndex: received, field: 'period' }
        );
      }
      if (order < 0) {
        throw new ValidationError(
          ErrorCodes.OUT_OF_ORDER,
          `Period ${String(point.period)} arrived after ${String(partition.lastPeriod)}`,
          { recordIndex: received, field: 'period' }
        );
      }
    }
    partition.lastPeriod = point.period;
    return partition;
  }

  return {
    push(point) {
      if (closed) {
        throw new SeqLensError(ErrorCodes.STREAM_CLOSED, 'Cannot push after end()');
      }
      const partition = admit(point);
      received++;

      if (resolved.peakMode === 'global') {
        buffered.push(point);
        return [];
      }

      if (point.value !== null && (partition.peak === null || point.value > partition.peak)) {
        partition.peak = point.value;
      }
      const prior = partition.window ? partition.window.lagged() : undefined;
      partition.window?.push(point.value);
      return [buildPoint(point, partition.peak, prior, resolved)];
    },

    end() {
      closed = true;
      if (resolved.peakMode !== 'global') return [];
      const output: TemporalPoint[] = [];
      const byGroup = new Map<string, SeriesPoint[]>();
      for (const point of buffered) {
        const key = groupKey(point);
        const bucket = byGroup.get(key);
        if (bucket) bucket.push(point);
        else byGroup.set(key, [point]);
      }
      for (const bucket of byGroup.values()) {
        output.push(...normalizeSeries(bucket, resolved));
      }
      return output;
    },
  };
}
