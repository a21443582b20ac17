import { describe, it, expect } from 'vitest';
import { computeTemporalPoints, createTemporalStream, LagWindow } from '../src/temporal';
import { ConfigurationError, ErrorCodes, SeqLensError, ValidationError } from '../src/errors';
import type { LabelTable, SeriesPoint } from '../src/types';

function monthly(values: Array<number | null>, group?: string): SeriesPoint[] {
  return values.map((value, i) => ({
    period: `2024-${String(i + 1).padStart(2, '0')}-01`,
    value,
    ...(group === undefined ? {} : { group }),
  }));
}

const eras: LabelTable = {
  rules: [
    { label: 'Early', when: { period: { lt: '2024-03-01' } } },
    { label: 'Late', when: { period: { gte: '2024-03-01' } } },
  ],
};

describe('computeTemporalPoints', () => {
  it('expresses each value as a percentage of the series peak', () => {
    const points = computeTemporalPoints(monthly([10, 20, 5]));

    expect(points.map((point) => point.pctOfPeak)).toEqual([50, 100, 25]);
    expect(points.map((point) => point.peak)).toEqual([20, 20, 20]);
  });

  it('computes change against the value lag positions earlier', () => {
    const points = computeTemporalPoints(monthly([100, 150, 75]), { lag: 1 });
    expect(points.map((point) => point.periodOverPeriodPct)).toEqual([null, 50, -50]);
  });

  it('yields null rather than failing on a zero prior', () => {
    const points = computeTemporalPoints(monthly([0, 10]), { lag: 1 });
    expect(points[1].periodOverPeriodPct).toBeNull();
  });

  it('treats the lag as positional when a period is missing', () => {
    const points = computeTemporalPoints(
      [
        { period: '2024-01-01', value: 10 },
        { period: '2024-02-01', value: 20 },
        { period: '2024-04-01', value: 40 },
      ],
      { lag: 1 }
    );

    expect(points[2].periodOverPeriodPct).toBe(100);
  });

  it('leaves ratios over unknown values null', () => {
    const points = computeTemporalPoints(monthly([null, 8, 4]), { lag: 1 });

    expect(points.map((point) => point.pctOfPeak)).toEqual([null, 100, 50]);
    expect(points.map((point) => point.periodOverPeriodPct)).toEqual([null, null, -50]);
  });

  it('has no peak when every value is null', () => {
    const points = computeTemporalPoints(monthly([null, null]));
    expect(points.map((point) => [point.peak, point.pctOfPeak])).toEqual([
      [null, null],
      [null, null],
    ]);
  });

  it('uses the running peak in to-date mode', () => {
    const points = computeTemporalPoints(monthly([10, 20, 5]), { peakMode: 'to-date' });
    expect(points.map((point) => point.pctOfPeak)).toEqual([100, 100, 25]);
  });

  it('rounds half away from zero at the requested precision', () => {
    const points = computeTemporalPoints(monthly([1, 3]));
    expect(points[0].pctOfPeak).toBe(33.3);

    const precise = computeTemporalPoints(monthly([1, 3]), { precision: 2 });
    expect(precise[0].pctOfPeak).toBe(33.33);
  });

  it('sorts each series by period', () => {
    const points = computeTemporalPoints([
      { period: '2024-03-01', value: 3 },
      { period: '2024-01-01', value: 1 },
      { period: '2024-02-01', value: 2 },
    ]);
    expect(points.map((point) => point.period)).toEqual(['2024-01-01', '2024-02-01', '2024-03-01']);
  });

  it('normalizes every group against its own peak', () => {
    const points = computeTemporalPoints([
      ...monthly([50, 100], 'python'),
      ...monthly([2, 1], 'rust'),
    ]);

    expect(points).toEqual([
      expect.objectContaining({ group: 'python', value: 50, peak: 100, pctOfPeak: 50 }),
      expect.objectContaining({ group: 'python', value: 100, peak: 100, pctOfPeak: 100 }),
      expect.objectContaining({ group: 'rust', value: 2, peak: 2, pctOfPeak: 100 }),
      expect.objectContaining({ group: 'rust', value: 1, peak: 2, pctOfPeak: 50 }),
    ]);
  });

  it('labels points from a rule table', () => {
    const points = computeTemporalPoints(monthly([1, 2, 3, 4]), { labels: eras });
    expect(points.map((point) => point.label)).toEqual(['Early', 'Early', 'Late', 'Late']);
  });

  it('passes extra fields to the labels', () => {
    const [point] = computeTemporalPoints(
      [{ period: 1, value: 5, fields: { source: 'api' } }],
      { labels: { rules: [{ label: 'Live', when: { source: { eq: 'api' } } }], otherwise: 'Archive' } }
    );
    expect(point.label).toBe('Live');
  });

  it('omits the group key for ungrouped series', () => {
    const [point] = computeTemporalPoints([{ period: 1, value: 5 }]);
    expect(point).toEqual({
      period: 1,
      value: 5,
      peak: 5,
      pctOfPeak: 100,
      periodOverPeriodPct: null,
      label: null,
    });
  });

  it('rejects a repeated period', () => {
    try {
      computeTemporalPoints([
        { period: '2024-01-01', value: 1 },
        { period: '2024-02-01', value: 2 },
        { period: '2024-01-01', value: 3 },
      ]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ code: ErrorCodes.DUPLICATE_PERIOD, recordIndex: 2 });
    }
  });

  it('allows the same period in different groups', () => {
    expect(() =>
      computeTemporalPoints([
        { period: '2024-01-01', value: 1, group: 'a' },
        { period: '2024-01-01', value: 2, group: 'b' },
      ])
    ).not.toThrow();
  });

  it('rejects a lag below 1', () => {
    expect(() => computeTemporalPoints([], { lag: 0 })).toThrow(ConfigurationError);
  });
});

describe('LagWindow', () => {
  it('returns the value lag positions back once filled', () => {
    const window = new LagWindow(2);
    expect(window.lagged()).toBeUndefined();
    window.push(1);
    window.push(2);
    expect(window.lagged()).toBe(1);
    window.push(3);
    expect(window.lagged()).toBe(2);
    window.push(null);
    expect(window.lagged()).toBe(3);
  });
});

describe('createTemporalStream', () => {
  it('emits each point immediately in to-date mode', () => {
    const stream = createTemporalStream({ peakMode: 'to-date', lag: 1 });

    expect(stream.push({ period: 1, value: 100 })).toEqual([
      { period: 1, value: 100, peak: 100, pctOfPeak: 100, periodOverPeriodPct: null, label: null },
    ]);
    expect(stream.push({ period: 2, value: 150 })).toEqual([
      { period: 2, value: 150, peak: 150, pctOfPeak: 100, periodOverPeriodPct: 50, label: null },
    ]);
    expect(stream.push({ period: 3, value: 75 })).toEqual([
      { period: 3, value: 75, peak: 150, pctOfPeak: 50, periodOverPeriodPct: -50, label: null },
    ]);
    expect(stream.end()).toEqual([]);
  });

  it('matches batch output in global mode', () => {
    const series = [...monthly([10, 20, 5], 'a'), ...monthly([4, 2], 'b')];
    const stream = createTemporalStream({ lag: 1 });
    const pushed = series.flatMap((point) => stream.push(point));

    expect(pushed).toEqual([]);
    expect(stream.end()).toEqual(computeTemporalPoints(series, { lag: 1 }));
  });

  it('rejects periods that go backwards', () => {
    const stream = createTemporalStream({ peakMode: 'to-date' });
    stream.push({ period: 2, value: 1 });

    try {
      stream.push({ period: 1, value: 1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCodes.OUT_OF_ORDER, recordIndex: 1 });
    }
  });

  it('rejects a repeated period', () => {
    const stream = createTemporalStream();
    stream.push({ period: 'a', value: 1 });
    expect(() => stream.push({ period: 'a', value: 2 })).toThrow(/appears more than once/);
  });

  it('refuses input after end()', () => {
    const stream = createTemporalStream();
    stream.end();

    try {
      stream.push({ period: 1, value: 1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SeqLensError);
      expect(error).toMatchObject({ code: ErrorCodes.STREAM_CLOSED });
    }
  });
});
