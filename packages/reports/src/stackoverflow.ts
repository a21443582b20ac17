import {
  coerceOccurredAt,
  computeTemporalPoints,
  ratioPct,
  roundHalfAwayFromZero,
  toNumberOrNull,
  type LabelTable,
  type SeriesPoint,
} from '@seqlens/core';
import { ERA_TABLE } from './labels';

/** Monthly aggregate from the public dataset or the Stack Exchange API. */
export interface MonthlyQuestionsRow {
  month: string | Date | null;
  question_count: number | null;
  unique_askers?: number | null;
  avg_score?: number | null;
  avg_views?: number | null;
  avg_answer_count?: number | null;
  answered_count?: number | null;
  accepted_count?: number | null;
}

export interface MonthlyTagRow {
  month: string | Date | null;
  tag: string;
  question_count: number | null;
}

export interface TrendOptions {
  /** Era labels keyed on `period` (default: Growth, Plateau, Post-ChatGPT) */
  eras?: LabelTable;
  /** First month counted as post-ChatGPT (default '2022-12-01') */
  postChatgptFrom?: string;
}

export interface MonthlyTrendOptions extends TrendOptions {
  /** Positions back for the change column (default 12, year over year) */
  lag?: number;
}

export interface MonthlyTrendRow {
  month: string;
  year: number;
  quarter: number;
  questionCount: number | null;
  uniqueAskers: number | null;
  avgScore: number | null;
  avgViews: number | null;
  avgAnswerCount: number | null;
  answeredCount: number | null;
  acceptedCount: number | null;
  answerRatePct: number | null;
  acceptanceRatePct: number | null;
  era: string | null;
  isPostChatgpt: boolean;
  yoyChangePct: number | null;
  pctOfPeak: number | null;
}

export interface TagTrendRow {
  month: string;
  tag: string;
  questionCount: number | null;
  peakCount: number | null;
  pctOfPeak: number | null;
  era: string | null;
  isPostChatgpt: boolean;
}

const DEFAULT_POST_CHATGPT_FROM = '2022-12-01';

function monthKey(month: string | Date | null): string | null {
  if (month === null) return null;
  const key = coerceOccurredAt(month, 'iso-date');
  return typeof key === 'string' ? key : null;
}

function rounded(value: number | null | undefined, digits: number): number | null {
  const numeric = toNumberOrNull(value);
  return numeric === null ? null : roundHalfAwayFromZero(numeric, digits);
}

/**
 * Combine the archive and API sources. Rows without a month are dropped; a
 * month present in both sources is reported as a duplicate period downstream.
 */
export function combineMonthlySources(
  ...sources: ReadonlyArray<readonly MonthlyQuestionsRow[]>
): MonthlyQuestionsRow[] {
  return sources.flatMap((rows) => rows.filter((row) => monthKey(row.month) !== null));
}

/**
 * Monthly question volume with answer and acceptance rates, era labels,
 * year-over-year change and percentage of the all-time peak month.
 *
 * @throws ValidationError when a month appears twice
 */
export function monthlyTrends(
  rows: readonly MonthlyQuestionsRow[],
  options: MonthlyTrendOptions = {}
): MonthlyTrendRow[] {
  const postFrom = options.postChatgptFrom ?? DEFAULT_POST_CHATGPT_FROM;
  const byMonth = new Map<string, MonthlyQuestionsRow>();
  const series: SeriesPoint[] = [];
  for (const row of rows) {
    const month = monthKey(row.month);
    if (month === null) continue;
    byMonth.set(month, row);
    series.push({ period: month, value: toNumberOrNull(row.question_count) });
  }

  const points = computeTemporalPoints(series, {
    lag: options.lag ?? 12,
    labels: options.eras ?? ERA_TABLE,
  });

  return points.map((point) => {
    const month = String(point.period);
    const row = byMonth.get(month);
    const [year, monthOfYear] = month.split('-').map(Number);
    const answered = toNumberOrNull(row?.answered_count);
    const accepted = toNumberOrNull(row?.accepted_count);
    return {
      month,
      year,
      quarter: Math.ceil(monthOfYear / 3),
      questionCount: point.value,
      uniqueAskers: toNumberOrNull(row?.unique_askers),
      avgScore: rounded(row?.avg_score, 2),
      avgViews: rounded(row?.avg_views, 0),
      avgAnswerCount: rounded(row?.avg_answer_count, 2),
      answeredCount: answered,
      acceptedCount: accepted,
      answerRatePct: ratioPct(answered, point.value),
      acceptanceRatePct: ratioPct(accepted, point.value),
      era: point.label,
      isPostChatgpt: month >= postFrom,
      yoyChangePct: point.periodOverPeriodPct,
      pctOfPeak: point.pctOfPeak,
    };
  });
}

/**
 * Each tag's monthly questions as a percentage of that tag's own peak month,
 * so communities of very different sizes share one scale.
 * Ordered by month, then question count descending.
 */
export function tagTrends(rows: readonly MonthlyTagRow[], options: TrendOptions = {}): TagTrendRow[] {
  const postFrom = options.postChatgptFrom ?? DEFAULT_POST_CHATGPT_FROM;
  const series: SeriesPoint[] = [];
  for (const row of rows) {
    const month = monthKey(row.month);
    if (month === null) continue;
    series.push({ period: month, group: row.tag, value: toNumberOrNull(row.question_count) });
  }

  const points = computeTemporalPoints(series, { labels: options.eras ?? ERA_TABLE });

  return points
    .map((point) => {
      const month = String(point.period);
      return {
        month,
        tag: point.group ?? '',
        questionCount: point.value,
        peakCount: point.peak,
        pctOfPeak: point.pctOfPeak,
        era: point.label,
        isPostChatgpt: month >= postFrom,
      };
    })
    .sort(
      (a, b) =>
        (a.month < b.month ? -1 : a.month > b.month ? 1 : 0) ||
        (b.questionCount ?? -Infinity) - (a.questionCount ?? -Infinity) ||
        (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0)
    );
}
