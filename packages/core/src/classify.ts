import { checkConfig } from './config';
import { readField } from './fields';
import type { FieldCondition, FieldValue, LabelTable } from './types';

type Comparable = string | number;

function compareSameType(value: FieldValue, bound: Comparable): number | null {
  if (typeof value === 'number' && typeof bound === 'number') return value - bound;
  if (typeof value === 'string' && typeof bound === 'string') {
    if (value < bound) return -1;
    if (value > bound) return 1;
    return 0;
  }
  return null;
}

/**
 * Test one field against a condition.
 * Like SQL, a null or missing field fails every comparison; only `eq: null` matches it.
 */
export function matchesCondition(value: FieldValue | undefined, condition: FieldCondition): boolean {
  if (value === undefined || value === null) {
    return Object.keys(condition).length === 1 && condition.eq === null;
  }
  if (condition.eq !== undefined && value !== condition.eq) return false;
  if (condition.in !== undefined && !condition.in.includes(value)) return false;

  const bounds: Array<[Comparable | undefined, (diff: number) => boolean]> = [
    [condition.lt, (diff) => diff < 0],
    [condition.lte, (diff) => diff <= 0],
    [condition.gt, (diff) => diff > 0],
    [condition.gte, (diff) => diff >= 0],
  ];
  for (const [bound, holds] of bounds) {
    if (bound === undefined) continue;
    const diff = compareSameType(value, bound);
    if (diff === null || !holds(diff)) return false;
  }
  return true;
}

export type Classifier = (record: unknown) => string | null;

/**
 * Compile a label table into a classifier.
 *
 * Rules are evaluated top to bottom and the first match wins, like a CASE
 * expression. Field names in `when` are dotted paths into the record.
 *
 * @example
 * ```typescript
 * const season = createClassifier({
 *   rules: [
 *     { label: 'Winter', when: { month: { in: [12, 1, 2] } } },
 *     { label: 'Spring', when: { month: { in: [3, 4, 5] } } },
 *   ],
 *   otherwise: 'Other',
 * });
 * season({ month: 1 }); // 'Winter'
 * ```
 */
export function createClassifier(table: LabelTable): Classifier {
  const { rules, otherwise } = checkConfig('LabelTable', table);
  const compiled = rules.map((rule) => ({
    label: rule.label,
    conditions: Object.entries(rule.when ?? {}),
  }));
  const fallback = otherwise ?? null;

  return (record: unknown) => {
    for (const rule of compiled) {
      const matched = rule.conditions.every(([path, condition]) =>
        matchesCondition(readField(record, path), condition)
      );
      if (matched) return rule.label;
    }
    return fallback;
  };
}

/** Classify a single record; prefer {@link createClassifier} in loops. */
export function classify(record: unknown, table: LabelTable): string | null {
  return createClassifier(table)(record);
}
