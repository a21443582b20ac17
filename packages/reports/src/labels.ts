import { parseConfig, type LabelTable } from '@seqlens/core';
import erasJson from '../data/eras.json';
import weatherLabelsJson from '../data/weather-labels.json';
import wmoCodesJson from '../data/wmo-codes.json';

/** Stack Overflow activity eras, keyed on the `period` (first day of the month). */
export const ERA_TABLE: LabelTable = parseConfig<LabelTable>('LabelTable', erasJson);

/** Meteorological seasons by calendar month. */
export const SEASON_TABLE: LabelTable = parseConfig<LabelTable>('LabelTable', weatherLabelsJson.season);

/** Mutually exclusive daily weather categories; overcast means no sunshine at all. */
export const WEATHER_CATEGORY_TABLE: LabelTable = parseConfig<LabelTable>(
  'LabelTable',
  weatherLabelsJson.category
);

const WMO_DESCRIPTIONS: Record<string, string> = wmoCodesJson;

/** Human-readable WMO weather interpretation code. */
export function describeWeatherCode(code: number | null): string {
  if (code === null) return 'Unknown';
  return WMO_DESCRIPTIONS[String(code)] ?? 'Unknown';
}
