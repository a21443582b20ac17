import { createClassifier } from './classify';
import { checkConfig } from './config';
import { ErrorCodes, ValidationError } from './errors';
import { readField, readPath, toFieldValue, toNumberOrNull } from './fields';
import { silentLogger, type EngineLogger } from './logger';
import { compareOccurredAt, normalizeIdentifier, partitionByEntity } from './ordering';
import type {
  CategoryRule,
  Event,
  EventSchemaDescriptor,
  FieldCoercion,
  FieldRule,
  FieldValue,
  IdentifierCase,
  OccurredAt,
  OccurredAtCoercion,
} from './types';

export interface NormalizeOptions {
  logger?: EngineLogger;
}

const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})/;

function hasOwn(map: Record<string, string>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

function toIdentifier(raw: unknown, mode: IdentifierCase): string | null {
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return normalizeIdentifier(String(raw), mode);
  }
  if (typeof raw !== 'string') return null;
  const trimmed = raw.trim();
  return trimmed === '' ? null : normalizeIdentifier(trimmed, mode);
}

function validDate(date: Date): Date | null {
  return Number.isNaN(date.getTime()) ? null : date;
}

function toDate(raw: unknown): Date | null {
  if (raw instanceof Date) return validDate(raw);
  if (typeof raw === 'number') return Number.isFinite(raw) ? validDate(new Date(raw)) : null;
  if (typeof raw === 'string' && raw.trim() !== '') return validDate(new Date(raw.trim()));
  return null;
}

/** Coerce a raw ordering value; `null` means it could not be parsed. */
export function coerceOccurredAt(raw: unknown, coerce: OccurredAtCoercion): OccurredAt | null {
  switch (coerce) {
    case 'timestamp':
      return toDate(raw);
    case 'epoch-seconds': {
      const seconds = toNumberOrNull(raw);
      return seconds === null ? null : validDate(new Date(seconds * 1000));
    }
    case 'iso-date': {
      if (typeof raw === 'string') {
        const match = ISO_DATE_PREFIX.exec(raw.trim());
        if (match) {
          const day = match[1];
          return toDate(day)?.toISOString().slice(0, 10) === day ? day : null;
        }
      }
      const date = toDate(raw);
      return date ? date.toISOString().slice(0, 10) : null;
    }
    case 'number':
      return toNumberOrNull(raw);
    case 'string':
      if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
      return typeof raw === 'string' && raw !== '' ? raw : null;
  }
}

function coerceField(raw: unknown, coerce: FieldCoercion | undefined): FieldValue {
  switch (coerce) {
    case 'number':
      return toNumberOrNull(raw);
    case 'string': {
      const value = toFieldValue(raw);
      return value === undefined || value === null ? null : String(value);
    }
    case 'boolean':
      if (typeof raw === 'boolean') return raw;
      if (raw === 'true') return true;
      if (raw === 'false') return false;
      return null;
    case undefined:
      return toFieldValue(raw) ?? null;
  }
}

type CategoryReader = (record: unknown) => string | null;

function compileCategory(rule: CategoryRule): CategoryReader {
  if (rule.kind === 'rules') {
    return createClassifier(rule.table);
  }
  const { from, map, fallback } = rule;
  return (record) => {
    const raw = readField(record, from);
    if (raw === undefined || raw === null) return fallback ?? null;
    const key = String(raw);
    return map && hasOwn(map, key) ? map[key] : key;
  };
}

function missing(field: string, path: string, recordIndex: number): ValidationError {
  return new ValidationError(ErrorCodes.MISSING_FIELD, `Missing ${field} at '${path}'`, {
    recordIndex,
    field,
  });
}

function dedupeKey(record: unknown, path: string): string | null {
  const value = readField(record, path);
  return value === undefined || value === null ? null : `${typeof value}:${String(value)}`;
}

function readIdentifier(
  record: unknown,
  rule: FieldRule,
  field: string,
  mode: IdentifierCase,
  recordIndex: number
): string {
  const id = toIdentifier(readPath(record, rule.from), mode);
  if (id === null) throw missing(field, rule.from, recordIndex);
  return id;
}

/**
 * Shape raw records into events.
 *
 * The whole batch fails on the first invalid record; no partial output is
 * produced. Output is grouped by entity in order of first appearance, each
 * group sorted by `occurredAt` with ties kept in input order.
 *
 * @throws ValidationError for a record missing its entity or ordering key, or
 * whose category is outside the declared domain
 * @throws ConfigurationError for an invalid descriptor
 */
export function normalizeEvents(
  records: readonly unknown[],
  descriptor: EventSchemaDescriptor,
  options: NormalizeOptions = {}
): Event[] {
  const schema = checkConfig('EventSchemaDescriptor', descriptor);
  const logger = options.logger ?? silentLogger;
  const mode = schema.identifierCase ?? 'exact';
  const domain = new Set(schema.domain);
  const readCategory = compileCategory(schema.category);

  const events: Event[] = [];
  const latestByKey = new Map<string, number>();
  let nulledValues = 0;
  let duplicates = 0;

  records.forEach((record, recordIndex) => {
    const entityId = readIdentifier(record, schema.entityId, 'entityId', mode, recordIndex);

    const rawOccurredAt = readPath(record, schema.occurredAt.from);
    if (rawOccurredAt === undefined || rawOccurredAt === null) {
      throw missing('occurredAt', schema.occurredAt.from, recordIndex);
    }
    const occurredAt = coerceOccurredAt(rawOccurredAt, schema.occurredAt.coerce);
    if (occurredAt === null) {
      throw new ValidationError(
        ErrorCodes.INVALID_TIMESTAMP,
        `Cannot read ${JSON.stringify(rawOccurredAt)} as ${schema.occurredAt.coerce}`,
        { recordIndex, field: 'occurredAt' }
      );
    }

    const category = readCategory(record);
    if (category === null) {
      throw new ValidationError(ErrorCodes.MISSING_FIELD, 'No category could be determined', {
        recordIndex,
        field: 'category',
      });
    }
    if (!domain.has(category)) {
      throw new ValidationError(
        ErrorCodes.CATEGORY_OUT_OF_DOMAIN,
        `Category '${category}' is not one of ${schema.domain.join(', ')}`,
        { recordIndex, field: 'category' }
      );
    }

    let value: number | null = null;
    if (schema.value) {
      const rawValue = readPath(record, schema.value.from);
      value = toNumberOrNull(rawValue);
      if (value === null && rawValue !== undefined && rawValue !== null) {
        nulledValues++;
        logger.debug('Non-numeric value read as null', { recordIndex, raw: rawValue });
      }
    }

    const event: Event = { entityId, occurredAt, category, value, sequence: recordIndex };

    if (schema.participants) {
      const [first, second] = schema.participants;
      event.participants = [
        readIdentifier(record, first, 'participants', mode, recordIndex),
        readIdentifier(record, second, 'participants', mode, recordIndex),
      ];
    }

    if (schema.attributes) {
      const attributes: Record<string, FieldValue> = {};
      for (const [name, rule] of Object.entries(schema.attributes)) {
        attributes[name] = coerceField(readPath(record, rule.from), rule.coerce);
      }
      event.attributes = attributes;
    }

    const key = schema.dedupeBy ? dedupeKey(record, schema.dedupeBy) : null;
    if (key === null) {
      events.push(event);
      return;
    }
    const existing = latestByKey.get(key);
    if (existing === undefined) {
      latestByKey.set(key, events.length);
      events.push(event);
      return;
    }
    duplicates++;
    if (compareOccurredAt(occurredAt, events[existing].occurredAt) > 0) {
      events[existing] = event;
    }
  });

  const grouped = [...partitionByEntity(events).values()].flat();
  logger.debug('Normalized events', {
    records: records.length,
    events: grouped.length,
    duplicates,
    nulledValues,
  });
  return grouped;
}

export interface PerspectiveOptions {
  /** Category seen by the second participant; categories not listed are unchanged */
  flip?: Record<string, string>;
}

const DEFAULT_FLIP: Record<string, string> = { win: 'loss', loss: 'win' };

/**
 * Split matchup events into one event per participant.
 *
 * The category of a matchup event is seen from `participants[0]`; the second
 * participant receives the flipped category. Each derived event records the
 * other side under `attributes.opponent`. Events without participants pass
 * through unchanged.
 */
export function expandPerspectives(
  events: readonly Event[],
  options: PerspectiveOptions = {}
): Event[] {
  const flip = options.flip ?? DEFAULT_FLIP;
  const expanded: Event[] = [];

  events.forEach((event, index) => {
    if (!event.participants) {
      expanded.push({ ...event, sequence: index * 2 });
      return;
    }
    const [first, second] = event.participants;
    const flipped = hasOwn(flip, event.category) ? flip[event.category] : event.category;
    const base = { occurredAt: event.occurredAt, value: event.value };
    expanded.push({
      ...base,
      entityId: first,
      category: event.category,
      sequence: index * 2,
      attributes: { ...event.attributes, opponent: second },
    });
    expanded.push({
      ...base,
      entityId: second,
      category: flipped,
      sequence: index * 2 + 1,
      attributes: { ...event.attributes, opponent: first },
    });
  });

  return [...partitionByEntity(expanded).values()].flat();
}
