import { describe, it, expect, vi } from 'vitest';
import { coerceOccurredAt, expandPerspectives, normalizeEvents } from '../src/normalizer';
import { ConfigurationError, ErrorCodes, ValidationError } from '../src/errors';
import type { Event, EventSchemaDescriptor } from '../src/types';

const resultDescriptor: EventSchemaDescriptor = {
  domain: ['win', 'loss', 'draw'],
  entityId: { from: 'player' },
  occurredAt: { from: 'at', coerce: 'iso-date' },
  category: { kind: 'field', from: 'result' },
  value: { from: 'score' },
};

function captureError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('normalizeEvents', () => {
  it('groups by entity in order of first appearance and sorts each group', () => {
    const events = normalizeEvents(
      [
        { player: 'alice', at: '2024-01-02', result: 'win', score: '5' },
        { player: 'bob', at: '2024-01-01', result: 'loss', score: 2 },
        { player: 'alice', at: '2024-01-01', result: 'draw', score: 3 },
      ],
      resultDescriptor
    );

    expect(events).toEqual([
      { entityId: 'alice', occurredAt: '2024-01-01', category: 'draw', value: 3, sequence: 2 },
      { entityId: 'alice', occurredAt: '2024-01-02', category: 'win', value: 5, sequence: 0 },
      { entityId: 'bob', occurredAt: '2024-01-01', category: 'loss', value: 2, sequence: 1 },
    ]);
  });

  it('reads a non-numeric value as null and logs it', () => {
    const logger = recordingLogger();
    const [event] = normalizeEvents(
      [{ player: 'alice', at: '2024-01-01', result: 'win', score: 'n/a' }],
      resultDescriptor,
      { logger }
    );

    expect(event.value).toBeNull();
    expect(logger.debug).toHaveBeenCalledWith('Non-numeric value read as null', {
      recordIndex: 0,
      raw: 'n/a',
    });
    expect(logger.debug).toHaveBeenLastCalledWith('Normalized events', {
      records: 1,
      events: 1,
      duplicates: 0,
      nulledValues: 1,
    });
  });

  it('leaves a missing value null without logging it', () => {
    const logger = recordingLogger();
    const [event] = normalizeEvents(
      [{ player: 'alice', at: '2024-01-01', result: 'win' }],
      resultDescriptor,
      { logger }
    );

    expect(event.value).toBeNull();
    expect(logger.debug).toHaveBeenCalledTimes(1);
  });

  it('rejects a record without an entity', () => {
    const error = captureError(() =>
      normalizeEvents(
        [
          { player: 'alice', at: '2024-01-01', result: 'win' },
          { player: '   ', at: '2024-01-01', result: 'win' },
        ],
        resultDescriptor
      )
    );

    expect(error.code).toBe(ErrorCodes.MISSING_FIELD);
    expect(error.recordIndex).toBe(1);
    expect(error.field).toBe('entityId');
    expect(error.message).toBe("Missing entityId at 'player' (record 1, field 'entityId')");
  });

  it('rejects a record without an ordering key', () => {
    const error = captureError(() =>
      normalizeEvents([{ player: 'alice', result: 'win' }], resultDescriptor)
    );

    expect(error.code).toBe(ErrorCodes.MISSING_FIELD);
    expect(error.field).toBe('occurredAt');
  });

  it('rejects an unparseable ordering key', () => {
    const error = captureError(() =>
      normalizeEvents([{ player: 'alice', at: 'not a date', result: 'win' }], resultDescriptor)
    );

    expect(error.code).toBe(ErrorCodes.INVALID_TIMESTAMP);
    expect(error.recordIndex).toBe(0);
    expect(error.field).toBe('occurredAt');
  });

  it('rejects a category outside the domain', () => {
    const error = captureError(() =>
      normalizeEvents([{ player: 'alice', at: '2024-01-01', result: 'resign' }], resultDescriptor)
    );

    expect(error.code).toBe(ErrorCodes.CATEGORY_OUT_OF_DOMAIN);
    expect(error.message).toBe(
      "Category 'resign' is not one of win, loss, draw (record 0, field 'category')"
    );
  });

  it('rejects a calendar day that does not exist', () => {
    const error = captureError(() =>
      normalizeEvents(
        [
          { player: 'alice', at: '2024-03-01', result: 'win' },
          { player: 'alice', at: '2024-02-30', result: 'loss' },
        ],
        resultDescriptor
      )
    );

    expect(error.code).toBe(ErrorCodes.INVALID_TIMESTAMP);
    expect(error.recordIndex).toBe(1);
    expect(error.field).toBe('occurredAt');
  });

  it('produces no partial output when a later record fails', () => {
    const records = [
      { player: 'alice', at: '2024-01-01', result: 'win' },
      { player: 'bob', at: '2024-01-01', result: 'forfeit' },
    ];
    expect(() => normalizeEvents(records, resultDescriptor)).toThrow(ValidationError);
  });

  it('maps raw category values and falls back when absent', () => {
    const events = normalizeEvents(
      [
        { player: 'alice', at: 1, result: '1-0' },
        { player: 'alice', at: 2, result: '0-1' },
        { player: 'alice', at: 3 },
      ],
      {
        domain: ['win', 'loss', 'draw'],
        entityId: { from: 'player' },
        occurredAt: { from: 'at', coerce: 'number' },
        category: {
          kind: 'field',
          from: 'result',
          map: { '1-0': 'win', '0-1': 'loss' },
          fallback: 'draw',
        },
      }
    );

    expect(events.map((event) => event.category)).toEqual(['win', 'loss', 'draw']);
  });

  it('derives the category from a rule table', () => {
    const events = normalizeEvents(
      [
        { city: 'oslo', date: '2024-01-01', sun: 0.5 },
        { city: 'oslo', date: '2024-01-02', sun: 6 },
      ],
      {
        domain: ['gloomy', 'clear'],
        entityId: { from: 'city' },
        occurredAt: { from: 'date', coerce: 'iso-date' },
        category: {
          kind: 'rules',
          table: { rules: [{ label: 'gloomy', when: { sun: { lt: 1 } } }], otherwise: 'clear' },
        },
      }
    );

    expect(events.map((event) => event.category)).toEqual(['gloomy', 'clear']);
  });

  it('applies the identifier case policy to entities and participants', () => {
    const [event] = normalizeEvents(
      [{ white: { username: ' Alice ' }, black: { username: 'BOB' }, at: 1700000000, result: 'win' }],
      {
        domain: ['win', 'loss', 'draw'],
        entityId: { from: 'white.username' },
        occurredAt: { from: 'at', coerce: 'epoch-seconds' },
        category: { kind: 'field', from: 'result' },
        participants: [{ from: 'white.username' }, { from: 'black.username' }],
        identifierCase: 'lower',
      }
    );

    expect(event.entityId).toBe('alice');
    expect(event.participants).toEqual(['alice', 'bob']);
    expect(event.occurredAt).toEqual(new Date(1700000000000));
  });

  it('reports a missing participant', () => {
    const error = captureError(() =>
      normalizeEvents([{ a: 'x', at: 1, result: 'win' }], {
        domain: ['win'],
        entityId: { from: 'a' },
        occurredAt: { from: 'at', coerce: 'number' },
        category: { kind: 'field', from: 'result' },
        participants: [{ from: 'a' }, { from: 'b' }],
      })
    );

    expect(error.code).toBe(ErrorCodes.MISSING_FIELD);
    expect(error.field).toBe('participants');
  });

  it('coerces attributes', () => {
    const [event] = normalizeEvents(
      [{ id: 'a', at: 1, kind: 'x', rating: '1500', rated: 'true', url: 42, extra: { nested: 1 } }],
      {
        domain: ['x'],
        entityId: { from: 'id' },
        occurredAt: { from: 'at', coerce: 'number' },
        category: { kind: 'field', from: 'kind' },
        attributes: {
          rating: { from: 'rating', coerce: 'number' },
          rated: { from: 'rated', coerce: 'boolean' },
          url: { from: 'url', coerce: 'string' },
          extra: { from: 'extra' },
          absent: { from: 'nope' },
        },
      }
    );

    expect(event.attributes).toEqual({
      rating: 1500,
      rated: true,
      url: '42',
      extra: null,
      absent: null,
    });
  });

  it('keeps the latest record per dedupe key', () => {
    const events = normalizeEvents(
      [
        { url: 'g1', player: 'alice', at: 1, result: 'win' },
        { url: 'g2', player: 'alice', at: 5, result: 'draw' },
        { url: 'g1', player: 'alice', at: 2, result: 'loss' },
        { url: 'g1', player: 'alice', at: 0, result: 'draw' },
      ],
      {
        domain: ['win', 'loss', 'draw'],
        entityId: { from: 'player' },
        occurredAt: { from: 'at', coerce: 'number' },
        category: { kind: 'field', from: 'result' },
        dedupeBy: 'url',
      }
    );

    expect(events).toEqual([
      { entityId: 'alice', occurredAt: 2, category: 'loss', value: null, sequence: 2 },
      { entityId: 'alice', occurredAt: 5, category: 'draw', value: null, sequence: 1 },
    ]);
  });

  it('rejects an invalid descriptor', () => {
    expect(() => normalizeEvents([], { ...resultDescriptor, domain: [] })).toThrow(
      ConfigurationError
    );
  });
});

describe('coerceOccurredAt', () => {
  it('truncates ISO timestamps to the date', () => {
    expect(coerceOccurredAt('2024-03-05T10:00:00Z', 'iso-date')).toBe('2024-03-05');
    expect(coerceOccurredAt(new Date(Date.UTC(2024, 2, 5, 12)), 'iso-date')).toBe('2024-03-05');
  });

  it('rejects impossible calendar days', () => {
    expect(coerceOccurredAt('2024-02-30', 'iso-date')).toBeNull();
    expect(coerceOccurredAt('2023-02-29', 'iso-date')).toBeNull();
    expect(coerceOccurredAt('2024-02-29', 'iso-date')).toBe('2024-02-29');
  });

  it('reads epoch seconds', () => {
    expect(coerceOccurredAt('1700000000', 'epoch-seconds')).toEqual(new Date(1700000000000));
    expect(coerceOccurredAt('soon', 'epoch-seconds')).toBeNull();
  });

  it('reads numbers and strings', () => {
    expect(coerceOccurredAt(' 42 ', 'number')).toBe(42);
    expect(coerceOccurredAt(7, 'string')).toBe('7');
    expect(coerceOccurredAt('', 'string')).toBeNull();
  });

  it('rejects invalid timestamps', () => {
    expect(coerceOccurredAt('yesterday-ish', 'timestamp')).toBeNull();
    expect(coerceOccurredAt(Number.NaN, 'timestamp')).toBeNull();
  });
});

describe('expandPerspectives', () => {
  it('gives each participant its own event with the flipped outcome', () => {
    const events: Event[] = [
      {
        entityId: 'alice',
        occurredAt: 1,
        category: 'win',
        value: null,
        participants: ['alice', 'bob'],
        sequence: 0,
        attributes: { url: 'u1' },
      },
      {
        entityId: 'bob',
        occurredAt: 2,
        category: 'draw',
        value: null,
        participants: ['bob', 'alice'],
        sequence: 1,
      },
    ];

    expect(expandPerspectives(events)).toEqual([
      {
        entityId: 'alice',
        occurredAt: 1,
        category: 'win',
        value: null,
        sequence: 0,
        attributes: { url: 'u1', opponent: 'bob' },
      },
      {
        entityId: 'alice',
        occurredAt: 2,
        category: 'draw',
        value: null,
        sequence: 3,
        attributes: { opponent: 'bob' },
      },
      {
        entityId: 'bob',
        occurredAt: 1,
        category: 'loss',
        value: null,
        sequence: 1,
        attributes: { url: 'u1', opponent: 'alice' },
      },
      {
        entityId: 'bob',
        occurredAt: 2,
        category: 'draw',
        value: null,
        sequence: 2,
        attributes: { opponent: 'alice' },
      },
    ]);
  });

  it('passes through events without participants', () => {
    const event: Event = { entityId: 'x', occurredAt: 1, category: 'win', value: 4, sequence: 9 };
    expect(expandPerspectives([event])).toEqual([{ ...event, sequence: 0 }]);
  });

  it('uses a custom flip table', () => {
    const [, second] = expandPerspectives(
      [
        {
          entityId: 'home',
          occurredAt: 1,
          category: 'H',
          value: null,
          participants: ['home', 'away'],
          sequence: 0,
        },
      ],
      { flip: { H: 'A', A: 'H' } }
    );

    expect(second.entityId).toBe('away');
    expect(second.category).toBe('A');
  });
});
