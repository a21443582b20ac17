import type { Event, IdentifierCase, OccurredAt } from './types';

function orderingValue(key: OccurredAt): number | string {
  return key instanceof Date ? key.getTime() : key;
}

/**
 * Compare two ordering keys.
 * Dates and numbers compare numerically; strings compare by code unit, which
 * orders ISO dates and timestamps chronologically.
 */
export function compareOccurredAt(a: OccurredAt, b: OccurredAt): number {
  const left = orderingValue(a);
  const right = orderingValue(b);
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  const l = String(left);
  const r = String(right);
  if (l < r) return -1;
  if (l > r) return 1;
  return 0;
}

/** Compare identifiers by code unit, the default total order for matchup keys. */
export function compareIdentifiers(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function normalizeIdentifier(id: string, mode: IdentifierCase = 'exact'): string {
  switch (mode) {
    case 'lower':
      return id.toLowerCase();
    case 'upper':
      return id.toUpperCase();
    case 'exact':
      return id;
  }
}

/** Build a membership test for an allow-list under a case policy. */
export function createAllowList(
  entities: readonly string[] | undefined,
  mode: IdentifierCase = 'exact'
): ((id: string) => boolean) | null {
  if (!entities) return null;
  const members = new Set(entities.map((id) => normalizeIdentifier(id, mode)));
  return (id: string) => members.has(normalizeIdentifier(id, mode));
}

/** Order events by `occurredAt`, ties by input sequence. */
export function compareEvents(a: Event, b: Event): number {
  return compareOccurredAt(a.occurredAt, b.occurredAt) || a.sequence - b.sequence;
}

/**
 * Partition events by entity, in order of each entity's first appearance,
 * and sort every partition chronologically.
 */
export function partitionByEntity<E extends Event>(events: Iterable<E>): Map<string, E[]> {
  const partitions = new Map<string, E[]>();
  for (const event of events) {
    const bucket = partitions.get(event.entityId);
    if (bucket) {
      bucket.push(event);
    } else {
      partitions.set(event.entityId, [event]);
    }
  }
  for (const bucket of partitions.values()) {
    bucket.sort(compareEvents);
  }
  return partitions;
}
