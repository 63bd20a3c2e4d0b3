// packages/network/src/collection.ts
import { Errors } from '@epitrace/core';
import type {
  BidirectionalTrace, CollectionEntry, NetworkRow, NetworkTable, TraceCollection, TraceUnit
} from '@epitrace/core';
import { flattenBidirectional, networkTable } from './flatten';

type KeyedEntry = readonly [key: string, entry: CollectionEntry];

function isPositional(items: TraceCollection['items']): items is readonly CollectionEntry[] {
  return Array.isArray(items);
}

// positional entries are keyed by index, named entries by name
function keyedEntries(items: TraceCollection['items']): KeyedEntry[] {
  if (!isPositional(items)) return [...items.entries()];
  return items.map((entry, i) => [String(i), entry] as const);
}

function isBundle(entry: CollectionEntry): entry is readonly TraceUnit[] {
  return !('kind' in entry);
}

function checkShapes(entries: readonly KeyedEntry[]): void {
  for (const [key, entry] of entries) {
    if (isBundle(entry) && entry.length !== 1) throw Errors.SHAPE_COUNT(key, entry.length);
  }
}

function checkTypes(entries: readonly KeyedEntry[]): Array<readonly [string, BidirectionalTrace]> {
  return entries.map(([key, entry]) => {
    if (isBundle(entry)) throw Errors.ELEMENT_TYPE(key, 'bundle');
    if (entry.kind !== 'bidirectional') throw Errors.ELEMENT_TYPE(key, entry.kind);
    return [key, entry] as const;
  });
}

/**
 * Flatten every bidirectional trace of a collection and concatenate the
 * results in collection order. Every entry is validated before any row is
 * produced; a shape problem anywhere is reported ahead of a type problem.
 */
export function flattenCollection(collection: TraceCollection): NetworkTable {
  const entries = keyedEntries(collection.items);
  checkShapes(entries);
  const traces = checkTypes(entries);

  const grouped: Array<{ group: string; row: NetworkRow }> = traces.flatMap(([group, trace]) =>
    flattenBidirectional(trace).rows.map((row) => ({ group, row }))
  );

  // the group key only keeps each entry's rows contiguous; root already identifies them
  return networkTable(grouped.map(({ row }) => row));
}
