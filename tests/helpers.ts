/* tests/helpers.ts */
import type {
  BidirectionalTrace, Direction, DirectionalTrace, TracedEdge, TraceCollection, CollectionEntry
} from '@epitrace/core';

export const day = (iso: string): Date => new Date(`${iso}T00:00:00.000Z`);

export function edge(source: string, destination: string, distance: number): TracedEdge {
  return { source, destination, distance };
}

export function directional(
  root: string,
  direction: Direction,
  edges: TracedEdge[] = [],
  window: [string, string] = ['2005-08-01', '2005-10-31']
): DirectionalTrace {
  return { kind: 'directional', root, direction, windowBegin: day(window[0]), windowEnd: day(window[1]), edges };
}

export function bidirectional(
  root: string,
  ingoing: TracedEdge[] = [],
  outgoing: TracedEdge[] = [],
  windows: { in?: [string, string]; out?: [string, string] } = {}
): BidirectionalTrace {
  return {
    kind: 'bidirectional',
    root,
    ingoing: directional(root, 'in', ingoing, windows.in),
    outgoing: directional(root, 'out', outgoing, windows.out)
  };
}

export function collection(items: CollectionEntry[] | Map<string, CollectionEntry>): TraceCollection {
  return { kind: 'collection', items };
}

/** (source, destination, distance) triples of a row list, for order assertions */
export function triples(rows: readonly { source: string; destination: string; distance: number }[]): Array<[string, string, number]> {
  return rows.map((r) => [r.source, r.destination, r.distance]);
}
