// packages/network/src/dedup.ts
import type { TracedEdge } from '@epitrace/core';

export function sameEdge(a: TracedEdge, b: TracedEdge): boolean {
  return a.source === b.source && a.destination === b.destination && a.distance === b.distance;
}

/**
 * Drop every edge identical to its immediate predecessor in traversal order.
 * Depth-first traversal emits edges from a common parent contiguously, so a
 * repeat further down the sequence is a different discovery path and is kept.
 */
export function dedupeAdjacentEdges(edges: readonly TracedEdge[]): TracedEdge[] {
  const kept: TracedEdge[] = [];
  let prev: TracedEdge | undefined;
  for (const edge of edges) {
    if (!prev || !sameEdge(prev, edge)) kept.push(edge);
    prev = edge;
  }
  return kept;
}
