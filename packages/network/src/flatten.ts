// packages/network/src/flatten.ts
import { NETWORK_SCHEMA } from '@epitrace/core';
import type { BidirectionalTrace, DirectionalTrace, NetworkRow, NetworkTable } from '@epitrace/core';
import { dedupeAdjacentEdges } from './dedup';
import { reconcileWindow } from './window';

export function networkTable(rows: readonly NetworkRow[] = []): NetworkTable {
  return Object.freeze({ schema: NETWORK_SCHEMA, rows: Object.freeze([...rows]) });
}

/**
 * One row per retained edge, in traversal order. Root, direction and window
 * are constant across the trace, so the window is reconciled once.
 */
export function flattenDirectional(trace: DirectionalTrace): NetworkTable {
  if (trace.edges.length === 0) return networkTable();

  const window = reconcileWindow(trace.direction, trace.windowBegin, trace.windowEnd);
  const rows = dedupeAdjacentEdges(trace.edges).map((edge): NetworkRow => Object.freeze({
    root: trace.root,
    ...window,
    source: edge.source,
    destination: edge.destination,
    distance: edge.distance
  }));
  return networkTable(rows);
}

/** Ingoing rows, then outgoing rows. An empty side contributes nothing. */
export function flattenBidirectional(trace: BidirectionalTrace): NetworkTable {
  const ingoing = flattenDirectional(trace.ingoing);
  const outgoing = flattenDirectional(trace.outgoing);
  return networkTable([...ingoing.rows, ...outgoing.rows]);
}
