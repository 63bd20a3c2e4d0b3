// packages/network/src/index.ts
// Contact-network flattening: traced contacts -> (root, window, direction, source, destination, distance) rows.
import { Errors } from '@epitrace/core';
import type { ContactInput, NetworkTable } from '@epitrace/core';
import { flattenBidirectional, flattenDirectional } from './flatten';
import { flattenCollection } from './collection';

export { dedupeAdjacentEdges, sameEdge } from './dedup';
export { reconcileWindow } from './window';
export { flattenDirectional, flattenBidirectional, networkTable } from './flatten';
export { flattenCollection } from './collection';
export { toRecords, isoDate } from './records';
export type { NetworkRecord } from './records';

function describeKind(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) return String(value.kind);
  return typeof value;
}

/** Flatten any traced-contact input into a network table. */
export function networkStructure(input: ContactInput): NetworkTable {
  switch (input.kind) {
    case 'directional': return flattenDirectional(input);
    case 'bidirectional': return flattenBidirectional(input);
    case 'collection': return flattenCollection(input);
    default:
      throw Errors.UNKNOWN_KIND(describeKind(input));
  }
}
