import type { EdgePool, TracedEdge } from '../types';
import { Errors } from '../errors';

/**
 * Expand a pooled traversal into direct edges, one per traversal step.
 * Throws TraceContractError when the pool arrays disagree.
 */
export function edgesFromPool(pool: EdgePool): TracedEdge[] {
  if (pool.source.length !== pool.destination.length) {
    throw Errors.POOL_MISMATCH('source and destination pools differ in length', {
      source: pool.source.length,
      destination: pool.destination.length,
    });
  }
  if (pool.index.length !== pool.distance.length) {
    throw Errors.POOL_MISMATCH('index and distance differ in length', {
      index: pool.index.length,
      distance: pool.distance.length,
    });
  }

  return pool.index.map((i, step) => {
    const source = pool.source[i];
    const destination = pool.destination[i];
    if (!Number.isInteger(i) || source === undefined || destination === undefined) {
      throw Errors.POOL_MISMATCH(`index ${i} at step ${step} is outside the pool`, { step, index: i });
    }
    return { source, destination, distance: pool.distance[step] };
  });
}
