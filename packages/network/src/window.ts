// packages/network/src/window.ts
import { Errors } from '@epitrace/core';
import type { Direction, WindowColumns } from '@epitrace/core';

/** Place a trace's single time window into the in/out column pair its direction selects. */
export function reconcileWindow(direction: Direction, windowBegin: Date, windowEnd: Date): WindowColumns {
  const begin = new Date(windowBegin.getTime());
  const end = new Date(windowEnd.getTime());
  switch (direction) {
    case 'in':
      return { direction, inBegin: begin, inEnd: end, outBegin: null, outEnd: null };
    case 'out':
      return { direction, inBegin: null, inEnd: null, outBegin: begin, outEnd: end };
    default:
      throw Errors.UNKNOWN_DIRECTION(String(direction));
  }
}
