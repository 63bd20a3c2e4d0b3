// packages/network/src/records.ts
import type { Direction, HoldingId, NetworkTable } from '@epitrace/core';

/** JSON-safe view of a network row: dates as YYYY-MM-DD, absent windows as null. */
export interface NetworkRecord {
  root: HoldingId;
  inBegin: string | null;
  inEnd: string | null;
  outBegin: string | null;
  outEnd: string | null;
  direction: Direction;
  source: HoldingId;
  destination: HoldingId;
  distance: number;
}

export function isoDate(d: Date | null): string | null {
  return d ? d.toISOString().slice(0, 10) : null;
}

export function toRecords(table: NetworkTable): NetworkRecord[] {
  return table.rows.map((r) => ({
    root: r.root,
    inBegin: isoDate(r.inBegin),
    inEnd: isoDate(r.inEnd),
    outBegin: isoDate(r.outBegin),
    outEnd: isoDate(r.outEnd),
    direction: r.direction,
    source: r.source,
    destination: r.destination,
    distance: r.distance
  }));
}
