// --------------------
// Holdings & edges
// --------------------
export type HoldingId = string;

// 'in' = ingoing (backward tracing), 'out' = outgoing (forward tracing)
export type Direction = 'in' | 'out';

export interface TracedEdge {
  readonly source: HoldingId;
  readonly destination: HoldingId;
  readonly distance: number; // hop count from root along the discovery path, >= 1
}

/**
 * Traversal stored against shared endpoint pools: step k is
 * (source[index[k]], destination[index[k]], distance[k]).
 */
export interface EdgePool {
  readonly source: readonly HoldingId[];
  readonly destination: readonly HoldingId[];
  readonly index: readonly number[];   // zero-based
  readonly distance: readonly number[];
}

// --------------------
// Traces (produced by the tracer)
// --------------------
export interface DirectionalTrace {
  readonly kind: 'directional';
  readonly root: HoldingId;
  readonly direction: Direction;
  readonly windowBegin: Date;
  readonly windowEnd: Date;
  readonly edges: readonly TracedEdge[]; // depth-first visitation order
}

export interface BidirectionalTrace {
  readonly kind: 'bidirectional';
  readonly root: HoldingId;
  readonly ingoing: DirectionalTrace;
  readonly outgoing: DirectionalTrace;
}

export type TraceUnit = DirectionalTrace | BidirectionalTrace;

// An array entry bundles several traces together; only single traces are valid.
export type CollectionEntry = TraceUnit | readonly TraceUnit[];

export interface TraceCollection {
  readonly kind: 'collection';
  readonly items: readonly CollectionEntry[] | ReadonlyMap<string, CollectionEntry>;
}

export type ContactInput = DirectionalTrace | BidirectionalTrace | TraceCollection;

// --------------------
// Output table
// --------------------
export type IngoingWindow = {
  readonly inBegin: Date;
  readonly inEnd: Date;
  readonly outBegin: null;
  readonly outEnd: null;
};

export type OutgoingWindow = {
  readonly inBegin: null;
  readonly inEnd: null;
  readonly outBegin: Date;
  readonly outEnd: Date;
};

export type WindowColumns =
  | ({ readonly direction: 'in' } & IngoingWindow)
  | ({ readonly direction: 'out' } & OutgoingWindow);

export type NetworkRow = WindowColumns & {
  readonly root: HoldingId;
  readonly source: HoldingId;
  readonly destination: HoldingId;
  readonly distance: number;
};

export type ColumnType = 'holding' | 'date' | 'direction' | 'integer';

export interface ColumnSpec {
  readonly name: keyof NetworkRow;
  readonly type: ColumnType;
  readonly nullable: boolean;
}

export const NETWORK_SCHEMA = Object.freeze([
  { name: 'root',        type: 'holding',   nullable: false },
  { name: 'inBegin',     type: 'date',      nullable: true },
  { name: 'inEnd',       type: 'date',      nullable: true },
  { name: 'outBegin',    type: 'date',      nullable: true },
  { name: 'outEnd',      type: 'date',      nullable: true },
  { name: 'direction',   type: 'direction', nullable: false },
  { name: 'source',      type: 'holding',   nullable: false },
  { name: 'destination', type: 'holding',   nullable: false },
  { name: 'distance',    type: 'integer',   nullable: false },
] as const satisfies readonly ColumnSpec[]);

export type NetworkSchema = typeof NETWORK_SCHEMA;

export interface NetworkTable {
  readonly schema: NetworkSchema;
  readonly rows: readonly NetworkRow[];
}
