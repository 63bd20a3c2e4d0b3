// packages/core/src/errors.ts

export type CollectionErrorCode = 'COLLECTION_SHAPE_COUNT' | 'COLLECTION_ELEMENT_TYPE';
export type TraceContractErrorCode = 'TRACE_CONTRACT' | 'TRACE_UNKNOWN_DIRECTION' | 'TRACE_UNKNOWN_KIND';
export type NetworkErrorCode = CollectionErrorCode | TraceContractErrorCode;

export type ErrorDetails = Record<string, unknown>;

export class NetworkStructureError extends Error {
  readonly code: NetworkErrorCode;
  readonly details?: ErrorDetails;

  constructor(code: NetworkErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'NetworkStructureError';
    this.code = code;
    this.details = details;
  }
}

/** Malformed aggregation input: a collection entry is a bundle or not a bidirectional trace. */
export class CollectionError extends NetworkStructureError {
  declare readonly code: CollectionErrorCode;

  constructor(code: CollectionErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = 'CollectionError';
  }
}

/** A value from the tracer broke its contract. This is an integration bug, not bad user input. */
export class TraceContractError extends NetworkStructureError {
  declare readonly code: TraceContractErrorCode;

  constructor(code: TraceContractErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = 'TraceContractError';
  }
}

export const Errors = {
  SHAPE_COUNT: (key: string, length: number) =>
    new CollectionError('COLLECTION_SHAPE_COUNT', `Unexpected length of collection entry ${key}: ${length}`, { key, length }),
  ELEMENT_TYPE: (key: string, found: string) =>
    new CollectionError('COLLECTION_ELEMENT_TYPE', `Unexpected object in collection at ${key}: ${found}`, { key, found }),
  POOL_MISMATCH: (msg: string, details?: ErrorDetails) =>
    new TraceContractError('TRACE_CONTRACT', `Malformed edge pool: ${msg}`, details),
  UNKNOWN_DIRECTION: (direction: string) =>
    new TraceContractError('TRACE_UNKNOWN_DIRECTION', `Unknown trace direction: ${direction}`, { direction }),
  UNKNOWN_KIND: (kind: string) =>
    new TraceContractError('TRACE_UNKNOWN_KIND', `Unknown contact input kind: ${kind}`, { kind }),
} as const;
