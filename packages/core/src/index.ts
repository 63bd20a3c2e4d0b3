export * from './types';
export * from './errors';
export * from './schemas';
export { edgesFromPool } from './utils/edge-pool';
