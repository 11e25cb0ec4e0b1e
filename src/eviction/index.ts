export { EvictionStrategy } from './EvictionStrategy';
export type { EvictionContext } from './EvictionStrategy';
export { LRUEvictionStrategy } from './strategies/LRUEvictionStrategy';
