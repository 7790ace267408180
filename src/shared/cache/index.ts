/**
 * Cache Module Exports
 */

// Render Cache
export { RenderCache } from './render-cache';
export type { RenderCacheEntry, RenderCacheStats, Sized } from './render-cache';

// Cache Utilities
export {
  serializeCueKey,
  cuesMatch,
  estimateByteSize,
  formatBytes,
} from './cache-utils';
export type { CueKey } from './cache-utils';
