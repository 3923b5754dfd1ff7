/**
 * @hopper/cache-gcs
 *
 * Google Cloud Storage remote cache for Hopper
 */

export { GcsCacheBackend } from './adapter.js';
export type { GcsCacheConfig } from './adapter.js';
