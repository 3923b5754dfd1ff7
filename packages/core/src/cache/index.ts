/**
 * Cache System - Task output artifacts keyed by fingerprint
 *
 * Provides the CacheBackend capability with two built-in backends:
 * - InMemoryCacheBackend - For testing
 * - LocalCacheBackend - Local filesystem
 *
 * Remote backends (Google Cloud Storage) live in their own packages.
 */

export {
  CacheArtifactSchema,
  CachedFileSchema,
  CacheError,
  assertValidFingerprint,
  parseArtifact,
  type CacheArtifact,
  type CachedFile,
  type CacheBackend,
} from './types.js';

export { InMemoryCacheBackend } from './memory-backend.js';

export { LocalCacheBackend } from './local-backend.js';

export { OutputCache, type OutputCacheOptions, type CacheStats } from './output-cache.js';

export {
  collectOutputs,
  restoreOutputs,
  checkName,
  canonicalizeName,
  type NameValidation,
} from './artifact.js';
