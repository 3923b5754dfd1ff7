/**
 * Hashing System - File hashes and task fingerprints
 */

export {
  FileHasher,
  hashContents,
  hashFile,
  parseIgnoreFile,
  isIgnored,
  type HashOptions,
  type IgnoreRule,
} from './file-hasher.js';

export {
  computeFingerprint,
  computeGlobalHash,
  hashEnv,
  canonicalJson,
  FINGERPRINT_VERSION,
  type FingerprintInput,
} from './fingerprint.js';
