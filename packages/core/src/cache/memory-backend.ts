import type { CacheArtifact, CacheBackend } from './types.js';
import { assertValidFingerprint, parseArtifact } from './types.js';

/**
 * InMemoryCacheBackend - Process-local cache for tests and throwaway runs
 *
 * Entries are stored serialized so callers never share mutable state.
 */
export class InMemoryCacheBackend implements CacheBackend {
  readonly name = 'memory';
  private entries: Map<string, string> = new Map();

  async initialize(): Promise<void> {
    // No-op for in-memory cache
  }

  async get(fingerprint: string): Promise<CacheArtifact | undefined> {
    const raw = this.entries.get(fingerprint);
    if (raw === undefined) return undefined;
    return parseArtifact(JSON.parse(raw), fingerprint);
  }

  async put(fingerprint: string, artifact: CacheArtifact): Promise<void> {
    assertValidFingerprint(fingerprint);
    this.entries.set(fingerprint, JSON.stringify(artifact));
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  has(fingerprint: string): boolean {
    return this.entries.has(fingerprint);
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
