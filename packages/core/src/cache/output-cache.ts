import type { Logger } from '../types.js';
import type { CacheArtifact, CacheBackend } from './types.js';

export interface OutputCacheOptions {
  /** Look up existing entries (default true) */
  read?: boolean;
  /** Store new entries (default true) */
  write?: boolean;
  logger?: Logger;
}

export interface CacheStats {
  hits: number;
  misses: number;
  writes: number;
  errors: number;
}

/**
 * OutputCache - Fault-tolerant front of a CacheBackend
 *
 * Backend failures never fail a run: reads degrade to a miss and writes
 * are dropped, both with a warning. `withLock` serializes work on the same
 * fingerprint so a task instance is never executed twice concurrently.
 */
export class OutputCache {
  private backend: CacheBackend;
  private logger?: Logger;
  private read: boolean;
  private write: boolean;
  private available = true;
  private locks: Map<string, Promise<void>> = new Map();
  private stats: CacheStats = { hits: 0, misses: 0, writes: 0, errors: 0 };

  constructor(backend: CacheBackend, options: OutputCacheOptions = {}) {
    this.backend = backend;
    this.logger = options.logger;
    this.read = options.read ?? true;
    this.write = options.write ?? true;
  }

  get backendName(): string {
    return this.backend.name;
  }

  /**
   * Initialize the backend; on failure the cache is disabled for the run
   */
  async initialize(): Promise<void> {
    try {
      await this.backend.initialize();
    } catch (error) {
      this.available = false;
      this.stats.errors++;
      this.logger?.warn(`Cache backend '${this.backend.name}' unavailable, running without cache`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
    }
  }

  async fetch(fingerprint: string): Promise<CacheArtifact | undefined> {
    if (!this.read || !this.available) {
      this.stats.misses++;
      return undefined;
    }

    try {
      const artifact = await this.backend.get(fingerprint);
      if (artifact) {
        this.stats.hits++;
      } else {
        this.stats.misses++;
      }
      return artifact;
    } catch (error) {
      this.stats.errors++;
      this.stats.misses++;
      this.logger?.warn(`Cache read failed for ${fingerprint}, treating as miss`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      return undefined;
    }
  }

  /**
   * @returns true when the artifact was stored
   */
  async store(fingerprint: string, artifact: CacheArtifact): Promise<boolean> {
    if (!this.write || !this.available) return false;

    try {
      await this.backend.put(fingerprint, artifact);
      this.stats.writes++;
      return true;
    } catch (error) {
      this.stats.errors++;
      this.logger?.warn(`Cache write failed for ${fingerprint}`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      return false;
    }
  }

  /**
   * Run `fn` once every earlier holder of the same fingerprint finished
   */
  async withLock<T>(fingerprint: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(fingerprint) ?? Promise.resolve();
    const result = previous.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(fingerprint, tail);

    try {
      return await result;
    } finally {
      if (this.locks.get(fingerprint) === tail) {
        this.locks.delete(fingerprint);
      }
    }
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  async close(): Promise<void> {
    await this.backend.close();
  }
}
