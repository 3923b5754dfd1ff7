import { randomUUID } from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import type { Logger } from '../types.js';
import type { CacheArtifact, CacheBackend } from './types.js';
import { assertValidFingerprint, CacheError, parseArtifact } from './types.js';

/**
 * LocalCacheBackend - One JSON document per fingerprint on disk
 *
 * Writes go to a unique temporary file that is renamed into place, so a
 * reader sees either no entry or a complete one.
 *
 * @example
 * ```typescript
 * const backend = new LocalCacheBackend('/repo/.hopper/cache');
 * await backend.initialize();
 * await backend.put('3f2a9c0d11b2e4f5', artifact);
 * ```
 */
export class LocalCacheBackend implements CacheBackend {
  readonly name = 'local';
  private dir: string;
  private logger?: Logger;

  constructor(dir: string, logger?: Logger) {
    this.dir = dir;
    this.logger = logger;
  }

  async initialize(): Promise<void> {
    try {
      await mkdir(this.dir, { recursive: true });
    } catch (error) {
      throw new CacheError(`Failed to create cache directory ${this.dir}`, 'INIT_ERROR', error);
    }
  }

  async get(fingerprint: string): Promise<CacheArtifact | undefined> {
    assertValidFingerprint(fingerprint);
    const path = this.entryPath(fingerprint);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return undefined;
      }
      throw new CacheError(`Failed to read cache entry ${fingerprint}`, 'READ_ERROR', error);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new CacheError(`Corrupt cache entry ${fingerprint}: not JSON`, 'CORRUPT_ENTRY', error);
    }
    return parseArtifact(data, fingerprint);
  }

  async put(fingerprint: string, artifact: CacheArtifact): Promise<void> {
    assertValidFingerprint(fingerprint);
    const target = this.entryPath(fingerprint);
    const temp = `${target}.${randomUUID()}.tmp`;

    try {
      await writeFile(temp, JSON.stringify(artifact), 'utf-8');
      await rename(temp, target);
      this.logger?.debug('Cache entry written', { fingerprint });
    } catch (error) {
      await rm(temp, { force: true });
      throw new CacheError(`Failed to write cache entry ${fingerprint}`, 'WRITE_ERROR', error);
    }
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  getDirectory(): string {
    return this.dir;
  }

  private entryPath(fingerprint: string): string {
    return join(this.dir, `${fingerprint}.json`);
  }
}
