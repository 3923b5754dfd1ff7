import { z } from 'zod';

export const CachedFileSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('file'),
    path: z.string(),
    /** base64 */
    content: z.string(),
    mode: z.number().int(),
  }),
  z.object({ type: z.literal('directory'), path: z.string() }),
  z.object({ type: z.literal('symlink'), path: z.string(), target: z.string() }),
]);

export type CachedFile = z.infer<typeof CachedFileSchema>;

export const CacheArtifactSchema = z.object({
  fingerprint: z.string(),
  taskId: z.string(),
  files: z.array(CachedFileSchema),
  logs: z.string(),
  duration: z.number(),
  createdAt: z.number(),
});

/**
 * Everything needed to replay a task without running it
 */
export type CacheArtifact = z.infer<typeof CacheArtifactSchema>;

/**
 * CacheBackend - Storage capability behind the output cache
 *
 * Implementations:
 * - InMemoryCacheBackend - For testing
 * - LocalCacheBackend - JSON entries on the local filesystem
 * - GcsCacheBackend - Google Cloud Storage (@hopper/cache-gcs)
 *
 * Backends must tolerate concurrent get/put of different fingerprints and
 * concurrent put of the same fingerprint (last writer wins, never a torn
 * entry).
 */
export interface CacheBackend {
  readonly name: string;

  /**
   * Prepare storage (create directories, verify buckets)
   */
  initialize(): Promise<void>;

  /**
   * @returns the artifact, or undefined on a miss
   * @throws CacheError when the backend cannot be read
   */
  get(fingerprint: string): Promise<CacheArtifact | undefined>;

  /**
   * @throws CacheError when the artifact cannot be written
   */
  put(fingerprint: string, artifact: CacheArtifact): Promise<void>;

  close(): Promise<void>;
}

/**
 * Custom error for cache operations
 */
export class CacheError extends Error {
  public readonly code?: string;
  public override readonly cause?: unknown;

  constructor(message: string, code?: string, cause?: unknown) {
    super(message);
    this.name = 'CacheError';
    this.code = code;
    this.cause = cause;
  }
}

const FINGERPRINT_PATTERN = /^[0-9a-f]{8,64}$/;

/**
 * Fingerprints become file and object names; keep them to hex
 */
export function assertValidFingerprint(fingerprint: string): void {
  if (!FINGERPRINT_PATTERN.test(fingerprint)) {
    throw new CacheError(`Invalid fingerprint: ${fingerprint}`, 'INVALID_KEY');
  }
}

/**
 * Validate an entry read back from a backend
 */
export function parseArtifact(data: unknown, source: string): CacheArtifact {
  const result = CacheArtifactSchema.safeParse(data);
  if (!result.success) {
    throw new CacheError(
      `Corrupt cache entry ${source}: ${result.error.issues[0]?.message ?? 'invalid'}`,
      'CORRUPT_ENTRY',
      result.error
    );
  }
  return result.data;
}
