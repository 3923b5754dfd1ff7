/**
 * Google Cloud Storage cache backend for Hopper
 *
 * Shares task outputs between machines through a GCS bucket, with support for:
 * - Application Default Credentials (ADC)
 * - Service Account JSON
 * - Key File Path
 */

import { Storage, type Bucket, type StorageOptions } from '@google-cloud/storage';
import {
  CacheError,
  assertValidFingerprint,
  parseArtifact,
  type CacheArtifact,
  type CacheBackend,
} from '@hopper/core';

export interface GcsCacheConfig {
  /**
   * GCS bucket name (required)
   */
  bucketName: string;

  /**
   * Optional: Service account credentials as JSON object
   */
  credentials?: {
    client_email: string;
    private_key: string;
    project_id?: string;
  };

  /**
   * Optional: Path to service account key file
   */
  keyFilename?: string;

  /**
   * Optional: GCP project ID
   */
  projectId?: string;

  /**
   * Optional: Object name prefix, e.g. 'hopper-cache/'
   */
  prefix?: string;

  /**
   * Optional: Custom storage endpoint (for testing with emulator)
   */
  apiEndpoint?: string;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * GcsCacheBackend - One JSON object per fingerprint
 *
 * @example
 * ```typescript
 * const hopper = new Hopper({
 *   rootDir: process.cwd(),
 *   cache: {
 *     type: 'custom',
 *     backend: new GcsCacheBackend({ bucketName: 'my-build-cache', prefix: 'ci/' }),
 *   },
 * });
 * ```
 */
export class GcsCacheBackend implements CacheBackend {
  readonly name = 'gcs';
  private bucket: Bucket;
  private bucketName: string;
  private prefix: string;

  constructor(config: GcsCacheConfig) {
    const options: StorageOptions = {};

    if (config.credentials) {
      options.credentials = config.credentials;
      options.projectId = config.credentials.project_id || config.projectId;
    } else if (config.keyFilename) {
      options.keyFilename = config.keyFilename;
      options.projectId = config.projectId;
    } else if (config.projectId) {
      options.projectId = config.projectId;
    }
    // If none provided, GCS SDK will use Application Default Credentials

    if (config.apiEndpoint) {
      options.apiEndpoint = config.apiEndpoint;
    }

    try {
      this.bucket = new Storage(options).bucket(config.bucketName);
    } catch (error) {
      throw new CacheError(`Failed to initialize GCS cache: ${messageOf(error)}`, 'INIT_ERROR', error);
    }

    this.bucketName = config.bucketName;
    this.prefix = config.prefix ?? '';
  }

  /**
   * Object name for a fingerprint
   */
  objectName(fingerprint: string): string {
    return `${this.prefix}${fingerprint}.json`;
  }

  async initialize(): Promise<void> {
    let exists: boolean;
    try {
      [exists] = await this.bucket.exists();
    } catch (error) {
      throw new CacheError(
        `Failed to reach bucket ${this.bucketName}: ${messageOf(error)}`,
        'INIT_ERROR',
        error
      );
    }
    if (!exists) {
      throw new CacheError(`Bucket ${this.bucketName} does not exist`, 'INIT_ERROR');
    }
  }

  async get(fingerprint: string): Promise<CacheArtifact | undefined> {
    assertValidFingerprint(fingerprint);
    const name = this.objectName(fingerprint);
    const file = this.bucket.file(name);

    let content: Buffer;
    try {
      const [exists] = await file.exists();
      if (!exists) return undefined;
      [content] = await file.download();
    } catch (error) {
      throw new CacheError(`Failed to read ${name}: ${messageOf(error)}`, 'READ_ERROR', error);
    }

    let data: unknown;
    try {
      data = JSON.parse(content.toString('utf-8'));
    } catch (error) {
      throw new CacheError(`Corrupt cache entry ${name}: ${messageOf(error)}`, 'CORRUPT_ENTRY', error);
    }
    return parseArtifact(data, name);
  }

  async put(fingerprint: string, artifact: CacheArtifact): Promise<void> {
    assertValidFingerprint(fingerprint);
    const name = this.objectName(fingerprint);

    try {
      await this.bucket.file(name).save(JSON.stringify(artifact), {
        contentType: 'application/json',
        resumable: false,
        metadata: {
          metadata: {
            taskId: artifact.taskId,
            createdAt: artifact.createdAt.toString(),
          },
        },
      });
    } catch (error) {
      throw new CacheError(`Failed to write ${name}: ${messageOf(error)}`, 'WRITE_ERROR', error);
    }
  }

  async close(): Promise<void> {
    // The GCS client holds no open connections
  }
}
