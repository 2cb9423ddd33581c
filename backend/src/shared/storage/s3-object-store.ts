/**
 * backend/src/shared/storage/s3-object-store.ts
 *
 * WHY:
 * - Production ObjectStore backed by an S3 bucket (or any S3-compatible endpoint).
 *
 * DELIVERY MODES:
 * - presigned: HEAD the key (so a missing object is detected at render time),
 *   then hand the browser a time-limited GET URL.
 * - proxy: page renders only HEAD the key; the bytes are pulled (GET) when
 *   /assets/background is requested.
 *
 * RULES:
 * - Credentials come from the AWS SDK default provider chain, never from config.
 * - Every SDK error is rethrown as AssetUnavailableError (callers degrade, never fail).
 */

import { GetObjectCommand, HeadObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';

import type { AssetDelivery } from '../../app/config';
import {
  AssetUnavailableError,
  type ObjectLocation,
  type ObjectStore,
  type ObjectStoreFetchOptions,
  type StoredObject,
} from './object-store';

export type S3ObjectStoreOptions = {
  bucket: string;
  region: string;
  endpoint: string | null;
  delivery: AssetDelivery;
  urlTtlSeconds: number;
};

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;

  constructor(private readonly opts: S3ObjectStoreOptions) {
    this.client = new S3Client({
      region: opts.region,
      ...(opts.endpoint ? { endpoint: opts.endpoint, forcePathStyle: true } : {}),
    });
  }

  async locate(key: string, fetchOpts: ObjectStoreFetchOptions = {}): Promise<ObjectLocation> {
    return this.guard<ObjectLocation>(key, async () => {
      await this.head(key, fetchOpts);
      if (this.opts.delivery === 'proxy') return { kind: 'proxy' };

      return { kind: 'url', url: await this.sign(key) };
    });
  }

  async fetch(key: string, fetchOpts: ObjectStoreFetchOptions = {}): Promise<StoredObject> {
    return this.guard<StoredObject>(key, async () => {
      if (this.opts.delivery === 'proxy') return this.download(key, fetchOpts);

      await this.head(key, fetchOpts);
      return { kind: 'url', url: await this.sign(key) };
    });
  }

  close(): void {
    this.client.destroy();
  }

  private async guard<T>(key: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      if (err instanceof AssetUnavailableError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new AssetUnavailableError(key, `S3 fetch failed: ${reason}`, { cause: err });
    }
  }

  private async head(key: string, fetchOpts: ObjectStoreFetchOptions): Promise<void> {
    await this.client.send(new HeadObjectCommand({ Bucket: this.opts.bucket, Key: key }), {
      abortSignal: fetchOpts.signal,
    });
  }

  private sign(key: string): Promise<string> {
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: this.opts.bucket, Key: key }), {
      expiresIn: this.opts.urlTtlSeconds,
    });
  }

  private async download(key: string, fetchOpts: ObjectStoreFetchOptions): Promise<StoredObject> {
    const res = await this.client.send(
      new GetObjectCommand({ Bucket: this.opts.bucket, Key: key }),
      { abortSignal: fetchOpts.signal },
    );

    if (!res.Body) {
      throw new AssetUnavailableError(key, 'S3 returned an empty body');
    }

    const body = await res.Body.transformToByteArray();
    return { kind: 'bytes', body, contentType: res.ContentType ?? null };
  }
}
