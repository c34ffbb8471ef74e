/*
Purpose: the object-store operations the release index, producer inputs and retry ledger share.
Assumptions: one bucket per run; keys are plain strings with "/" separated prefixes.
Usage: const bucket = new S3ObjectBucket(createS3Client(storage), storage.bucket).
*/

import {
  DeleteObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";

import type { StorageSettings } from "../core/config.js";

// =============================================================================
// TYPES
// =============================================================================

export type BucketObject = {
  key: string;
  lastModified: Date | null;
};

export interface ObjectBucket {
  readonly name: string;
  list(prefix: string): Promise<BucketObject[]>;
  /** Cheapest call that proves the bucket is reachable with the current credentials. */
  probe(prefix: string): Promise<void>;
  /** Resolves to null when the key does not exist. */
  get(key: string): Promise<Buffer | null>;
  put(key: string, body: string | Buffer, contentType?: string): Promise<void>;
  delete(key: string): Promise<void>;
}

// =============================================================================
// S3 IMPLEMENTATION
// =============================================================================

export function createS3Client(storage: StorageSettings): S3Client {
  const config: ConstructorParameters<typeof S3Client>[0] = {
    region: storage.region,
    endpoint: storage.endpoint,
    forcePathStyle: Boolean(storage.endpoint),
  };
  if (storage.credentials) {
    config.credentials = storage.credentials;
  }
  return new S3Client(config);
}

export class S3ObjectBucket implements ObjectBucket {
  constructor(
    private readonly client: S3Client,
    readonly name: string,
  ) {}

  async list(prefix: string): Promise<BucketObject[]> {
    const objects: BucketObject[] = [];
    let continuationToken: string | undefined;

    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.name,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        }),
      );
      for (const entry of page.Contents ?? []) {
        if (!entry.Key) continue;
        objects.push({ key: entry.Key, lastModified: entry.LastModified ?? null });
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return objects;
  }

  async probe(prefix: string): Promise<void> {
    await this.client.send(new ListObjectsV2Command({ Bucket: this.name, Prefix: prefix, MaxKeys: 1 }));
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.name, Key: key }));
      if (!response.Body) return Buffer.alloc(0);
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (err) {
      if (isMissingKeyError(err)) return null;
      throw err;
    }
  }

  async put(key: string, body: string | Buffer, contentType = "application/json"): Promise<void> {
    await this.client.send(
      new PutObjectCommand({ Bucket: this.name, Key: key, Body: body, ContentType: contentType }),
    );
  }

  async delete(key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.name, Key: key }));
  }
}

function isMissingKeyError(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) return false;
  return error.name === "NoSuchKey" || error.name === "NotFound" || error.$metadata.httpStatusCode === 404;
}
