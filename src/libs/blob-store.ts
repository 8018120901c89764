// src/libs/blob-store.ts
// ============================================================================
// BlobStore over S3 (LocalStack in dev: path-style addressing)
// ----------------------------------------------------------------------------
// put / get / delete / exists / presignedUrl / list for one bucket.
// Build the client with s3ClientFromEnv() (aws.ts).
// Tenant data goes under tenants/<tenant>/... (tenantObjectKey).
// ============================================================================

import { createHash } from "node:crypto";
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  NotFound,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { awsHttpStatus } from "./aws.js";

export type BlobBody = Uint8Array | string;

export type PutOptions = {
  contentType?: string;
  metadata?: Record<string, string>;
};

export type PutResult = {
  key: string;
  size: number;
  /** sha256, hex */
  checksum: string;
  etag: string | null;
};

export type BlobListing = {
  key: string;
  size: number;
  lastModified: Date | null;
};

export type PresignOptions = {
  expiresIn?: number;
  method?: "GET" | "PUT";
};

export interface BlobStore {
  put(key: string, body: BlobBody, opts?: PutOptions): Promise<PutResult>;
  get(key: string): Promise<Uint8Array>;
  delete(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  presignedUrl(key: string, opts?: PresignOptions): Promise<string>;
  list(prefix: string, opts?: { maxKeys?: number }): Promise<BlobListing[]>;
}

export class BlobNotFoundError extends Error {
  constructor(readonly key: string) {
    super(`Blob not found: ${key}`);
    this.name = "BlobNotFoundError";
  }
}

export class InvalidObjectKeyError extends Error {
  constructor(readonly part: string) {
    super(`Invalid object key segment: "${part}"`);
    this.name = "InvalidObjectKeyError";
  }
}

/**
 * tenants/<tenant>/<parts...>. Parts may contain "/", but no segment may be
 * empty, "." or "..".
 */
export function tenantObjectKey(tenantId: string, ...parts: string[]): string {
  const segments = [tenantId, ...parts].flatMap((part) => part.split("/"));
  for (const segment of segments) {
    if (segment === "" || segment === "." || segment === "..") {
      throw new InvalidObjectKeyError(segment);
    }
  }
  return ["tenants", ...segments].join("/");
}

function isMissing(err: unknown): boolean {
  return err instanceof NoSuchKey || err instanceof NotFound || awsHttpStatus(err) === 404;
}

const DEFAULT_PRESIGN_TTL_SEC = 3600;

export class S3BlobStore implements BlobStore {
  constructor(
    private readonly client: S3Client,
    readonly bucket: string,
  ) {}

  async put(key: string, body: BlobBody, opts: PutOptions = {}): Promise<PutResult> {
    const bytes = typeof body === "string" ? Buffer.from(body, "utf8") : body;
    const checksum = createHash("sha256").update(bytes).digest("hex");

    const out = await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: bytes,
        ContentType: opts.contentType ?? "application/octet-stream",
        Metadata: { ...opts.metadata, sha256: checksum },
      }),
    );

    return { key, size: bytes.byteLength, checksum, etag: out.ETag ?? null };
  }

  async get(key: string): Promise<Uint8Array> {
    try {
      const out = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!out.Body) throw new BlobNotFoundError(key);
      return await out.Body.transformToByteArray();
    } catch (err) {
      if (isMissing(err)) throw new BlobNotFoundError(key);
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    // S3 DeleteObject succeeds for missing keys as well.
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async presignedUrl(key: string, opts: PresignOptions = {}): Promise<string> {
    const expiresIn = opts.expiresIn ?? DEFAULT_PRESIGN_TTL_SEC;
    if (opts.method === "PUT") {
      return getSignedUrl(this.client, new PutObjectCommand({ Bucket: this.bucket, Key: key }), {
        expiresIn,
      });
    }
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: this.bucket, Key: key }), {
      expiresIn,
    });
  }

  async list(prefix: string, opts: { maxKeys?: number } = {}): Promise<BlobListing[]> {
    const maxKeys = opts.maxKeys ?? 1000;
    const items: BlobListing[] = [];
    let continuationToken: string | undefined;

    do {
      const out = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          MaxKeys: Math.min(1000, maxKeys - items.length),
          ContinuationToken: continuationToken,
        }),
      );
      for (const obj of out.Contents ?? []) {
        if (!obj.Key) continue;
        items.push({ key: obj.Key, size: obj.Size ?? 0, lastModified: obj.LastModified ?? null });
      }
      continuationToken = out.IsTruncated ? out.NextContinuationToken : undefined;
    } while (continuationToken && items.length < maxKeys);

    return items;
  }
}
