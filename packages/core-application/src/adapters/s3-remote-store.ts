import { createReadStream } from "node:fs";
import {
  S3Client,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";

import type { RemoteObjectInfo } from "@mirror-sync/core-domain";
import type { RemoteHead, RemoteListPage, RemoteStore } from "../ports/remote-store";
import type { Logger } from "../ports/logger";
import type { StaticCredentials } from "../application/config";
import { RemoteUnavailableError, describeError, httpStatusOf } from "../application/errors";
import { NullLogger } from "./console-logger";

/** Max keys per ListObjectsV2 request (S3 limit). */
export const LIST_PAGE_SIZE = 1000;

/** Objects above this size go up as multipart uploads (and get composite etags). */
export const MULTIPART_PART_BYTES = 8 * 1024 * 1024;

export type S3ClientSettings = {
  region: string;
  requestTimeoutMs: number;
  maxAttempts: number;
  credentials?: StaticCredentials;
};

export function createS3Client(settings: S3ClientSettings): S3Client {
  return new S3Client({
    region: settings.region,
    credentials: settings.credentials,
    maxAttempts: settings.maxAttempts,
    requestHandler: {
      requestTimeout: settings.requestTimeoutMs,
      connectionTimeout: Math.min(settings.requestTimeoutMs, 5000),
    },
  });
}

export type S3RemoteStoreOptions = {
  logger?: Logger;
  partSizeBytes?: number;
  /** Parts of one multipart upload sent concurrently. */
  queueSize?: number;
  /** Client for ListObjectsV2 when the caller retries listings itself; defaults to `client`. */
  listClient?: S3Client;
};

export class S3RemoteStore implements RemoteStore {
  private readonly logger: Logger;

  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly options: S3RemoteStoreOptions = {}
  ) {
    this.logger = options.logger ?? new NullLogger();
  }

  async head(key: string): Promise<RemoteHead> {
    try {
      const res = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return { exists: true, sizeBytes: res.ContentLength };
    } catch (err) {
      if (httpStatusOf(err) === 404) return { exists: false };
      throw err;
    }
  }

  async listPage(prefix: string, continuationToken: string | null): Promise<RemoteListPage> {
    const res = await (this.options.listClient ?? this.client).send(
      new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: prefix || undefined,
        MaxKeys: LIST_PAGE_SIZE,
        ContinuationToken: continuationToken ?? undefined,
      })
    );

    const objects: RemoteObjectInfo[] = [];
    for (const obj of res.Contents ?? []) {
      const key = obj.Key;
      if (!key || key.endsWith("/")) continue; // skip directory placeholders
      objects.push({
        remoteKey: key,
        sizeBytes: typeof obj.Size === "number" ? obj.Size : 0,
        lastModified: obj.LastModified ?? new Date(0),
        etag: obj.ETag ?? null,
      });
    }

    const nextToken = res.NextContinuationToken ?? null;
    if (res.IsTruncated === true && !nextToken) {
      this.logger.warn(
        `[S3 LIST] IsTruncated=true but no NextContinuationToken for bucket=${this.bucket} prefix=${prefix}`
      );
    }

    return { objects, nextToken };
  }

  async upload(localPath: string, key: string, sizeBytes: number): Promise<void> {
    this.logger.debug(`PUT s3://${this.bucket}/${key} (${sizeBytes} bytes)`);
    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucket,
        Key: key,
        Body: createReadStream(localPath),
      },
      partSize: this.options.partSizeBytes ?? MULTIPART_PART_BYTES,
      queueSize: this.options.queueSize ?? 4,
      leavePartsOnError: false,
    });
    await upload.done();
  }

  async checkBucket(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (err) {
      const status = httpStatusOf(err);
      if (status === 404) {
        throw new RemoteUnavailableError(`Bucket '${this.bucket}' does not exist`, status, err);
      }
      if (status === 403) {
        throw new RemoteUnavailableError(`Access denied to bucket '${this.bucket}'`, status, err);
      }
      throw new RemoteUnavailableError(
        `Error accessing bucket '${this.bucket}': ${describeError(err)}`,
        status,
        err
      );
    }
  }
}
