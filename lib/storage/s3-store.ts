/**
 * S3-compatible object store (AWS S3, MinIO, LocalStack).
 */

import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";
import type { ObjectStore } from "./types.js";
import { contentTypeForKey } from "./types.js";
import { StorageError } from "../errors.js";

export interface S3StoreConfig {
  bucket: string;
  region?: string;
  /** Custom endpoint; enables path-style addressing */
  endpoint?: string;
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  readonly bucket: string;

  constructor(config: S3StoreConfig, client?: S3Client) {
    this.bucket = config.bucket;
    if (client) {
      this.client = client;
    } else {
      const clientConfig: S3ClientConfig = { region: config.region ?? "us-east-1" };
      if (config.endpoint) {
        clientConfig.endpoint = config.endpoint;
        clientConfig.forcePathStyle = true;
      }
      this.client = new S3Client(clientConfig);
    }
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      const res = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key })
      );
      if (!res.Body) return Buffer.alloc(0);
      return Buffer.from(await res.Body.transformToByteArray());
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new StorageError(`Failed to read s3://${this.bucket}/${key}`, key, { cause: err });
    }
  }

  async put(key: string, body: Buffer | string, contentType?: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType ?? contentTypeForKey(key),
        })
      );
    } catch (err) {
      throw new StorageError(`Failed to write s3://${this.bucket}/${key}`, key, { cause: err });
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new StorageError(`Failed to stat s3://${this.bucket}/${key}`, key, { cause: err });
    }
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let token: string | undefined;
    try {
      do {
        const res = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: prefix,
            ContinuationToken: token,
          })
        );
        for (const obj of res.Contents ?? []) {
          if (obj.Key) keys.push(obj.Key);
        }
        token = res.IsTruncated ? res.NextContinuationToken : undefined;
      } while (token);
    } catch (err) {
      throw new StorageError(`Failed to list s3://${this.bucket}/${prefix}`, prefix, { cause: err });
    }
    return keys.sort();
  }
}

function isNotFound(err: unknown): boolean {
  if (err instanceof S3ServiceException) {
    return err.name === "NoSuchKey" || err.name === "NotFound" || err.$metadata.httpStatusCode === 404;
  }
  return false;
}
