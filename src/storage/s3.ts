/**
 * S3-compatible storage backend using the AWS SDK v3 client.
 */
import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { StorageConfigError } from "../core/exceptions.js";
import type { StorageBackend } from "./backend.js";

export interface S3StorageConfig {
  endpoint?: string;
  bucket: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
  region?: string;
  prefix?: string;
  forcePathStyle?: boolean;
}

export class S3Storage implements StorageBackend {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(config: S3StorageConfig) {
    if (!config.accessKeyId || !config.secretAccessKey) {
      throw new StorageConfigError("No AWS credentials found for S3 storage");
    }
    this.client = new S3Client({
      endpoint: config.endpoint,
      region: config.region ?? "us-west-2",
      forcePathStyle: config.forcePathStyle,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
        sessionToken: config.sessionToken,
      },
    });
    this.bucket = config.bucket;
    this.prefix = config.prefix ? config.prefix.replace(/\/$/, "") + "/" : "";
  }

  private fullKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key), Body: data }),
    );
  }

  async read(key: string): Promise<Uint8Array> {
    const out = await this.client.send(
      new GetObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }),
    );
    if (!out.Body) throw new Error(`Empty object body for ${key}`);
    return out.Body.transformToByteArray();
  }

  async list(prefix: string): Promise<string[]> {
    const base = prefix.replace(/\/+$/, "");
    const keys: string[] = [];
    let token: string | undefined;
    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: this.fullKey(base),
          ContinuationToken: token,
        }),
      );
      for (const obj of page.Contents ?? []) {
        const key = obj.Key?.slice(this.prefix.length);
        // "raw" must not pick up "raw-old/..."
        if (key !== undefined && (base === "" || key === base || key.startsWith(`${base}/`))) {
          keys.push(key);
        }
      }
      token = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (token);
    return keys.sort();
  }
}
