/**
 * @module server/object-storage
 * @description Object storage for attempt snapshots.
 * Objects live under `snapshots/{studentId}/{testId}/{attemptId}.json`.
 */

import { Client } from "minio";
import { text } from "node:stream/consumers";
import type { MinioConfig } from "./config";

export const SNAPSHOT_POINTER_PREFIX = "minio://";
const SNAPSHOT_KEY_PREFIX = "snapshots/";

export interface SnapshotMetadata {
  attemptDate: string | null;
  attemptNo: number | null;
}

export interface ObjectStorage {
  /** Stores the content and returns the object path used in pointers. */
  uploadSnapshot(key: string, content: string, metadata: SnapshotMetadata): Promise<string>;
  /** Returns undefined when the object does not exist. */
  downloadSnapshot(key: string): Promise<string | undefined>;
  deleteSnapshot(key: string): Promise<void>;
  /** Attempt ids that have a stored snapshot for the student and test. */
  listSnapshots(studentId: string, testId: string): Promise<string[]>;
}

export function buildSnapshotKey(studentId: string, testId: string, attemptId: string): string {
  return `${SNAPSHOT_KEY_PREFIX}${studentId}/${testId}/${attemptId}.json`;
}

export function snapshotListPrefix(studentId: string, testId: string): string {
  return `${SNAPSHOT_KEY_PREFIX}${studentId}/${testId}/`;
}

export function isSnapshotPointer(value: string): boolean {
  return value.startsWith(SNAPSHOT_POINTER_PREFIX);
}

export function toSnapshotPointer(path: string): string {
  return `${SNAPSHOT_POINTER_PREFIX}${path}`;
}

export function keyFromSnapshotPointer(pointer: string): string {
  return pointer.slice(SNAPSHOT_POINTER_PREFIX.length);
}

/**
 * Attempt id encoded in an object name below a list prefix, or undefined for
 * anything that is not a direct `.json` child.
 */
export function attemptIdFromKey(key: string, prefix: string): string | undefined {
  if (!key.startsWith(prefix) || !key.endsWith(".json")) return undefined;
  const name = key.slice(prefix.length, -".json".length);
  return name.length > 0 && !name.includes("/") ? name : undefined;
}

function isMissingObjectError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) return false;
  return error.code === "NoSuchKey" || error.code === "NotFound";
}

export class MinioObjectStorage implements ObjectStorage {
  private readonly client: Client;
  private readonly bucket: string;
  private bucketReady: Promise<void> | null = null;

  constructor(config: MinioConfig) {
    this.client = new Client({
      endPoint: config.endPoint,
      port: config.port,
      useSSL: config.useSSL,
      accessKey: config.accessKey,
      secretKey: config.secretKey,
    });
    this.bucket = config.bucket;
  }

  private ensureBucket(): Promise<void> {
    if (!this.bucketReady) {
      this.bucketReady = this.createBucketIfMissing().catch((error: unknown) => {
        this.bucketReady = null;
        throw error;
      });
    }
    return this.bucketReady;
  }

  private async createBucketIfMissing(): Promise<void> {
    if (await this.client.bucketExists(this.bucket)) return;
    await this.client.makeBucket(this.bucket);
    console.log(`Bucket '${this.bucket}' created`);
  }

  async uploadSnapshot(key: string, content: string, metadata: SnapshotMetadata): Promise<string> {
    await this.ensureBucket();
    const body = Buffer.from(content, "utf8");
    await this.client.putObject(this.bucket, key, body, body.length, {
      "Content-Type": "application/json",
      "X-Amz-Meta-Attempt-Date": metadata.attemptDate ?? "",
      "X-Amz-Meta-Attempt-No": metadata.attemptNo === null ? "" : String(metadata.attemptNo),
    });
    return key;
  }

  async downloadSnapshot(key: string): Promise<string | undefined> {
    await this.ensureBucket();
    try {
      const stream = await this.client.getObject(this.bucket, key);
      return await text(stream);
    } catch (error) {
      if (isMissingObjectError(error)) return undefined;
      throw error;
    }
  }

  async deleteSnapshot(key: string): Promise<void> {
    await this.ensureBucket();
    await this.client.removeObject(this.bucket, key);
  }

  async listSnapshots(studentId: string, testId: string): Promise<string[]> {
    await this.ensureBucket();
    const prefix = snapshotListPrefix(studentId, testId);

    return new Promise((resolve, reject) => {
      const ids: string[] = [];
      const stream = this.client.listObjectsV2(this.bucket, prefix, true);
      stream.on("data", (item) => {
        const id = item.name ? attemptIdFromKey(item.name, prefix) : undefined;
        if (id) ids.push(id);
      });
      stream.on("error", reject);
      stream.on("end", () => resolve(ids));
    });
  }
}
