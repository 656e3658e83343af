/**
 * @module server/services/snapshot-storage
 * @description Keeps attempt snapshots either inline in `test_attempts.attempt_snapshot`
 * or in object storage with a `minio://` pointer in that column.
 * Writes never fail because of object storage: the content falls back to inline.
 */

import { readAttemptVersion } from "../attempt-version";
import { NotFoundError, StorageUnavailableError, ValidationError, errorMessage } from "../errors";
import {
  buildSnapshotKey,
  isSnapshotPointer,
  keyFromSnapshotPointer,
  toSnapshotPointer,
  type ObjectStorage,
} from "../object-storage";
import type { IStorage } from "../storage";

export interface SnapshotStorageOptions {
  /** Snapshots at or below this UTF-8 size stay inline; 0 sends everything to object storage. */
  inlineThresholdBytes: number;
}

// inline values are told apart from minio:// pointers by being JSON
function assertJson(snapshotJson: string): void {
  try {
    JSON.parse(snapshotJson);
  } catch (error) {
    throw new ValidationError(`Snapshot must be valid JSON: ${errorMessage(error)}`, { field: "snapshot" });
  }
}

export class SnapshotStorageTier {
  constructor(
    private readonly storage: IStorage,
    private readonly objectStorage: ObjectStorage | null,
    private readonly options: SnapshotStorageOptions,
  ) {}

  /**
   * Stores the snapshot and returns the value written to the attempt row.
   */
  async save(
    studentId: string,
    testId: string,
    attemptId: string,
    snapshotJson: string,
    attemptVersionJson: string | null,
    date: string | null,
  ): Promise<string> {
    assertJson(snapshotJson);
    const attempt = await this.storage.getAttempt(attemptId);
    if (!attempt) throw new NotFoundError("Attempt", attemptId);

    const stored = await this.place(studentId, testId, attemptId, snapshotJson, attemptVersionJson, date);
    await this.storage.updateAttempt(attemptId, { attemptSnapshot: stored });
    return stored;
  }

  async saveForAttempt(attemptId: string, snapshotJson: string): Promise<string> {
    const attempt = await this.storage.getAttempt(attemptId);
    if (!attempt) throw new NotFoundError("Attempt", attemptId);

    const attemptVersionJson = attempt.attemptVersion == null ? null : JSON.stringify(attempt.attemptVersion);
    return this.save(
      attempt.studentId,
      attempt.testId,
      attempt.id,
      snapshotJson,
      attemptVersionJson,
      attempt.dateOfAttempt,
    );
  }

  async load(attemptId: string): Promise<string | null> {
    const attempt = await this.storage.getAttempt(attemptId);
    if (!attempt) throw new NotFoundError("Attempt", attemptId);

    const value = attempt.attemptSnapshot;
    if (value === null || value === "") return null;
    if (!isSnapshotPointer(value)) return value;

    if (!this.objectStorage) {
      throw new StorageUnavailableError(`Snapshot of attempt ${attemptId} is in object storage, which is not configured`);
    }

    const key = keyFromSnapshotPointer(value);
    let content: string | undefined;
    try {
      content = await this.objectStorage.downloadSnapshot(key);
    } catch (error) {
      throw new StorageUnavailableError(`Snapshot of attempt ${attemptId} could not be read: ${errorMessage(error)}`, error);
    }
    if (content === undefined) {
      throw new StorageUnavailableError(`Snapshot object ${key} of attempt ${attemptId} is missing`);
    }
    return content;
  }

  /**
   * Removes the snapshot object (best effort) and then the attempt record.
   */
  async delete(attemptId: string): Promise<void> {
    const attempt = await this.storage.getAttempt(attemptId);
    if (!attempt) throw new NotFoundError("Attempt", attemptId);

    if (this.objectStorage) {
      const key = attempt.attemptSnapshot && isSnapshotPointer(attempt.attemptSnapshot)
        ? keyFromSnapshotPointer(attempt.attemptSnapshot)
        : buildSnapshotKey(attempt.studentId, attempt.testId, attempt.id);
      try {
        await this.objectStorage.deleteSnapshot(key);
      } catch (error) {
        console.warn(`Failed to delete snapshot object ${key} of attempt ${attemptId}:`, errorMessage(error));
      }
    }

    await this.storage.deleteAttempt(attemptId);
  }

  /** Attempt ids with a stored snapshot for the student and test. */
  async list(studentId: string, testId: string): Promise<string[]> {
    if (this.objectStorage) {
      try {
        return await this.objectStorage.listSnapshots(studentId, testId);
      } catch (error) {
        console.warn(
          `Listing snapshots in object storage failed for student ${studentId}, test ${testId}; using database:`,
          errorMessage(error),
        );
      }
    }

    const attempts = await this.storage.getAttemptsByStudentAndTest(studentId, testId);
    return attempts.filter((a) => a.attemptSnapshot !== null && a.attemptSnapshot !== "").map((a) => a.id);
  }

  private async place(
    studentId: string,
    testId: string,
    attemptId: string,
    snapshotJson: string,
    attemptVersionJson: string | null,
    date: string | null,
  ): Promise<string> {
    if (!this.objectStorage) return snapshotJson;

    const threshold = this.options.inlineThresholdBytes;
    if (threshold > 0 && Buffer.byteLength(snapshotJson, "utf8") <= threshold) {
      return snapshotJson;
    }

    const key = buildSnapshotKey(studentId, testId, attemptId);
    try {
      const attemptNo = attemptVersionJson === null
        ? undefined
        : readAttemptVersion(attemptVersionJson, attemptId).attemptNo;
      const path = await this.objectStorage.uploadSnapshot(key, snapshotJson, {
        attemptDate: date,
        attemptNo: attemptNo ?? null,
      });
      return toSnapshotPointer(path);
    } catch (error) {
      console.warn(`Snapshot upload failed for attempt ${attemptId}, storing inline:`, errorMessage(error));
      return snapshotJson;
    }
  }
}
