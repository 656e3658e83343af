import { describe, it, expect, beforeEach, vi, afterEach } from "vitest";
import { MemStorage } from "../mem-storage";
import { NotFoundError, StorageUnavailableError, ValidationError } from "../errors";
import { FailingObjectStorage, InMemoryObjectStorage } from "../test/fakes";
import { SnapshotStorageTier } from "./snapshot-storage";

const snapshotJson = '{"questions":[{"id":"q1","text":"First"}]}';

describe("SnapshotStorageTier", () => {
  let storage: MemStorage;
  let attemptId: string;

  beforeEach(async () => {
    storage = new MemStorage();
    const attempt = await storage.createAttempt({
      studentId: "student-1",
      testId: "test-1",
      dateOfAttempt: "2024-03-09",
      attemptVersion: { attemptNo: 2, answers: [] },
    });
    attemptId = attempt.id;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function storedValue() {
    return (await storage.getAttempt(attemptId))?.attemptSnapshot;
  }

  it("uploads to object storage and stores a pointer", async () => {
    const objects = new InMemoryObjectStorage();
    const tier = new SnapshotStorageTier(storage, objects, { inlineThresholdBytes: 0 });

    const stored = await tier.saveForAttempt(attemptId, snapshotJson);

    const key = `snapshots/student-1/test-1/${attemptId}.json`;
    expect(stored).toBe(`minio://${key}`);
    expect(await storedValue()).toBe(`minio://${key}`);
    expect(objects.objects.get(key)).toEqual({
      content: snapshotJson,
      metadata: { attemptDate: "2024-03-09", attemptNo: 2 },
    });
    expect(await tier.load(attemptId)).toBe(snapshotJson);
  });

  it("falls back to inline content when the upload fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const tier = new SnapshotStorageTier(storage, new FailingObjectStorage(), { inlineThresholdBytes: 0 });

    const stored = await tier.save("student-1", "test-1", attemptId, snapshotJson, null, "2024-03-09");

    expect(stored).toBe(snapshotJson);
    expect(await storedValue()).toBe(snapshotJson);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toContain(attemptId);
  });

  it("stores inline when object storage is not configured", async () => {
    const tier = new SnapshotStorageTier(storage, null, { inlineThresholdBytes: 0 });
    expect(await tier.saveForAttempt(attemptId, snapshotJson)).toBe(snapshotJson);
    expect(await tier.load(attemptId)).toBe(snapshotJson);
  });

  it("rejects content that is not JSON, so it cannot pass for a pointer", async () => {
    const tier = new SnapshotStorageTier(storage, null, { inlineThresholdBytes: 0 });

    await expect(tier.saveForAttempt(attemptId, "minio://snapshots/forged.json")).rejects.toBeInstanceOf(ValidationError);
    await expect(tier.saveForAttempt(attemptId, "{unterminated")).rejects.toThrow(/^Snapshot must be valid JSON/);
    expect(await storedValue()).toBeNull();
  });

  it("keeps small snapshots inline under the threshold", async () => {
    const objects = new InMemoryObjectStorage();
    const tier = new SnapshotStorageTier(storage, objects, { inlineThresholdBytes: 1024 });

    expect(await tier.saveForAttempt(attemptId, snapshotJson)).toBe(snapshotJson);
    expect(objects.objects.size).toBe(0);
  });

  it("returns null when no snapshot was saved", async () => {
    const tier = new SnapshotStorageTier(storage, null, { inlineThresholdBytes: 0 });
    expect(await tier.load(attemptId)).toBeNull();
  });

  it("reports unavailable storage when a pointer cannot be resolved", async () => {
    await storage.updateAttempt(attemptId, { attemptSnapshot: "minio://snapshots/student-1/test-1/gone.json" });

    await expect(
      new SnapshotStorageTier(storage, new InMemoryObjectStorage(), { inlineThresholdBytes: 0 }).load(attemptId),
    ).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(
      new SnapshotStorageTier(storage, new FailingObjectStorage(), { inlineThresholdBytes: 0 }).load(attemptId),
    ).rejects.toThrow(/could not be read: connect ECONNREFUSED/);
    await expect(
      new SnapshotStorageTier(storage, null, { inlineThresholdBytes: 0 }).load(attemptId),
    ).rejects.toBeInstanceOf(StorageUnavailableError);
  });

  it("deletes the object and the attempt", async () => {
    const objects = new InMemoryObjectStorage();
    const tier = new SnapshotStorageTier(storage, objects, { inlineThresholdBytes: 0 });
    await tier.saveForAttempt(attemptId, snapshotJson);

    await tier.delete(attemptId);

    expect(objects.objects.size).toBe(0);
    expect(await storage.getAttempt(attemptId)).toBeUndefined();
  });

  it("still deletes the attempt when the object store fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const tier = new SnapshotStorageTier(storage, new FailingObjectStorage(), { inlineThresholdBytes: 0 });
    await storage.updateAttempt(attemptId, { attemptSnapshot: "minio://snapshots/student-1/test-1/x.json" });

    await tier.delete(attemptId);

    expect(await storage.getAttempt(attemptId)).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
    await expect(tier.delete(attemptId)).rejects.toBeInstanceOf(NotFoundError);
  });

  describe("list", () => {
    it("lists attempt ids from object storage", async () => {
      const objects = new InMemoryObjectStorage();
      const tier = new SnapshotStorageTier(storage, objects, { inlineThresholdBytes: 0 });
      await tier.saveForAttempt(attemptId, snapshotJson);
      await objects.uploadSnapshot("snapshots/student-1/test-2/other.json", "{}", { attemptDate: null, attemptNo: null });

      expect(await tier.list("student-1", "test-1")).toEqual([attemptId]);
    });

    it("falls back to attempts with a stored snapshot", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const withoutSnapshot = await storage.createAttempt({ studentId: "student-1", testId: "test-1" });
      await storage.updateAttempt(attemptId, { attemptSnapshot: snapshotJson });

      const failing = new SnapshotStorageTier(storage, new FailingObjectStorage(), { inlineThresholdBytes: 0 });
      const unconfigured = new SnapshotStorageTier(storage, null, { inlineThresholdBytes: 0 });

      expect(await failing.list("student-1", "test-1")).toEqual([attemptId]);
      expect(await unconfigured.list("student-1", "test-1")).toEqual([attemptId]);
      expect(await unconfigured.list("student-1", "test-1")).not.toContain(withoutSnapshot.id);
    });
  });

  it("fails for an unknown attempt", async () => {
    const tier = new SnapshotStorageTier(storage, null, { inlineThresholdBytes: 0 });
    await expect(tier.saveForAttempt("missing", snapshotJson)).rejects.toBeInstanceOf(NotFoundError);
    await expect(tier.load("missing")).rejects.toBeInstanceOf(NotFoundError);
  });
});
