import { describe, it, expect, beforeEach } from "vitest";
import { MemStorage } from "../mem-storage";
import { NotFoundError } from "../errors";
import { sampleContent } from "../test/fakes";
import { AttemptSnapshotBuilder } from "./attempt-snapshot";
import { AttemptService } from "./attempts";
import { TestCatalog } from "./test-catalog";

describe("AttemptService", () => {
  let storage: MemStorage;
  let catalog: TestCatalog;
  let service: AttemptService;

  beforeEach(() => {
    storage = new MemStorage();
    catalog = new TestCatalog(storage);
    service = new AttemptService(storage, catalog, new AttemptSnapshotBuilder(storage));
  });

  it("creates an open attempt without a date or score", async () => {
    const test = await catalog.createTest(sampleContent());
    const attempt = await service.createAttempt("student-1", test.id);

    expect(attempt.completed).toBe(false);
    expect(attempt.dateOfAttempt).toBeNull();
    expect(attempt.point).toBeNull();
    expect(attempt.attemptVersion).toBeNull();
  });

  it("starts an attempt with the test's questions frozen in", async () => {
    const test = await catalog.createTest(sampleContent());
    const { attempt, attemptVersion } = await service.startAttempt("student-1", test.id);

    expect(attemptVersion.attemptNo).toBe(1);
    expect(attemptVersion.testTitle).toBe("Safety basics");
    expect(attemptVersion.minPoint).toBe(4);
    expect(attemptVersion.answers.map((a) => a.questionId)).toEqual(test.questions.map((q) => q.id));
    expect(attemptVersion.answers.map((a) => a.maxPoints)).toEqual([5, 3]);
    expect(attempt.attemptVersion).toEqual(attemptVersion);
  });

  it("numbers attempts after the completed ones", async () => {
    const test = await catalog.createTest(sampleContent());
    const first = await service.startAttempt("student-1", test.id);
    await storage.updateAttempt(first.attempt.id, { completed: true, point: 5 });
    await service.startAttempt("student-1", test.id); // left open
    const legacyScored = await service.createAttempt("student-1", test.id);
    await storage.updateAttempt(legacyScored.id, { point: 2 });

    const next = await service.startAttempt("student-1", test.id);

    expect(await service.countCompletedAttempts("student-1", test.id)).toBe(2);
    expect(next.attemptVersion.attemptNo).toBe(3);
  });

  it("lists attempts by student and test", async () => {
    const test = await catalog.createTest(sampleContent());
    const other = await catalog.createTest(sampleContent({ title: "Other" }));
    const a = await service.createAttempt("student-1", test.id);
    await service.createAttempt("student-2", test.id);
    await service.createAttempt("student-1", other.id);

    expect((await service.listAttemptsByStudentAndTest("student-1", test.id)).map((x) => x.id)).toEqual([a.id]);
    expect(await service.listAttemptsByTest(test.id)).toHaveLength(2);
    expect(await service.listAttemptsByTest("missing")).toEqual([]);
  });

  it("fails for an unknown test", async () => {
    await expect(service.startAttempt("student-1", "missing")).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.createAttempt("student-1", "missing")).rejects.toThrow("Test not found");
  });
});
