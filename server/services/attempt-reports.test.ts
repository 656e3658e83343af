import { describe, it, expect, beforeEach } from "vitest";
import type { TestAttempt } from "@shared/schema";
import { MemStorage } from "../mem-storage";
import { NotFoundError } from "../errors";
import { sampleContent } from "../test/fakes";
import { AttemptReports, passed } from "./attempt-reports";
import { TestCatalog } from "./test-catalog";

function attempt(overrides: Partial<TestAttempt>): TestAttempt {
  return {
    id: "att-1",
    studentId: "student-1",
    testId: "test-1",
    dateOfAttempt: null,
    point: null,
    certificateId: null,
    attemptVersion: null,
    attemptSnapshot: null,
    completed: false,
    revision: 0,
    createdAt: new Date(2024, 0, 1),
    ...overrides,
  };
}

describe("passed", () => {
  const test = { id: "test-1", courseId: null, title: "T", minPoint: 4, description: null };

  it("is null until the attempt is completed with a score", () => {
    expect(passed(attempt({ completed: false, point: 5 }), test)).toBeNull();
    expect(passed(attempt({ completed: true, point: null }), test)).toBeNull();
    expect(passed(attempt({ completed: true, point: 5 }), undefined)).toBeNull();
  });

  it("compares the score with the passing threshold", () => {
    expect(passed(attempt({ completed: true, point: 4 }), test)).toBe(true);
    expect(passed(attempt({ completed: true, point: 3 }), test)).toBe(false);
  });

  it("judges against the threshold frozen into the attempt document", () => {
    const frozen = attempt({ completed: true, point: 5, attemptVersion: { minPoint: 4, answers: [] } });
    const republished = { ...test, minPoint: 8 };

    expect(passed(frozen, republished)).toBe(true);
    expect(passed(frozen, undefined)).toBe(true);
    expect(passed(attempt({ completed: true, point: 5, attemptVersion: { minPoint: 6, answers: [] } }), test)).toBe(false);
  });
});

describe("AttemptReports", () => {
  let storage: MemStorage;
  let reports: AttemptReports;

  beforeEach(() => {
    storage = new MemStorage();
    reports = new AttemptReports(storage);
  });

  it("returns attempt detail with the normalized answer document", async () => {
    const test = await new TestCatalog(storage).createTest(sampleContent());
    const created = await storage.createAttempt({
      studentId: "student-1",
      testId: test.id,
      completed: true,
      point: 6,
      dateOfAttempt: "2024-03-09",
      attemptVersion: { attemptNo: 1, answers: [{ questionId: "q1", answerId: "a1" }] },
    });

    const detail = await reports.getAttemptDetail(created.id);

    expect(detail).toEqual({
      attemptId: created.id,
      studentId: "student-1",
      testId: test.id,
      dateOfAttempt: "2024-03-09",
      point: 6,
      completed: true,
      passed: true,
      certificateId: null,
      attemptSnapshot: null,
      attemptVersion: {
        attemptNo: 1,
        answers: [{ questionId: "q1", answerIds: ["a1"], answerTexts: [], answerPoints: [0], earnedPoints: 0 }],
      },
    });
  });

  it("fails for an unknown attempt", async () => {
    await expect(reports.getAttemptDetail("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("aggregates a student's statistics per test", async () => {
    const catalog = new TestCatalog(storage);
    const safety = await catalog.createTest(sampleContent());
    const exits = await catalog.createTest(sampleContent({ title: "Exits", minPoint: 8 }));

    await storage.createAttempt({ studentId: "s1", testId: safety.id, completed: true, point: 3, dateOfAttempt: "2024-03-01" });
    await storage.createAttempt({ studentId: "s1", testId: safety.id, completed: true, point: 6, dateOfAttempt: "2024-03-05" });
    await storage.createAttempt({ studentId: "s1", testId: exits.id, completed: true, point: 7, dateOfAttempt: "2024-03-03" });
    await storage.createAttempt({ studentId: "s1", testId: exits.id });
    await storage.createAttempt({ studentId: "s1", testId: "deleted-test", completed: true, point: 9, dateOfAttempt: "2024-02-01" });
    await storage.createAttempt({ studentId: "s2", testId: safety.id, completed: true, point: 8, dateOfAttempt: "2024-04-01" });

    const stats = await reports.getStudentStats("s1");

    expect(stats).toEqual({
      studentId: "s1",
      attemptsTotal: 5,
      attemptsPassed: 1,
      bestScore: 9,
      lastAttemptAt: "2024-03-05",
      perTest: [
        { testId: safety.id, title: "Safety basics", attempts: 2, bestScore: 6, passedCount: 1 },
        { testId: exits.id, title: "Exits", attempts: 2, bestScore: 7, passedCount: 0 },
        { testId: "deleted-test", title: "Unknown Test", attempts: 1, bestScore: 9, passedCount: 0 },
      ],
    });
  });

  it("lists a student's attempts with pass flags", async () => {
    const test = await new TestCatalog(storage).createTest(sampleContent());
    const open = await storage.createAttempt({ studentId: "s1", testId: test.id });
    const done = await storage.createAttempt({ studentId: "s1", testId: test.id, completed: true, point: 2 });

    const items = await reports.getStudentAttempts("s1");

    expect(items.map((i) => [i.attemptId, i.passed])).toEqual([
      [open.id, null],
      [done.id, false],
    ]);
  });

  it("reports empty statistics for a student without attempts", async () => {
    expect(await reports.getStudentStats("nobody")).toEqual({
      studentId: "nobody",
      attemptsTotal: 0,
      attemptsPassed: 0,
      bestScore: null,
      lastAttemptAt: null,
      perTest: [],
    });
  });
});
