import { describe, it, expect, beforeEach } from "vitest";
import { MemStorage } from "../mem-storage";
import { NotFoundError } from "../errors";
import { AttemptSnapshotBuilder } from "./attempt-snapshot";

const questions = [
  { questionId: "q1", order: 0, questionText: "First", maxPoints: 5 },
  { questionId: "q2", order: 1, questionText: "Second", maxPoints: 3 },
  { questionId: "q3", order: 2 },
];

describe("AttemptSnapshotBuilder", () => {
  let storage: MemStorage;
  let builder: AttemptSnapshotBuilder;
  let attemptId: string;

  beforeEach(async () => {
    storage = new MemStorage();
    builder = new AttemptSnapshotBuilder(storage);
    const attempt = await storage.createAttempt({ studentId: "student-1", testId: "test-1" });
    attemptId = attempt.id;
  });

  async function storedJson(): Promise<string> {
    const attempt = await storage.getAttempt(attemptId);
    return JSON.stringify(attempt?.attemptVersion);
  }

  it("creates one empty entry per question in the given order", async () => {
    const doc = await builder.initAttemptVersionIfEmpty(attemptId, {
      attemptNo: 1,
      questions,
      testTitle: "Safety basics",
      minPoint: 4,
    });

    expect(doc.attemptNo).toBe(1);
    expect(doc.testTitle).toBe("Safety basics");
    expect(doc.minPoint).toBe(4);
    expect(doc.answers).toHaveLength(3);
    expect(doc.answers.map((a) => a.questionId)).toEqual(["q1", "q2", "q3"]);
    for (const entry of doc.answers) {
      expect(entry.answerIds).toEqual([]);
      expect(entry.answerTexts).toEqual([]);
      expect(entry.answerPoints).toEqual([]);
      expect(entry.earnedPoints).toBe(0);
    }
    expect(doc.answers[0]).toEqual({
      order: 0,
      questionId: "q1",
      questionText: "First",
      maxPoints: 5,
      answerIds: [],
      answerTexts: [],
      answerPoints: [],
      earnedPoints: 0,
    });
    expect("questionText" in doc.answers[2]).toBe(false);
  });

  it("leaves an initialized document byte-identical on a second call", async () => {
    await builder.initAttemptVersionIfEmpty(attemptId, { attemptNo: 1, questions });
    const before = await storedJson();

    const again = await builder.initAttemptVersionIfEmpty(attemptId, {
      attemptNo: 7,
      questions: [{ questionId: "other" }],
      testTitle: "Changed",
    });

    expect(await storedJson()).toBe(before);
    expect(again.attemptNo).toBe(1);
    expect(again.answers.map((a) => a.questionId)).toEqual(["q1", "q2", "q3"]);
  });

  it("treats an empty object as uninitialized", async () => {
    await storage.updateAttempt(attemptId, { attemptVersion: {} });
    const doc = await builder.initAttemptVersionIfEmpty(attemptId, { attemptNo: 2, questions });
    expect(doc.answers).toHaveLength(3);
  });

  it("returns the winner's document when a concurrent init lands first", async () => {
    const [a, b] = await Promise.all([
      builder.initAttemptVersionIfEmpty(attemptId, { attemptNo: 1, questions }),
      builder.initAttemptVersionIfEmpty(attemptId, { attemptNo: 1, questions: [{ questionId: "late" }] }),
    ]);

    expect(a.answers.map((e) => e.questionId)).toEqual(["q1", "q2", "q3"]);
    expect(b).toEqual(a);
    expect((await storage.getAttemptVersion(attemptId))?.revision).toBe(1);
  });

  it("reports null for an uninitialized attempt", async () => {
    expect(await builder.getAttemptVersion(attemptId)).toBeNull();
  });

  it("fails for an unknown attempt", async () => {
    await expect(
      builder.initAttemptVersionIfEmpty("missing", { attemptNo: 1, questions }),
    ).rejects.toBeInstanceOf(NotFoundError);
    await expect(builder.getAttemptVersion("missing")).rejects.toThrow("Attempt not found");
  });
});
