import type {
  AttemptDetail,
  AttemptListItem,
  PerTestStats,
  StudentStats,
  Test,
  TestAttempt,
} from "@shared/schema";
import { isEmptyAttemptVersion, parseAttemptVersion, readAttemptVersion } from "../attempt-version";
import { NotFoundError } from "../errors";
import type { IStorage } from "../storage";
import { isCompletedAttempt } from "./attempts";

/**
 * null until the attempt is completed with a score. The threshold frozen into the
 * attempt document wins over the live test's, which may have been republished or deleted.
 */
export function passed(attempt: TestAttempt, test: Test | undefined): boolean | null {
  if (!attempt.completed || attempt.point === null) return null;
  const parsed = parseAttemptVersion(attempt.attemptVersion);
  const threshold = (parsed.ok ? parsed.document.minPoint : undefined) ?? test?.minPoint;
  if (threshold === undefined) return null;
  return attempt.point >= threshold;
}

function toListItem(attempt: TestAttempt, test: Test | undefined): AttemptListItem {
  return {
    attemptId: attempt.id,
    testId: attempt.testId,
    dateOfAttempt: attempt.dateOfAttempt,
    point: attempt.point,
    completed: attempt.completed,
    passed: passed(attempt, test),
    certificateId: attempt.certificateId,
    attemptSnapshot: attempt.attemptSnapshot,
  };
}

export class AttemptReports {
  constructor(private readonly storage: IStorage) {}

  async getAttemptDetail(attemptId: string): Promise<AttemptDetail> {
    const attempt = await this.storage.getAttempt(attemptId);
    if (!attempt) throw new NotFoundError("Attempt", attemptId);
    const test = await this.storage.getTest(attempt.testId);

    return {
      ...toListItem(attempt, test),
      studentId: attempt.studentId,
      attemptVersion: isEmptyAttemptVersion(attempt.attemptVersion)
        ? null
        : readAttemptVersion(attempt.attemptVersion, attempt.id),
    };
  }

  async getStudentAttempts(studentId: string): Promise<AttemptListItem[]> {
    const attempts = await this.storage.getAttemptsByStudent(studentId);
    const tests = await this.loadTests(attempts);
    return attempts.map((a) => toListItem(a, tests.get(a.testId)));
  }

  async getStudentStats(studentId: string): Promise<StudentStats> {
    const attempts = await this.storage.getAttemptsByStudent(studentId);
    const tests = await this.loadTests(attempts);

    const perTest = new Map<string, PerTestStats>();
    let attemptsPassed = 0;
    let bestScore: number | null = null;
    let lastAttemptAt: string | null = null;

    for (const attempt of attempts) {
      const test = tests.get(attempt.testId);
      let stats = perTest.get(attempt.testId);
      if (!stats) {
        stats = {
          testId: attempt.testId,
          title: test?.title ?? "Unknown Test",
          attempts: 0,
          bestScore: null,
          passedCount: 0,
        };
        perTest.set(attempt.testId, stats);
      }
      stats.attempts++;

      if (passed(attempt, test)) {
        attemptsPassed++;
        stats.passedCount++;
      }

      if (attempt.point !== null) {
        if (bestScore === null || attempt.point > bestScore) bestScore = attempt.point;
        if (stats.bestScore === null || attempt.point > stats.bestScore) stats.bestScore = attempt.point;
      }

      // YYYY-MM-DD compares lexicographically
      if (isCompletedAttempt(attempt) && attempt.dateOfAttempt) {
        if (lastAttemptAt === null || attempt.dateOfAttempt > lastAttemptAt) {
          lastAttemptAt = attempt.dateOfAttempt;
        }
      }
    }

    return {
      studentId,
      attemptsTotal: attempts.length,
      attemptsPassed,
      bestScore,
      lastAttemptAt,
      perTest: Array.from(perTest.values()),
    };
  }

  private async loadTests(attempts: TestAttempt[]): Promise<Map<string, Test>> {
    const tests = new Map<string, Test>();
    for (const testId of new Set(attempts.map((a) => a.testId))) {
      const test = await this.storage.getTest(testId);
      if (test) tests.set(testId, test);
    }
    return tests;
  }
}
