import type { AttemptVersionDocument, TestAttempt } from "@shared/schema";
import { NotFoundError } from "../errors";
import type { IStorage } from "../storage";
import type { AttemptSnapshotBuilder } from "./attempt-snapshot";
import type { TestCatalog } from "./test-catalog";

export interface StartedAttempt {
  attempt: TestAttempt;
  attemptVersion: AttemptVersionDocument;
}

export function isCompletedAttempt(attempt: TestAttempt): boolean {
  return attempt.completed || attempt.point !== null;
}

export class AttemptService {
  constructor(
    private readonly storage: IStorage,
    private readonly catalog: TestCatalog,
    private readonly snapshots: AttemptSnapshotBuilder,
  ) {}

  async createAttempt(studentId: string, testId: string): Promise<TestAttempt> {
    const test = await this.storage.getTest(testId);
    if (!test) throw new NotFoundError("Test", testId);

    return this.storage.createAttempt({
      studentId,
      testId,
      dateOfAttempt: null,
      point: null,
      attemptVersion: null,
      completed: false,
    });
  }

  /**
   * Creates the attempt and freezes the test's current questions into its document.
   */
  async startAttempt(studentId: string, testId: string): Promise<StartedAttempt> {
    const test = await this.catalog.getTest(testId);
    const attemptNo = (await this.countCompletedAttempts(studentId, testId)) + 1;
    const attempt = await this.createAttempt(studentId, testId);

    const attemptVersion = await this.snapshots.initAttemptVersionIfEmpty(attempt.id, {
      attemptNo,
      questions: await this.catalog.buildAttemptQuestions(testId),
      testTitle: test.title,
      minPoint: test.minPoint,
    });

    const latest = await this.storage.getAttempt(attempt.id);
    return { attempt: latest ?? attempt, attemptVersion };
  }

  async listAttemptsByTest(testId: string): Promise<TestAttempt[]> {
    return this.storage.getAttemptsByTest(testId);
  }

  async listAttemptsByStudentAndTest(studentId: string, testId: string): Promise<TestAttempt[]> {
    return this.storage.getAttemptsByStudentAndTest(studentId, testId);
  }

  async countCompletedAttempts(studentId: string, testId: string): Promise<number> {
    const attempts = await this.storage.getAttemptsByStudentAndTest(studentId, testId);
    return attempts.filter(isCompletedAttempt).length;
  }
}
