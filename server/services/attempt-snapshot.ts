import type { AttemptAnswerEntry, AttemptQuestionInit, AttemptVersionDocument } from "@shared/schema";
import { isEmptyAttemptVersion, readAttemptVersion, toStoredAttemptVersion } from "../attempt-version";
import { NotFoundError } from "../errors";
import type { IStorage } from "../storage";

export interface AttemptVersionInit {
  attemptNo: number;
  questions: AttemptQuestionInit[];
  testTitle?: string;
  minPoint?: number;
}

function emptyEntry(question: AttemptQuestionInit): AttemptAnswerEntry {
  const entry: AttemptAnswerEntry = {
    questionId: question.questionId,
    answerIds: [],
    answerTexts: [],
    answerPoints: [],
    earnedPoints: 0,
  };
  if (question.order !== undefined) entry.order = question.order;
  if (question.questionText !== undefined) entry.questionText = question.questionText;
  if (question.maxPoints !== undefined) entry.maxPoints = question.maxPoints;
  return entry;
}

/**
 * Builds the frozen per-attempt answer document. Once written, the header and
 * entry order never change; only answer fields are filled in later.
 */
export class AttemptSnapshotBuilder {
  constructor(private readonly storage: IStorage) {}

  async initAttemptVersionIfEmpty(attemptId: string, init: AttemptVersionInit): Promise<AttemptVersionDocument> {
    const stored = await this.storage.getAttemptVersion(attemptId);
    if (!stored) throw new NotFoundError("Attempt", attemptId);

    if (!isEmptyAttemptVersion(stored.document)) {
      return readAttemptVersion(stored.document, attemptId);
    }

    const document = toStoredAttemptVersion({
      attemptNo: init.attemptNo,
      testTitle: init.testTitle,
      minPoint: init.minPoint,
      answers: init.questions.map(emptyEntry),
    });

    const written = await this.storage.compareAndSetAttemptVersion(attemptId, document, stored.revision);
    if (written) return document;

    // another caller initialized it first
    const current = await this.storage.getAttemptVersion(attemptId);
    if (!current) throw new NotFoundError("Attempt", attemptId);
    return readAttemptVersion(current.document, attemptId);
  }

  async getAttemptVersion(attemptId: string): Promise<AttemptVersionDocument | null> {
    const stored = await this.storage.getAttemptVersion(attemptId);
    if (!stored) throw new NotFoundError("Attempt", attemptId);
    if (isEmptyAttemptVersion(stored.document)) return null;
    return readAttemptVersion(stored.document, attemptId);
  }
}
