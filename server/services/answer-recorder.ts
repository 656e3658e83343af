/**
 * @module server/services/answer-recorder
 * @description Writes student selections into the attempt answer document.
 * Every write is a read-modify-write guarded by the attempt revision and
 * retried when another request wrote in between.
 */

import type { AttemptAnswerEntry, AttemptVersionDocument, TestAttempt } from "@shared/schema";
import { readAttemptVersionForUpdate, toStoredAttemptVersion } from "../attempt-version";
import { ConflictError, NotFoundError, ValidationError } from "../errors";
import type { IStorage } from "../storage";

export type SaveAnswersStatus = "recorded" | "ignored";

export interface SaveAnswersInput {
  questionId: string;
  answerIds: string[];
  answerPoints: number[];
  earnedPoints: number;
}

export interface UpsertAnswersInput {
  questionText: string;
  maxPoints: number;
  answerIds: string[];
  answerTexts: string[];
  answerPoints: number[];
  earnedPoints: number;
}

export interface AnswerRecorderOptions {
  retries: number;
  now?: () => Date;
}

interface Selection {
  answerIds: string[];
  answerTexts: string[];
  answerPoints: number[];
  earnedPoints: number;
}

/**
 * Trims ids, drops blanks and repeats (first occurrence wins with its point and text).
 * Length checks run on the submitted arrays: mismatched points are zeroed along with
 * earnedPoints, mismatched texts are dropped.
 */
export function normalizeSelection(
  rawIds: string[],
  rawPoints: number[],
  earnedPoints: number,
  rawTexts: string[] = [],
): Selection {
  const pointsMatch = rawPoints.length === rawIds.length;
  const textsMatch = rawTexts.length === rawIds.length;

  const seen = new Set<string>();
  const selection: Selection = {
    answerIds: [],
    answerTexts: [],
    answerPoints: [],
    earnedPoints: pointsMatch ? earnedPoints : 0,
  };

  rawIds.forEach((rawId, i) => {
    const id = rawId.trim();
    if (id === "" || seen.has(id)) return;
    seen.add(id);
    selection.answerIds.push(id);
    selection.answerPoints.push(pointsMatch ? rawPoints[i] : 0);
    if (textsMatch) selection.answerTexts.push(rawTexts[i]);
  });

  if (!textsMatch) selection.answerTexts = [];
  return selection;
}

export function formatAttemptDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

function replaceEntry(
  doc: AttemptVersionDocument,
  questionId: string,
  update: (entry: AttemptAnswerEntry | undefined) => AttemptAnswerEntry,
): AttemptVersionDocument {
  const index = doc.answers.findIndex((entry) => entry.questionId === questionId);
  if (index === -1) {
    return { ...doc, answers: [...doc.answers, update(undefined)] };
  }
  const answers = doc.answers.slice();
  answers[index] = update(answers[index]);
  return { ...doc, answers };
}

export class AnswerRecorder {
  private readonly retries: number;
  private readonly now: () => Date;

  constructor(private readonly storage: IStorage, options: AnswerRecorderOptions) {
    this.retries = options.retries;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Records the first submission for a question. Later submissions are ignored.
   */
  async saveAnswers(attemptId: string, input: SaveAnswersInput): Promise<SaveAnswersStatus> {
    const selection = normalizeSelection(input.answerIds, input.answerPoints, input.earnedPoints);
    if (selection.answerIds.length === 0) {
      throw new ValidationError("At least one answer must be selected", { field: "answerIds" });
    }

    const written = await this.mutate(attemptId, (doc) => {
      const existing = doc.answers.find((entry) => entry.questionId === input.questionId);
      if (existing && existing.answerIds.length > 0) return null;

      return replaceEntry(doc, input.questionId, (entry) => ({
        ...entry,
        questionId: input.questionId,
        answerIds: selection.answerIds,
        answerPoints: selection.answerPoints,
        earnedPoints: selection.earnedPoints,
      }));
    });
    return written === null ? "ignored" : "recorded";
  }

  /**
   * Overwrites the question's selection. An empty selection clears it.
   */
  async upsertAnswers(attemptId: string, questionId: string, input: UpsertAnswersInput): Promise<AttemptAnswerEntry> {
    const selection = normalizeSelection(input.answerIds, input.answerPoints, input.earnedPoints, input.answerTexts);

    const doc = await this.mutate(attemptId, (current) =>
      replaceEntry(current, questionId, (entry) => ({
        ...entry,
        questionId,
        questionText: input.questionText,
        maxPoints: input.maxPoints,
        answerIds: selection.answerIds,
        answerTexts: selection.answerTexts,
        answerPoints: selection.answerPoints,
        earnedPoints: selection.earnedPoints,
      })),
    );

    const written = doc?.answers.find((entry) => entry.questionId === questionId);
    if (!written) throw new NotFoundError("Question", questionId);
    return written;
  }

  /**
   * Marks the attempt completed with the caller's total. The first completion fixes the date.
   */
  async completeAttemptById(attemptId: string, totalPoints: number): Promise<TestAttempt> {
    if (!Number.isInteger(totalPoints) || totalPoints < 0) {
      throw new ValidationError("Total points must be a non-negative integer", { field: "totalPoints" });
    }

    const attempt = await this.storage.getAttempt(attemptId);
    if (!attempt) throw new NotFoundError("Attempt", attemptId);

    const updated = await this.storage.updateAttempt(attemptId, {
      completed: true,
      point: totalPoints,
      dateOfAttempt: attempt.dateOfAttempt ?? formatAttemptDate(this.now()),
    });
    if (!updated) throw new NotFoundError("Attempt", attemptId);
    return updated;
  }

  private async mutate(
    attemptId: string,
    change: (doc: AttemptVersionDocument) => AttemptVersionDocument | null,
  ): Promise<AttemptVersionDocument | null> {
    for (let attempt = 1; attempt <= this.retries; attempt++) {
      const row = await this.storage.getAttempt(attemptId);
      if (!row) throw new NotFoundError("Attempt", attemptId);
      if (row.completed) {
        throw new ConflictError(`Attempt ${attemptId} is already completed`);
      }

      const next = change(readAttemptVersionForUpdate(row.attemptVersion, attemptId));
      if (next === null) return null;

      const stored = toStoredAttemptVersion(next);
      if (await this.storage.compareAndSetAttemptVersion(attemptId, stored, row.revision)) {
        return stored;
      }
    }

    throw new ConflictError(
      `Answers for attempt ${attemptId} were modified concurrently; gave up after ${this.retries} attempts`,
    );
  }
}
