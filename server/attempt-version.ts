import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import {
  attemptAnswerEntrySchema,
  legacyAttemptAnswerEntrySchema,
  type AttemptAnswerEntry,
  type AttemptVersionDocument,
} from "@shared/schema";
import { ConflictError, errorMessage } from "./errors";

/**
 * Stored answer entry, tagged by the shape it was written in.
 * `legacy` entries predate multi-answer support and carry a single answerId
 * (possibly next to an empty answerIds array); everything else is `current`.
 */
const storedAnswerEntrySchema = z.union([
  legacyAttemptAnswerEntrySchema.transform((entry) => ({ kind: "legacy" as const, entry })),
  attemptAnswerEntrySchema.transform((entry) => ({ kind: "current" as const, entry })),
]);

export type StoredAnswerEntry = z.infer<typeof storedAnswerEntrySchema>;

const storedDocumentSchema = z.object({
  attemptNo: z.number().int().optional(),
  testTitle: z.string().optional(),
  minPoint: z.number().int().optional(),
  answers: z.array(storedAnswerEntrySchema).default([]),
});

function pointsFor(ids: string[], points: number[] | undefined): number[] {
  return points?.length === ids.length ? points : ids.map(() => 0);
}

function normalizeEntry(stored: StoredAnswerEntry): AttemptAnswerEntry {
  switch (stored.kind) {
    case "current": {
      const { answerIds, answerPoints, earnedPoints, ...rest } = stored.entry;
      const ids = answerIds ?? [];
      return {
        ...rest,
        answerIds: ids,
        answerPoints: pointsFor(ids, answerPoints),
        earnedPoints: earnedPoints ?? 0,
      };
    }
    case "legacy": {
      const { answerId, answerIds, answerPoints, earnedPoints, ...rest } = stored.entry;
      const ids = answerIds && answerIds.length > 0 ? answerIds : answerId ? [answerId] : [];
      return {
        ...rest,
        answerIds: ids,
        answerTexts: rest.answerTexts?.length === ids.length ? rest.answerTexts : [],
        answerPoints: pointsFor(ids, answerPoints),
        earnedPoints: earnedPoints ?? 0,
      };
    }
  }
}

/**
 * True when nothing has been initialized yet (null column or an empty object).
 */
export function isEmptyAttemptVersion(raw: unknown): boolean {
  if (raw === null || raw === undefined) return true;
  if (typeof raw === "string") return raw.trim().length === 0;
  return typeof raw === "object" && !Array.isArray(raw) && Object.keys(raw).length === 0;
}

export type ParsedAttemptVersion =
  | { ok: true; document: AttemptVersionDocument }
  | { ok: false; reason: string };

/**
 * Parses a stored attempt_version value into the current document shape.
 * Accepts both entry shapes.
 */
export function parseAttemptVersion(raw: unknown): ParsedAttemptVersion {
  if (isEmptyAttemptVersion(raw)) {
    return { ok: true, document: { answers: [] } };
  }

  let value = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch (error) {
      return { ok: false, reason: `not valid JSON (${errorMessage(error)})` };
    }
  }

  const parsed = storedDocumentSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: fromZodError(parsed.error).message };
  }

  const { answers, ...header } = parsed.data;
  return { ok: true, document: { ...header, answers: answers.map(normalizeEntry) } };
}

/**
 * Reads a stored attempt_version for display. An unreadable document reads as empty.
 */
export function readAttemptVersion(raw: unknown, attemptId?: string): AttemptVersionDocument {
  const parsed = parseAttemptVersion(raw);
  if (parsed.ok) return parsed.document;
  console.warn(`attempt_version of attempt ${attemptId ?? "?"} is unreadable, showing an empty document:`, parsed.reason);
  return { answers: [] };
}

/**
 * Reads a stored attempt_version that is about to be rewritten.
 * Throws instead of letting an unreadable document be replaced.
 */
export function readAttemptVersionForUpdate(raw: unknown, attemptId: string): AttemptVersionDocument {
  const parsed = parseAttemptVersion(raw);
  if (parsed.ok) return parsed.document;
  throw new ConflictError(`Answer document of attempt ${attemptId} is unreadable and was left unchanged: ${parsed.reason}`);
}

/**
 * Returns the document exactly as it will be persisted: current shape only,
 * optional fields omitted when absent.
 */
export function toStoredAttemptVersion(doc: AttemptVersionDocument): AttemptVersionDocument {
  const stored: AttemptVersionDocument = { answers: [] };
  if (doc.attemptNo !== undefined) stored.attemptNo = doc.attemptNo;
  if (doc.testTitle !== undefined) stored.testTitle = doc.testTitle;
  if (doc.minPoint !== undefined) stored.minPoint = doc.minPoint;

  stored.answers = doc.answers.map((entry) => {
    const out: AttemptAnswerEntry = {
      questionId: entry.questionId,
      answerIds: entry.answerIds,
      answerPoints: entry.answerPoints,
      earnedPoints: entry.earnedPoints,
    };
    if (entry.order !== undefined) out.order = entry.order;
    if (entry.questionText !== undefined) out.questionText = entry.questionText;
    if (entry.maxPoints !== undefined) out.maxPoints = entry.maxPoints;
    if (entry.answerTexts !== undefined) out.answerTexts = entry.answerTexts;
    return out;
  });

  return stored;
}
