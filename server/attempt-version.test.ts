import { describe, it, expect, vi, afterEach } from "vitest";
import { ConflictError } from "./errors";
import {
  isEmptyAttemptVersion,
  parseAttemptVersion,
  readAttemptVersion,
  readAttemptVersionForUpdate,
  toStoredAttemptVersion,
} from "./attempt-version";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("isEmptyAttemptVersion", () => {
  it("treats null and an empty object as empty", () => {
    expect(isEmptyAttemptVersion(null)).toBe(true);
    expect(isEmptyAttemptVersion(undefined)).toBe(true);
    expect(isEmptyAttemptVersion({})).toBe(true);
    expect(isEmptyAttemptVersion("")).toBe(true);
  });

  it("treats any initialized document as non-empty", () => {
    expect(isEmptyAttemptVersion({ answers: [] })).toBe(false);
    expect(isEmptyAttemptVersion({ attemptNo: 1 })).toBe(false);
  });
});

describe("readAttemptVersion", () => {
  it("reads the current entry shape unchanged", () => {
    const stored = {
      attemptNo: 2,
      testTitle: "Safety basics",
      answers: [
        { order: 0, questionId: "q1", answerIds: ["a1", "a2"], answerPoints: [2, 1], earnedPoints: 3 },
      ],
    };
    expect(readAttemptVersion(stored)).toEqual(stored);
  });

  it("normalizes a legacy single-answer entry", () => {
    const doc = readAttemptVersion({
      attemptNo: 1,
      answers: [{ questionId: "q1", questionText: "Pick one", answerId: "a7" }],
    });
    expect(doc.answers).toEqual([
      {
        questionId: "q1",
        questionText: "Pick one",
        answerIds: ["a7"],
        answerTexts: [],
        answerPoints: [0],
        earnedPoints: 0,
      },
    ]);
  });

  it("prefers answerIds over answerId on legacy entries", () => {
    const doc = readAttemptVersion({
      answers: [{ questionId: "q1", answerId: "a1", answerIds: ["a2", "a3"], answerTexts: ["B", "C"] }],
    });
    expect(doc.answers[0]).toEqual({
      questionId: "q1",
      answerIds: ["a2", "a3"],
      answerTexts: ["B", "C"],
      answerPoints: [0, 0],
      earnedPoints: 0,
    });
  });

  it("maps an unanswered legacy entry to an empty selection", () => {
    const doc = readAttemptVersion({ answers: [{ questionId: "q1", answerId: null }] });
    expect(doc.answers[0].answerIds).toEqual([]);
    expect(doc.answers[0].answerPoints).toEqual([]);
  });

  it("fills in omitted entry fields", () => {
    const doc = readAttemptVersion({
      attemptNo: 3,
      answers: [
        { questionId: "q1", answerIds: ["a1"], answerPoints: [5] },
        { questionId: "q2" },
      ],
    });
    expect(doc).toEqual({
      attemptNo: 3,
      answers: [
        { questionId: "q1", answerIds: ["a1"], answerPoints: [5], earnedPoints: 0 },
        { questionId: "q2", answerIds: [], answerPoints: [], earnedPoints: 0 },
      ],
    });
  });

  it("falls back to answerId when a legacy entry has an empty answerIds", () => {
    const doc = readAttemptVersion({ answers: [{ questionId: "q1", answerId: "a9", answerIds: [] }] });
    expect(doc.answers[0]).toEqual({
      questionId: "q1",
      answerIds: ["a9"],
      answerTexts: [],
      answerPoints: [0],
      earnedPoints: 0,
    });
  });

  it("accepts a JSON string", () => {
    const doc = readAttemptVersion('{"attemptNo":3,"answers":[]}');
    expect(doc).toEqual({ attemptNo: 3, answers: [] });
  });

  it("treats an unreadable document as empty and warns", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(readAttemptVersion({ answers: "broken" }, "att-1")).toEqual({ answers: [] });
    expect(readAttemptVersion("{not json", "att-1")).toEqual({ answers: [] });
    expect(warn).toHaveBeenCalledTimes(2);
  });
});

describe("readAttemptVersionForUpdate", () => {
  it("refuses to hand out an unreadable document for rewriting", () => {
    expect(parseAttemptVersion({ answers: "broken" }).ok).toBe(false);
    expect(() => readAttemptVersionForUpdate({ answers: "broken" }, "att-1")).toThrow(ConflictError);
    expect(() => readAttemptVersionForUpdate("{not json", "att-1")).toThrow(/^Answer document of attempt att-1 is unreadable/);
  });

  it("reads an empty column as an empty document", () => {
    expect(readAttemptVersionForUpdate(null, "att-1")).toEqual({ answers: [] });
  });
});

describe("toStoredAttemptVersion", () => {
  it("writes only the current shape and omits absent optionals", () => {
    const legacy = readAttemptVersion({ answers: [{ questionId: "q1", answerId: "a1" }] });
    const stored = toStoredAttemptVersion(legacy);
    expect(JSON.stringify(stored)).toBe(
      '{"answers":[{"questionId":"q1","answerIds":["a1"],"answerPoints":[0],"earnedPoints":0,"answerTexts":[]}]}',
    );
  });
});
