import type { AttemptQuestionInit, Test, TestContentInput, TestWithQuestions } from "@shared/schema";
import { NotFoundError } from "../errors";
import type { IStorage } from "../storage";
import { questionMaxPoints, validateTestContent } from "../validation";
import { insertQuestionSet, withAnswers } from "./content";

/** Published tests. Editing goes through drafts. */
export class TestCatalog {
  constructor(private readonly storage: IStorage) {}

  async listTests(courseId?: string): Promise<Test[]> {
    return this.storage.getTests(courseId);
  }

  async getTest(testId: string): Promise<TestWithQuestions> {
    const test = await this.storage.getTest(testId);
    if (!test) throw new NotFoundError("Test", testId);
    return { ...test, questions: await withAnswers(this.storage, await this.storage.getQuestionsByTestId(test.id)) };
  }

  async createTest(content: TestContentInput): Promise<TestWithQuestions> {
    validateTestContent(content);

    return this.storage.transaction(async (tx) => {
      const test = await tx.createTest({
        courseId: content.courseId ?? null,
        title: content.title.trim(),
        minPoint: content.minPoint,
        description: content.description ?? null,
      });
      await insertQuestionSet(tx, { ownerType: "test", testId: test.id }, content.questions);
      return { ...test, questions: await withAnswers(tx, await tx.getQuestionsByTestId(test.id)) };
    });
  }

  /**
   * Removes the test, its questions and any draft editing it.
   * Attempts keep their own copy of the content and are left alone.
   */
  async deleteTest(testId: string): Promise<void> {
    await this.storage.transaction(async (tx) => {
      const draft = await tx.getDraftByTestId(testId);
      if (draft) await tx.deleteDraft(draft.id);
      const deleted = await tx.deleteTest(testId);
      if (!deleted) throw new NotFoundError("Test", testId);
    });
  }

  /** Per-question header entries for a new attempt document, in display order. */
  async buildAttemptQuestions(testId: string): Promise<AttemptQuestionInit[]> {
    const test = await this.getTest(testId);
    return test.questions.map((q) => ({
      questionId: q.id,
      order: q.order,
      questionText: q.textOfQuestion,
      maxPoints: questionMaxPoints(q.answers),
    }));
  }
}
