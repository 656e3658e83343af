/**
 * @module server/services/draft-publish
 * @description Draft lifecycle for test content: no draft, draft exists, published.
 * Authors edit a draft; publishing overwrites the linked test (or creates one)
 * and discards the draft, all inside one transaction.
 */

import type { Draft, DraftWithQuestions, SaveDraftRequest, Test, TestWithQuestions } from "@shared/schema";
import { ConflictError, NotFoundError } from "../errors";
import type { IStorage } from "../storage";
import { validateTestContent } from "../validation";
import { copyQuestionSet, insertQuestionSet, toQuestionContent, withAnswers } from "./content";

export interface CreateDraftResult {
  draft: DraftWithQuestions;
  created: boolean;
}

export interface SaveDraftResult {
  draft: DraftWithQuestions;
  created: boolean;
}

export class DraftPublishCoordinator {
  constructor(private readonly storage: IStorage) {}

  async listDrafts(courseId?: string): Promise<Draft[]> {
    return this.storage.getDrafts(courseId);
  }

  async getDraft(draftId: string): Promise<DraftWithQuestions> {
    const draft = await this.storage.getDraft(draftId);
    if (!draft) throw new NotFoundError("Draft", draftId);
    return this.loadDraft(this.storage, draft);
  }

  /**
   * Opens a test for editing. Returns the existing draft when there is one.
   */
  async createDraftFromTest(testId: string): Promise<CreateDraftResult> {
    const test = await this.storage.getTest(testId);
    if (!test) throw new NotFoundError("Test", testId);

    const existing = await this.storage.getDraftByTestId(testId);
    if (existing) {
      return { draft: await this.loadDraft(this.storage, existing), created: false };
    }

    try {
      const draft = await this.storage.transaction(async (tx) => {
        const created = await tx.createDraft({
          testId: test.id,
          courseId: test.courseId,
          title: test.title,
          minPoint: test.minPoint,
          description: test.description,
        });
        const source = await withAnswers(tx, await tx.getQuestionsByTestId(test.id));
        await copyQuestionSet(tx, { ownerType: "draft", draftId: created.id, testId: test.id }, source);
        return this.loadDraft(tx, created);
      });
      return { draft, created: true };
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
      // a concurrent request created the draft first
      const winner = await this.storage.getDraftByTestId(testId);
      if (!winner) throw error;
      return { draft: await this.loadDraft(this.storage, winner), created: false };
    }
  }

  /**
   * Creates or updates a draft, replacing its whole question set.
   */
  async saveDraft(request: SaveDraftRequest): Promise<SaveDraftResult> {
    validateTestContent(request);

    const fields = {
      courseId: request.courseId ?? null,
      title: request.title.trim(),
      minPoint: request.minPoint,
      description: request.description ?? null,
    };

    return this.storage.transaction(async (tx) => {
      let target: Draft | undefined;
      if (request.draftId) {
        target = await tx.getDraft(request.draftId);
        if (!target) throw new NotFoundError("Draft", request.draftId);
      } else if (request.testId) {
        target = await tx.getDraftByTestId(request.testId);
      }

      if (target) {
        const updated = await tx.updateDraft(target.id, fields);
        if (!updated) throw new NotFoundError("Draft", target.id);
        await tx.deleteQuestionsByOwner("draft", updated.id);
        await insertQuestionSet(tx, { ownerType: "draft", draftId: updated.id, testId: updated.testId }, request.questions);
        return { draft: await this.loadDraft(tx, updated), created: false };
      }

      const testId = request.testId ?? null;
      if (testId !== null && !(await tx.getTest(testId))) {
        throw new NotFoundError("Test", testId);
      }
      const created = await tx.createDraft({ ...fields, testId });
      await insertQuestionSet(tx, { ownerType: "draft", draftId: created.id, testId }, request.questions);
      return { draft: await this.loadDraft(tx, created), created: true };
    });
  }

  /**
   * Replaces the linked test's content with the draft (or creates a new test),
   * then deletes the draft.
   */
  async publish(draftId: string): Promise<TestWithQuestions> {
    const draft = await this.storage.getDraft(draftId);
    if (!draft) throw new NotFoundError("Draft", draftId);

    const draftQuestions = await withAnswers(this.storage, await this.storage.getQuestionsByDraftId(draft.id));
    validateTestContent({ title: draft.title, minPoint: draft.minPoint, questions: toQuestionContent(draftQuestions) });

    return this.storage.transaction(async (tx) => {
      const fields = {
        courseId: draft.courseId,
        title: draft.title,
        minPoint: draft.minPoint,
        description: draft.description,
      };

      let test: Test | undefined;
      if (draft.testId) {
        test = await tx.updateTest(draft.testId, fields);
        if (!test) throw new NotFoundError("Test", draft.testId);
        await tx.deleteQuestionsByOwner("test", test.id);
      } else {
        test = await tx.createTest(fields);
      }

      const source = await withAnswers(tx, await tx.getQuestionsByDraftId(draft.id));
      await copyQuestionSet(tx, { ownerType: "test", testId: test.id }, source);
      await tx.deleteDraft(draft.id);

      return { ...test, questions: await withAnswers(tx, await tx.getQuestionsByTestId(test.id)) };
    });
  }

  async deleteDraft(draftId: string): Promise<void> {
    const deleted = await this.storage.deleteDraft(draftId);
    if (!deleted) throw new NotFoundError("Draft", draftId);
  }

  private async loadDraft(store: IStorage, draft: Draft): Promise<DraftWithQuestions> {
    return { ...draft, questions: await withAnswers(store, await store.getQuestionsByDraftId(draft.id)) };
  }
}
