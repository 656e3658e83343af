import { randomUUID } from "crypto";
import type {
  Test, InsertTest,
  Draft, InsertDraft,
  Question, InsertQuestion, QuestionOwnerType,
  Answer, InsertAnswer,
  TestAttempt, InsertTestAttempt,
  AttemptVersionDocument,
} from "@shared/schema";
import { ConflictError } from "./errors";
import type { IStorage, StoredAttemptVersion } from "./storage";

export interface MemState {
  tests: Map<string, Test>;
  drafts: Map<string, Draft>;
  questions: Map<string, Question>;
  answers: Map<string, Answer>;
  attempts: Map<string, TestAttempt>;
}

function emptyState(): MemState {
  return {
    tests: new Map(),
    drafts: new Map(),
    questions: new Map(),
    answers: new Map(),
    attempts: new Map(),
  };
}

function byOrder(a: Question, b: Question) {
  return a.order - b.order;
}

function byCreatedAt(a: TestAttempt, b: TestAttempt) {
  return a.createdAt.getTime() - b.createdAt.getTime();
}

type Undo = () => void;

/**
 * In-process storage used by tests and when DATABASE_URL is not set.
 * Mirrors DatabaseStorage semantics, including the unique drafts.test_id index,
 * revision compare-and-swap and transactional rollback.
 */
export class MemStorage implements IStorage {
  // transactions run one at a time; a rollback undoes only writes made through the transaction's store
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly state: MemState = emptyState(),
    private readonly journal?: Undo[],
  ) {}

  async transaction<T>(fn: (store: IStorage) => Promise<T>): Promise<T> {
    if (this.journal) return fn(this);

    const run = async () => {
      const journal: Undo[] = [];
      try {
        return await fn(new MemStorage(this.state, journal));
      } catch (error) {
        for (const undo of journal.reverse()) undo();
        throw error;
      }
    };
    const result = this.queue.then(run, run);
    this.queue = result.catch(() => undefined);
    return result;
  }

  private put<V>(table: Map<string, V>, id: string, row: V): void {
    this.record(table, id);
    table.set(id, row);
  }

  private remove<V>(table: Map<string, V>, id: string): boolean {
    if (!table.has(id)) return false;
    this.record(table, id);
    return table.delete(id);
  }

  private record<V>(table: Map<string, V>, id: string): void {
    if (!this.journal) return;
    const previous = table.get(id);
    this.journal.push(() => {
      if (previous === undefined) table.delete(id);
      else table.set(id, previous);
    });
  }

  // Tests

  async getTests(courseId?: string): Promise<Test[]> {
    return Array.from(this.state.tests.values())
      .filter((t) => !courseId || t.courseId === courseId)
      .sort((a, b) => a.title.localeCompare(b.title));
  }

  async getTest(id: string): Promise<Test | undefined> {
    return this.state.tests.get(id);
  }

  async createTest(test: InsertTest): Promise<Test> {
    const created: Test = {
      id: randomUUID(),
      courseId: test.courseId ?? null,
      title: test.title,
      minPoint: test.minPoint ?? 0,
      description: test.description ?? null,
    };
    this.put(this.state.tests, created.id, created);
    return created;
  }

  async updateTest(id: string, test: Partial<InsertTest>): Promise<Test | undefined> {
    const existing = this.state.tests.get(id);
    if (!existing) return undefined;
    const updated: Test = { ...existing, ...test };
    this.put(this.state.tests, id, updated);
    return updated;
  }

  async deleteTest(id: string): Promise<boolean> {
    await this.deleteQuestionsByOwner("test", id);
    return this.remove(this.state.tests, id);
  }

  // Drafts

  async getDrafts(courseId?: string): Promise<Draft[]> {
    return Array.from(this.state.drafts.values())
      .filter((d) => !courseId || d.courseId === courseId)
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime());
  }

  async getDraft(id: string): Promise<Draft | undefined> {
    return this.state.drafts.get(id);
  }

  async getDraftByTestId(testId: string): Promise<Draft | undefined> {
    return Array.from(this.state.drafts.values()).find((d) => d.testId === testId);
  }

  async createDraft(draft: InsertDraft): Promise<Draft> {
    const testId = draft.testId ?? null;
    if (testId !== null && (await this.getDraftByTestId(testId))) {
      throw new ConflictError(`A draft already exists for test ${testId}`);
    }
    const created: Draft = {
      id: randomUUID(),
      testId,
      courseId: draft.courseId ?? null,
      title: draft.title,
      minPoint: draft.minPoint ?? 0,
      description: draft.description ?? null,
      updatedAt: new Date(),
    };
    this.put(this.state.drafts, created.id, created);
    return created;
  }

  async updateDraft(id: string, draft: Partial<InsertDraft>): Promise<Draft | undefined> {
    const existing = this.state.drafts.get(id);
    if (!existing) return undefined;
    const updated: Draft = { ...existing, ...draft, updatedAt: new Date() };
    this.put(this.state.drafts, id, updated);
    return updated;
  }

  async deleteDraft(id: string): Promise<boolean> {
    await this.deleteQuestionsByOwner("draft", id);
    return this.remove(this.state.drafts, id);
  }

  // Questions & answers

  async getQuestion(id: string): Promise<Question | undefined> {
    return this.state.questions.get(id);
  }

  async getQuestionsByTestId(testId: string): Promise<Question[]> {
    return Array.from(this.state.questions.values())
      .filter((q) => q.ownerType === "test" && q.testId === testId)
      .sort(byOrder);
  }

  async getQuestionsByDraftId(draftId: string): Promise<Question[]> {
    return Array.from(this.state.questions.values())
      .filter((q) => q.ownerType === "draft" && q.draftId === draftId)
      .sort(byOrder);
  }

  async createQuestion(question: InsertQuestion): Promise<Question> {
    const created: Question = {
      id: randomUUID(),
      ownerType: question.ownerType,
      testId: question.testId ?? null,
      draftId: question.draftId ?? null,
      textOfQuestion: question.textOfQuestion,
      order: question.order ?? 0,
    };
    this.put(this.state.questions, created.id, created);
    return created;
  }

  async deleteQuestion(id: string): Promise<boolean> {
    for (const answer of Array.from(this.state.answers.values())) {
      if (answer.questionId === id) this.remove(this.state.answers, answer.id);
    }
    return this.remove(this.state.questions, id);
  }

  async deleteQuestionsByOwner(ownerType: QuestionOwnerType, ownerId: string): Promise<number> {
    const owned = ownerType === "test"
      ? await this.getQuestionsByTestId(ownerId)
      : await this.getQuestionsByDraftId(ownerId);
    for (const question of owned) {
      await this.deleteQuestion(question.id);
    }
    return owned.length;
  }

  async getAnswersByQuestionId(questionId: string): Promise<Answer[]> {
    return Array.from(this.state.answers.values())
      .filter((a) => a.questionId === questionId)
      .sort((a, b) => a.position - b.position);
  }

  async createAnswer(answer: InsertAnswer): Promise<Answer> {
    const created: Answer = {
      id: randomUUID(),
      questionId: answer.questionId,
      text: answer.text,
      score: answer.score ?? 0,
      position: answer.position ?? 0,
    };
    this.put(this.state.answers, created.id, created);
    return created;
  }

  async deleteAnswer(id: string): Promise<boolean> {
    return this.remove(this.state.answers, id);
  }

  // Attempts

  async createAttempt(attempt: InsertTestAttempt): Promise<TestAttempt> {
    const created: TestAttempt = {
      id: randomUUID(),
      studentId: attempt.studentId,
      testId: attempt.testId,
      dateOfAttempt: attempt.dateOfAttempt ?? null,
      point: attempt.point ?? null,
      certificateId: attempt.certificateId ?? null,
      attemptVersion: attempt.attemptVersion ?? null,
      attemptSnapshot: attempt.attemptSnapshot ?? null,
      completed: attempt.completed ?? false,
      revision: 0,
      createdAt: new Date(),
    };
    this.put(this.state.attempts, created.id, created);
    return created;
  }

  async getAttempt(id: string): Promise<TestAttempt | undefined> {
    return this.state.attempts.get(id);
  }

  async getAttemptsByStudent(studentId: string): Promise<TestAttempt[]> {
    return Array.from(this.state.attempts.values())
      .filter((a) => a.studentId === studentId)
      .sort(byCreatedAt);
  }

  async getAttemptsByTest(testId: string): Promise<TestAttempt[]> {
    return Array.from(this.state.attempts.values())
      .filter((a) => a.testId === testId)
      .sort(byCreatedAt);
  }

  async getAttemptsByStudentAndTest(studentId: string, testId: string): Promise<TestAttempt[]> {
    return (await this.getAttemptsByStudent(studentId)).filter((a) => a.testId === testId);
  }

  async updateAttempt(id: string, updates: Partial<InsertTestAttempt>): Promise<TestAttempt | undefined> {
    const existing = this.state.attempts.get(id);
    if (!existing) return undefined;
    const updated: TestAttempt = { ...existing, ...updates, revision: existing.revision + 1 };
    this.put(this.state.attempts, id, updated);
    return updated;
  }

  async getAttemptVersion(id: string): Promise<StoredAttemptVersion | undefined> {
    const attempt = this.state.attempts.get(id);
    if (!attempt) return undefined;
    // jsonb round-trip: callers never share the stored object
    return { document: structuredClone(attempt.attemptVersion), revision: attempt.revision };
  }

  async compareAndSetAttemptVersion(
    id: string,
    document: AttemptVersionDocument,
    expectedRevision: number,
  ): Promise<boolean> {
    const attempt = this.state.attempts.get(id);
    if (!attempt || attempt.revision !== expectedRevision) return false;
    this.put(this.state.attempts, id, {
      ...attempt,
      attemptVersion: structuredClone(document),
      revision: attempt.revision + 1,
    });
    return true;
  }

  async deleteAttempt(id: string): Promise<boolean> {
    return this.remove(this.state.attempts, id);
  }
}
