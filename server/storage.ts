import { randomUUID } from "crypto";
import { eq, inArray, and, asc, sql } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import * as schema from "@shared/schema";
import {
  tests, drafts, questions, answers, testAttempts,
  type Test, type InsertTest,
  type Draft, type InsertDraft,
  type Question, type InsertQuestion, type QuestionOwnerType,
  type Answer, type InsertAnswer,
  type TestAttempt, type InsertTestAttempt,
  type AttemptVersionDocument,
} from "@shared/schema";
import { ConflictError, isUniqueViolation } from "./errors";

export interface StoredAttemptVersion {
  document: unknown; // raw jsonb, read through readAttemptVersion
  revision: number;
}

export interface IStorage {
  // Tests
  getTests(courseId?: string): Promise<Test[]>;
  getTest(id: string): Promise<Test | undefined>;
  createTest(test: InsertTest): Promise<Test>;
  updateTest(id: string, test: Partial<InsertTest>): Promise<Test | undefined>;
  /** Removes the test with its questions and answers. */
  deleteTest(id: string): Promise<boolean>;

  // Drafts
  getDrafts(courseId?: string): Promise<Draft[]>;
  getDraft(id: string): Promise<Draft | undefined>;
  getDraftByTestId(testId: string): Promise<Draft | undefined>;
  /** @throws ConflictError when another draft already links the same testId */
  createDraft(draft: InsertDraft): Promise<Draft>;
  updateDraft(id: string, draft: Partial<InsertDraft>): Promise<Draft | undefined>;
  /** Removes the draft with its questions and answers. */
  deleteDraft(id: string): Promise<boolean>;

  // Questions
  getQuestion(id: string): Promise<Question | undefined>;
  getQuestionsByTestId(testId: string): Promise<Question[]>;
  getQuestionsByDraftId(draftId: string): Promise<Question[]>;
  createQuestion(question: InsertQuestion): Promise<Question>;
  deleteQuestion(id: string): Promise<boolean>;
  deleteQuestionsByOwner(ownerType: QuestionOwnerType, ownerId: string): Promise<number>;

  // Answers
  getAnswersByQuestionId(questionId: string): Promise<Answer[]>;
  createAnswer(answer: InsertAnswer): Promise<Answer>;
  deleteAnswer(id: string): Promise<boolean>;

  // Attempts
  createAttempt(attempt: InsertTestAttempt): Promise<TestAttempt>;
  getAttempt(id: string): Promise<TestAttempt | undefined>;
  getAttemptsByStudent(studentId: string): Promise<TestAttempt[]>;
  getAttemptsByTest(testId: string): Promise<TestAttempt[]>;
  getAttemptsByStudentAndTest(studentId: string, testId: string): Promise<TestAttempt[]>;
  /** Also bumps the revision, so a pending attempt-document swap read before this update fails. */
  updateAttempt(id: string, updates: Partial<InsertTestAttempt>): Promise<TestAttempt | undefined>;
  getAttemptVersion(id: string): Promise<StoredAttemptVersion | undefined>;
  /** Writes the document only if the revision is unchanged; bumps the revision on success. */
  compareAndSetAttemptVersion(id: string, document: AttemptVersionDocument, expectedRevision: number): Promise<boolean>;
  deleteAttempt(id: string): Promise<boolean>;

  /** Runs fn against a transactional store; a thrown error rolls back every write. */
  transaction<T>(fn: (store: IStorage) => Promise<T>): Promise<T>;
}

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

function ownerColumn(ownerType: QuestionOwnerType) {
  return ownerType === "test" ? questions.testId : questions.draftId;
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Executor) {}

  async transaction<T>(fn: (store: IStorage) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new DatabaseStorage(tx)));
  }

  // ============================================
  // Tests
  // ============================================

  async getTests(courseId?: string): Promise<Test[]> {
    const query = this.db.select().from(tests);
    if (courseId) {
      return query.where(eq(tests.courseId, courseId)).orderBy(asc(tests.title));
    }
    return query.orderBy(asc(tests.title));
  }

  async getTest(id: string): Promise<Test | undefined> {
    const [test] = await this.db.select().from(tests).where(eq(tests.id, id));
    return test || undefined;
  }

  async createTest(test: InsertTest): Promise<Test> {
    const [created] = await this.db.insert(tests).values({
      id: randomUUID(),
      courseId: test.courseId ?? null,
      title: test.title,
      minPoint: test.minPoint ?? 0,
      description: test.description ?? null,
    }).returning();
    return created;
  }

  async updateTest(id: string, test: Partial<InsertTest>): Promise<Test | undefined> {
    const [updated] = await this.db.update(tests).set(test).where(eq(tests.id, id)).returning();
    return updated || undefined;
  }

  async deleteTest(id: string): Promise<boolean> {
    await this.deleteQuestionsByOwner("test", id);
    const result = await this.db.delete(tests).where(eq(tests.id, id));
    return (result.rowCount ?? 0) > 0;
  }

  // ============================================
  // Drafts
  // ============================================

  async getDrafts(courseId?: string): Promise<Draft[]> {
    const query = this.db.select().from(drafts);
    if (courseId) {
      return query.where(eq(drafts.courseId, courseId)).orderBy(asc(drafts.updatedAt));
    }
    return query.orderBy(asc(drafts.updatedAt));
  }

  async getDraft(id: string): Promise<Draft | undefined> {
    const [draft] = await this.db.select().from(drafts).where(eq(drafts.id, id));
    return draft || undefined;
  }

  async getDraftByTestId(testId: string): Promise<Draft | undefined> {
    const [draft] = await this.db.select().from(drafts).where(eq(drafts.testId, testId));
    return draft || undefined;
  }

  async createDraft(draft: InsertDraft): Promise<Draft> {
    try {
      const [created] = await this.db.insert(drafts).values({
        id: randomUUID(),
        testId: draft.testId ?? null,
        courseId: draft.courseId ?? null,
        title: draft.title,
        minPoint: draft.minPoint ?? 0,
        description: draft.description ?? null,
        updatedAt: new Date(),
      }).returning();
      return created;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`A draft already exists for test ${draft.testId}`);
      }
      throw error;
    }
  }

  async updateDraft(id: string, draft: Partial<InsertDraft>): Promise<Draft | undefined> {
    const [updated] = await this.db.update(drafts)
      .set({ ...draft, updatedAt: new Date() })
      .where(eq(drafts.id, id))
      .returning();
    return updated || undefined;
  }

  async deleteDraft(id: string): Promise<boolean> {
    await this.deleteQuestionsByOwner("draft", id);
    const result = await this.db.delete(drafts).where(eq(drafts.id, id));
    return (result.rowCount ?? 0) > 0;
  }

  // ============================================
  // Questions & answers
  // ============================================

  async getQuestion(id: string): Promise<Question | undefined> {
    const [question] = await this.db.select().from(questions).where(eq(questions.id, id));
    return question || undefined;
  }

  async getQuestionsByTestId(testId: string): Promise<Question[]> {
    return this.db.select().from(questions)
      .where(and(eq(questions.ownerType, "test"), eq(questions.testId, testId)))
      .orderBy(asc(questions.order));
  }

  async getQuestionsByDraftId(draftId: string): Promise<Question[]> {
    return this.db.select().from(questions)
      .where(and(eq(questions.ownerType, "draft"), eq(questions.draftId, draftId)))
      .orderBy(asc(questions.order));
  }

  async createQuestion(question: InsertQuestion): Promise<Question> {
    const [created] = await this.db.insert(questions).values({
      id: randomUUID(),
      ownerType: question.ownerType,
      testId: question.testId ?? null,
      draftId: question.draftId ?? null,
      textOfQuestion: question.textOfQuestion,
      order: question.order ?? 0,
    }).returning();
    return created;
  }

  async deleteQuestion(id: string): Promise<boolean> {
    await this.db.delete(answers).where(eq(answers.questionId, id));
    const result = await this.db.delete(questions).where(eq(questions.id, id));
    return (result.rowCount ?? 0) > 0;
  }

  async deleteQuestionsByOwner(ownerType: QuestionOwnerType, ownerId: string): Promise<number> {
    const owned = and(eq(questions.ownerType, ownerType), eq(ownerColumn(ownerType), ownerId));
    const rows = await this.db.select({ id: questions.id }).from(questions).where(owned);
    if (rows.length === 0) return 0;

    await this.db.delete(answers).where(inArray(answers.questionId, rows.map((r) => r.id)));
    const result = await this.db.delete(questions).where(owned);
    return result.rowCount ?? 0;
  }

  async getAnswersByQuestionId(questionId: string): Promise<Answer[]> {
    return this.db.select().from(answers)
      .where(eq(answers.questionId, questionId))
      .orderBy(asc(answers.position));
  }

  async createAnswer(answer: InsertAnswer): Promise<Answer> {
    const [created] = await this.db.insert(answers).values({
      id: randomUUID(),
      questionId: answer.questionId,
      text: answer.text,
      score: answer.score ?? 0,
      position: answer.position ?? 0,
    }).returning();
    return created;
  }

  async deleteAnswer(id: string): Promise<boolean> {
    const result = await this.db.delete(answers).where(eq(answers.id, id));
    return (result.rowCount ?? 0) > 0;
  }

  // ============================================
  // Attempts
  // ============================================

  async createAttempt(attempt: InsertTestAttempt): Promise<TestAttempt> {
    const [created] = await this.db.insert(testAttempts).values({
      ...attempt,
      id: randomUUID(),
      revision: 0,
      createdAt: new Date(),
    }).returning();
    return created;
  }

  async getAttempt(id: string): Promise<TestAttempt | undefined> {
    const [attempt] = await this.db.select().from(testAttempts).where(eq(testAttempts.id, id));
    return attempt || undefined;
  }

  async getAttemptsByStudent(studentId: string): Promise<TestAttempt[]> {
    return this.db.select().from(testAttempts)
      .where(eq(testAttempts.studentId, studentId))
      .orderBy(asc(testAttempts.createdAt));
  }

  async getAttemptsByTest(testId: string): Promise<TestAttempt[]> {
    return this.db.select().from(testAttempts)
      .where(eq(testAttempts.testId, testId))
      .orderBy(asc(testAttempts.createdAt));
  }

  async getAttemptsByStudentAndTest(studentId: string, testId: string): Promise<TestAttempt[]> {
    return this.db.select().from(testAttempts)
      .where(and(eq(testAttempts.studentId, studentId), eq(testAttempts.testId, testId)))
      .orderBy(asc(testAttempts.createdAt));
  }

  async updateAttempt(id: string, updates: Partial<InsertTestAttempt>): Promise<TestAttempt | undefined> {
    const [updated] = await this.db.update(testAttempts)
      .set({ ...updates, revision: sql`${testAttempts.revision} + 1` })
      .where(eq(testAttempts.id, id))
      .returning();
    return updated || undefined;
  }

  async getAttemptVersion(id: string): Promise<StoredAttemptVersion | undefined> {
    const [row] = await this.db
      .select({ document: testAttempts.attemptVersion, revision: testAttempts.revision })
      .from(testAttempts)
      .where(eq(testAttempts.id, id));
    return row || undefined;
  }

  async compareAndSetAttemptVersion(
    id: string,
    document: AttemptVersionDocument,
    expectedRevision: number,
  ): Promise<boolean> {
    const updated = await this.db.update(testAttempts)
      .set({ attemptVersion: document, revision: sql`${testAttempts.revision} + 1` })
      .where(and(eq(testAttempts.id, id), eq(testAttempts.revision, expectedRevision)))
      .returning({ id: testAttempts.id });
    return updated.length > 0;
  }

  async deleteAttempt(id: string): Promise<boolean> {
    const result = await this.db.delete(testAttempts).where(eq(testAttempts.id, id));
    return (result.rowCount ?? 0) > 0;
  }
}
