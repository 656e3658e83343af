import { pgTable, varchar, text, integer, boolean, timestamp, date, jsonb, index, uniqueIndex } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const tests = pgTable("tests", {
  id: varchar("id", { length: 36 }).primaryKey(),
  courseId: varchar("course_id", { length: 36 }),
  title: text("title").notNull(),
  minPoint: integer("min_point").notNull().default(0), // порог прохождения
  description: text("description"),
});

export const drafts = pgTable("drafts", {
  id: varchar("id", { length: 36 }).primaryKey(),
  testId: varchar("test_id", { length: 36 }), // null - тест ещё не опубликован
  courseId: varchar("course_id", { length: 36 }),
  title: text("title").notNull(),
  minPoint: integer("min_point").notNull().default(0),
  description: text("description"),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => ({
  // NULLs are distinct in PostgreSQL, so only drafts linked to a test are constrained
  testIdx: uniqueIndex("drafts_test_id_idx").on(table.testId),
}));

export const questionOwnerTypes = ["test", "draft"] as const;

export const questions = pgTable("questions", {
  id: varchar("id", { length: 36 }).primaryKey(),
  ownerType: text("owner_type", { enum: questionOwnerTypes }).notNull(),
  testId: varchar("test_id", { length: 36 }), // для черновика - ссылка на редактируемый тест
  draftId: varchar("draft_id", { length: 36 }),
  textOfQuestion: text("text_of_question").notNull(),
  order: integer("order").notNull().default(0),
}, (table) => ({
  testOwnerIdx: index("questions_test_owner_idx").on(table.ownerType, table.testId),
  draftOwnerIdx: index("questions_draft_owner_idx").on(table.ownerType, table.draftId),
}));

export const answers = pgTable("answers", {
  id: varchar("id", { length: 36 }).primaryKey(),
  questionId: varchar("question_id", { length: 36 }).notNull(),
  text: text("text").notNull(),
  score: integer("score").notNull().default(0),
  position: integer("position").notNull().default(0),
}, (table) => ({
  questionIdx: index("answers_question_idx").on(table.questionId),
}));

export const testAttempts = pgTable("test_attempts", {
  id: varchar("id", { length: 36 }).primaryKey(),
  studentId: varchar("student_id", { length: 36 }).notNull(),
  testId: varchar("test_id", { length: 36 }).notNull(),
  // Выставляется только при завершении попытки
  dateOfAttempt: date("date_of_attempt", { mode: "string" }),
  point: integer("point"),
  certificateId: varchar("certificate_id", { length: 36 }),
  attemptVersion: jsonb("attempt_version"),
  attemptSnapshot: text("attempt_snapshot"), // JSON целиком или указатель minio://...
  completed: boolean("completed").notNull().default(false),
  revision: integer("revision").notNull().default(0),
  createdAt: timestamp("created_at").notNull().defaultNow(),
}, (table) => ({
  studentTestDateIdx: index("test_attempts_student_test_date_idx")
    .on(table.studentId, table.testId, table.dateOfAttempt),
}));

export const insertTestSchema = createInsertSchema(tests).omit({ id: true });
export const insertDraftSchema = createInsertSchema(drafts).omit({ id: true, updatedAt: true });
export const insertQuestionSchema = createInsertSchema(questions).omit({ id: true });
export const insertAnswerSchema = createInsertSchema(answers).omit({ id: true });

export type InsertTest = z.infer<typeof insertTestSchema>;
export type Test = typeof tests.$inferSelect;

export type InsertDraft = z.infer<typeof insertDraftSchema>;
export type Draft = typeof drafts.$inferSelect;

export type InsertQuestion = z.infer<typeof insertQuestionSchema>;
export type Question = typeof questions.$inferSelect;
export type QuestionOwnerType = (typeof questionOwnerTypes)[number];

export type InsertAnswer = z.infer<typeof insertAnswerSchema>;
export type Answer = typeof answers.$inferSelect;

// jsonb columns are read back as unknown and parsed by the attempt version reader
export type InsertTestAttempt = Omit<typeof testAttempts.$inferInsert, "id" | "createdAt" | "revision">;
export type TestAttempt = typeof testAttempts.$inferSelect;

// === Content editing ===

export const answerInputSchema = z.object({
  text: z.string(),
  score: z.number().int(),
});

export const questionInputSchema = z.object({
  textOfQuestion: z.string(),
  order: z.number().int().optional(),
  answers: z.array(answerInputSchema),
});

export const testContentSchema = z.object({
  courseId: z.string().nullish(),
  title: z.string(),
  minPoint: z.number().int(),
  description: z.string().nullish(),
  questions: z.array(questionInputSchema),
});

export const saveDraftRequestSchema = testContentSchema.extend({
  draftId: z.string().nullish(),
  testId: z.string().nullish(),
});

export type AnswerInput = z.infer<typeof answerInputSchema>;
export type QuestionInput = z.infer<typeof questionInputSchema>;
export type TestContentInput = z.infer<typeof testContentSchema>;
export type SaveDraftRequest = z.infer<typeof saveDraftRequestSchema>;

export type QuestionWithAnswers = Question & { answers: Answer[] };
export type TestWithQuestions = Test & { questions: QuestionWithAnswers[] };
export type DraftWithQuestions = Draft & { questions: QuestionWithAnswers[] };

// === Attempts ===

export const startAttemptRequestSchema = z.object({
  studentId: z.string().min(1, "studentId is required"),
});

export const attemptQuestionInitSchema = z.object({
  questionId: z.string().min(1),
  order: z.number().int().optional(),
  questionText: z.string().optional(),
  maxPoints: z.number().int().min(0).optional(),
});

export const initAttemptVersionRequestSchema = z.object({
  attemptNo: z.number().int().min(0),
  questions: z.array(attemptQuestionInitSchema),
  testTitle: z.string().optional(),
  minPoint: z.number().int().min(0).optional(),
});

export const saveAnswersRequestSchema = z.object({
  questionId: z.string().min(1, "questionId is required"),
  answerIds: z.array(z.string()),
  answerPoints: z.array(z.number().int().min(0)).default([]),
  earnedPoints: z.number().int().min(0).default(0),
});

export const upsertAnswersRequestSchema = z.object({
  questionText: z.string().default(""),
  maxPoints: z.number().int().min(0).default(0),
  answerIds: z.array(z.string()),
  answerTexts: z.array(z.string()).default([]),
  answerPoints: z.array(z.number().int().min(0)).default([]),
  earnedPoints: z.number().int().min(0).default(0),
});

export const completeAttemptRequestSchema = z.object({
  totalPoints: z.number().int(),
});

export const saveSnapshotRequestSchema = z.object({
  snapshot: z.string().min(1, "snapshot is required"),
});

export type AttemptQuestionInit = z.infer<typeof attemptQuestionInitSchema>;

// Текущая форма записи ответа в attempt_version; кроме questionId все поля необязательны
export const attemptAnswerEntrySchema = z.object({
  order: z.number().int().optional(),
  questionId: z.string(),
  questionText: z.string().optional(),
  maxPoints: z.number().int().optional(),
  answerIds: z.array(z.string()).optional(),
  answerTexts: z.array(z.string()).optional(),
  answerPoints: z.array(z.number().int()).optional(),
  earnedPoints: z.number().int().optional(),
});

// Старая форма: один answerId, без баллов
export const legacyAttemptAnswerEntrySchema = attemptAnswerEntrySchema.extend({
  answerId: z.string().nullable(),
});

export type StoredAttemptAnswerEntry = z.infer<typeof attemptAnswerEntrySchema>;
export type LegacyAttemptAnswerEntry = z.infer<typeof legacyAttemptAnswerEntrySchema>;

export type AttemptAnswerEntry = {
  order?: number;
  questionId: string;
  questionText?: string;
  maxPoints?: number;
  answerIds: string[];
  answerTexts?: string[];
  answerPoints: number[];
  earnedPoints: number;
};

export type AttemptVersionDocument = {
  attemptNo?: number;
  testTitle?: string;
  minPoint?: number;
  answers: AttemptAnswerEntry[];
};

// === Reports ===

export type AttemptListItem = {
  attemptId: string;
  testId: string;
  dateOfAttempt: string | null;
  point: number | null;
  completed: boolean;
  passed: boolean | null;
  certificateId: string | null;
  attemptSnapshot: string | null;
};

export type AttemptDetail = AttemptListItem & {
  studentId: string;
  attemptVersion: AttemptVersionDocument | null;
};

export type PerTestStats = {
  testId: string;
  title: string;
  attempts: number;
  bestScore: number | null;
  passedCount: number;
};

export type StudentStats = {
  studentId: string;
  attemptsTotal: number;
  attemptsPassed: number;
  bestScore: number | null;
  lastAttemptAt: string | null;
  perTest: PerTestStats[];
};
