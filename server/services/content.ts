import type { Question, QuestionInput, QuestionWithAnswers } from "@shared/schema";
import type { IStorage } from "../storage";
import type { QuestionContent } from "../validation";

/** Where a question set is attached. Draft copies keep the edited test id as lineage. */
export type QuestionOwner =
  | { ownerType: "test"; testId: string }
  | { ownerType: "draft"; draftId: string; testId: string | null };

function ownerFields(owner: QuestionOwner) {
  return owner.ownerType === "test"
    ? { ownerType: owner.ownerType, testId: owner.testId, draftId: null }
    : { ownerType: owner.ownerType, testId: owner.testId, draftId: owner.draftId };
}

export async function withAnswers(store: IStorage, questions: Question[]): Promise<QuestionWithAnswers[]> {
  const result: QuestionWithAnswers[] = [];
  for (const question of questions) {
    result.push({ ...question, answers: await store.getAnswersByQuestionId(question.id) });
  }
  return result;
}

/**
 * Inserts submitted questions; order defaults to the question's index,
 * answer position to the answer's index.
 */
export async function insertQuestionSet(
  store: IStorage,
  owner: QuestionOwner,
  inputs: QuestionInput[],
): Promise<void> {
  for (const [index, input] of inputs.entries()) {
    const question = await store.createQuestion({
      ...ownerFields(owner),
      textOfQuestion: input.textOfQuestion,
      order: input.order ?? index,
    });
    for (const [position, answer] of input.answers.entries()) {
      await store.createAnswer({
        questionId: question.id,
        text: answer.text,
        score: answer.score,
        position,
      });
    }
  }
}

/**
 * Deep copy with fresh ids. Question order and answer positions are preserved.
 */
export async function copyQuestionSet(
  store: IStorage,
  owner: QuestionOwner,
  source: QuestionWithAnswers[],
): Promise<void> {
  for (const original of source) {
    const question = await store.createQuestion({
      ...ownerFields(owner),
      textOfQuestion: original.textOfQuestion,
      order: original.order,
    });
    for (const answer of original.answers) {
      await store.createAnswer({
        questionId: question.id,
        text: answer.text,
        score: answer.score,
        position: answer.position,
      });
    }
  }
}

export function toQuestionContent(questions: QuestionWithAnswers[]): QuestionContent[] {
  return questions.map((q) => ({
    textOfQuestion: q.textOfQuestion,
    answers: q.answers.map((a) => ({ text: a.text, score: a.score })),
  }));
}
