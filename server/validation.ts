import { ValidationError } from "./errors";

export interface AnswerContent {
  text: string;
  score: number;
}

export interface QuestionContent {
  textOfQuestion: string;
  answers: AnswerContent[];
}

export interface TestContent {
  title: string;
  minPoint: number;
  questions: QuestionContent[];
}

/** Sum of positive answer scores over every question. */
export function maxAchievableScore(questions: QuestionContent[]): number {
  let total = 0;
  for (const question of questions) {
    total += questionMaxPoints(question.answers);
  }
  return total;
}

export function questionMaxPoints(answers: AnswerContent[]): number {
  return answers.reduce((sum, a) => (a.score > 0 ? sum + a.score : sum), 0);
}

/**
 * Checks editable content before anything is written.
 * Throws the first violation found; indices in messages are 1-based.
 */
export function validateTestContent(content: TestContent): void {
  if (!content.title || content.title.trim() === "") {
    throw new ValidationError("Test title is required", { field: "title" });
  }

  if (!Number.isInteger(content.minPoint)) {
    throw new ValidationError("Minimum passing score must be a whole number", { field: "minPoint" });
  }
  if (content.minPoint < 0) {
    throw new ValidationError("Minimum passing score cannot be negative", { field: "minPoint" });
  }

  if (content.questions.length === 0) {
    throw new ValidationError("Test must contain at least one question", { field: "questions" });
  }

  content.questions.forEach((question, qi) => {
    const questionIndex = qi + 1;

    if (!question.textOfQuestion || question.textOfQuestion.trim() === "") {
      throw new ValidationError(`Question ${questionIndex} cannot be empty`, {
        field: "textOfQuestion",
        questionIndex,
      });
    }

    if (question.answers.length < 2) {
      throw new ValidationError(`Question ${questionIndex} must contain at least 2 answers`, {
        field: "answers",
        questionIndex,
      });
    }

    question.answers.forEach((answer, ai) => {
      const answerIndex = ai + 1;
      if (!answer.text || answer.text.trim() === "") {
        throw new ValidationError(`Question ${questionIndex}: answer ${answerIndex} cannot be empty`, {
          field: "text",
          questionIndex,
          answerIndex,
        });
      }
      if (!Number.isInteger(answer.score)) {
        throw new ValidationError(`Question ${questionIndex}: answer ${answerIndex} score must be a whole number`, {
          field: "score",
          questionIndex,
          answerIndex,
        });
      }
      if (answer.score < 0) {
        throw new ValidationError(`Question ${questionIndex}: answer ${answerIndex} score cannot be negative`, {
          field: "score",
          questionIndex,
          answerIndex,
        });
      }
    });

    if (!question.answers.some((a) => a.score > 0)) {
      throw new ValidationError(
        `Question ${questionIndex} must contain at least one correct answer (score > 0)`,
        { field: "answers", questionIndex },
      );
    }
  });

  const max = maxAchievableScore(content.questions);
  if (content.minPoint > max) {
    throw new ValidationError(
      `Minimum passing score (${content.minPoint}) exceeds the maximum achievable score (${max})`,
      { field: "minPoint" },
    );
  }
}
