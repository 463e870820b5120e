import type { ZodError } from 'zod';
import { ValidationError } from '../../common/errors.js';
import { answerSheetSchema, examSchema } from '../../common/schemas.js';
import type { AnswerSheet, Exam } from '../../common/types.js';

function issuesOf(prefix: string, error: ZodError): string[] {
  return error.issues.map(issue => `${[prefix, ...issue.path].join('.')}: ${issue.message}`);
}

/**
 * Validates an echoed exam and its answer sheet. Throws ValidationError
 * listing every problem; nothing downstream runs on a rejected submission.
 */
export function validateSubmission(exam: unknown, answers: unknown): { exam: Exam; answers: AnswerSheet } {
  const parsedExam = examSchema.safeParse(exam);
  const parsedAnswers = answerSheetSchema.safeParse(answers);
  const details: string[] = [];
  if (!parsedExam.success) details.push(...issuesOf('exam', parsedExam.error));
  if (!parsedAnswers.success) details.push(...issuesOf('answers', parsedAnswers.error));
  if (!parsedExam.success || !parsedAnswers.success) {
    throw new ValidationError('Invalid submission', details);
  }

  const questions = new Map(parsedExam.data.questions.map(question => [question.id, question]));
  for (const [questionId, selected] of Object.entries(parsedAnswers.data.answers)) {
    const question = questions.get(questionId);
    if (!question) {
      details.push(`answers.${questionId}: unknown question id`);
    } else if (selected >= question.choices.length) {
      details.push(`answers.${questionId}: choice ${selected} is out of range (0-${question.choices.length - 1})`);
    }
  }
  if (details.length > 0) {
    throw new ValidationError('Invalid submission', details);
  }
  return { exam: parsedExam.data, answers: parsedAnswers.data };
}
