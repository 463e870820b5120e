import { z } from 'zod';
import { MISCONCEPTION_IDS, SESSION_MODES } from './types.js';
import type {
  AnswerSheet,
  CacheEntry,
  Coaching,
  Exam,
  Plan,
  Question,
  StudentState,
} from './types.js';

export const sessionModeSchema = z.enum(SESSION_MODES);
export const misconceptionIdSchema = z.enum(MISCONCEPTION_IDS);

const fraction = z.number().min(0).max(1);

export const planSchema: z.ZodType<Plan> = z.object({
  domains: z.array(z.string().min(1)).min(1),
  weights: z.record(fraction),
  targetQuestions: z.number().int().min(1).max(60),
  difficultyMix: z.object({
    foundational: fraction,
    applied: fraction,
    scenario: fraction,
  }),
  nextFocus: z.array(z.string()),
});

export const questionSchema: z.ZodType<Question> = z
  .object({
    id: z.string().min(1),
    domain: z.string().min(1),
    stem: z.string().min(1),
    choices: z.array(z.string().min(1)).min(2).max(6),
    answerIndex: z.number().int().nonnegative(),
    rationaleDraft: z.string(),
  })
  .refine(question => question.answerIndex < question.choices.length, {
    message: 'answerIndex must be a valid index into choices',
    path: ['answerIndex'],
  });

export const examSchema: z.ZodType<Exam> = z
  .object({
    questions: z.array(questionSchema).min(1).max(60),
  })
  .superRefine((exam, ctx) => {
    const seen = new Set<string>();
    exam.questions.forEach((question, index) => {
      if (seen.has(question.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate question id "${question.id}"`,
          path: ['questions', index, 'id'],
        });
      }
      seen.add(question.id);
    });
  });

export const answerSheetSchema: z.ZodType<AnswerSheet> = z.object({
  answers: z.record(z.number().int().nonnegative()),
});

export const citationSchema = z.object({
  title: z.string(),
  url: z.string(),
  snippet: z.string(),
});

export const coachingSchema: z.ZodType<Coaching> = z.object({
  lessonPoints: z.array(z.string().min(1)).min(1),
  drills: z.array(
    z.object({
      misconceptionId: misconceptionIdSchema,
      prompts: z.array(z.string().min(1)).min(1),
    }),
  ),
});

const tallySchema = z.object({
  attempted: z.number().int().nonnegative(),
  correct: z.number().int().nonnegative(),
});

export const studentStateSchema: z.ZodType<StudentState> = z.object({
  domains: z.record(tallySchema),
  misconceptions: z.record(
    misconceptionIdSchema,
    z.object({ count: z.number().int().nonnegative(), lastSeen: z.string() }),
  ),
  sessionsCompleted: z.number().int().nonnegative(),
  lastSessionAt: z.string().nullable(),
});

export const cacheEntrySchema: z.ZodType<CacheEntry> = z.object({
  url: z.string().min(1),
  content: z.string(),
  fetchedAt: z.string(),
});
