import { z } from 'zod';
import {
  MISCONCEPTION_IDS,
  type AnswerSheet,
  type Diagnosis,
  type DiagnosisResult,
  type Exam,
  type MisconceptionId,
  type Question,
} from '../../common/types.js';
import { defaultMisconceptionFor, isMisconceptionId } from './taxonomy.js';

export const MISCONCEPTION_SYSTEM_PROMPT = `You are the misconception analyst of a certification exam tutor.
Compare the student's answers with the answer key and diagnose each mistake.
Use ONLY these misconception ids: ${MISCONCEPTION_IDS.join(', ')}.
Output ONLY valid JSON (no markdown):
{
  "results": [
    {
      "id": "<question id>",
      "correct": true | false,
      "misconceptionId": "<id, or null when correct>",
      "why": "<brief explanation>",
      "confidence": <0.0-1.0>
    }
  ]
}`;

/** What the model is asked for; every field but the id is advisory. */
export const modelDiagnosisSchema = z.object({
  results: z.array(
    z.object({
      id: z.string(),
      correct: z.boolean().optional(),
      misconceptionId: z.string().nullable().optional(),
      why: z.string().optional(),
      confidence: z.number().optional(),
    }),
  ),
});

export type ModelDiagnosis = z.infer<typeof modelDiagnosisSchema>;

const CORRECT_CONFIDENCE = 0.9;
const INCORRECT_CONFIDENCE = 0.75;

export function buildMisconceptionPrompt(exam: Exam, answers: AnswerSheet): string {
  return `Exam:\n${JSON.stringify(exam, null, 2)}\n\nStudent answers:\n${JSON.stringify(answers, null, 2)}`;
}

export function selectedAnswer(answers: AnswerSheet, questionId: string): number | undefined {
  return Object.hasOwn(answers.answers, questionId) ? answers.answers[questionId] : undefined;
}

export function defaultWhy(question: Question, selected: number | undefined, correct: boolean): string {
  if (correct) {
    return 'Correct answer selected.';
  }
  if (selected === undefined) {
    return `No answer provided. Correct answer is choice ${question.answerIndex + 1}.`;
  }
  return `Selected choice ${selected + 1}; correct is choice ${question.answerIndex + 1}.`;
}

function clampConfidence(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(1, Math.max(0, value));
}

/** Ranks tags of incorrect results by frequency, ties broken by first occurrence. */
export function rankTopMisconceptions(results: DiagnosisResult[]): MisconceptionId[] {
  const counts = new Map<MisconceptionId, { count: number; firstSeen: number }>();
  results.forEach((result, index) => {
    if (result.correct || result.misconceptionId === null) {
      return;
    }
    const current = counts.get(result.misconceptionId);
    counts.set(result.misconceptionId, { count: (current?.count ?? 0) + 1, firstSeen: current?.firstSeen ?? index });
  });
  return [...counts.entries()]
    .sort(([, a], [, b]) => b.count - a.count || a.firstSeen - b.firstSeen)
    .map(([id]) => id);
}

/**
 * Grades from the answer key alone. Used offline, for mock tests and when the
 * model cannot produce a usable diagnosis.
 */
export function diagnoseDeterministically(exam: Exam, answers: AnswerSheet): Diagnosis {
  const results = exam.questions.map((question): DiagnosisResult => {
    const selected = selectedAnswer(answers, question.id);
    const correct = selected === question.answerIndex;
    const why = defaultWhy(question, selected, correct);
    return {
      id: question.id,
      correct,
      why: correct || !question.rationaleDraft.trim() ? why : `${why} ${question.rationaleDraft.trim()}`,
      misconceptionId: correct ? null : defaultMisconceptionFor(question.domain),
      confidence: correct ? CORRECT_CONFIDENCE : INCORRECT_CONFIDENCE,
    };
  });
  return { results, topMisconceptions: rankTopMisconceptions(results) };
}

/**
 * Merges model output with the answer key. Correctness is always recomputed;
 * the model's reasoning and confidence are kept only when it agrees about
 * correctness, and unknown tags fall back to the domain default.
 */
export function normalizeModelDiagnosis(exam: Exam, answers: AnswerSheet, output: ModelDiagnosis): Diagnosis {
  const byId = new Map(output.results.map(result => [result.id, result]));
  const results = exam.questions.map((question): DiagnosisResult => {
    const modelResult = byId.get(question.id);
    const selected = selectedAnswer(answers, question.id);
    const correct = selected === question.answerIndex;
    const fallbackConfidence = correct ? CORRECT_CONFIDENCE : INCORRECT_CONFIDENCE;
    const trusted = modelResult?.correct === undefined || modelResult.correct === correct;
    const modelWhy = trusted ? modelResult?.why?.trim() : undefined;
    const modelTag = modelResult?.misconceptionId;
    return {
      id: question.id,
      correct,
      why: modelWhy || defaultWhy(question, selected, correct),
      misconceptionId: correct ? null : isMisconceptionId(modelTag) ? modelTag : defaultMisconceptionFor(question.domain),
      confidence: clampConfidence(trusted ? modelResult?.confidence : undefined, fallbackConfidence),
    };
  });
  return { results, topMisconceptions: rankTopMisconceptions(results) };
}
