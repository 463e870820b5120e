import type { Plan } from '../../common/types.js';

export { stubExam } from './offline-stubs.js';

export const EXAMINER_SYSTEM_PROMPT = `You are the examiner of a certification exam tutor.
Given a study plan, write a multiple-choice quiz.
Output ONLY valid JSON matching this shape (no markdown, no explanation):
{
  "questions": [
    {
      "id": "1",
      "domain": "<domain>",
      "stem": "<question text>",
      "choices": ["A) ...", "B) ...", "C) ...", "D) ..."],
      "answerIndex": <0-based index of the correct choice>,
      "rationaleDraft": "<one-sentence rationale>"
    }
  ]
}
Write targetQuestions questions with unique ids, covering the plan's domains in
proportion to their weights.`;

export function buildExaminerPrompt(plan: Plan): string {
  return `Study plan:\n${JSON.stringify(plan, null, 2)}`;
}
