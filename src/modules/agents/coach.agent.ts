import { MISCONCEPTION_LABELS, type Coaching, type Diagnosis, type GroundedExplanation } from '../../common/types.js';
import { stubLessonPoints } from './offline-stubs.js';

export const COACH_SYSTEM_PROMPT = `You are the coach of a certification exam tutor.
Given a diagnosis and grounded explanations, write lesson points and drills.
Output ONLY valid JSON:
{
  "lessonPoints": ["<point>", ...],
  "drills": [
    { "misconceptionId": "<id>", "prompts": ["<drill question>", ...] }
  ]
}
Keep lesson points to one or two sentences. Write two or three drill prompts
for each of the top misconceptions. Only restate claims that carry citations.`;

const DRILLED_MISCONCEPTIONS = 3;

export function buildCoachPrompt(diagnosis: Diagnosis, grounded: GroundedExplanation[]): string {
  return `Diagnosis:\n${JSON.stringify(diagnosis, null, 2)}\n\nGrounded explanations:\n${JSON.stringify(grounded, null, 2)}`;
}

export function stubCoaching(diagnosis: Diagnosis): Coaching {
  return {
    lessonPoints: stubLessonPoints(),
    drills: diagnosis.topMisconceptions.slice(0, DRILLED_MISCONCEPTIONS).map(misconceptionId => {
      const label = MISCONCEPTION_LABELS[misconceptionId].toLowerCase();
      return {
        misconceptionId,
        prompts: [
          `Explain ${label} in your own words.`,
          `Describe a real situation where confusing ${label} would cause a problem.`,
        ],
      };
    }),
  };
}
