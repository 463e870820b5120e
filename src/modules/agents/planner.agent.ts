import { MISCONCEPTION_IDS, MISCONCEPTION_LABELS, type StudentState } from '../../common/types.js';
import { weakestDomains } from '../state/student-state.model.js';
import { EXAM_DOMAINS } from './taxonomy.js';

export { stubPlan } from './offline-stubs.js';

export const PLANNER_SYSTEM_PROMPT = `You are the planner of a certification exam tutor.
Given the student's history and optional focus topics, produce a study plan.
Output ONLY valid JSON matching this shape (no markdown, no explanation):
{
  "domains": ["<domain>", ...],
  "weights": { "<domain>": 0.4, ... },
  "targetQuestions": <integer 8-12>,
  "difficultyMix": { "foundational": 0.5, "applied": 0.3, "scenario": 0.2 },
  "nextFocus": ["<area>", ...]
}
Domains must be chosen from: ${EXAM_DOMAINS.join(', ')}.
Weights and difficultyMix values are fractions between 0 and 1.`;

export interface PlannerInput {
  state: StudentState;
  focusTopics: string[];
  minutes: number;
}

export function buildPlannerPrompt({ state, focusTopics, minutes }: PlannerInput): string {
  const lines = ['Student state:'];
  if (Object.keys(state.domains).length > 0) {
    lines.push(`Domain results: ${JSON.stringify(state.domains)}`);
    lines.push(`Weakest domains first: ${weakestDomains(state).join(', ')}`);
  }
  const misconceptions = MISCONCEPTION_IDS.flatMap(id => {
    const tally = state.misconceptions[id];
    return tally && tally.count > 0 ? [{ id, count: tally.count }] : [];
  }).sort((a, b) => b.count - a.count);
  if (misconceptions.length > 0) {
    const listed = misconceptions.map(({ id, count }) => `${id} (${MISCONCEPTION_LABELS[id]}, seen ${count}x)`);
    lines.push(`Past misconceptions: ${listed.join(', ')}`);
  }
  lines.push(`Sessions completed: ${state.sessionsCompleted}`);
  lines.push(`Available study minutes: ${minutes}`);
  lines.push(
    focusTopics.length > 0
      ? `Focus topics requested: ${focusTopics.join(', ')}`
      : 'No specific focus requested; balance across domains.',
  );
  return lines.join('\n');
}
