import type { Diagnosis, Exam, StudentState } from '../../common/types.js';
import { studentStateSchema } from '../../common/schemas.js';
import { moduleLogger } from '../../common/logger.js';

export const DEFAULT_USER_KEY = 'default';

const log = moduleLogger('state');

export function createStudentState(): StudentState {
  return {
    domains: {},
    misconceptions: {},
    sessionsCompleted: 0,
    lastSessionAt: null,
  };
}

/** Maps a caller identity onto a storage key of `[A-Za-z0-9._-]` characters. */
export function sanitizeUserId(userId: string): string {
  const cleaned = userId
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^[._]+|[._]+$/g, '');
  return cleaned || DEFAULT_USER_KEY;
}

/**
 * Folds one finished session into the running totals. Counters only grow:
 * every diagnosed question counts as attempted in its domain, and every
 * incorrect result bumps its misconception tag.
 */
export function applyDiagnosis(state: StudentState, exam: Exam, diagnosis: Diagnosis, now: Date): StudentState {
  const timestamp = now.toISOString();
  const domainByQuestion = new Map(exam.questions.map(question => [question.id, question.domain]));
  const domains = Object.fromEntries(
    Object.entries(state.domains).map(([domain, tally]) => [domain, { ...tally }]),
  );
  const misconceptions = { ...state.misconceptions };

  for (const result of diagnosis.results) {
    const domain = domainByQuestion.get(result.id);
    if (domain !== undefined) {
      const tally = domains[domain] ?? { attempted: 0, correct: 0 };
      tally.attempted += 1;
      if (result.correct) {
        tally.correct += 1;
      }
      domains[domain] = tally;
    }
    if (!result.correct && result.misconceptionId) {
      const previous = misconceptions[result.misconceptionId];
      misconceptions[result.misconceptionId] = { count: (previous?.count ?? 0) + 1, lastSeen: timestamp };
    }
  }

  return {
    domains,
    misconceptions,
    sessionsCompleted: state.sessionsCompleted + 1,
    lastSessionAt: timestamp,
  };
}

/** Domains ordered weakest first by accuracy; unseen domains are not listed. */
export function weakestDomains(state: StudentState): string[] {
  return Object.entries(state.domains)
    .filter(([, tally]) => tally.attempted > 0)
    .map(([domain, tally]) => ({ domain, accuracy: tally.correct / tally.attempted }))
    .sort((a, b) => a.accuracy - b.accuracy || a.domain.localeCompare(b.domain))
    .map(entry => entry.domain);
}

/** Validates a stored payload; anything unreadable is treated as absent. */
export function parseStoredState(payload: unknown, context: { backend: string; key: string }): StudentState | undefined {
  const parsed = studentStateSchema.safeParse(payload);
  if (!parsed.success) {
    log.warn({ ...context, issues: parsed.error.issues.length }, 'stored state invalid; using a fresh state');
    return undefined;
  }
  return parsed.data;
}
