import { z } from 'zod';
import cardData from '../../data/concept-cards.json' with { type: 'json' };
import type { Exam, MisconceptionId, Plan, Question } from '../../common/types.js';
import { FALLBACK_MISCONCEPTION, mockFocusFor } from './taxonomy.js';

export const MOCK_MIN_QUESTIONS = 40;
export const MOCK_MAX_QUESTIONS = 60;

const CHOICE_LABELS = ['A', 'B', 'C', 'D'] as const;
const DISTRACTOR_OFFSETS = [3, 7, 11, 17, 23, 29, 31];
const DISTRACTORS_PER_QUESTION = 3;
const FOCUS_LIMIT = 3;

const conceptCardSchema = z.object({
  domain: z.string().min(1),
  term: z.string().min(1),
  definition: z.string().min(1),
  rationale: z.string().min(1),
});

export type ConceptCard = z.infer<typeof conceptCardSchema>;

/** Picks distractor cards at fixed offsets so a bank is reproducible. */
export function pickDistractorIndexes(index: number, poolSize: number): number[] {
  const picks: number[] = [];
  for (const offset of DISTRACTOR_OFFSETS) {
    const candidate = (index + offset) % poolSize;
    if (candidate === index || picks.includes(candidate)) {
      continue;
    }
    picks.push(candidate);
    if (picks.length === DISTRACTORS_PER_QUESTION) {
      return picks;
    }
  }
  throw new Error(`Unable to pick ${DISTRACTORS_PER_QUESTION} distractors from a pool of ${poolSize}`);
}

function placeChoices(correct: string, distractors: string[], correctIndex: number): string[] {
  const remaining = [...distractors];
  return CHOICE_LABELS.map((_, slot) => (slot === correctIndex ? correct : remaining.shift() ?? ''));
}

/** Two questions per card: name the term from its definition, and define the term. */
export function buildQuestionBank(cards: ConceptCard[]): Question[] {
  return cards.flatMap((card, index): Question[] => {
    const distractorCards = pickDistractorIndexes(index, cards.length).flatMap(i => cards[i] ?? []);
    const termIndex = index % CHOICE_LABELS.length;
    const definitionIndex = (index + 1) % CHOICE_LABELS.length;
    return [
      {
        id: `drop-${index + 1}`,
        domain: card.domain,
        stem: `An example of [Dropdown Menu] is ${card.definition}`,
        choices: placeChoices(card.term, distractorCards.map(c => c.term), termIndex),
        answerIndex: termIndex,
        rationaleDraft: card.rationale,
      },
      {
        id: `def-${index + 1}`,
        domain: card.domain,
        stem: `What is the primary purpose of ${card.term}?`,
        choices: placeChoices(card.definition, distractorCards.map(c => c.definition), definitionIndex).map(
          (choice, slot) => `${CHOICE_LABELS[slot]}) ${choice}`,
        ),
        answerIndex: definitionIndex,
        rationaleDraft: card.rationale,
      },
    ];
  });
}

const conceptCards = z.array(conceptCardSchema).parse(cardData);
const questionBank = buildQuestionBank(conceptCards);

if (questionBank.length < MOCK_MAX_QUESTIONS) {
  throw new Error(`Mock question bank has ${questionBank.length} questions; at least ${MOCK_MAX_QUESTIONS} are required`);
}

export function questionBankSize(): number {
  return questionBank.length;
}

function planForQuestions(questions: Question[]): Plan {
  const counts = new Map<string, number>();
  for (const question of questions) {
    counts.set(question.domain, (counts.get(question.domain) ?? 0) + 1);
  }
  const domains = [...counts.keys()].sort((a, b) => (counts.get(b) ?? 0) - (counts.get(a) ?? 0));
  const weights = Object.fromEntries(
    domains.map(domain => [domain, Math.round(((counts.get(domain) ?? 0) / questions.length) * 1000) / 1000]),
  );

  const nextFocus: MisconceptionId[] = [];
  for (const domain of domains) {
    const focus = mockFocusFor(domain);
    if (focus && !nextFocus.includes(focus)) {
      nextFocus.push(focus);
    }
    if (nextFocus.length === FOCUS_LIMIT) {
      break;
    }
  }

  return {
    domains,
    weights,
    targetQuestions: questions.length,
    difficultyMix: { foundational: 1, applied: 0, scenario: 0 },
    nextFocus: nextFocus.length > 0 ? nextFocus : [FALLBACK_MISCONCEPTION],
  };
}

/**
 * Samples a 40-60 question mock test from the concept-card bank and renumbers
 * the questions 1..n. `random` must return values in [0, 1).
 */
export function buildMockTestSession(random: () => number = Math.random): { plan: Plan; exam: Exam } {
  const count = MOCK_MIN_QUESTIONS + Math.floor(random() * (MOCK_MAX_QUESTIONS - MOCK_MIN_QUESTIONS + 1));
  const pool = questionBank.map(question => structuredClone(question));
  for (let i = 0; i < count; i += 1) {
    const j = i + Math.floor(random() * (pool.length - i));
    const picked = pool[j];
    pool[j] = pool[i];
    pool[i] = picked;
  }
  const questions = pool.slice(0, count).map((question, index) => ({ ...question, id: String(index + 1) }));
  return { plan: planForQuestions(questions), exam: { questions } };
}
