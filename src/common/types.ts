export const SESSION_MODES = ['adaptive', 'mock_test'] as const;
export type SessionMode = (typeof SESSION_MODES)[number];

export const MISCONCEPTION_IDS = ['SRM', 'IDAM', 'REGION', 'PRICING', 'GOV', 'SEC', 'SERVICE_SCOPE', 'TERMS'] as const;
export type MisconceptionId = (typeof MISCONCEPTION_IDS)[number];

export const MISCONCEPTION_LABELS: Record<MisconceptionId, string> = {
  SRM: 'Shared responsibility',
  IDAM: 'Identity and access management',
  REGION: 'Regions and availability',
  PRICING: 'Pricing and cost',
  GOV: 'Governance and compliance',
  SEC: 'Security controls',
  SERVICE_SCOPE: 'Service scope',
  TERMS: 'Terminology',
};

export const INSUFFICIENT_EVIDENCE = 'Insufficient evidence';

export interface DifficultyMix {
  foundational: number;
  applied: number;
  scenario: number;
}

export interface Plan {
  domains: string[];
  weights: Record<string, number>;
  targetQuestions: number;
  difficultyMix: DifficultyMix;
  nextFocus: string[];
}

export interface Question {
  id: string;
  domain: string;
  stem: string;
  choices: string[];
  /** Zero-based index into `choices`. */
  answerIndex: number;
  rationaleDraft: string;
}

export interface Exam {
  questions: Question[];
}

/** Unanswered questions are absent from `answers`. */
export interface AnswerSheet {
  answers: Record<string, number>;
}

export interface DiagnosisResult {
  id: string;
  correct: boolean;
  why: string;
  misconceptionId: MisconceptionId | null;
  confidence: number;
}

export interface Diagnosis {
  results: DiagnosisResult[];
  topMisconceptions: MisconceptionId[];
}

export interface Citation {
  title: string;
  url: string;
  snippet: string;
}

export interface GroundedExplanation {
  questionId: string;
  explanation: string;
  citations: Citation[];
}

export interface Drill {
  misconceptionId: MisconceptionId;
  prompts: string[];
}

export interface Coaching {
  lessonPoints: string[];
  drills: Drill[];
}

export interface DomainTally {
  attempted: number;
  correct: number;
}

export interface MisconceptionTally {
  count: number;
  lastSeen: string;
}

export interface StudentState {
  domains: Record<string, DomainTally>;
  misconceptions: Partial<Record<MisconceptionId, MisconceptionTally>>;
  sessionsCompleted: number;
  lastSessionAt: string | null;
}

export interface CacheEntry {
  url: string;
  content: string;
  fetchedAt: string;
}

export type StageName = 'plan' | 'examine' | 'diagnose' | 'ground' | 'coach';

export type StageStatus = 'ok' | 'repaired' | 'fallback' | 'stub';

export interface StageReport {
  stage: StageName;
  status: StageStatus;
  attempts: number;
}

export interface DomainEvent<TPayload = Record<string, unknown>> {
  id: string;
  type: string;
  occurredAt: string;
  payload: TPayload;
}
