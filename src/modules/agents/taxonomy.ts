import { MISCONCEPTION_IDS, type MisconceptionId } from '../../common/types.js';

export const EXAM_DOMAINS = [
  'Cloud Concepts',
  'Azure Architecture',
  'Azure Services',
  'Security',
  'Identity',
  'Governance',
  'Cost Management',
] as const;

export const FALLBACK_MISCONCEPTION: MisconceptionId = 'TERMS';

/** Tag assumed for a wrong answer when the model gives none we recognize. */
const DIAGNOSIS_DEFAULTS: Record<string, MisconceptionId> = {
  'Cloud Concepts': 'SRM',
  'Azure Architecture': 'REGION',
  Security: 'IDAM',
  'Cost Management': 'PRICING',
  Governance: 'GOV',
  Identity: 'IDAM',
  'Azure Services': 'SERVICE_SCOPE',
};

/** Misconceptions a mock test's leading domains put in focus. */
const MOCK_FOCUS: Record<string, MisconceptionId> = {
  ...DIAGNOSIS_DEFAULTS,
  Security: 'SEC',
};

export function isMisconceptionId(value: unknown): value is MisconceptionId {
  return typeof value === 'string' && (MISCONCEPTION_IDS as readonly string[]).includes(value);
}

export function defaultMisconceptionFor(domain: string): MisconceptionId {
  return Object.hasOwn(DIAGNOSIS_DEFAULTS, domain) ? DIAGNOSIS_DEFAULTS[domain] : FALLBACK_MISCONCEPTION;
}

export function mockFocusFor(domain: string): MisconceptionId | undefined {
  return Object.hasOwn(MOCK_FOCUS, domain) ? MOCK_FOCUS[domain] : undefined;
}
