import type { SessionMode } from '../../common/types.js';

export const SESSION_PHASES = [
  'planning',
  'examining',
  'awaiting_answers',
  'diagnosing',
  'grounding',
  'coaching',
  'summarizing',
  'done',
] as const;
export type SessionPhase = (typeof SESSION_PHASES)[number];

const ADAPTIVE_TRANSITIONS: Record<SessionPhase, SessionPhase | undefined> = {
  planning: 'examining',
  examining: 'awaiting_answers',
  awaiting_answers: 'diagnosing',
  diagnosing: 'grounding',
  grounding: 'coaching',
  coaching: 'summarizing',
  summarizing: 'done',
  done: undefined,
};

const MOCK_TEST_TRANSITIONS: Record<SessionPhase, SessionPhase | undefined> = {
  ...ADAPTIVE_TRANSITIONS,
  diagnosing: 'summarizing',
  grounding: undefined,
  coaching: undefined,
};

export class IllegalTransitionError extends Error {
  constructor(
    public readonly mode: SessionMode,
    public readonly from: SessionPhase,
    public readonly to: SessionPhase,
  ) {
    super(`Illegal ${mode} session transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/** Linear phase machine; the mode is fixed for the life of the session. */
export class SessionMachine {
  private current: SessionPhase;
  private readonly visited: SessionPhase[];

  constructor(
    readonly mode: SessionMode,
    initial: SessionPhase = 'planning',
  ) {
    this.current = initial;
    this.visited = [initial];
  }

  get phase(): SessionPhase {
    return this.current;
  }

  get history(): readonly SessionPhase[] {
    return this.visited;
  }

  next(): SessionPhase | undefined {
    const table = this.mode === 'mock_test' ? MOCK_TEST_TRANSITIONS : ADAPTIVE_TRANSITIONS;
    return table[this.current];
  }

  transition(to: SessionPhase): void {
    if (this.next() !== to) {
      throw new IllegalTransitionError(this.mode, this.current, to);
    }
    this.current = to;
    this.visited.push(to);
  }
}
