import { describe, expect, it } from 'vitest';
import { IllegalTransitionError, SessionMachine } from '../session-machine.js';

describe('SessionMachine', () => {
  it('walks the adaptive phases in order', () => {
    const machine = new SessionMachine('adaptive');
    for (const phase of ['examining', 'awaiting_answers', 'diagnosing', 'grounding', 'coaching', 'summarizing', 'done'] as const) {
      machine.transition(phase);
    }
    expect(machine.phase).toBe('done');
    expect(machine.history).toHaveLength(8);
    expect(machine.next()).toBeUndefined();
  });

  it('sends mock tests from diagnosing straight to summarizing', () => {
    const machine = new SessionMachine('mock_test', 'awaiting_answers');
    machine.transition('diagnosing');
    expect(machine.next()).toBe('summarizing');
    expect(() => machine.transition('grounding')).toThrow(IllegalTransitionError);
    machine.transition('summarizing');
    expect(machine.history).toEqual(['awaiting_answers', 'diagnosing', 'summarizing']);
  });

  it('rejects skipping ahead in adaptive sessions', () => {
    const machine = new SessionMachine('adaptive', 'diagnosing');
    expect(() => machine.transition('summarizing')).toThrow('Illegal adaptive session transition: diagnosing -> summarizing');
    expect(machine.phase).toBe('diagnosing');
  });

  it('rejects moving backwards', () => {
    const machine = new SessionMachine('adaptive', 'examining');
    expect(() => machine.transition('planning')).toThrow(IllegalTransitionError);
  });
});
