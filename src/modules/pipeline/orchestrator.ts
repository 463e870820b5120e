import { v4 as uuid } from 'uuid';
import { ValidationError } from '../../common/errors.js';
import { EVENT_TYPES, type InMemoryEventBus } from '../../common/event-bus.js';
import { moduleLogger } from '../../common/logger.js';
import { coachingSchema, examSchema, planSchema } from '../../common/schemas.js';
import type {
  AnswerSheet,
  Coaching,
  Diagnosis,
  Exam,
  GroundedExplanation,
  Plan,
  SessionMode,
  StageReport,
  StudentState,
} from '../../common/types.js';
import { COACH_SYSTEM_PROMPT, buildCoachPrompt, stubCoaching } from '../agents/coach.agent.js';
import { EXAMINER_SYSTEM_PROMPT, buildExaminerPrompt, stubExam } from '../agents/examiner.agent.js';
import {
  MISCONCEPTION_SYSTEM_PROMPT,
  buildMisconceptionPrompt,
  diagnoseDeterministically,
  modelDiagnosisSchema,
  normalizeModelDiagnosis,
} from '../agents/misconception.agent.js';
import { buildMockTestSession } from '../agents/mock-test.js';
import { PLANNER_SYSTEM_PROMPT, buildPlannerPrompt, stubPlan } from '../agents/planner.agent.js';
import type { GroundingVerifier } from '../grounding/grounding.service.js';
import type { ModelInvoker } from '../llm/model-client.js';
import type { StateStore } from '../state/state.repository.js';
import { applyDiagnosis, sanitizeUserId } from '../state/student-state.model.js';
import { validateSubmission } from './exam-validation.js';
import type { IssuedExamRegistry } from './issued-exam.registry.js';
import { SessionMachine } from './session-machine.js';
import { runStage, stubReport, summarizeStage, type StageRuntime } from './stage-runner.js';

export const DEFAULT_STUDY_MINUTES = 30;

export interface StartRequest {
  userId: string;
  mode: SessionMode;
  focusTopics?: string[];
  minutes?: number;
  offline?: boolean;
}

export interface StartResponse {
  sessionId: string;
  userId: string;
  mode: SessionMode;
  offlineUsed: boolean;
  plan: Plan;
  exam: Exam;
  warnings: string[];
  stages: StageReport[];
  state: StudentState;
}

export interface SubmitRequest {
  userId: string;
  mode: SessionMode;
  exam: unknown;
  answers: unknown;
  offline?: boolean;
}

export interface SubmitResponse {
  sessionId: string;
  userId: string;
  mode: SessionMode;
  offlineUsed: boolean;
  diagnosis: Diagnosis;
  grounded: GroundedExplanation[];
  coaching: Coaching;
  warnings: string[];
  stages: StageReport[];
  state: StudentState;
}

export interface OrchestratorSettings {
  offline: boolean;
  modelTimeoutMs: number;
  verifyIssuedExams: boolean;
}

export interface PipelineOrchestratorDeps {
  settings: OrchestratorSettings;
  stateStore: StateStore;
  grounding: GroundingVerifier;
  registry: IssuedExamRegistry;
  events: InMemoryEventBus;
  /** Absent when no model endpoint is configured; every session then runs offline. */
  invoke?: ModelInvoker;
  now?: () => Date;
  random?: () => number;
}

const log = moduleLogger('pipeline');

function usedOffline(runtime: StageRuntime, stages: StageReport[]): boolean {
  return !runtime.invoke || stages.some(stage => stage.status === 'fallback');
}

export class PipelineOrchestrator {
  private readonly now: () => Date;
  private readonly random: () => number;

  constructor(private readonly deps: PipelineOrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.random = deps.random ?? Math.random;
  }

  async start(request: StartRequest): Promise<StartResponse> {
    const userId = sanitizeUserId(request.userId);
    const runtime = this.openRuntime(request.offline);
    const machine = new SessionMachine(request.mode);
    const focusTopics = (request.focusTopics ?? []).map(topic => topic.trim()).filter(topic => topic.length > 0);
    const state = await this.deps.stateStore.load(userId);

    let plan: Plan;
    let exam: Exam;
    let stages: StageReport[];
    if (request.mode === 'mock_test') {
      if (focusTopics.length > 0) {
        runtime.warnings.push('Focus topics are ignored in mock_test mode.');
      }
      ({ plan, exam } = buildMockTestSession(this.random));
      machine.transition('examining');
      stages = [stubReport('plan'), stubReport('examine')];
    } else {
      const planned = await runStage(runtime, {
        stage: 'plan',
        label: 'Planner',
        agent: 'planner',
        systemPrompt: PLANNER_SYSTEM_PROMPT,
        userPrompt: buildPlannerPrompt({ state, focusTopics, minutes: request.minutes ?? DEFAULT_STUDY_MINUTES }),
        schemaName: 'Plan',
        schema: planSchema,
        fallback: stubPlan,
      });
      plan = planned.value;
      machine.transition('examining');
      const examined = await runStage(runtime, {
        stage: 'examine',
        label: 'Examiner',
        agent: 'examiner',
        systemPrompt: EXAMINER_SYSTEM_PROMPT,
        userPrompt: buildExaminerPrompt(plan),
        schemaName: 'Exam',
        schema: examSchema,
        fallback: stubExam,
      });
      exam = examined.value;
      stages = [summarizeStage('plan', [planned]), summarizeStage('examine', [examined])];
    }
    machine.transition('awaiting_answers');
    this.deps.registry.record(userId, request.mode, exam);

    const offlineUsed = usedOffline(runtime, stages);
    this.deps.events.emit(EVENT_TYPES.SessionStarted, {
      sessionId: runtime.sessionId,
      userId,
      mode: request.mode,
      questions: exam.questions.length,
      offlineUsed,
    });
    log.info({ sessionId: runtime.sessionId, userId, mode: request.mode, phase: machine.phase }, 'session started');

    return {
      sessionId: runtime.sessionId,
      userId,
      mode: request.mode,
      offlineUsed,
      plan,
      exam,
      warnings: runtime.warnings,
      stages,
      state,
    };
  }

  async submit(request: SubmitRequest): Promise<SubmitResponse> {
    const userId = sanitizeUserId(request.userId);
    const { exam, answers } = validateSubmission(request.exam, request.answers);

    if (!this.deps.settings.verifyIssuedExams) {
      return this.complete(request, userId, exam, answers);
    }
    const reservation = this.deps.registry.reserve(userId, request.mode, exam);
    if (!reservation.ok) {
      throw new ValidationError('Exam verification failed', [reservation.reason]);
    }
    const { fingerprint } = reservation;
    try {
      return await this.complete(request, userId, exam, answers, () =>
        this.deps.registry.consume(userId, fingerprint),
      );
    } catch (error) {
      this.deps.registry.release(userId, fingerprint);
      throw error;
    }
  }

  /** Runs the post-answer stages and commits state; `onSaved` runs right after the write. */
  private async complete(
    request: SubmitRequest,
    userId: string,
    exam: Exam,
    answers: AnswerSheet,
    onSaved?: () => void,
  ): Promise<SubmitResponse> {
    const runtime = this.openRuntime(request.offline);
    const machine = new SessionMachine(request.mode, 'awaiting_answers');
    const state = await this.deps.stateStore.load(userId);

    machine.transition('diagnosing');
    let diagnosis: Diagnosis;
    let grounded: GroundedExplanation[] = [];
    let coaching: Coaching = { lessonPoints: [], drills: [] };
    const stages: StageReport[] = [];

    if (request.mode === 'mock_test') {
      diagnosis = diagnoseDeterministically(exam, answers);
      stages.push(stubReport('diagnose'));
    } else {
      const diagnosed = await runStage(runtime, {
        stage: 'diagnose',
        label: 'Misconception analysis',
        agent: 'misconception',
        systemPrompt: MISCONCEPTION_SYSTEM_PROMPT,
        userPrompt: buildMisconceptionPrompt(exam, answers),
        schemaName: 'Diagnosis',
        schema: modelDiagnosisSchema.transform(output => normalizeModelDiagnosis(exam, answers, output)),
        fallback: () => diagnoseDeterministically(exam, answers),
      });
      diagnosis = diagnosed.value;
      stages.push(summarizeStage('diagnose', [diagnosed]));

      machine.transition('grounding');
      const groundingRun = await this.deps.grounding.groundAll(exam, diagnosis, runtime);
      grounded = groundingRun.grounded;
      stages.push(groundingRun.report);

      machine.transition('coaching');
      const current = diagnosis;
      const coached = await runStage(runtime, {
        stage: 'coach',
        label: 'Coach',
        agent: 'coach',
        systemPrompt: COACH_SYSTEM_PROMPT,
        userPrompt: buildCoachPrompt(current, grounded),
        schemaName: 'Coaching',
        schema: coachingSchema,
        fallback: () => stubCoaching(current),
      });
      coaching = coached.value;
      stages.push(summarizeStage('coach', [coached]));
    }

    machine.transition('summarizing');
    const nextState = applyDiagnosis(state, exam, diagnosis, this.now());
    await this.deps.stateStore.save(userId, nextState);
    onSaved?.();
    machine.transition('done');

    const offlineUsed = usedOffline(runtime, stages);
    const incorrect = diagnosis.results.filter(result => !result.correct).length;
    this.deps.events.emit(EVENT_TYPES.SessionCompleted, {
      sessionId: runtime.sessionId,
      userId,
      mode: request.mode,
      questions: exam.questions.length,
      incorrect,
      topMisconceptions: diagnosis.topMisconceptions,
      offlineUsed,
    });
    log.info({ sessionId: runtime.sessionId, userId, mode: request.mode, incorrect }, 'session completed');

    return {
      sessionId: runtime.sessionId,
      userId,
      mode: request.mode,
      offlineUsed,
      diagnosis,
      grounded,
      coaching,
      warnings: runtime.warnings,
      stages,
      state: nextState,
    };
  }

  private openRuntime(offline: boolean | undefined): StageRuntime {
    const runOffline = offline === true || this.deps.settings.offline;
    return {
      invoke: runOffline ? undefined : this.deps.invoke,
      timeoutMs: this.deps.settings.modelTimeoutMs,
      sessionId: uuid(),
      warnings: [],
      events: this.deps.events,
    };
  }
}
