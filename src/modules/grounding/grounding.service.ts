import { z } from 'zod';
import { mapWithConcurrency } from '../../common/concurrency.js';
import { ToolDeniedError, describeError } from '../../common/errors.js';
import { moduleLogger } from '../../common/logger.js';
import {
  INSUFFICIENT_EVIDENCE,
  type Diagnosis,
  type DiagnosisResult,
  type Exam,
  type GroundedExplanation,
  type Question,
  type StageReport,
  type StageStatus,
} from '../../common/types.js';
import type { GroundingConfig } from '../../config/index.js';
import { stubCitationFor } from '../agents/offline-stubs.js';
import type { DocumentCache, DocumentFetcher } from '../cache/document-cache.js';
import { runStage, summarizeStage, type StageRuntime } from '../pipeline/stage-runner.js';
import type { GatedToolClient } from '../tools/tool-client.js';
import {
  groundedExplanation,
  insufficientEvidence,
  isAllowedCitationUrl,
  validateCitations,
} from './citation-validator.js';
import {
  EXPLANATION_SYSTEM_PROMPT,
  QUERY_SYSTEM_PROMPT,
  buildExplanationPrompt,
  buildQueryPrompt,
  explanationSchema,
  fallbackQuery,
  searchQuerySchema,
  type CandidateDocument,
} from './grounding.prompts.js';

const log = moduleLogger('grounding');

const MAX_SEARCH_LIMIT = 10;

const searchResponseSchema = z.union([z.array(z.unknown()), z.object({ results: z.array(z.unknown()) })]);
const searchHitSchema = z.object({ url: z.string(), title: z.string().optional() });
const fetchedDocumentSchema = z.union([z.string(), z.object({ content: z.string() }), z.object({ text: z.string() })]);

export interface SearchCandidate {
  url: string;
  title: string;
}

type StageAttempt = { status: StageStatus; attempts: number };

export interface QuestionGrounding {
  explanation: GroundedExplanation;
  attempts: StageAttempt[];
}

export interface GroundingRun {
  grounded: GroundedExplanation[];
  report: StageReport;
}

/**
 * Picks at most `limit` unique search hits on the citation host. Anything
 * that is not a list of `{ url, title? }` hits yields no candidates.
 */
export function selectCandidates(raw: unknown, host: string, limit: number): SearchCandidate[] {
  const parsed = searchResponseSchema.safeParse(raw);
  if (!parsed.success) {
    return [];
  }
  const hits = Array.isArray(parsed.data) ? parsed.data : parsed.data.results;
  const candidates: SearchCandidate[] = [];
  const seen = new Set<string>();
  for (const item of hits) {
    if (candidates.length >= limit) break;
    const hit = searchHitSchema.safeParse(item);
    if (!hit.success) continue;
    const url = hit.data.url.trim();
    if (seen.has(url) || !isAllowedCitationUrl(url, host)) continue;
    seen.add(url);
    candidates.push({ url, title: hit.data.title?.trim() || url });
  }
  return candidates;
}

/** Document fetcher for the cache that goes through the gated `document-fetch` tool. */
export function createToolDocumentFetcher(tools: GatedToolClient): DocumentFetcher {
  return async url => {
    const raw = await tools.call('document-fetch', { url });
    const parsed = fetchedDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error('document-fetch returned no content');
    }
    const data = parsed.data;
    return typeof data === 'string' ? data : 'content' in data ? data.content : data.text;
  };
}

export function offlineGrounding(question: Question): GroundedExplanation {
  const explanation = `The correct answer is choice ${question.answerIndex + 1}. ${question.rationaleDraft}`.trim();
  return groundedExplanation(question.id, explanation, [stubCitationFor(question.domain)]);
}

export interface GroundingVerifierDeps {
  tools: GatedToolClient;
  cache: DocumentCache;
  config: GroundingConfig;
}

export class GroundingVerifier {
  constructor(private readonly deps: GroundingVerifierDeps) {}

  /** One explanation per diagnosis entry, in diagnosis order. */
  async groundAll(exam: Exam, diagnosis: Diagnosis, runtime: StageRuntime): Promise<GroundingRun> {
    const questions = new Map(exam.questions.map(question => [question.id, question]));
    const runs = await mapWithConcurrency(diagnosis.results, this.deps.config.concurrency, async result => {
      const question = questions.get(result.id);
      if (!question) {
        return { explanation: insufficientEvidence(result.id), attempts: [] };
      }
      return this.ground(question, result, runtime);
    });
    return {
      grounded: runs.map(run => run.explanation),
      report: summarizeStage(
        'ground',
        runs.flatMap(run => run.attempts),
      ),
    };
  }

  async ground(question: Question, result: DiagnosisResult, runtime: StageRuntime): Promise<QuestionGrounding> {
    if (!runtime.invoke) {
      return { explanation: offlineGrounding(question), attempts: [{ status: 'stub', attempts: 0 }] };
    }
    const attempts: StageAttempt[] = [];
    try {
      const explanation = await this.groundOnline(question, result, runtime, attempts);
      return { explanation, attempts };
    } catch (error) {
      log.warn({ questionId: question.id, sessionId: runtime.sessionId, err: describeError(error) }, 'grounding failed');
      runtime.warnings.push(
        `Grounding for question ${question.id} failed; marked insufficient evidence. (${describeError(error)})`,
      );
      return { explanation: insufficientEvidence(question.id), attempts };
    }
  }

  private async groundOnline(
    question: Question,
    result: DiagnosisResult,
    runtime: StageRuntime,
    attempts: StageAttempt[],
  ): Promise<GroundedExplanation> {
    const { config, tools, cache } = this.deps;

    const query = await runStage(runtime, {
      stage: 'ground',
      label: `Grounding query for question ${question.id}`,
      agent: 'grounding',
      systemPrompt: QUERY_SYSTEM_PROMPT,
      userPrompt: buildQueryPrompt(question, result),
      schemaName: 'SearchQuery',
      schema: searchQuerySchema,
      fallback: () => ({ query: fallbackQuery(question) }),
    });
    attempts.push(query);

    let hits: unknown;
    try {
      hits = await tools.call('document-search', {
        query: query.value.query,
        limit: Math.min(MAX_SEARCH_LIMIT, config.maxCandidates * 3),
      });
    } catch (error) {
      if (!(error instanceof ToolDeniedError)) {
        throw error;
      }
      return insufficientEvidence(question.id);
    }

    const candidates = selectCandidates(hits, config.citationHost, config.maxCandidates);
    const documents: CandidateDocument[] = [];
    for (const candidate of candidates) {
      try {
        const entry = await cache.getOrFetch(candidate.url);
        documents.push({ url: candidate.url, title: candidate.title, content: entry.content });
      } catch (error) {
        log.warn({ questionId: question.id, url: candidate.url, err: describeError(error) }, 'candidate skipped');
      }
    }
    if (documents.length === 0) {
      log.info({ questionId: question.id, candidates: candidates.length }, 'no documents to ground on');
      return insufficientEvidence(question.id);
    }

    const draft = await runStage(runtime, {
      stage: 'ground',
      label: `Grounding explanation for question ${question.id}`,
      agent: 'grounding',
      systemPrompt: EXPLANATION_SYSTEM_PROMPT,
      userPrompt: buildExplanationPrompt(question, result, documents, config.snippetWordCap),
      schemaName: 'GroundedExplanation',
      schema: explanationSchema,
      fallback: () => ({ explanation: INSUFFICIENT_EVIDENCE, citations: [] }),
    });
    attempts.push(draft);

    const citations = validateCitations(draft.value.citations, {
      host: config.citationHost,
      snippetWordCap: config.snippetWordCap,
      fetchedUrls: new Set(documents.map(doc => doc.url)),
    });
    return groundedExplanation(question.id, draft.value.explanation, citations);
  }
}
