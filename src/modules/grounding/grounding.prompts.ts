import { z } from 'zod';
import { citationSchema } from '../../common/schemas.js';
import {
  INSUFFICIENT_EVIDENCE,
  MISCONCEPTION_LABELS,
  type DiagnosisResult,
  type Question,
} from '../../common/types.js';

export const QUERY_SYSTEM_PROMPT = `You write documentation search queries for a certification exam tutor.
Given a question and the student's diagnosis, produce one short query that
would find official documentation explaining the correct answer.
Output ONLY valid JSON: { "query": "<query, at most 12 words>" }`;

export const searchQuerySchema = z.object({
  query: z.string().trim().min(1).max(300),
});

export const EXPLANATION_SYSTEM_PROMPT = `You explain exam answers using official documentation only.
Rules:
- Cite ONLY the documents listed in the request, using their exact URLs.
- Each snippet must be copied from the document text and stay within the word limit.
- If the documents do not support an explanation, return
  { "explanation": "${INSUFFICIENT_EVIDENCE}", "citations": [] }.
Output ONLY valid JSON:
{
  "explanation": "<two or three sentences>",
  "citations": [ { "title": "<title>", "url": "<url>", "snippet": "<short quote>" } ]
}`;

export const explanationSchema = z.object({
  explanation: z.string(),
  citations: z.array(citationSchema),
});

export type ExplanationDraft = z.infer<typeof explanationSchema>;

export interface CandidateDocument {
  url: string;
  title: string;
  content: string;
}

const EXCERPT_CHARS = 2000;

function describeResult(question: Question, result: DiagnosisResult): string[] {
  const lines = [
    `Domain: ${question.domain}`,
    `Question: ${question.stem}`,
    `Correct answer: ${question.choices[question.answerIndex]}`,
    `Student was ${result.correct ? 'correct' : 'incorrect'}: ${result.why}`,
  ];
  if (result.misconceptionId) {
    lines.push(`Misconception: ${MISCONCEPTION_LABELS[result.misconceptionId]}`);
  }
  return lines;
}

export function buildQueryPrompt(question: Question, result: DiagnosisResult): string {
  return describeResult(question, result).join('\n');
}

/** Used when the query stage cannot produce a usable query. */
export function fallbackQuery(question: Question): string {
  return `${question.domain}: ${question.stem}`.slice(0, 300).trim();
}

export function buildExplanationPrompt(
  question: Question,
  result: DiagnosisResult,
  documents: CandidateDocument[],
  snippetWordCap: number,
): string {
  const sources = documents.map(
    (doc, index) => `[${index + 1}] ${doc.title}\nURL: ${doc.url}\n${doc.content.slice(0, EXCERPT_CHARS)}`,
  );
  return [
    ...describeResult(question, result),
    `Snippet limit: ${snippetWordCap} words`,
    '',
    'Documents:',
    sources.join('\n\n'),
  ].join('\n');
}
