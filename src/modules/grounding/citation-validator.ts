import { INSUFFICIENT_EVIDENCE, type Citation, type GroundedExplanation } from '../../common/types.js';

export interface CitationPolicy {
  /** Exact host every citation URL must carry, e.g. `learn.microsoft.com`. */
  host: string;
  snippetWordCap: number;
  /** URLs actually fetched for this question. */
  fetchedUrls: ReadonlySet<string>;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

export function isAllowedCitationUrl(url: string, host: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  return parsed.protocol === 'https:' && parsed.host === host.toLowerCase() && !parsed.username && !parsed.password;
}

/** Drops every citation that fails the policy, then duplicates of the same (url, snippet). */
export function validateCitations(citations: readonly Citation[], policy: CitationPolicy): Citation[] {
  const kept: Citation[] = [];
  const seen = new Set<string>();
  for (const citation of citations) {
    const title = citation.title.trim();
    const snippet = citation.snippet.trim();
    const url = citation.url.trim();
    if (!title) continue;
    if (!policy.fetchedUrls.has(url)) continue;
    if (!isAllowedCitationUrl(url, policy.host)) continue;
    if (countWords(snippet) > policy.snippetWordCap) continue;
    const key = `${url}\n${snippet}`;
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push({ title, url, snippet });
  }
  return kept;
}

export function insufficientEvidence(questionId: string): GroundedExplanation {
  return { questionId, explanation: INSUFFICIENT_EVIDENCE, citations: [] };
}

/**
 * Builds a grounded explanation that holds the citation invariant: either at
 * least one citation, or the insufficient-evidence marker with none.
 */
export function groundedExplanation(questionId: string, explanation: string, citations: Citation[]): GroundedExplanation {
  const text = explanation.trim();
  if (citations.length === 0 || !text || text === INSUFFICIENT_EVIDENCE) {
    return insufficientEvidence(questionId);
  }
  return { questionId, explanation: text, citations };
}

export function holdsCitationInvariant(entry: GroundedExplanation): boolean {
  return entry.citations.length > 0
    ? entry.explanation !== INSUFFICIENT_EVIDENCE
    : entry.explanation === INSUFFICIENT_EVIDENCE;
}
