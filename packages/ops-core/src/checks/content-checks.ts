import { ACK_MARKERS, REFUSAL_PHRASE } from '../constants';
import { chatCompletionResponseSchema, searchResponseSchema, type MatchMode, type SearchHit } from '../schemas';
import { parseBody, readPath } from '../utils';
import { fail, pass, type CheckResult } from './check-result';

/**
 * Assistant text of a non-streaming completion, or null if the body is not one
 */
export function chatContent(body: string): string | null {
  const parsed = parseBody(body, chatCompletionResponseSchema);
  return parsed.ok ? parsed.data.choices[0].message.content : null;
}

/**
 * Text a needle is searched in: the raw body, or the answer plus its sources
 */
export function chatHaystack(body: string, mode: MatchMode): string {
  if (mode === 'substring') return body;

  const parsed = parseBody(body, chatCompletionResponseSchema);
  if (!parsed.ok) return '';

  const content = parsed.data.choices[0].message.content ?? '';
  const sources = parsed.data.sources === undefined ? '' : JSON.stringify(parsed.data.sources);
  return `${content}\n${sources}`;
}

/**
 * The "say only OK" routing check.
 * The refusal phrase anywhere in the body means the prompt was routed into document search.
 */
export function checkAcknowledgement(body: string, mode: MatchMode): CheckResult {
  const refused = body.includes(REFUSAL_PHRASE);
  let acknowledged: boolean;

  if (mode === 'substring') {
    acknowledged = ACK_MARKERS.some((marker) => body.includes(marker));
  } else {
    const content = chatContent(body);
    if (content === null) {
      return fail('Non-stream response is not a chat completion');
    }
    const answer = content.trim();
    acknowledged = answer === 'OK' || answer.startsWith('OK.');
  }

  if (!acknowledged) {
    return fail('Non-stream did not return OK (routing broken?)');
  }
  if (refused) {
    return fail('Non-stream routed to RAG incorrectly');
  }
  return pass('Non-stream chat returns OK');
}

export function checkContains(haystack: string, needle: string, label: string): CheckResult {
  return haystack.includes(needle) ? pass(`${label}: found '${needle}'`) : fail(`${label}: '${needle}' not found`);
}

export function hitFilename(hit: SearchHit): string | undefined {
  const filename = readPath(hit._source, ['file', 'filename']);
  return typeof filename === 'string' ? filename : undefined;
}

/**
 * Filenames of the returned hits
 */
export function hitFilenames(body: string): string[] {
  const parsed = parseBody(body, searchResponseSchema);
  if (!parsed.ok) return [];

  return parsed.data.hits.hits.map(hitFilename).filter((name): name is string => name !== undefined);
}

/**
 * Golden-file lookup in a search response
 */
export function checkHitFile(body: string, filename: string, mode: MatchMode): CheckResult {
  const found = mode === 'substring' ? body.includes(filename) : hitFilenames(body).includes(filename);
  return found ? pass(`ES ground truth: Found '${filename}'`) : fail(`ES did not find expected file '${filename}'`);
}

export interface EmptyContentEstimate {
  sample: number;
  empty: number;
  emptyPct: number;
  examples: string[];
}

/**
 * Share of sampled documents whose extracted content is missing or blank
 */
export function estimateEmptyContent(hits: readonly SearchHit[], maxExamples: number): EmptyContentEstimate {
  let empty = 0;
  const examples: string[] = [];

  for (const hit of hits) {
    const content = readPath(hit._source, ['content']);
    const blank = content === undefined || content === null || (typeof content === 'string' && content.trim() === '');

    if (!blank) continue;

    empty++;
    if (examples.length < maxExamples) {
      const real = readPath(hit._source, ['path', 'real']);
      examples.push(hitFilename(hit) || (typeof real === 'string' && real) || 'unknown');
    }
  }

  const sample = hits.length;
  return { sample, empty, emptyPct: sample ? (empty / sample) * 100 : 0, examples };
}

export function formatEmptyContent(estimate: EmptyContentEstimate): string {
  return `sample=${estimate.sample} empty=${estimate.empty} empty_pct=${estimate.emptyPct.toFixed(1)}%`;
}

/**
 * Empty-content share must stay at or below the allowed percentage
 */
export function checkEmptyContentBudget(estimate: EmptyContentEstimate, maxPct: number): CheckResult {
  const pct = estimate.emptyPct.toFixed(1);
  return estimate.emptyPct <= maxPct
    ? pass(`empty content ${pct}% within limit (${maxPct}%)`)
    : fail(`empty content ${pct}% above limit (${maxPct}%)`);
}

/**
 * A completion with non-blank assistant text
 */
export function checkAnswered(body: string): CheckResult {
  const content = chatContent(body);

  if (content === null) return fail('response is not a chat completion');
  if (content.trim() === '') return fail('answer is empty');
  return pass(`answer received (${content.length} chars)`);
}
