import { NO_EXACT_HITS_ANSWER } from '../constants';
import { chatContent } from './content-checks';
import { fail, pass, type CheckResult } from './check-result';

/**
 * The agent found something unless it answered nothing or the explicit no-hits text
 */
export function agentHasHits(body: string): boolean {
  const content = chatContent(body);
  return content !== null && content.trim() !== '' && content !== NO_EXACT_HITS_ANSWER;
}

/**
 * Compare one phrase's observed hits against its expectation.
 * `esHits` is null when the search response could not be read.
 */
export function checkPhraseExpectation(shouldHit: boolean, esHits: number | null, agentHits: boolean): CheckResult {
  if (esHits === null) {
    return fail('ES response unreadable');
  }

  if (shouldHit) {
    if (esHits === 0) return fail('ES should have hits but got 0');
    if (!agentHits) return fail('Agent should have hits but got none');
    return pass('Both ES and Agent found hits');
  }

  if (esHits > 0) return fail(`ES should have 0 hits but got ${esHits}`);
  if (agentHits) return fail('Agent should have 0 hits but got some');
  return pass('Both ES and Agent correctly returned no hits');
}
