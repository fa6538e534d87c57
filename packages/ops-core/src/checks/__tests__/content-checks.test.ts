import { describe, it, expect } from 'vitest';
import { buildChatCompletion, buildSearchResponse } from '@ragops/test-utils';
import { searchResponseSchema } from '../../schemas';
import {
  chatContent,
  chatHaystack,
  checkAcknowledgement,
  checkAnswered,
  checkContains,
  checkEmptyContentBudget,
  checkHitFile,
  estimateEmptyContent,
  formatEmptyContent,
  hitFilenames
} from '../content-checks';

const GOLDEN_FILE = 'Sockelkosten Konzeptphase.xlsx';

describe('checkAcknowledgement', () => {
  describe('substring mode', () => {
    it('should pass on a literal "content":"OK"', () => {
      const result = checkAcknowledgement('{"choices":[{"message":{"role":"assistant","content":"OK"}}]}', 'substring');

      expect(result).toEqual({ ok: true, detail: 'Non-stream chat returns OK' });
    });

    it('should pass on "content":"OK." with trailing text', () => {
      const result = checkAcknowledgement(buildChatCompletion('OK. Alles klar.'), 'substring');

      expect(result.ok).toBe(true);
    });

    it('should fail when the answer is the refusal phrase', () => {
      const result = checkAcknowledgement(buildChatCompletion('Nicht in den Dokumenten gefunden'), 'substring');

      expect(result).toEqual({ ok: false, detail: 'Non-stream did not return OK (routing broken?)' });
    });

    it('should fail when OK comes with the refusal phrase elsewhere in the body', () => {
      const body = buildChatCompletion('OK.', { sources: ['Nicht in den Dokumenten gefunden'] });

      expect(checkAcknowledgement(body, 'substring')).toEqual({
        ok: false,
        detail: 'Non-stream routed to RAG incorrectly'
      });
    });

    it('should accept a marker outside the answer field', () => {
      const body = '{"choices":[{"message":{"content":"Nope"}}],"debug":{"content":"OK"}}';

      expect(checkAcknowledgement(body, 'substring').ok).toBe(true);
    });
  });

  describe('structured mode', () => {
    it('should pass on a padded OK answer', () => {
      expect(checkAcknowledgement(buildChatCompletion(' OK '), 'structured').ok).toBe(true);
      expect(checkAcknowledgement(buildChatCompletion(' OK '), 'substring').ok).toBe(false);
    });

    it('should only look at the answer field', () => {
      const body = '{"choices":[{"message":{"content":"Nope"}}],"debug":{"content":"OK"}}';

      expect(checkAcknowledgement(body, 'structured')).toEqual({
        ok: false,
        detail: 'Non-stream did not return OK (routing broken?)'
      });
    });

    it('should fail on the refusal phrase', () => {
      const result = checkAcknowledgement(buildChatCompletion('Nicht in den Dokumenten gefunden.'), 'structured');

      expect(result.ok).toBe(false);
    });

    it('should fail when the refusal phrase comes back in the sources', () => {
      const body = buildChatCompletion('OK', { sources: ['Nicht in den Dokumenten gefunden'] });

      expect(checkAcknowledgement(body, 'structured')).toEqual({
        ok: false,
        detail: 'Non-stream routed to RAG incorrectly'
      });
    });

    it('should fail on a body that is not a completion', () => {
      expect(checkAcknowledgement('OK', 'structured')).toEqual({
        ok: false,
        detail: 'Non-stream response is not a chat completion'
      });
    });
  });
});

describe('chatContent / chatHaystack', () => {
  it('should extract the first choice content', () => {
    expect(chatContent(buildChatCompletion('Hallo'))).toBe('Hallo');
    expect(chatContent('{"error":"boom"}')).toBeNull();
  });

  it('should join answer and sources in structured mode', () => {
    const body = buildChatCompletion('Datei gefunden', { sources: [{ url: '/open?path=%2Fa.pdf' }] });

    expect(chatHaystack(body, 'structured')).toBe('Datei gefunden\n[{"url":"/open?path=%2Fa.pdf"}]');
    expect(chatHaystack(body, 'substring')).toBe(body);
  });
});

describe('checkContains', () => {
  it('should report found and missing needles', () => {
    expect(checkContains('see /open?path=x', '/open?path=', 'Agent sources')).toEqual({
      ok: true,
      detail: "Agent sources: found '/open?path='"
    });
    expect(checkContains('nothing here', GOLDEN_FILE, 'Agent answer')).toEqual({
      ok: false,
      detail: `Agent answer: '${GOLDEN_FILE}' not found`
    });
  });
});

describe('checkHitFile', () => {
  it('should find the golden file among hits', () => {
    const body = buildSearchResponse([{ filename: 'other.pdf' }, { filename: GOLDEN_FILE }]);

    expect(hitFilenames(body)).toEqual(['other.pdf', GOLDEN_FILE]);
    expect(checkHitFile(body, GOLDEN_FILE, 'substring')).toEqual({
      ok: true,
      detail: `ES ground truth: Found '${GOLDEN_FILE}'`
    });
    expect(checkHitFile(body, GOLDEN_FILE, 'structured').ok).toBe(true);
  });

  it('should only match the filename field in structured mode', () => {
    const body = buildSearchResponse([{ real: `/data/${GOLDEN_FILE}` }]);

    expect(checkHitFile(body, GOLDEN_FILE, 'substring').ok).toBe(true);
    expect(checkHitFile(body, GOLDEN_FILE, 'structured')).toEqual({
      ok: false,
      detail: `ES did not find expected file '${GOLDEN_FILE}'`
    });
  });
});

describe('estimateEmptyContent', () => {
  const hitsOf = (body: string) => searchResponseSchema.parse(JSON.parse(body)).hits.hits;

  it('should count missing, null and blank content', () => {
    const hits = hitsOf(
      buildSearchResponse([
        { filename: 'a.pdf', content: 'Text' },
        { filename: 'b.pdf', content: '   ' },
        { real: '/x/c.msg', content: null },
        {}
      ])
    );

    const estimate = estimateEmptyContent(hits, 5);

    expect(estimate).toEqual({ sample: 4, empty: 3, emptyPct: 75, examples: ['b.pdf', '/x/c.msg', 'unknown'] });
    expect(formatEmptyContent(estimate)).toBe('sample=4 empty=3 empty_pct=75.0%');
  });

  it('should cap the examples', () => {
    const hits = hitsOf(buildSearchResponse([{ filename: 'a' }, { filename: 'b' }, { filename: 'c' }]));

    expect(estimateEmptyContent(hits, 2).examples).toEqual(['a', 'b']);
  });

  it('should report zero for an empty sample', () => {
    expect(formatEmptyContent(estimateEmptyContent([], 5))).toBe('sample=0 empty=0 empty_pct=0.0%');
  });
});

describe('checkEmptyContentBudget', () => {
  const estimate = { sample: 200, empty: 15, emptyPct: 7.5, examples: [] };

  it('should pass at or below the limit', () => {
    expect(checkEmptyContentBudget(estimate, 7.5)).toEqual({ ok: true, detail: 'empty content 7.5% within limit (7.5%)' });
  });

  it('should fail above the limit', () => {
    expect(checkEmptyContentBudget(estimate, 5)).toEqual({ ok: false, detail: 'empty content 7.5% above limit (5%)' });
  });
});

describe('checkAnswered', () => {
  it('should accept non-blank content', () => {
    expect(checkAnswered(buildChatCompletion('Drei Dateien gefunden'))).toEqual({
      ok: true,
      detail: 'answer received (21 chars)'
    });
  });

  it('should reject blank content and non-completions', () => {
    expect(checkAnswered(buildChatCompletion(' '))).toEqual({ ok: false, detail: 'answer is empty' });
    expect(checkAnswered('{"detail":"Not Found"}')).toEqual({ ok: false, detail: 'response is not a chat completion' });
  });
});
