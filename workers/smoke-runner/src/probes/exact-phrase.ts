import { OPEN_URL_MARKER, chatHaystack, checkContains, checkHitFile, checkHttpStatus, exactPhrasePrompt } from '@ragops/core';
import type { ScriptContext } from '../suites/script';

/**
 * Golden path: the index finds the golden file for the golden phrase,
 * and the agent names it with a file-proxy link.
 * Exits 30/31 when the index fails, 40/41 when the agent does.
 */
export async function probeExactPhrase(ctx: ScriptContext): Promise<void> {
  const { config, clients, printer } = ctx;

  printer.line(`Testing phrase: '${config.goldenPhrase}'`);
  printer.line(`Expected file: '${config.goldenFile}'`);

  printer.line('1. Checking ES ground truth...');
  const search = await clients.es.searchPhrase(config.goldenPhrase, 5, { saveAs: 'es_exact.json' });
  ctx.expect(checkHttpStatus('ES search', search.status), undefined, 30);
  ctx.expect(checkHitFile(search.body, config.goldenFile, config.matchMode), undefined, 31);

  printer.line('2. Checking Agent exact phrase...');
  const answer = await clients.agent.chat(exactPhrasePrompt(config.goldenPhrase), {
    timeoutMs: config.chatMaxTimeMs,
    saveAs: 'agent_exact.json'
  });
  ctx.expect(checkHttpStatus('Agent chat', answer.status), undefined, 40);

  const haystack = chatHaystack(answer.body, config.matchMode);
  ctx.expect(checkContains(haystack, config.goldenFile, 'Agent answer'), undefined, 40);
  ctx.expect(checkContains(haystack, OPEN_URL_MARKER, 'Agent sources'), undefined, 41);
  ctx.expect(checkContains(haystack, encodeURIComponent(config.goldenFile), 'Agent sources'), undefined, 41);
}
