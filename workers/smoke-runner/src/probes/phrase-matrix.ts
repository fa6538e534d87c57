import { promises as fs } from 'fs';
import {
  ConfigError,
  agentHasHits,
  chatContent,
  checkPhraseExpectation,
  matrixPrompt,
  pageHitCount,
  phraseMatrixSchema,
  type PhraseMatrix
} from '@ragops/core';
import type { ScriptBody, ScriptContext } from '../suites/script';

export async function loadPhraseMatrix(file: string): Promise<PhraseMatrix> {
  const raw = await fs.readFile(file, 'utf8');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Phrase matrix ${file} is not JSON`, {
      file,
      reason: error instanceof Error ? error.message : String(error)
    });
  }

  const parsed = phraseMatrixSchema.safeParse(json);

  if (!parsed.success) {
    throw new ConfigError(`Invalid phrase matrix ${file}: ${parsed.error.issues[0].message}`, { file });
  }

  return parsed.data;
}

async function probePhrase(ctx: ScriptContext, phrase: string, shouldHit: boolean): Promise<boolean> {
  const { config, clients, printer } = ctx;

  printer.line();
  printer.line(`Testing phrase: '${phrase}' (should_hit=${shouldHit})`);

  const search = await clients.es.search({ size: 1, query: { match_phrase: { content: phrase } } });
  const esHits = search.status === 200 ? pageHitCount(search.body) : null;

  const answer = await clients.agent.chat(matrixPrompt(phrase), { timeoutMs: config.chatMaxTimeMs });
  const agentHits = agentHasHits(answer.body);

  printer.line(`  ES hits: ${esHits ?? 'n/a'}`);
  printer.line(`  Agent has hits: ${agentHits}`);
  printer.line(`  Agent response: ${chatContent(answer.body) ?? 'null'}`);

  return ctx.expect(checkPhraseExpectation(shouldHit, esHits, agentHits), phrase);
}

/**
 * Phrases that must hit in both the index and the agent, and phrases that must miss in both
 */
export function probePhraseMatrix(matrixFile: string): ScriptBody {
  return async (ctx) => {
    const matrix = await loadPhraseMatrix(matrixFile);
    let total = 0;
    let passed = 0;

    ctx.printer.line('Testing phrases that SHOULD HIT:');
    for (const phrase of matrix.shouldHit) {
      total++;
      if (await probePhrase(ctx, phrase, true)) passed++;
    }

    ctx.printer.line();
    ctx.printer.line('Testing phrases that SHOULD MISS:');
    for (const phrase of matrix.shouldMiss) {
      total++;
      if (await probePhrase(ctx, phrase, false)) passed++;
    }

    ctx.printer.line();
    ctx.printer.rule();
    ctx.printer.line('MATRIX EXACT PHRASES SUMMARY');
    ctx.printer.rule();
    ctx.printer.line(`Total tests: ${total}`);
    ctx.printer.line(`Passed: ${passed}`);
    ctx.printer.line(`Failed: ${total - passed}`);
  };
}
