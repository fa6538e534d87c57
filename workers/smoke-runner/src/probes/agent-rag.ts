import { RELEASE_RAG_PROMPTS, chatContent, checkAnswered, checkHttpStatus } from '@ragops/core';
import type { ScriptContext } from '../suites/script';

export async function probeAgentRag(ctx: ScriptContext): Promise<void> {
  const { config, clients, printer } = ctx;

  for (const [index, prompt] of RELEASE_RAG_PROMPTS.entries()) {
    printer.line(`--- Prompt: ${prompt}`);

    const answer = await clients.agent.chat(prompt, { timeoutMs: config.chatMaxTimeMs });
    ctx.expect(checkHttpStatus(`Prompt ${index + 1}`, answer.status));
    ctx.expect(checkAnswered(answer.body), `Prompt ${index + 1}`);

    printer.line((chatContent(answer.body) ?? answer.body).slice(0, 2600));
    printer.line();
  }
}
