import { ACK_PROMPT, checkAcknowledgement, checkHttpStatus } from '@ragops/core';
import type { ScriptContext } from '../suites/script';

/**
 * A trivial prompt must reach the model directly, not the document search
 */
export async function probeChatNonStream(ctx: ScriptContext): Promise<void> {
  const { config, clients, printer } = ctx;

  const answer = await clients.agent.chat(ACK_PROMPT, { timeoutMs: config.chatMaxTimeMs, saveAs: 'agent_ack.json' });
  ctx.expect(checkHttpStatus('Agent chat', answer.status));
  printer.line(answer.body.slice(0, 800));
  ctx.expect(checkAcknowledgement(answer.body, config.matchMode));
}
