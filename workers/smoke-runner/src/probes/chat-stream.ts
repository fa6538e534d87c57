import { ACK_PROMPT, checkHttpStatus, checkSseFraming, fail, pass } from '@ragops/core';
import type { ScriptContext } from '../suites/script';

export async function probeChatStream(ctx: ScriptContext): Promise<void> {
  const { config, clients, printer } = ctx;

  const stream = await clients.agent.chatStream(ACK_PROMPT, {
    timeoutMs: config.streamMaxTimeMs,
    saveAs: 'agent_stream.txt'
  });

  ctx.expect(checkHttpStatus('Agent stream', stream.status));
  ctx.expect(
    stream.timedOut
      ? fail(`stream still open after ${config.streamMaxTimeMs}ms`)
      : pass(`stream closed after ${stream.durationMs}ms`)
  );

  printer.line(stream.body.split('\n').slice(0, 20).join('\n'));

  const framing = checkSseFraming(stream.body);
  ctx.expect(framing);
  ctx.expect(
    framing.firstLineIsData
      ? pass(`first line is a data: line (first byte after ${stream.firstByteMs ?? '?'}ms)`)
      : fail('first line is not a data: line')
  );
}
