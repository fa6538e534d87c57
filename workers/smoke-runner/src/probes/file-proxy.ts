import { checkOpenStatus } from '@ragops/core';
import type { ScriptContext } from '../suites/script';

export async function probeFileProxy(ctx: ScriptContext): Promise<void> {
  const { config, clients, printer } = ctx;

  printer.line(`Opening ${clients.agent.openUrl(config.openProbePath)}`);
  const response = await clients.agent.open(config.openProbePath);
  ctx.expect(checkOpenStatus(response.status));
}
