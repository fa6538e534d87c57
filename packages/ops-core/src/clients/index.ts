import type { OpsConfig } from '../schemas';
import { AgentClient } from './agent-client';
import { ElasticsearchClient } from './elasticsearch-client';
import { LlmClient } from './llm-client';
import { ProbeClient } from './probe-client';

export * from './agent-client';
export * from './elasticsearch-client';
export * from './llm-client';
export * from './probe-client';

export interface StackClients {
  probe: ProbeClient;
  es: ElasticsearchClient;
  agent: AgentClient;
  llm: LlmClient;
}

/**
 * Wire every client from one config.
 * With `readOnlyIndex`, the probe refuses mutating requests to the search index.
 */
export function createStackClients(config: OpsConfig, options: { readOnlyIndex?: boolean } = {}): StackClients {
  const probe = new ProbeClient({
    timeoutMs: config.maxTimeMs,
    outputDir: config.outputDir,
    readOnlyUrls: options.readOnlyIndex ? [config.esUrl] : []
  });

  return {
    probe,
    es: new ElasticsearchClient(probe, config.esUrl, config.indexName),
    agent: new AgentClient(probe, config.agentUrl, config.llmModel),
    llm: new LlmClient(probe, config.ollamaUrl)
  };
}
