import {
  createPrinter,
  createStackClients,
  sleep,
  type OpsConfig,
  type Printer,
  type StackClients
} from '@ragops/core';
import { ComposeClient } from './docker/compose-client';
import { SpawnCommandRunner, type CommandRunner } from './docker/command-runner';

/**
 * Everything a lifecycle command touches, injectable for tests
 */
export interface StackContext {
  config: OpsConfig;
  clients: StackClients;
  compose: ComposeClient;
  printer: Printer;
  sleep: (ms: number) => Promise<void>;
  now: () => Date;
}

export interface StackContextOverrides {
  runner?: CommandRunner;
  printer?: Printer;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export function createStackContext(config: OpsConfig, overrides: StackContextOverrides = {}): StackContext {
  const runner = overrides.runner ?? new SpawnCommandRunner();

  return {
    config,
    clients: createStackClients(config),
    compose: new ComposeClient(runner, { composeFile: config.composeFile, cwd: config.composeDir }),
    printer: overrides.printer ?? createPrinter(),
    sleep: overrides.sleep ?? sleep,
    now: overrides.now ?? (() => new Date())
  };
}
