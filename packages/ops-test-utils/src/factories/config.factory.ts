import { loadOpsConfig, type OpsConfig } from '@ragops/core';

/**
 * Config as an entry point would load it, with test-friendly overrides
 */
export function buildOpsConfig(env: Record<string, string> = {}): OpsConfig {
  return loadOpsConfig({ LOG_LEVEL: 'silent', ...env });
}
