import { z } from 'zod';
import * as os from 'os';
import * as path from 'path';
import {
  CHAT_MAX_TIME_MS,
  DEFAULT_GOLDEN_FILE,
  DEFAULT_GOLDEN_PHRASE,
  DEFAULT_MAX_TIME_MS,
  DEFAULT_OPEN_PROBE_PATH,
  DEFAULT_TEST_TIMEOUT_SEC,
  DEFAULT_WAIT_SLEEP_SEC,
  DEFAULT_WAIT_TRIES,
  DOCKER_WAIT_TRIES,
  MIN_DOC_COUNT,
  RELEASE_MAX_EMPTY_PCT,
  RELEASE_SAMPLE_SIZE,
  STOP_GRACE_SEC,
  STREAM_MAX_TIME_MS
} from '../constants';
import { ConfigError } from '../errors';

const baseUrl = (fallback: string) =>
  z.string().url().default(fallback).transform((url) => url.replace(/\/+$/, ''));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

/**
 * How response bodies are inspected.
 * `substring` greps the raw body; `structured` parses JSON and looks at named fields.
 */
export const matchModeSchema = z.enum(['substring', 'structured']);

export type MatchMode = z.infer<typeof matchModeSchema>;

/**
 * Environment variables understood by every entry point
 */
export const opsEnvSchema = z.object({
  ES_URL: baseUrl('http://localhost:9200'),
  INDEX_NAME: z.string().min(1).default('rag_files_v1'),
  AGENT_URL: baseUrl('http://localhost:11436'),
  OLLAMA_URL: baseUrl('http://localhost:11434'),
  WEBUI_URL: baseUrl('http://localhost:8086'),
  LLM_MODEL: z.string().min(1).default('llama4:latest'),
  COMPOSE_DIR: z.string().min(1).default(() => process.cwd()),
  COMPOSE_FILE: z.string().min(1).default('docker-compose.yml'),
  OUTPUT_DIR: z.string().min(1).default(() => path.join(os.tmpdir(), 'ragops_tests')),
  REPORT_DIR: z.string().min(1).default('tests/reports'),
  SHUTDOWN_LOG_DIR: z.string().min(1).default('ops/_shutdown_logs'),
  MAX_TIME_MS: positiveInt(DEFAULT_MAX_TIME_MS),
  CHAT_MAX_TIME_MS: positiveInt(CHAT_MAX_TIME_MS),
  STREAM_MAX_TIME_MS: positiveInt(STREAM_MAX_TIME_MS),
  TEST_TIMEOUT_SEC: positiveInt(DEFAULT_TEST_TIMEOUT_SEC),
  WAIT_TRIES: positiveInt(DEFAULT_WAIT_TRIES),
  WAIT_SLEEP_SEC: z.coerce.number().nonnegative().default(DEFAULT_WAIT_SLEEP_SEC),
  DOCKER_WAIT_TRIES: positiveInt(DOCKER_WAIT_TRIES),
  STOP_GRACE_SEC: z.coerce.number().int().nonnegative().default(STOP_GRACE_SEC),
  MIN_DOC_COUNT: z.coerce.number().int().nonnegative().default(MIN_DOC_COUNT),
  GOLDEN_PHRASE: z.string().min(1).default(DEFAULT_GOLDEN_PHRASE),
  GOLDEN_FILE: z.string().min(1).default(DEFAULT_GOLDEN_FILE),
  OPEN_PROBE_PATH: z.string().startsWith('/').default(DEFAULT_OPEN_PROBE_PATH),
  CHECK_MATCH_MODE: matchModeSchema.default('structured'),
  RELEASE_SAMPLE_SIZE: positiveInt(RELEASE_SAMPLE_SIZE),
  RELEASE_MAX_EMPTY_PCT: z.coerce.number().min(0).max(100).default(RELEASE_MAX_EMPTY_PCT),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

/**
 * Resolved configuration (camelCase, paths absolute)
 */
export const opsConfigSchema = opsEnvSchema.transform((env) => {
  const composeDir = path.resolve(env.COMPOSE_DIR);

  return {
    esUrl: env.ES_URL,
    indexName: env.INDEX_NAME,
    agentUrl: env.AGENT_URL,
    ollamaUrl: env.OLLAMA_URL,
    webuiUrl: env.WEBUI_URL,
    llmModel: env.LLM_MODEL,
    composeDir,
    composeFile: path.resolve(composeDir, env.COMPOSE_FILE),
    outputDir: path.resolve(env.OUTPUT_DIR),
    reportDir: path.resolve(env.REPORT_DIR),
    shutdownLogDir: path.resolve(env.SHUTDOWN_LOG_DIR),
    maxTimeMs: env.MAX_TIME_MS,
    chatMaxTimeMs: env.CHAT_MAX_TIME_MS,
    streamMaxTimeMs: env.STREAM_MAX_TIME_MS,
    testTimeoutSec: env.TEST_TIMEOUT_SEC,
    waitTries: env.WAIT_TRIES,
    waitSleepSec: env.WAIT_SLEEP_SEC,
    dockerWaitTries: env.DOCKER_WAIT_TRIES,
    stopGraceSec: env.STOP_GRACE_SEC,
    minDocCount: env.MIN_DOC_COUNT,
    goldenPhrase: env.GOLDEN_PHRASE,
    goldenFile: env.GOLDEN_FILE,
    openProbePath: env.OPEN_PROBE_PATH,
    matchMode: env.CHECK_MATCH_MODE,
    releaseSampleSize: env.RELEASE_SAMPLE_SIZE,
    releaseMaxEmptyPct: env.RELEASE_MAX_EMPTY_PCT,
    logLevel: env.LOG_LEVEL
  };
});

export type OpsConfig = z.output<typeof opsConfigSchema>;

/**
 * Parse configuration from an environment map.
 * Empty strings count as unset so `FOO=` falls back to the default.
 */
export function loadOpsConfig(env: NodeJS.ProcessEnv = process.env): OpsConfig {
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = opsConfigSchema.safeParse(defined);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  return result.data;
}
