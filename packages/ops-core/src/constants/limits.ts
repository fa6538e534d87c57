/**
 * Timeouts, retry budgets and thresholds
 */

// HTTP
export const DEFAULT_MAX_TIME_MS = 10000;
export const CHAT_MAX_TIME_MS = 20000;
export const STREAM_MAX_TIME_MS = 15000;

// Readiness polling
export const DEFAULT_WAIT_TRIES = 60;
export const DEFAULT_WAIT_SLEEP_SEC = 2;
export const BOOT_GATE_WAIT_TRIES = 20;
export const BOOT_GATE_WAIT_SLEEP_SEC = 1;
export const DOCKER_WAIT_TRIES = 90;
export const DOCKER_WAIT_SLEEP_SEC = 1;

// Lifecycle
export const STOP_GRACE_SEC = 45;

// Runner
export const DEFAULT_TEST_TIMEOUT_SEC = 30;

// Index expectations
export const MIN_DOC_COUNT = 1000;
export const ALLOWED_CLUSTER_STATUSES = ['yellow', 'green'] as const;
export const OPEN_OK_STATUSES = [200, 206] as const;

// Release sampling
export const RELEASE_SAMPLE_SIZE = 200;
export const RELEASE_MAX_EMPTY_PCT = 100;
export const EMPTY_CONTENT_EXAMPLES = 5;
export const AGGREGATION_BUCKETS = 20;
