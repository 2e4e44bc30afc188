// Interview Session Client - Configuration
// Defaults for every timeout, retry, polling and size constant, with an
// environment overlay for the Node host.

export interface StepTimeouts {
  uploadMs: number;
  analyzeMs: number;
  generateQuestionsMs: number;
  createSessionMs: number;
}

export interface ConnectorConfig {
  probeTimeoutMs: number;
  connectTimeoutMs: number;
  publishTimeoutMs: number;
  /** Delay before the advisory local audio track check. */
  verifyDelayMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface PollConfig {
  intervalMs: number;
  maxAttempts: number;
}

export interface InterviewClientConfig {
  apiBaseUrl: string;
  /** Directory the Node report store writes into. */
  reportDir: string;
  questionCount: number;
  maxFileSizeBytes: number;
  validationDebounceMs: number;
  healthTimeoutMs: number;
  statusUpdateTimeoutMs: number;
  reportTimeoutMs: number;
  steps: StepTimeouts;
  connector: ConnectorConfig;
  retry: RetryConfig;
  poll: PollConfig;
  audioLevelIntervalMs: number;
  autoConnectDelayMs: number;
  /** Pause between a completed interview and the results view. */
  resultsDelayMs: number;
  /** Pause between an unexpected disconnect and the results view. */
  disconnectResultsDelayMs: number;
}

export const MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;

export const DEFAULT_CONFIG: Readonly<InterviewClientConfig> = Object.freeze({
  apiBaseUrl: "http://localhost:5000/api",
  reportDir: "output",
  questionCount: 6,
  maxFileSizeBytes: MAX_FILE_SIZE_BYTES,
  validationDebounceMs: 300,
  healthTimeoutMs: 10_000,
  statusUpdateTimeoutMs: 10_000,
  reportTimeoutMs: 30_000,
  steps: {
    uploadMs: 30_000,
    analyzeMs: 45_000,
    generateQuestionsMs: 45_000,
    createSessionMs: 30_000,
  },
  connector: {
    probeTimeoutMs: 30_000,
    connectTimeoutMs: 30_000,
    publishTimeoutMs: 15_000,
    verifyDelayMs: 1_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 2_000,
  },
  poll: {
    intervalMs: 1_000,
    maxAttempts: 30,
  },
  audioLevelIntervalMs: 100,
  autoConnectDelayMs: 1_000,
  resultsDelayMs: 1_000,
  disconnectResultsDelayMs: 2_000,
});

// ─── Environment overlay ────────────────────────────────────────────────────────

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Builds a config from DEFAULT_CONFIG plus any INTERVIEW_* variables in `env`.
 * @throws Error when a numeric variable is not a positive integer.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): InterviewClientConfig {
  const apiBaseUrl = env.INTERVIEW_API_URL?.trim() || DEFAULT_CONFIG.apiBaseUrl;
  try {
    new URL(apiBaseUrl);
  } catch (err) {
    throw new Error(`INTERVIEW_API_URL is not a valid URL: "${apiBaseUrl}"`, { cause: err });
  }

  return {
    ...DEFAULT_CONFIG,
    apiBaseUrl: apiBaseUrl.replace(/\/+$/, ""),
    reportDir: env.INTERVIEW_REPORT_DIR?.trim() || DEFAULT_CONFIG.reportDir,
    questionCount: readPositiveInt(env, "INTERVIEW_QUESTION_COUNT", DEFAULT_CONFIG.questionCount),
    steps: { ...DEFAULT_CONFIG.steps },
    connector: { ...DEFAULT_CONFIG.connector },
    retry: {
      maxAttempts: readPositiveInt(env, "INTERVIEW_CONNECT_MAX_ATTEMPTS", DEFAULT_CONFIG.retry.maxAttempts),
      baseDelayMs: readPositiveInt(env, "INTERVIEW_CONNECT_RETRY_DELAY_MS", DEFAULT_CONFIG.retry.baseDelayMs),
    },
    poll: {
      intervalMs: readPositiveInt(env, "INTERVIEW_STATUS_POLL_INTERVAL_MS", DEFAULT_CONFIG.poll.intervalMs),
      maxAttempts: readPositiveInt(env, "INTERVIEW_STATUS_POLL_MAX_ATTEMPTS", DEFAULT_CONFIG.poll.maxAttempts),
    },
  };
}
