import path from 'node:path';
import { ConfigSchema, type AppConfig, type PublicConfig } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const runsRoot = path.resolve(env.RUNS_ROOT || path.join(process.cwd(), 'tmp', 'runs'));

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
    },
    selection: {
      minScore: numberFromEnv(env.SELECTION_MIN_SCORE, 4),
      maxScoreBased: numberFromEnv(env.SELECTION_MAX_SCORE_BASED, 5),
    },
    deferred: {
      pageThreshold: numberFromEnv(env.DEFERRED_PAGE_THRESHOLD, 20),
    },
    analysis: {
      maxWorkers: numberFromEnv(env.ANALYSIS_MAX_WORKERS, 4),
      samplePages: numberFromEnv(env.ANALYSIS_SAMPLE_PAGES, 5),
      pdfinfoPath: env.PDFINFO_PATH?.trim() || 'pdfinfo',
      pdftotextPath: env.PDFTOTEXT_PATH?.trim() || 'pdftotext',
    },
    fetch: {
      timeoutMs: numberFromEnv(env.FETCH_TIMEOUT_MS, 30_000),
      maxBytes: numberFromEnv(env.FETCH_MAX_BYTES, 20 * 1024 * 1024),
      concurrency: numberFromEnv(env.FETCH_CONCURRENCY, 2),
      userAgent:
        env.FETCH_USER_AGENT?.trim() ||
        // Sent only on the browser-header retry.
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36',
    },
    llm: {
      apiKey: env.GEMINI_API_KEY?.trim() || undefined,
      classifyModel: env.GEMINI_CLASSIFY_MODEL?.trim() || 'gemini-2.5-flash-lite',
      temperature: numberFromEnv(env.GEMINI_TEMPERATURE, 0),
      // Hard cap: never exceed 10 RPM regardless of environment value
      requestsPerMinute: Math.max(1, Math.min(10, numberFromEnv(env.GEMINI_REQUESTS_PER_MINUTE, 10))),
      classifyEnabled: booleanFromEnv(env.PAGEREPORT_LLM_CLASSIFY, true),
    },
    persistence: {
      rootDir: runsRoot,
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const configFromEnv = (env: NodeJS.ProcessEnv): AppConfig => buildConfig(env);

