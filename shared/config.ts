import { z } from 'zod';
import type { ApiConfigResponse } from './types';

export const MAX_WORKERS = 16;

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    heartbeatIntervalMs: z.number().int().positive(),
  }),
  selection: z.object({
    minScore: z.number().int().positive(),
    maxScoreBased: z.number().int().positive(),
  }),
  deferred: z.object({
    pageThreshold: z.number().int().positive(),
  }),
  analysis: z.object({
    maxWorkers: z.number().int().positive().max(MAX_WORKERS),
    samplePages: z.number().int().positive(),
    pdfinfoPath: z.string().min(1),
    pdftotextPath: z.string().min(1),
  }),
  fetch: z.object({
    timeoutMs: z.number().int().positive(),
    maxBytes: z.number().int().positive(),
    concurrency: z.number().int().positive(),
    userAgent: z.string().min(1),
  }),
  llm: z.object({
    apiKey: z.string().optional(),
    classifyModel: z.string().min(1),
    temperature: z.number().min(0).max(2),
    requestsPerMinute: z.number().int().positive(),
    classifyEnabled: z.boolean(),
  }),
  persistence: z.object({
    rootDir: z.string().min(1),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export type PublicConfig = ApiConfigResponse;

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  selection: {
    minScore: config.selection.minScore,
    maxScoreBased: config.selection.maxScoreBased,
  },
  deferred: {
    pageThreshold: config.deferred.pageThreshold,
  },
  analysis: {
    maxWorkers: config.analysis.maxWorkers,
    samplePages: config.analysis.samplePages,
  },
  oracleClassification: {
    enabled: config.llm.classifyEnabled,
    hasApiKey: Boolean(config.llm.apiKey),
  },
});

/**
 * Parses a per-request worker override. Returns undefined when the value is
 * unusable or equal to the configured default.
 */
export const parseWorkerCountParam = (raw: string | null | undefined, fallback: number): number | undefined => {
  if (raw == null || raw.trim() === '') {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }
  const clamped = Math.min(MAX_WORKERS, Math.max(1, Math.round(parsed)));
  return clamped === fallback ? undefined : clamped;
};
