import { GoogleGenAI, type GenerateContentConfig } from '@google/genai';
import type { AppConfig } from '../../shared/config';
import { sleep } from '../utils/async';
import { Semaphore } from '../utils/concurrency';

type KeyState = {
  client: GoogleGenAI;
  requestTimestamps: number[];
  rateLimitMutex: Semaphore;
};

const stateByApiKey = new Map<string, KeyState>();

const getStateForApiKey = (apiKey: string): KeyState => {
  const existing = stateByApiKey.get(apiKey);
  if (existing) {
    return existing;
  }
  const created: KeyState = {
    client: new GoogleGenAI({ apiKey }),
    requestTimestamps: [],
    rateLimitMutex: new Semaphore(1),
  };
  stateByApiKey.set(apiKey, created);
  return created;
};

const statusOf = (error: unknown): number | null => {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
};

export const isTransientError = (error: unknown): boolean => {
  const code = statusOf(error);
  if (code === 429 || code === 503) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return /quota|unavailable|overload|temporar/.test(message);
};

export interface GenerateTextParams {
  model: string;
  prompt: string;
  config?: GenerateContentConfig;
}

/**
 * Sends one prompt through a per-key sliding-window rate limit and retries
 * transient failures with exponential backoff.
 */
export const rateLimitedGenerateText = async (config: AppConfig, params: GenerateTextParams): Promise<string> => {
  const apiKey = config.llm.apiKey;
  if (!apiKey) {
    throw new Error('GEMINI_API_KEY missing');
  }
  const state = getStateForApiKey(apiKey);
  const windowMs = 60_000;
  const rpm = Math.max(1, Math.min(10, config.llm.requestsPerMinute));
  const maxAttempts = 4;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      // Rate limit gate: check and reserve under the mutex.
      while (true) {
        const release = await state.rateLimitMutex.acquire();
        let waitMs = 0;
        try {
          const now = Date.now();
          while (state.requestTimestamps.length > 0 && now - state.requestTimestamps[0] > windowMs) {
            state.requestTimestamps.shift();
          }
          if (state.requestTimestamps.length < rpm) {
            state.requestTimestamps.push(now);
          } else {
            waitMs = Math.max(0, state.requestTimestamps[0] + windowMs - now);
          }
        } finally {
          release();
        }
        if (waitMs <= 0) break;
        await sleep(waitMs);
      }

      const response = await state.client.models.generateContent({
        model: params.model,
        contents: [{ role: 'user', parts: [{ text: params.prompt }] }],
        config: params.config,
      });
      const text = response.text;
      if (!text || !text.trim()) {
        throw new Error('Empty response from Gemini');
      }
      return text;
    } catch (error) {
      if (!isTransientError(error) || attempt >= maxAttempts) {
        throw error instanceof Error ? error : new Error(String(error));
      }
      const backoff = Math.min(30_000, 1_000 * 2 ** attempt) + Math.floor(Math.random() * 500);
      await sleep(backoff);
    }
  }

  throw new Error('Failed to generate content after retries');
};
