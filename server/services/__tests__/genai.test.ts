import { describe, expect, it } from 'vitest';
import { configFromEnv } from '../../config/config';
import { isTransientError, rateLimitedGenerateText } from '../genai';

describe('isTransientError', () => {
  it('treats rate limits and overloads as transient', () => {
    expect(isTransientError(Object.assign(new Error('x'), { status: 429 }))).toBe(true);
    expect(isTransientError(new Error('The model is overloaded'))).toBe(true);
    expect(isTransientError(Object.assign(new Error('bad request'), { status: 400 }))).toBe(false);
  });
});

describe('rateLimitedGenerateText', () => {
  it('fails fast without an api key', async () => {
    await expect(rateLimitedGenerateText(configFromEnv({}), { model: 'm', prompt: 'p' })).rejects.toThrow(
      'GEMINI_API_KEY missing',
    );
  });
});
