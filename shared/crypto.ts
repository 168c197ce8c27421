import { randomUUID } from 'node:crypto';

export const randomId = (): string => randomUUID();

const pad = (value: number) => String(value).padStart(2, '0');

/** Run ids look like `20261019T083000Z_a1b2c3`: sortable by start time. */
export const makeRunId = (now: Date = new Date()): string => {
  const stamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `T${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}Z`;
  const suffix = randomId().replace(/-/g, '').slice(0, 6);
  return `${stamp}_${suffix}`;
};

export const isSafeRunId = (value: string): boolean => /^[A-Za-z0-9_-]{1,80}$/.test(value);
