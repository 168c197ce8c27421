import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type { ArtifactStore } from '../../shared/artifacts';

const sanitizeSegment = (value: string): string =>
  value.replace(/[^a-z0-9_\-]/gi, '_').slice(0, 80) || 'artifact';

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to write outside of persistence root: ${target}`);
  }
};

/** One directory per run under `persistence.rootDir`; artifacts are pretty-printed JSON. */
export const createFsArtifactStore = (config: Pick<AppConfig, 'persistence'>): ArtifactStore => {
  const root = path.resolve(config.persistence.rootDir);

  const runDir = (runId: string) => {
    const dir = path.join(root, sanitizeSegment(runId));
    guardPath(root, dir);
    return dir;
  };

  const saveRunArtifact = async (runId: string, kind: string, data: unknown) => {
    const dir = runDir(runId);
    await ensureDir(dir);
    const target = path.join(dir, `${sanitizeSegment(kind)}.json`);
    guardPath(root, target);
    await fs.writeFile(target, JSON.stringify(data, null, 2), 'utf-8');
    return target;
  };

  return {
    ensureLayout: () => ensureDir(root),
    runDir,
    saveRunArtifact,
  };
};
