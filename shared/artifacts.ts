export interface ArtifactStore {
  ensureLayout: () => Promise<void>;
  /** Absolute directory holding downloads, samples and artifacts of one run. */
  runDir: (runId: string) => string;
  saveRunArtifact: (runId: string, kind: string, data: unknown) => Promise<string>;
}

export const createNoopArtifactStore = (rootDir = '.'): ArtifactStore => ({
  ensureLayout: async () => {},
  runDir: (runId) => `${rootDir}/${runId}`,
  saveRunArtifact: async () => '',
});
