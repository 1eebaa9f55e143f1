export interface ArtifactStore {
  ensureLayout: () => Promise<void>;
  /** Writes `<outputs>/<runId>/<kind>.json` and returns the path. */
  saveRunArtifact: (runId: string, kind: string, data: unknown) => Promise<string>;
  /** Writes a plain-text document under the outputs directory and returns the path. */
  saveArticleDocument: (name: string, text: string) => Promise<string>;
}

export const createNoopArtifactStore = (): ArtifactStore => ({
  ensureLayout: async () => {},
  saveRunArtifact: async () => '',
  saveArticleDocument: async () => '',
});
