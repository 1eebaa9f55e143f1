import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type { ArtifactStore } from '../../shared/artifacts';

export const sanitizeSegment = (value: string): string =>
  value.trim().replace(/[^a-z0-9_\-.]/gi, '_').replace(/^\.+/, '_').slice(0, 80) || 'artifact';

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to write outside of persistence root: ${target}`);
  }
};

export const createFsArtifactStore = (config: AppConfig['persistence']): ArtifactStore => {
  const root = config.outputsDir;

  const ensureLayout = async () => {
    await ensureDir(root);
  };

  const saveRunArtifact = async (runId: string, kind: string, data: unknown) => {
    const dir = path.join(root, sanitizeSegment(runId));
    await ensureDir(dir);
    const target = path.join(dir, `${sanitizeSegment(kind)}.json`);
    guardPath(root, target);
    await fs.writeFile(target, JSON.stringify(data, null, 2), 'utf-8');
    return target;
  };

  const saveArticleDocument = async (name: string, text: string) => {
    await ensureLayout();
    const target = path.join(root, sanitizeSegment(name));
    guardPath(root, target);
    await fs.writeFile(target, text, 'utf-8');
    return target;
  };

  return {
    ensureLayout,
    saveRunArtifact,
    saveArticleDocument,
  };
};
