import cors from 'cors';
import express from 'express';
import type { Request, Response } from 'express';
import type { ArtifactStore } from '../../shared/artifacts';
import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import type { ArticlePipelineDeps } from '../pipeline/articlePipeline';
import { createArticlePipelineDeps } from '../pipeline/createPipeline';
import { getPublicConfig } from '../config/config';
import { createSseStream } from './sse';
import { handleGenerateArticle, type GenerateArticleOutcome } from './generateArticle';

export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  store: ArtifactStore;
  buildPipeline?: (options: { image: boolean }) => ArticlePipelineDeps;
}

const sendOutcome = (res: Response, outcome: GenerateArticleOutcome) => {
  if (outcome.kind === 'document') {
    res.attachment(outcome.filename);
    res.type('text/plain; charset=utf-8').send(outcome.text);
    return;
  }
  res.status(outcome.statusCode).json(outcome.body);
};

export const createApp = ({ config, logger, store, buildPipeline }: AppDeps) => {
  const app = express();
  const build = buildPipeline ?? ((options: { image: boolean }) => createArticlePipelineDeps(config, logger, store, options));

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.post('/api/generate-article', async (req: Request, res: Response) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });
    const outcome = await handleGenerateArticle(
      req.body,
      { config, logger, buildPipeline: build },
      { signal: controller.signal },
    );
    if (!res.headersSent) {
      sendOutcome(res, outcome);
    }
  });

  app.get('/api/generate-article-stream', async (req: Request, res: Response) => {
    const stream = createSseStream(res, { heartbeatMs: config.server.heartbeatIntervalMs, label: 'generate-article' }, logger);
    try {
      const outcome = await handleGenerateArticle(
        { ...req.query, return_json: true },
        { config, logger, buildPipeline: build },
        { signal: stream.controller.signal, send: stream.send },
      );
      if (outcome.kind === 'json' && outcome.body.status === 'success') {
        stream.sendJson('result', outcome.body);
      } else {
        stream.sendJson('fatal', { error: outcome.kind === 'json' ? outcome.body.message : 'Unexpected document outcome' });
      }
    } catch (error) {
      logger.warn('SSE stream ended early', { error: error instanceof Error ? error.message : String(error) });
    } finally {
      stream.close();
    }
  });

  return app;
};
