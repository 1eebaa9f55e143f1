import 'dotenv/config';
import { loadConfig, getPublicConfig } from './config/config';
import { createFsArtifactStore } from './persistence/fsStore';
import { createNoopArtifactStore } from '../shared/artifacts';
import { createLogger } from './obs/logger';
import { createApp } from './http/app';

const config = loadConfig();
const store = config.persistence.mode === 'fs' ? createFsArtifactStore(config.persistence) : createNoopArtifactStore();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  ...getPublicConfig(config),
  hasOpenAiKey: Boolean(config.llm.openaiApiKey),
  hasGeminiKey: Boolean(config.llm.geminiApiKey),
});

const app = createApp({ config, logger, store });
const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
