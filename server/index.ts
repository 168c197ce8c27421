import 'dotenv/config';
import { loadConfig } from './config/config';
import { createApp } from './app';
import { createPopplerTools } from './documents/pdfTools';
import { createLogger } from './obs/logger';
import { createFsArtifactStore } from './persistence/fsStore';
import { createClassifierChain } from './selection/classifier';

const config = loadConfig();
const store = createFsArtifactStore(config);
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  selection: config.selection,
  deferred: config.deferred,
  analysis: { maxWorkers: config.analysis.maxWorkers, samplePages: config.analysis.samplePages },
  oracle: {
    enabled: config.llm.classifyEnabled,
    hasApiKey: Boolean(config.llm.apiKey),
    model: config.llm.classifyModel,
  },
  runsRoot: config.persistence.rootDir,
});

const app = createApp({
  config,
  store,
  logger,
  classifier: createClassifierChain(config, logger),
  tools: createPopplerTools({
    pdfinfoPath: config.analysis.pdfinfoPath,
    pdftotextPath: config.analysis.pdftotextPath,
  }),
});

const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
