import { serve } from '@hono/node-server';
import { createApp } from './app';
import { getConfig } from './services/config';
import { SemanticSearchClient, SessionStore } from './services/course-qa';
import { LLMClient } from './services/llm';
import { logger } from './services/logger';

const config = getConfig();

const store = new SessionStore({
  llm: new LLMClient(config.llm),
  corpusPath: config.corpusPath,
  search: new SemanticSearchClient(config.searchUrl),
}, config.sessions);

const server = serve({ fetch: createApp(store).fetch, port: config.port }, (info) => {
  logger.info({ port: info.port, model: config.llm.model, corpusPath: config.corpusPath }, 'course Q&A API listening');
});

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('Shutting down server...');
  server.close(() => process.exit(0));
});
