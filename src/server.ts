// src/server.ts
// What: HTTP server entrypoint and composition root.
// How: Loads config, opens and initializes the vault once, wires gateways, retriever and orchestrator into the
//      app, listens on the configured port, and closes the vault on SIGINT/SIGTERM.

import { createApp } from './app.js';
import { loadConfig } from './config/env.js';
import { errorMessage } from './errors.js';
import logger from './logging.js';
import { DocumentStore } from './services/documentStore.js';
import { OpenAICompatibleEmbeddings, createClient } from './services/embeddings.js';
import { OpenAICompatibleGenerator } from './services/generation.js';
import { Orchestrator } from './services/orchestrator.js';
import { Retriever } from './services/retriever.js';

async function main(): Promise<void> {
  const config = loadConfig();

  const store = DocumentStore.open({
    path: config.VAULT_DB_PATH,
    passphrase: config.VAULT_PASSPHRASE,
    dimension: config.EMBEDDING_DIMENSION,
  });
  await store.initialize(config.REQUIRE_VECTOR_INDEX);

  const client = createClient(config.LLM_BASE_URL, config.LLM_API_KEY);
  const gatewayOptions = { baseURL: config.LLM_BASE_URL, apiKey: config.LLM_API_KEY, client };
  const embedder = new OpenAICompatibleEmbeddings({ ...gatewayOptions, model: config.EMBED_MODEL });
  const generator = new OpenAICompatibleGenerator({ ...gatewayOptions, model: config.CHAT_MODEL });
  const retriever = new Retriever(store, embedder, { contextWindowTokens: config.CONTEXT_WINDOW_TOKENS });
  const orchestrator = new Orchestrator({ store, embedder, generator, retriever });

  const app = createApp({ store, retriever, orchestrator });
  const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT, llm: config.LLM_BASE_URL }, 'Server listening');
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      store.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.fatal({ err: errorMessage(err) }, 'Startup failed');
  process.exit(1);
});
