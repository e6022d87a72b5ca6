// Research Desk API
// Port: 3737 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import { env, logConfiguration } from './env.js';
import { openDatabase } from './db.js';
import { buildServer } from './server.js';
import { createProvider } from './providers/index.js';
import { createEmbedder } from './services/embeddings.js';
import { DocumentIndex } from './services/retrieval.js';
import { isWebSearchAvailable, searchWeb } from './services/web-search.js';
import { ToolRegistry, initializeTools } from './services/tools/index.js';
import { Orchestrator } from './services/orchestrator/index.js';
import { SqliteConversationStore } from './services/conversation/index.js';
import { ChatService } from './services/chat-service.js';

const db = openDatabase(env.DATABASE_PATH);

const embedder = createEmbedder();
const documents = embedder ? new DocumentIndex(db, embedder) : null;

const registry = initializeTools(new ToolRegistry(), {
  retriever: documents,
  searchWeb: isWebSearchAvailable() ? searchWeb : null,
  documentSearchResults: env.DOCUMENT_SEARCH_RESULTS,
});

const orchestrator = new Orchestrator(createProvider(), registry, {
  maxRounds: env.MAX_TOOL_ROUNDS,
  maxWebSources: env.MAX_WEB_SOURCES,
  toolTimeoutMs: env.TOOL_TIMEOUT_MS,
});

const store = new SqliteConversationStore(db);
const server = await buildServer({
  store,
  chatService: new ChatService(store, orchestrator),
  documents,
  registry,
});

const shutdown = async (signal: string) => {
  server.log.info({ signal }, 'Shutting down');
  await server.close();
  db.close();
  process.exit(0);
};
process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

// Start server
try {
  await server.listen({ port: env.PORT, host: env.HOST });
  server.log.info(`Research Desk API listening on http://${env.HOST}:${env.PORT}`);
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
