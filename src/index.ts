/**
 * PDF Hint Tutor - Main Entry Point
 * Loads the PDF corpus, then serves the chat API over HTTP
 */

import { CONFIG } from './config.js';
import { ChatService } from './services/chat-service.js';
import { ContextManager } from './services/context-manager.js';
import { KnowledgeBaseService } from './services/knowledge-base.js';
import { OpenAIModelGateway } from './services/model-gateway.js';
import { PdfDirectorySource } from './services/pdf-source.js';
import { SessionStore } from './services/session-store.js';
import { createHttpApp, startHttpServer } from './transport/http.js';

async function main() {
  // Validate environment
  if (!CONFIG.OPENAI_API_KEY) {
    console.error('Error: OPENAI_API_KEY not found in environment variables');
    console.error('Please create a .env file with your OpenAI API key');
    process.exit(1);
  }

  console.log(CONFIG.APP_NAME);
  console.log('='.repeat(CONFIG.APP_NAME.length));
  console.log(`Model: ${CONFIG.MODEL_NAME} (temperature ${CONFIG.TEMPERATURE}, top_p ${CONFIG.TOP_P})`);
  console.log(`History: last ${CONFIG.MAX_HISTORY_LENGTH} turns, sessions expire after ${CONFIG.SESSION_TIMEOUT_MINUTES} min`);
  console.log(`Knowledge budget: ${CONFIG.MAX_KNOWLEDGE_CHARS} chars`);
  console.log();

  // Load the corpus before accepting traffic
  const knowledge = new KnowledgeBaseService();
  const source = new PdfDirectorySource(
    { materialsDir: CONFIG.MATERIALS_DIR, assignmentsDir: CONFIG.ASSIGNMENTS_DIR },
    CONFIG.DEBUG
  );
  const report = await knowledge.refresh(source);
  if (!knowledge.hasContent()) {
    console.warn('[KB] No PDFs loaded. Answers will not be grounded in class materials.');
  } else {
    console.log(`[KB] Ready: ${report.succeeded} PDF(s) loaded, ${report.skipped} skipped`);
  }

  const sessions = new SessionStore({
    maxHistoryLength: CONFIG.MAX_HISTORY_LENGTH,
    sessionTimeoutMs: CONFIG.SESSION_TIMEOUT_MINUTES * 60_000
  });
  const stopSweeper = sessions.startSweeper(CONFIG.SESSION_SWEEP_INTERVAL_SECONDS * 1000);

  const chat = new ChatService({
    sessions,
    knowledge,
    contextManager: new ContextManager(),
    gateway: new OpenAIModelGateway({
      apiKey: CONFIG.OPENAI_API_KEY,
      model: CONFIG.MODEL_NAME,
      temperature: CONFIG.TEMPERATURE,
      topP: CONFIG.TOP_P,
      maxOutputTokens: CONFIG.MAX_OUTPUT_TOKENS
    }),
    budget: { maxKnowledgeChars: CONFIG.MAX_KNOWLEDGE_CHARS },
    debug: CONFIG.DEBUG
  });

  const app = createHttpApp({
    appName: CONFIG.APP_NAME,
    chat,
    sessions,
    knowledge,
    source,
    staticDir: CONFIG.STATIC_DIR
  });
  const server = await startHttpServer(app, CONFIG.HOST, CONFIG.PORT);

  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down...`);
    stopSweeper();
    server.close(error => {
      if (error) {
        console.error('Error while closing server:', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
