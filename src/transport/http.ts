/**
 * HTTP surface for the hint tutor.
 *
 * Endpoints:
 *  - POST /api/chat                  : { session_id?, message } -> { session_id, response, timestamp }
 *  - POST /api/clear/:sessionId      : empty a session's history (idempotent)
 *  - GET  /api/history/:sessionId    : turns of a live session (404 when unknown)
 *  - GET  /api/session/:sessionId    : session metadata (404 when unknown)
 *  - POST /api/cleanup               : evict expired sessions now
 *  - GET  /api/assignment-questions  : segmented questions per assignment
 *  - POST /api/knowledge/refresh     : reload the corpus from its source
 *  - GET  /api/stats                 : knowledge base + session statistics
 *  - GET  /health                    : readiness and loaded PDF count
 *  - GET  /, /static/*               : frontend assets when STATIC_DIR exists
 *
 * Model failures answer with 429/502/503 and a user-facing `detail`; the
 * session keeps the user's message so the client can simply resend.
 */
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import fs from 'node:fs';
import type { Server } from 'node:http';
import path from 'node:path';
import { z } from 'zod';
import type { ChatService } from '../services/chat-service.js';
import type { DocumentSource, KnowledgeBaseService } from '../services/knowledge-base.js';
import type { SessionStore } from '../services/session-store.js';
import { describeModelError, NotFoundError } from '../utils/errors.js';
import type { ModelError } from '../utils/errors.js';

export interface HttpDeps {
  appName: string;
  chat: ChatService;
  sessions: SessionStore;
  knowledge: KnowledgeBaseService;
  source: DocumentSource;
  staticDir?: string;
}

export const chatRequestSchema = z.object({
  session_id: z.string().max(200).nullish(),
  message: z.string().trim().min(1).max(5000)
});

const toIso = (epochMs: number): string => new Date(epochMs).toISOString();

function statusForModelError(error: ModelError): number {
  switch (error.kind) {
    case 'RateLimited':
      return 429;
    case 'Unavailable':
      return 503;
    default:
      return 502;
  }
}

export function createHttpApp(deps: HttpDeps): express.Express {
  const { chat, sessions, knowledge, source } = deps;
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // An empty or missing session_id starts a new session
  app.post('/api/chat', async (req: Request, res: Response) => {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ detail: 'Invalid chat request', code: 'VALIDATION_ERROR', issues: parsed.error.issues });
      return;
    }

    // A client that disconnects cancels the model call
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    const result = await chat.chat(parsed.data.session_id || undefined, parsed.data.message, controller.signal);
    if (controller.signal.aborted) return;

    if (result.ok) {
      res.json({ session_id: result.sessionId, response: result.response, timestamp: toIso(result.timestamp) });
      return;
    }

    res.status(statusForModelError(result.error)).json({
      detail: describeModelError(result.error),
      code: result.error.kind,
      retryable: result.error.retryable,
      session_id: result.sessionId
    });
  });

  app.post('/api/clear/:sessionId', (req, res) => {
    sessions.clear(req.params.sessionId);
    res.json({ message: 'History cleared successfully', session_id: req.params.sessionId });
  });

  app.get('/api/history/:sessionId', (req, res) => {
    const session = sessions.require(req.params.sessionId);
    res.json(session.turns.map(turn => ({ role: turn.role, content: turn.content, timestamp: toIso(turn.timestamp) })));
  });

  app.get('/api/session/:sessionId', (req, res) => {
    const info = sessions.info(req.params.sessionId);
    if (!info) throw new NotFoundError('Session', req.params.sessionId);
    res.json({
      session_id: info.sessionId,
      message_count: info.messageCount,
      created_at: toIso(info.createdAt),
      last_activity: toIso(info.lastActivity),
      is_expired: info.isExpired
    });
  });

  app.post('/api/cleanup', (_req, res) => {
    const count = sessions.evictExpired();
    res.json({ cleaned_up: count, message: `Cleaned up ${count} expired session(s)` });
  });

  app.get('/api/assignment-questions', (_req, res) => {
    res.json({
      assignments: knowledge.listAssignmentQuestions().map(group => ({
        filename: group.filename,
        questions: group.questions.map(q => ({
          id: q.label,
          text: q.text,
          has_scenario: q.flags.hasScenario,
          has_table: q.flags.hasTable,
          has_image: q.flags.hasImage
        }))
      }))
    });
  });

  app.post('/api/knowledge/refresh', async (_req, res) => {
    const report = await knowledge.refresh(source);
    res.json({
      succeeded: report.succeeded,
      skipped: report.skipped,
      errors: report.failures.map(f => f.message)
    });
  });

  app.get('/api/stats', (_req, res) => {
    const summary = knowledge.getSummary();
    const stats = sessions.stats();
    res.json({
      knowledge_base: {
        materials_count: summary.materialsCount,
        assignments_count: summary.assignmentsCount,
        total_pdfs: summary.totalPdfs,
        materials_list: summary.materials,
        assignments_list: summary.assignments,
        errors: summary.errors
      },
      chat_sessions: {
        total_sessions: stats.totalSessions,
        active_sessions: stats.activeSessions,
        total_messages: stats.totalMessages,
        avg_messages_per_session: stats.avgMessagesPerSession
      }
    });
  });

  app.get('/health', (_req, res) => {
    const summary = knowledge.getSummary();
    res.json({
      status: 'healthy',
      loaded_pdf_count: summary.totalPdfs,
      materials_loaded: summary.materialsCount,
      assignments_loaded: summary.assignmentsCount,
      total_pdfs: summary.totalPdfs,
      has_content: knowledge.hasContent()
    });
  });

  const staticDir = deps.staticDir ? path.resolve(deps.staticDir) : undefined;
  if (staticDir && fs.existsSync(staticDir)) {
    app.use('/static', express.static(staticDir));
  }

  app.get('/', (_req, res) => {
    const indexPath = staticDir ? path.join(staticDir, 'index.html') : undefined;
    if (indexPath && fs.existsSync(indexPath)) {
      res.sendFile(indexPath);
      return;
    }
    res.json({ message: `${deps.appName} API`, health: '/health' });
  });

  app.use((_req, res) => {
    res.status(404).json({ detail: 'Resource not found' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof NotFoundError) {
      res.status(404).json({ detail: err.message });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ detail: 'Malformed JSON body' });
      return;
    }
    console.error('[HTTP] Unhandled error:', err);
    if (!res.headersSent) {
      res.status(500).json({ detail: 'Internal server error' });
    }
  });

  return app;
}

/**
 * Bind the app and resolve once the listener is ready.
 */
export function startHttpServer(app: express.Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      console.log(`[HTTP] Listening at http://${host}:${port}`);
      resolve(server);
    });
  });
}
