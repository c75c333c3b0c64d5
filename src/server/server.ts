import express from 'express';
import type { Server } from 'node:http';

import { createAskRouter } from './routes/ask.js';
import { createEmailsRouter } from './routes/emails.js';
import { createConversationsRouter } from './routes/conversations.js';
import { createFeedbackRouter } from './routes/feedback.js';
import { createAnalyticsRouter } from './routes/analytics.js';
import { errorHandler } from './middleware/error-handler.js';
import type { ServerDeps } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('server');

export function createApp(deps: ServerDeps) {
  const app = express();

  app.use(express.json({ limit: '32kb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', sessionId: deps.assistant.sessionId });
  });

  // API routes
  app.use('/api/ask', createAskRouter(deps));
  app.use('/api/emails', createEmailsRouter(deps));
  app.use('/api/conversations', createConversationsRouter(deps));
  app.use('/api/feedback', createFeedbackRouter(deps));
  app.use('/api/analytics', createAnalyticsRouter());

  app.use('/api/{*path}', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // API error handler (must come after API routes)
  app.use('/api', errorHandler);

  return app;
}

/**
 * Listen until SIGINT/SIGTERM.
 */
export async function startServer(deps: ServerDeps, port: number): Promise<void> {
  const app = createApp(deps);

  return new Promise((resolve, reject) => {
    const server: Server = app.listen(port, () => {
      log.info(`UniHelp API running at http://localhost:${port}`);

      const shutdown = () => {
        log.info('Shutting down server...');
        server.close(() => {
          resolve();
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        log.error(`Port ${port} is already in use. Try: unihelp serve --port ${port + 1}`);
      }
      reject(err);
    });
  });
}
