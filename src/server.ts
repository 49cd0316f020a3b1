import express from 'express';
import { Server } from 'http';
import { AppContext } from './context';
import { createPageImagesRouter } from './routes/pageImagesRoutes';
import { cleanupOrphanedTempFiles } from './storage/jsonStore';
import { logger } from './utils/logger';

export function createApp(context: AppContext): express.Express {
  const app = express();

  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(createPageImagesRouter({
    query: context.query,
    service: context.service,
    expandOpenSearch: context.config.pageImages.expandOpenSearch,
  }));

  return app;
}

export async function startServer(context: AppContext, port: number = context.config.server.port): Promise<Server> {
  const cleaned = await cleanupOrphanedTempFiles(context.config.storage.dataDir);
  if (cleaned > 0) {
    logger.info(`Cleaned up ${cleaned} orphaned temp file(s) on startup`);
  }

  const app = createApp(context);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Page images server running at http://localhost:${port}`);
      resolve(server);
    });
    server.on('error', reject);
  });
}
