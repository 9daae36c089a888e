import { createServer } from 'http';
import type { Socket } from 'net';
import { createApp } from './app';
import { getCompositionRoot } from './app/composition-root';
import { HealthController } from './controllers/health.controller';
import { logger } from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 10_000;

async function startServer() {
  const composition = getCompositionRoot();
  const config = composition.getConfig();
  const db = composition.getDbPort();

  try {
    await db.connect();
    logger.info('database-connected');
  } catch (error) {
    logger.error('database-connect-failed', error);
    process.exit(1);
  }

  const app = createApp({
    services: composition.getServices(),
    health: new HealthController(db),
    uploadMaxBytes: config.roster.uploadMaxBytes,
  });

  const httpServer = createServer(app);
  // Track open sockets so we can force-close on shutdown to avoid hangs
  const sockets = new Set<Socket>();
  httpServer.on('connection', (socket: Socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });

  httpServer.listen(config.port, () => {
    logger.info('server-listening', { port: config.port, env: config.env });
  });

  const graceful = async (signal: string) => {
    logger.info('server-shutdown', { signal });
    const forceExit = setTimeout(() => {
      logger.warn('server-shutdown-forced', { openSockets: sockets.size });
      for (const socket of sockets) socket.destroy();
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    try {
      await db.disconnect();
    } catch (error) {
      logger.warn('database-disconnect-failed', error);
    }
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      graceful(signal).catch((error) => {
        logger.error('server-shutdown-failed', error);
        process.exit(1);
      });
    });
  }
}

process.on('unhandledRejection', (reason) => {
  logger.error('unhandled-rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
});

startServer().catch((error) => {
  logger.error('server-start-failed', error);
  process.exit(1);
});
