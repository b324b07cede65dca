import { createServer, type Server } from 'http';
import { getEnv } from './config/env.js';
import { connectDB, closeDB, checkDatabaseHealth } from './config/database.js';
import { createApp } from './app.js';
import { MongoNoteStore } from './models/Note.js';
import { NoteService } from './services/notes/NoteService.js';
import { ShutdownCoordinator } from './utils/shutdownCoordinator.js';
import { logger } from './utils/logger.js';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function main(): Promise<void> {
  const env = getEnv();

  const db = await connectDB();
  const noteStore = new MongoNoteStore(db, env.MONGODB_NOTE_COLLECTION);
  await noteStore.ensureIndexes();

  const noteService = new NoteService(noteStore, {
    defaultLimit: env.NOTES_DEFAULT_LIMIT,
    maxLimit: env.NOTES_MAX_LIMIT,
    sortOrder: env.NOTES_SORT_ORDER,
  });

  const app = createApp({
    noteService,
    checkDatabase: () => checkDatabaseHealth(),
    env,
  });

  const httpServer = createServer(app);

  const shutdownCoordinator = new ShutdownCoordinator(env.SHUTDOWN_TIMEOUT_MS);
  shutdownCoordinator.register('http-server', () => closeServer(httpServer), 10000);
  shutdownCoordinator.register('mongodb', () => closeDB(), 10000);

  const gracefulShutdown = (signal: string): void => {
    if (shutdownCoordinator.isShuttingDown()) {
      logger.warn('Shutdown already in progress, forcing exit');
      process.exit(1);
    }
    shutdownCoordinator
      .shutdown(signal)
      .then(({ failed }) => process.exit(failed.length === 0 ? 0 : 1))
      .catch((error: unknown) => {
        logger.error({ error }, 'Fatal error during shutdown, forcing exit');
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(env.PORT, env.HOST, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  logger.info({ port: env.PORT, host: env.HOST }, 'Server started successfully and listening');
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Server startup failed');
  process.exit(1);
});
