import process from 'node:process';
import { startWorker, closeQueue } from './queue';
import { logger } from './logger';
import { env } from './env';
import { ensureFfmpeg } from './ffmpeg';

async function main() {
  // Sem ffmpeg não adianta aceitar jobs
  const binary = await ensureFfmpeg();
  logger.info({ queue: env.QUEUE_NAME, redis: env.REDIS_URL, concurrency: env.WORKER_CONCURRENCY, ffmpeg: binary }, 'Starting rotate worker');
  const worker = startWorker();

  const shutdown = async (signal: string) => {
    try {
      logger.info({ signal, pid: process.pid }, 'Shutting down worker');
      await worker.close();
      await closeQueue();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during worker shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  logger.fatal({ err }, 'Worker failed to start');
  process.exit(1);
});
