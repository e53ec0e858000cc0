import { Queue, Worker, Job, QueueEvents } from 'bullmq';
import IORedis from 'ioredis';
import { env } from './env';
import { logger } from './logger';
import type { RotateJobData, RotateJobResult } from './types';
import { handleRotateJob } from './rotateJob';

// Criar a conexão com o Redis
const connection = new IORedis(env.REDIS_URL, { maxRetriesPerRequest: null });

// Criar a fila
export const queue = new Queue<RotateJobData, RotateJobResult>(env.QUEUE_NAME, { connection });
// Criar os eventos da fila
export const queueEvents = new QueueEvents(env.QUEUE_NAME, { connection });

export async function closeQueue(): Promise<void> {
  await queueEvents.close();
  await queue.close();
  await connection.quit();
}

// Criar o worker
export function startWorker() {
  const concurrency = env.WORKER_CONCURRENCY;
  logger.info({ concurrency, pid: process.pid }, 'Initializing BullMQ worker');

  // Cada job é um lote; cada lote tem sua própria área de staging
  const worker = new Worker<RotateJobData, RotateJobResult>(
    env.QUEUE_NAME,
    async (job: Job<RotateJobData, RotateJobResult>) => {
      logger.info({ jobId: job.id, data: job.data }, 'Worker received job');
      return handleRotateJob(job);
    },
    { connection, concurrency },
  );

  worker.on('completed', (job, result) => {
    logger.info({ jobId: job.id, succeeded: result.succeeded, failed: result.failed }, 'Job completed');
  });
  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'Job failed');
  });
  worker.on('error', (err) => {
    logger.error({ err }, 'Worker error');
  });

  queueEvents.on('waiting', ({ jobId }) => logger.info({ jobId }, 'Job waiting'));
  queueEvents.on('active', ({ jobId }) => logger.info({ jobId }, 'Job active'));
  queueEvents.on('progress', ({ jobId, data }) => logger.debug({ jobId, progress: data }, 'Job progress'));
  queueEvents.on('failed', ({ jobId, failedReason }) => logger.error({ jobId, failedReason }, 'Job failed event'));

  return worker;
}
