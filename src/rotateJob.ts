import axios from 'axios';
import type { Job } from 'bullmq';
import { UnrecoverableError } from 'bullmq';
import { z } from 'zod';
import { rotateBatch } from './batch';
import { env } from './env';
import { RotationError } from './errors';
import { ROTATION_SELECTIONS } from './filters';
import { logger } from './logger';
import { defaultOutputDir } from './paths';
import type { ProgressSink } from './progress';
import type { RotateJobData, RotateJobResult, TranscodeOutcome } from './types';

// Só o que o handler usa do Job do BullMQ
export type RotateJob = Pick<Job<RotateJobData, RotateJobResult>, 'id' | 'data' | 'updateProgress'>;

const jobDataSchema = z.object({
  inputs: z.array(z.string().min(1)),
  rotation: z.enum(ROTATION_SELECTIONS),
  customAngle: z.number().nullish(),
  outputDir: z.string().optional(),
});

// Progresso do lote vai para o job em porcentagem
function jobProgress(job: RotateJob): ProgressSink {
  return {
    observe: async (fraction) => {
      await job.updateProgress(Math.round(fraction * 100));
    },
  };
}

// Função que trata o job de rotação
export async function handleRotateJob(job: RotateJob): Promise<RotateJobResult> {
  const parsed = jobDataSchema.safeParse(job.data);
  if (!parsed.success) {
    logger.error({ jobId: job.id, issues: parsed.error.issues }, 'Invalid rotate job payload');
    throw new UnrecoverableError(`Invalid rotate job payload: ${parsed.error.message}`);
  }
  const data = parsed.data;
  const outputDir = data.outputDir ?? env.ROTATE_DEFAULT_OUTPUT_DIR ?? defaultOutputDir();

  logger.info({ jobId: job.id, inputs: data.inputs.length, rotation: data.rotation, outputDir }, 'Rotate job started');

  let outcomes: TranscodeOutcome[];
  try {
    outcomes = await rotateBatch(
      { inputs: data.inputs, rotation: data.rotation, customAngle: data.customAngle, outputDir },
      { progress: jobProgress(job) },
    );
  } catch (err) {
    // Erros de nível de job não melhoram com retry
    if (err instanceof RotationError) {
      logger.error({ jobId: job.id, kind: err.kind, err: err.message }, 'Rotate job rejected');
      throw new UnrecoverableError(`${err.kind}: ${err.message}`);
    }
    throw err;
  }

  const succeeded = outcomes.filter((o) => o.ok).length;
  const result: RotateJobResult = {
    outputDir,
    outcomes,
    succeeded,
    failed: outcomes.length - succeeded,
  };

  if (env.BACKEND_API_URL) {
    await notifyBackend(env.BACKEND_API_URL, job.id, result);
  } else {
    logger.debug('BACKEND_API_URL not set; skipping callback');
  }

  return result;
}

// Normaliza a base para que contenha exatamente uma "/api"
export function callbackUrl(baseUrl: string): string {
  const base = baseUrl.replace(/\/+$/, '').replace(/\/api\/api$/, '/api');
  const ensuredApi = base.endsWith('/api') ? base : `${base}/api`;
  return `${ensuredApi}/videos/rotate/callback`;
}

// Callback com backoff exponencial: 2s, 4s, 8s...
// Os arquivos já estão no destino, então uma falha aqui só é registrada
async function notifyBackend(baseUrl: string, jobId: string | undefined, result: RotateJobResult): Promise<boolean> {
  const url = callbackUrl(baseUrl);
  const maxRetries = env.CALLBACK_MAX_RETRIES;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await axios.post(
        url,
        { jobId, ...result },
        {
          headers: env.BACKEND_API_TOKEN ? { Authorization: `Bearer ${env.BACKEND_API_TOKEN}` } : undefined,
          timeout: 30000,
        },
      );
      logger.info({ jobId, attempt }, 'Callback to backend succeeded');
      return true;
    } catch (cbErr) {
      if (attempt === maxRetries) {
        logger.error(
          { err: cbErr instanceof Error ? cbErr.message : String(cbErr), jobId, attempt, maxRetries },
          'Callback to backend failed after all retries',
        );
        return false;
      }
      const retryDelay = 2000 * Math.pow(2, attempt - 1);
      logger.warn({ jobId, attempt, maxRetries, retryDelay }, `Callback to backend failed, retrying... (${attempt}/${maxRetries})`);
      await new Promise((resolve) => setTimeout(resolve, retryDelay));
    }
  }
  return false;
}
