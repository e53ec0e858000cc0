import 'dotenv/config';
import { z } from 'zod';

const schema = z.object({
  // Caminho explícito do ffmpeg; sem ele usa o PATH e depois o binário empacotado
  FFMPEG_PATH: z.string().min(1).optional(),
  // Espera depois que o ffmpeg termina antes de mover o arquivo
  ROTATE_SETTLE_MS: z.coerce.number().int().min(0).default(1000),
  ROTATE_DEFAULT_OUTPUT_DIR: z.string().min(1).optional(),

  REDIS_URL: z.string().min(1).default('redis://127.0.0.1:6379'),
  QUEUE_NAME: z.string().default('video-rotate'),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(1),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Optional callback to backend with the batch outcomes
  BACKEND_API_URL: z.string().url().optional(),
  BACKEND_API_TOKEN: z.string().optional(),
  CALLBACK_MAX_RETRIES: z.coerce.number().int().min(1).default(5),
});

export type Env = z.infer<typeof schema>;

export const env = schema.parse(process.env);
