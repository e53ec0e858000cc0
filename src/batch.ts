import path from 'node:path';
import { RotationError } from './errors';
import { ensureFfmpeg, rotateVideo, withTempDir } from './ffmpeg';
import { isLossless, parseRotation, resolveFilter } from './filters';
import { logger } from './logger';
import { ensureDir, isVideoFile, moveFile, resolveOutputPath, rotatedFileName } from './paths';
import { BatchJob, noopProgress, type ProgressSink } from './progress';
import type { RotationRequest, RotationSelection, TranscodeOutcome } from './types';

export type BatchInput = {
  inputs: readonly string[];
  rotation: RotationSelection;
  customAngle?: number | null;
  outputDir?: string | null;
};

export type BatchOptions = {
  progress?: ProgressSink;
  settleMs?: number;
  ffmpegPath?: string;
};

type Staged = { request: RotationRequest; outcome: TranscodeOutcome };

// Função que gira todos os vídeos do lote e coloca o resultado em outputDir
// Erros de job lançam RotationError antes de qualquer item; erro de um item vira outcome
export async function rotateBatch(input: BatchInput, options: BatchOptions = {}): Promise<TranscodeOutcome[]> {
  // 1) Validação, antes de qualquer escrita no disco
  if (input.inputs.length === 0) {
    throw new RotationError('EmptyBatch', 'No files uploaded.');
  }
  const mode = parseRotation(input.rotation, input.customAngle);
  const filter = resolveFilter(mode);
  const outputDir = input.outputDir;
  if (!outputDir || !outputDir.trim()) {
    throw new RotationError('NoOutputDirectory', 'No output directory specified.');
  }

  // 2) Pré-condições do job inteiro
  await ensureFfmpeg(options.ffmpegPath);
  await ensureDir(outputDir);

  const requests: RotationRequest[] = input.inputs.map((inputPath) => Object.freeze({ inputPath, mode, outputDir }));
  const job = new BatchJob(requests, options.progress ?? noopProgress);
  warnOnNameCollisions(requests);

  const startTime = Date.now();
  logger.info({ total: job.total, mode, filter, lossless: isLossless(mode), outputDir }, 'Starting rotate batch');

  const outcomes = await withTempDir('rotate-', async (staging) => {
    const staged: Staged[] = [];

    // 3) Um item por vez, na ordem de entrada
    for (const [index, request] of job.requests.entries()) {
      await job.beforeItem(index);

      // Quem decide é o ffmpeg; a extensão só gera um aviso
      if (!isVideoFile(request.inputPath)) {
        logger.warn({ inputPath: request.inputPath }, 'Input does not look like a video file, trying anyway');
      }

      // Prefixo com o índice: nomes iguais não colidem na área de staging
      const stagedFile = path.join(staging, `${index}-${rotatedFileName(request.inputPath)}`);
      const itemStart = Date.now();
      const outcome = await rotateVideo(request, filter, stagedFile, { settleMs: options.settleMs });
      logger.info({ index, inputPath: request.inputPath, ok: outcome.ok, duration: Date.now() - itemStart }, 'Rotate item finished');
      staged.push({ request, outcome });
    }

    // 4) Move os resultados para o diretório final
    const finals: TranscodeOutcome[] = [];
    for (const { request, outcome } of staged) {
      finals.push(await relocate(request, outcome));
    }
    return finals;
  });

  await job.complete();

  const succeeded = outcomes.filter((o) => o.ok).length;
  logger.info(
    { total: outcomes.length, succeeded, failed: outcomes.length - succeeded, totalDuration: Date.now() - startTime },
    'Rotate batch completed',
  );
  return outcomes;
}

// Falha ao mover vira falha do item, não do lote
async function relocate(request: RotationRequest, outcome: TranscodeOutcome): Promise<TranscodeOutcome> {
  if (!outcome.ok) return outcome;

  try {
    const finalPath = await resolveOutputPath(request.inputPath, request.outputDir);
    await moveFile(outcome.outputPath, finalPath);
    return { ok: true, inputPath: request.inputPath, outputPath: finalPath };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ err, inputPath: request.inputPath }, 'Failed to move rotated output');
    return { ok: false, inputPath: request.inputPath, message: `Failed to move output: ${message}` };
  }
}

// Último a escrever vence; só avisamos
function warnOnNameCollisions(requests: readonly RotationRequest[]): void {
  const seen = new Map<string, string>();
  for (const { inputPath } of requests) {
    const name = rotatedFileName(inputPath);
    const previous = seen.get(name);
    if (previous !== undefined) {
      logger.warn({ name, previous, inputPath }, 'Output name collision: later item overwrites earlier one');
    }
    seen.set(name, inputPath);
  }
}
