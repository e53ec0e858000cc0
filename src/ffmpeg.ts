import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import ffmpeg from 'fluent-ffmpeg';
import { randomUUID } from 'node:crypto';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import fs from 'node:fs/promises';
import { env } from './env';
import { RotationError } from './errors';
import { resolveFilter } from './filters';
import { logger } from './logger';
import type { ProbeResult, RotationMode, RotationRequest, TranscodeOutcome } from './types';

// Configuração de encode: crf 0 é lossless para transposições, então o preset
// mais rápido não perde nada
export const VIDEO_CODEC = 'libx264';
export const ROTATE_OUTPUT_OPTIONS = ['-crf 0', '-preset ultrafast'];

export type LocateOptions = {
  configuredPath?: string;
  searchPath?: string;
  bundledPath?: string;
  platform?: NodeJS.Platform;
};

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    await fs.access(candidate, fsConstants.X_OK);
    const stat = await fs.stat(candidate);
    return stat.isFile();
  } catch {
    return false;
  }
}

// Função que localiza o binário do ffmpeg
// 1) FFMPEG_PATH, se configurado (sem fallback)
// 2) PATH do sistema
// 3) binário empacotado pelo @ffmpeg-installer
export async function locateFfmpeg(options: LocateOptions = {}): Promise<string> {
  const configured = options.configuredPath ?? env.FFMPEG_PATH;
  if (configured) {
    if (await isExecutable(configured)) return configured;
    throw new RotationError('TranscoderNotFound', `FFMPEG_PATH points to ${configured}, which is not an executable file.`);
  }

  const platform = options.platform ?? process.platform;
  const searchPath = options.searchPath ?? process.env.PATH ?? '';
  const names = platform === 'win32' ? ['ffmpeg.exe', 'ffmpeg'] : ['ffmpeg'];
  for (const dir of searchPath.split(path.delimiter).filter(Boolean)) {
    for (const name of names) {
      const candidate = path.join(dir, name);
      if (await isExecutable(candidate)) return candidate;
    }
  }

  const bundled = options.bundledPath ?? ffmpegInstaller.path;
  if (bundled && (await isExecutable(bundled))) return bundled;

  throw new RotationError(
    'TranscoderNotFound',
    'FFmpeg not found. Install FFmpeg and add it to your PATH, or set FFMPEG_PATH.',
  );
}

// Resolve o binário uma vez por job e entrega para o fluent-ffmpeg
export async function ensureFfmpeg(configuredPath?: string): Promise<string> {
  const binary = await locateFfmpeg({ configuredPath });
  ffmpeg.setFfmpegPath(binary);
  logger.debug({ binary }, 'ffmpeg resolved');
  return binary;
}

// Função auxiliar para parsear timemark do ffmpeg (HH:MM:SS.ff)
function parseTimeMark(timemark: string): number | undefined {
  const parts = timemark.split(':');
  if (parts.length !== 3) return undefined;

  const [hours, minutes, seconds] = parts.map(Number);
  if (![hours, minutes, seconds].every(Number.isFinite)) return undefined;

  return hours * 3600 + minutes * 60 + seconds;
}

const DURATION_MARKER = /Duration:\s*(\d+:\d{2}:\d{2}(?:\.\d+)?)/;

// Procura o marcador "Duration: HH:MM:SS.ff" na saída de diagnóstico
export function parseDuration(diagnostics: string): number | undefined {
  const match = DURATION_MARKER.exec(diagnostics);
  if (!match) return undefined;
  return parseTimeMark(match[1]);
}

// Função que obtém a duração do vídeo rodando o ffmpeg sem saída real (-f null -)
export async function probeDuration(inputFile: string): Promise<ProbeResult> {
  await ensureFfmpeg();
  return runProbe(inputFile);
}

// O ffmpeg imprime os metadados no stderr; o status de saída não importa aqui
async function runProbe(inputFile: string): Promise<ProbeResult> {
  const durationSeconds = await new Promise<number | undefined>((resolve) => {
    let found: number | undefined;

    ffmpeg(inputFile)
      .format('null')
      .output('-')
      .on('start', (cmd: string) => logger.debug({ cmd }, 'ffmpeg probe start'))
      .on('stderr', (line: string) => {
        if (found === undefined) found = parseDuration(line);
      })
      .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
        logger.debug({ err: err.message, inputFile }, 'ffmpeg probe exited with error');
        resolve(found ?? parseDuration(stderr ?? ''));
      })
      .on('end', (_stdout: string | null, stderr: string | null) => {
        resolve(found ?? parseDuration(stderr ?? ''));
      })
      .run();
  });

  if (durationSeconds === undefined) {
    throw new RotationError('DurationUnavailable', `Could not determine video duration for ${inputFile}.`);
  }
  return { durationSeconds };
}

// Cria um arquivo temporário vazio e exclusivo para o frame de preview
async function createTempImage(): Promise<string> {
  const file = path.join(os.tmpdir(), `rotate-preview-${randomUUID()}.png`);
  await fs.writeFile(file, '', { flag: 'wx' });
  return file;
}

// Função que extrai um frame girado do meio do vídeo para um PNG temporário
// O arquivo devolvido é de quem chamou e deve ser apagado (ver withPreviewFrame)
export async function extractRotatedFrame(inputFile: string, mode: RotationMode): Promise<string> {
  const filter = resolveFilter(mode);
  await ensureFfmpeg();
  const { durationSeconds } = await runProbe(inputFile);
  const seekSeconds = durationSeconds / 2;
  const frameFile = await createTempImage();

  try {
    await new Promise<void>((resolve, reject) => {
      ffmpeg(inputFile)
        .seekInput(seekSeconds)
        .videoFilters(filter)
        .frames(1)
        .output(frameFile)
        .on('start', (cmd: string) => logger.info({ cmd }, 'ffmpeg preview start'))
        .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
          reject(new RotationError('PreviewFailed', failureMessage(err, stderr), { cause: err }));
        })
        .on('end', () => resolve())
        .run();
    });
  } catch (err) {
    await fs.rm(frameFile, { force: true });
    throw err;
  }

  return frameFile;
}

// Entrega o frame para fn e apaga o arquivo em qualquer caminho de saída
export async function withPreviewFrame<T>(
  inputFile: string,
  mode: RotationMode,
  fn: (frameFile: string) => Promise<T>,
): Promise<T> {
  const frameFile = await extractRotatedFrame(inputFile, mode);
  try {
    return await fn(frameFile);
  } finally {
    await fs.rm(frameFile, { force: true });
  }
}

function failureMessage(err: Error, stderr: string | null): string {
  const diagnostics = stderr?.trim();
  return diagnostics ? diagnostics : err.message;
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export type RotateOptions = {
  settleMs?: number;
};

// Função que roda o ffmpeg para um item do lote.
// Nunca lança: falha vira { ok: false, message } com o stderr do ffmpeg.
export async function rotateVideo(
  request: RotationRequest,
  filter: string,
  outputFile: string,
  options: RotateOptions = {},
): Promise<TranscodeOutcome> {
  const { inputPath } = request;
  const settleMs = options.settleMs ?? env.ROTATE_SETTLE_MS;

  const failure = await new Promise<string | undefined>((resolve) => {
    ffmpeg(inputPath)
      .videoFilters(filter)
      .videoCodec(VIDEO_CODEC)
      .outputOptions(ROTATE_OUTPUT_OPTIONS)
      .output(outputFile)
      .on('start', (cmd: string) => logger.info({ cmd, inputPath }, 'ffmpeg rotate start'))
      .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
        logger.error({ err: err.message, inputPath, outputFile }, 'ffmpeg rotate error');
        resolve(failureMessage(err, stderr));
      })
      .on('end', () => resolve(undefined))
      .run();
  });

  // Dá tempo para o sistema de arquivos terminar de gravar antes de mover
  if (settleMs > 0) await new Promise((resolve) => setTimeout(resolve, settleMs));

  if (failure !== undefined) return { ok: false, inputPath, message: failure };
  if (!(await exists(outputFile))) {
    return { ok: false, inputPath, message: `ffmpeg exited successfully but produced no output at ${outputFile}` };
  }
  return { ok: true, inputPath, outputPath: outputFile };
}

// Função que cria um diretório temporário
// fn é a função que será executada no diretório temporário
// O diretório é removido em qualquer caminho de saída
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  // Criar o diretório temporário
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    // Executar a função no diretório temporário
    return await fn(dir);
  } finally {
    // Remover o diretório temporário
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (err) {
      logger.warn({ err, dir }, 'Failed to remove temp dir');
    }
  }
}
