import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import mime from 'mime';
import { RotationError } from './errors';

export const ROTATED_SUFFIX = '_rotated';

// Função que deriva o nome do arquivo de saída
// clip.mp4 -> clip_rotated.mp4
export function rotatedFileName(inputPath: string): string {
  const { name, ext } = path.parse(inputPath);
  return `${name}${ROTATED_SUFFIX}${ext}`;
}

// Função que resolve o caminho final de saída e garante que o diretório existe.
// Não protege contra colisão: dois inputs com o mesmo nome sobrescrevem um ao outro.
export async function resolveOutputPath(inputPath: string, outputDir: string): Promise<string> {
  await ensureDir(outputDir);
  return path.join(outputDir, rotatedFileName(inputPath));
}

export async function ensureDir(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (err) {
    throw new RotationError('OutputDirectoryUnavailable', `Cannot create output directory ${dir}`, { cause: err });
  }
}

// Pasta padrão de saída: ~/Videos/rotated no Windows, ~/Movies/rotated no resto
export function defaultOutputDir(platform: NodeJS.Platform = process.platform, home: string = os.homedir()): string {
  const folder = platform === 'win32' ? 'Videos' : 'Movies';
  return path.join(home, folder, 'rotated');
}

export function isVideoFile(filePath: string): boolean {
  const type = mime.getType(filePath);
  return type !== null && type.startsWith('video/');
}

// Move o arquivo; rename falha entre dispositivos (tmp em outro volume), então copia
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (err) {
    if (!isErrnoException(err) || err.code !== 'EXDEV') throw err;
    await fs.copyFile(from, to);
    await fs.rm(from, { force: true });
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
