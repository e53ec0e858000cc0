import path from 'node:path';
import { queue, queueEvents, closeQueue } from './queue';
import { ROTATION_SELECTIONS } from './filters';
import type { RotateJobData, RotationSelection } from './types';

// Uso: submit <90|180|270|custom[:angulo]> <pasta de saída> <arquivo...>
function parseArgs(argv: string[]): RotateJobData {
  const [rotationArg, outputDir, ...files] = argv;
  if (!rotationArg || !outputDir || files.length === 0) {
    throw new Error('Usage: submit <90|180|270|custom:ANGLE> <output-dir> <video...>');
  }
  const [selection, angle] = rotationArg.split(':');
  if (!isSelection(selection)) {
    throw new Error(`Rotation must be one of ${ROTATION_SELECTIONS.join(', ')}`);
  }
  return {
    inputs: files.map((f) => path.resolve(f)),
    rotation: selection,
    customAngle: angle === undefined ? undefined : Number(angle),
    outputDir: path.resolve(outputDir),
  };
}

function isSelection(value: string): value is RotationSelection {
  return ROTATION_SELECTIONS.some((s) => s === value);
}

async function main() {
  const data = parseArgs(process.argv.slice(2));
  const job = await queue.add('rotate', data);
  console.log('Queued job', job.id, 'with', data.inputs.length, 'file(s)');

  const result = await job.waitUntilFinished(queueEvents);
  for (const outcome of result.outcomes) {
    console.log(outcome.ok ? `OK   ${outcome.inputPath} -> ${outcome.outputPath}` : `FAIL ${outcome.inputPath}: ${outcome.message}`);
  }
  console.log(`Rotated ${result.succeeded} video(s), ${result.failed} failed`);
  await closeQueue();
}

main().catch(async (err) => {
  console.error('Submit failed:', err instanceof Error ? err.message : err);
  await closeQueue();
  process.exit(1);
});
