export { rotateBatch } from './batch';
export type { BatchInput, BatchOptions } from './batch';
export { resolveFilter, parseRotation, isLossless, ROTATION_SELECTIONS } from './filters';
export {
  locateFfmpeg,
  ensureFfmpeg,
  parseDuration,
  probeDuration,
  extractRotatedFrame,
  withPreviewFrame,
  rotateVideo,
} from './ffmpeg';
export { rotatedFileName, resolveOutputPath, defaultOutputDir, isVideoFile, ROTATED_SUFFIX } from './paths';
export { BatchJob, noopProgress } from './progress';
export type { ProgressSink } from './progress';
export { RotationError, isRotationError } from './errors';
export type { RotationErrorKind } from './errors';
export type {
  RotationMode,
  RotationSelection,
  RotationRequest,
  TranscodeOutcome,
  ProbeResult,
  RotateJobData,
  RotateJobResult,
} from './types';
