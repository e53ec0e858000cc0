// Erros de nível de job: abortam o lote inteiro antes de qualquer item rodar.
// Falhas de um item nunca viram exceção, elas ficam no TranscodeOutcome.
export type RotationErrorKind =
  | 'InvalidAngle'
  | 'MissingAngle'
  | 'EmptyBatch'
  | 'NoOutputDirectory'
  | 'OutputDirectoryUnavailable'
  | 'TranscoderNotFound'
  | 'DurationUnavailable'
  | 'PreviewFailed';

export class RotationError extends Error {
  readonly kind: RotationErrorKind;

  constructor(kind: RotationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RotationError';
    this.kind = kind;
  }
}

export function isRotationError(err: unknown, kind?: RotationErrorKind): err is RotationError {
  return err instanceof RotationError && (kind === undefined || err.kind === kind);
}
