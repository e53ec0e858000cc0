// Rotação pedida para o lote inteiro
export type RotationMode =
  | { kind: 'deg90' }
  | { kind: 'deg180' }
  | { kind: 'deg270' }
  | { kind: 'custom'; angle: number }; // graus, sentido horário, pode ser negativo

// Valor que chega da borda (formulário, fila, linha de comando)
export type RotationSelection = '90' | '180' | '270' | 'custom';

export type RotationRequest = {
  readonly inputPath: string;
  readonly mode: RotationMode;
  readonly outputDir: string;
};

export type TranscodeOutcome =
  | { readonly ok: true; readonly inputPath: string; readonly outputPath: string }
  | { readonly ok: false; readonly inputPath: string; readonly message: string };

export type ProbeResult = {
  durationSeconds: number;
};

export type RotateJobData = {
  inputs: string[]; // caminhos locais já resolvidos
  rotation: RotationSelection;
  customAngle?: number | null; // obrigatório quando rotation = 'custom'
  outputDir?: string; // default: ROTATE_DEFAULT_OUTPUT_DIR ou ~/Movies/rotated
};

export type RotateJobResult = {
  outputDir: string;
  outcomes: TranscodeOutcome[];
  succeeded: number;
  failed: number;
};
