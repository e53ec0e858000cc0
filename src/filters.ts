import { RotationError } from './errors';
import type { RotationMode, RotationSelection } from './types';

// Transposições são rearranjos exatos de pixels; 180 usa duas vezes o mesmo
// transpose=2 em vez de um filtro de rotação interpolado
const TRANSPOSE_FILTERS = {
  deg90: 'transpose=1',
  deg180: 'transpose=2,transpose=2',
  deg270: 'transpose=2',
} as const;

export const ROTATION_SELECTIONS = ['90', '180', '270', 'custom'] as const satisfies readonly RotationSelection[];

// Função que resolve o filtro de vídeo (-vf) para o modo de rotação
export function resolveFilter(mode: RotationMode): string {
  if (mode.kind !== 'custom') return TRANSPOSE_FILTERS[mode.kind];

  if (typeof mode.angle !== 'number' || !Number.isFinite(mode.angle)) {
    throw new RotationError('InvalidAngle', `Custom rotation needs a finite angle, got ${String(mode.angle)}`);
  }
  // Ângulo arbitrário exige reamostragem: não é lossless
  return `rotate=${mode.angle}*(PI/180):bilinear=0`;
}

// Converte a escolha da borda em RotationMode; o ângulo 0 é válido
export function parseRotation(selection: RotationSelection, customAngle?: number | null): RotationMode {
  switch (selection) {
    case '90':
      return { kind: 'deg90' };
    case '180':
      return { kind: 'deg180' };
    case '270':
      return { kind: 'deg270' };
    case 'custom':
      if (customAngle === undefined || customAngle === null) {
        throw new RotationError('MissingAngle', 'Please provide a custom angle.');
      }
      if (!Number.isFinite(customAngle)) {
        throw new RotationError('InvalidAngle', `Custom rotation needs a finite angle, got ${customAngle}`);
      }
      return { kind: 'custom', angle: customAngle };
  }
}

export function isLossless(mode: RotationMode): boolean {
  return mode.kind !== 'custom';
}
