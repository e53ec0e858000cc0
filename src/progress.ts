import type { RotationRequest } from './types';

// Quem quer acompanhar o lote implementa só isso
export interface ProgressSink {
  observe(fraction: number): void | Promise<void>;
}

export const noopProgress: ProgressSink = {
  observe: () => undefined,
};

// Estado de um lote em execução. Pertence a uma única chamada de rotateBatch.
export class BatchJob {
  readonly requests: readonly RotationRequest[];
  private current = 0;

  constructor(requests: readonly RotationRequest[], private readonly sink: ProgressSink = noopProgress) {
    this.requests = requests;
  }

  get progress(): number {
    return this.current;
  }

  get total(): number {
    return this.requests.length;
  }

  // Progresso nunca diminui e fica sempre em [0, 1]
  async advance(fraction: number): Promise<void> {
    const next = Math.min(1, Math.max(this.current, fraction));
    this.current = next;
    await this.sink.observe(next);
  }

  // Chamado antes do item começar, não depois
  async beforeItem(index: number): Promise<void> {
    await this.advance(index / this.total);
  }

  async complete(): Promise<void> {
    await this.advance(1);
  }
}
