import type { PipelineState } from '../../../types/mixed';

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  validating: ['dumping', 'failed'],
  dumping: ['archiving', 'failed'],
  archiving: ['encrypting', 'failed'],
  encrypting: ['uploading', 'failed'],
  uploading: ['pruning', 'failed'],
  pruning: ['done', 'failed'],
  done: [],
  failed: [],
};

export class PipelineStateMachine {
  private current: PipelineState = 'validating';
  private readonly visited: PipelineState[] = ['validating'];

  constructor(private readonly onTransition?: (from: PipelineState, to: PipelineState) => void) {}

  get state(): PipelineState {
    return this.current;
  }

  get history(): readonly PipelineState[] {
    return this.visited;
  }

  transition(next: PipelineState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal pipeline transition: ${this.current} -> ${next}`);
    }
    const previous = this.current;
    this.current = next;
    this.visited.push(next);
    this.onTransition?.(previous, next);
  }
}
