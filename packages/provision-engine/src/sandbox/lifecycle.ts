export type SandboxState =
  | 'absent'
  | 'created'
  | 'configured'
  | 'running'
  | 'provisioned'
  | 'kept'
  | 'destroyed';

const VALID_TRANSITIONS: Record<SandboxState, SandboxState[]> = {
  absent:      ['created'],
  created:     ['configured', 'destroyed'],
  configured:  ['running', 'destroyed'],
  running:     ['provisioned', 'destroyed'],
  provisioned: ['kept', 'destroyed'],
  kept:        [],
  destroyed:   [],
};

/**
 * Tracks one sandbox through a provisioning run. Every state except the
 * terminal ones can only move forward or to `destroyed`.
 */
export class SandboxLifecycle {
  private current: SandboxState = 'absent';
  private readonly visited: SandboxState[] = ['absent'];

  constructor(readonly name: string) {}

  get state(): SandboxState {
    return this.current;
  }

  get history(): readonly SandboxState[] {
    return this.visited;
  }

  transition(next: SandboxState): void {
    const allowed = VALID_TRANSITIONS[this.current];
    if (!allowed.includes(next)) {
      throw new Error(`Invalid transition: ${this.current} -> ${next} for sandbox ${this.name}`);
    }
    this.current = next;
    this.visited.push(next);
  }

  isTerminal(): boolean {
    return VALID_TRANSITIONS[this.current].length === 0;
  }
}
