export type RunState =
  | 'idle'
  | 'gathering'
  | 'extracting'
  | 'analyzing'
  | 'degraded'
  | 'synthesizing'
  | 'validating'
  | 'done'
  | 'failed';

export const TERMINAL_STATES: ReadonlySet<RunState> = new Set(['done', 'failed']);

// `failed` is reachable from every non-terminal state and is added below.
const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  idle: ['gathering'],
  gathering: ['extracting', 'degraded'],
  extracting: ['analyzing', 'degraded'],
  degraded: ['extracting', 'analyzing', 'synthesizing'],
  analyzing: ['synthesizing', 'degraded'],
  synthesizing: ['validating'],
  validating: ['done', 'synthesizing'],
  done: [],
  failed: [],
};

export function isTerminal(state: RunState): boolean {
  return TERMINAL_STATES.has(state);
}

export function canTransition(from: RunState, to: RunState): boolean {
  if (isTerminal(from)) return false;
  if (to === 'failed') return true;
  return TRANSITIONS[from].includes(to);
}

export class IllegalTransitionError extends Error {
  constructor(from: RunState, to: RunState) {
    super(`Illegal run transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}
