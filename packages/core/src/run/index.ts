export {
  type RunState,
  TERMINAL_STATES,
  canTransition,
  isTerminal,
  IllegalTransitionError,
} from './states.js';

export {
  type RunRequest,
  MAX_QUARTERS,
  RunRequestSchema,
  parseRunRequest,
} from './request.js';

export {
  type TraceEvent,
  type TraceEntry,
  type TraceSink,
  type EvidenceGap,
  type RunContextOptions,
  RunContext,
} from './context.js';

export { Semaphore, mapLimited } from './concurrency.js';

export {
  type StateChangeEvent,
  type DocumentGapEvent,
  type ModelRetryEvent,
  type SynthesisAttemptEvent,
  type RunCompleteEvent,
  type RunErrorEvent,
  type StoreErrorEvent,
  type CoordinatorEvents,
  type CoordinatorOptions,
  DEFAULT_RUN_BUDGET_MS,
  DEFAULT_CONCURRENCY,
  ForecastCoordinator,
  quartersOf,
} from './coordinator.js';
