export {
  type SynthesisDraft,
  type MetricEntry,
  type Evidence,
  type Qualitative,
  type ForecastResult,
  SynthesisDraftSchema,
  SENTIMENT_LABELS,
  MetricEntrySchema,
  EvidenceSchema,
  QualitativeSchema,
  ForecastResultSchema,
} from './schema.js';

export { type DraftParse, stripFences, parseDraft } from './parse.js';

export {
  type SynthesisPromptInput,
  buildSynthesisPrompt,
  buildCorrectionPrompt,
  withValidationFeedback,
} from './prompts.js';

export {
  type Reconciliation,
  type ResultMeta,
  selectMetrics,
  deriveMargins,
  metricsConfidence,
  analysisConfidence,
  rankInsights,
  reconcile,
  assembleResult,
  sentimentLabel,
} from './reconcile.js';

export {
  type MetricAnomaly,
  type ValidationOptions,
  type ValidationOutcome,
  findAnomalies,
  validateForecast,
} from './validator.js';

export {
  type SynthesisAttempt,
  type DraftRequest,
  DEFAULT_SYNTHESIS_ATTEMPTS,
  Synthesizer,
} from './synthesizer.js';
