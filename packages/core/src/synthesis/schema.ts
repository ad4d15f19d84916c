import { z } from 'zod';

// ---------------------------------------------------------------------------
// Draft: what the model is asked to return
// ---------------------------------------------------------------------------

/**
 * Shape check applied to raw model output. Types only: ranges and
 * citations are the validator's job, so a draft that parses here may still
 * be sent back for correction.
 */
export const SynthesisDraftSchema = z.object({
  outlook: z.string(),
  sentiment: z.object({
    score: z.number(),
    label: z.string(),
  }),
  key_themes: z.array(z.object({
    theme: z.string(),
    summary: z.string(),
    sentiment: z.number(),
    confidence: z.number(),
    sources: z.array(z.string()),
  })),
  projections: z.array(z.object({
    metric: z.string(),
    direction: z.enum(['up', 'flat', 'down']),
    rationale: z.string(),
    sources: z.array(z.string()),
  })).default([]),
  risks: z.array(z.object({
    description: z.string(),
    sources: z.array(z.string()),
  })).default([]),
  opportunities: z.array(z.object({
    description: z.string(),
    sources: z.array(z.string()),
  })).default([]),
});

export type SynthesisDraft = z.infer<typeof SynthesisDraftSchema>;

// ---------------------------------------------------------------------------
// Final result
// ---------------------------------------------------------------------------

const confidence = z.number().min(0).max(1);
const polarity = z.number().min(-1).max(1);
const citations = z.array(z.string().min(1)).min(1, 'must cite at least one document');

export const SENTIMENT_LABELS = ['positive', 'neutral', 'negative'] as const;

export const MetricEntrySchema = z.object({
  value: z.number().finite(),
  unit: z.string().min(1),
  confidence,
  period: z.string().regex(/^FY\d{4}-Q[1-4]$/),
  strategy: z.enum(['table', 'text', 'ocr', 'derived']),
  sourceDocumentId: z.string().min(1),
}).strict();

export const EvidenceSchema = z.object({
  kind: z.enum(['metric', 'insight', 'gap', 'anomaly']),
  ref: z.string().min(1),
  sourceDocumentId: z.string().min(1).optional(),
  /** Every input document of a derived metric. */
  derivedFrom: z.array(z.string().min(1)).min(1).optional(),
  detail: z.string(),
}).strict();

export const QualitativeSchema = z.object({
  outlook: z.string().min(1),
  sentiment: z.object({
    score: polarity,
    label: z.enum(SENTIMENT_LABELS),
  }).strict(),
  key_themes: z.array(z.object({
    theme: z.string().min(1),
    summary: z.string().min(1),
    sentiment: polarity,
    confidence,
    sources: citations,
  }).strict()),
  projections: z.array(z.object({
    metric: z.string().min(1),
    direction: z.enum(['up', 'flat', 'down']),
    rationale: z.string().min(1),
    sources: citations,
  }).strict()),
  risks: z.array(z.object({
    description: z.string().min(1),
    sources: citations,
  }).strict()),
  opportunities: z.array(z.object({
    description: z.string().min(1),
    sources: citations,
  }).strict()),
}).strict();

export const ForecastResultSchema = z.object({
  runId: z.string().min(1),
  ticker: z.string().min(1),
  generatedAt: z.string().datetime(),
  quartersAnalyzed: z.array(z.string()),
  status: z.enum(['complete', 'degraded']),
  metrics: z.record(z.string(), MetricEntrySchema),
  qualitative: QualitativeSchema,
  confidence_scores: z.object({
    metrics: confidence,
    analysis: confidence,
  }).strict(),
  evidence: z.array(EvidenceSchema),
}).strict();

export type MetricEntry = z.infer<typeof MetricEntrySchema>;
export type Evidence = z.infer<typeof EvidenceSchema>;
export type Qualitative = z.infer<typeof QualitativeSchema>;
export type ForecastResult = z.infer<typeof ForecastResultSchema>;
