import { z } from 'zod';

export const CONFIDENCE_COMPONENTS = [
  'empirical_support',
  'theoretical_basis',
  'methodological_rigor',
  'consensus_alignment',
] as const;

// Four-part confidence vector used for every node.
export const ConfidenceVectorSchema = z.object({
  empirical_support: z.number().min(0.0).max(1.0).default(0.5),
  theoretical_basis: z.number().min(0.0).max(1.0).default(0.5),
  methodological_rigor: z.number().min(0.0).max(1.0).default(0.5),
  consensus_alignment: z.number().min(0.0).max(1.0).default(0.5),
});

export type ConfidenceVector = z.infer<typeof ConfidenceVectorSchema>;

export const confidenceToList = (confidence: ConfidenceVector): number[] =>
  CONFIDENCE_COMPONENTS.map((component) => confidence[component]);

export const confidenceFromList = (values: readonly number[]): ConfidenceVector => {
  if (values.length !== 4) {
    throw new Error('Confidence list must have exactly 4 values.');
  }
  return ConfidenceVectorSchema.parse({
    empirical_support: values[0],
    theoretical_basis: values[1],
    methodological_rigor: values[2],
    consensus_alignment: values[3],
  });
};

export const averageConfidence = (confidence: ConfidenceVector): number =>
  confidenceToList(confidence).reduce((sum, value) => sum + value, 0) / 4.0;

export const minConfidence = (confidence: ConfidenceVector): number =>
  Math.min(...confidenceToList(confidence));

export const CertaintyScoreSchema = z.number().min(0.0).max(1.0);
export type CertaintyScore = z.infer<typeof CertaintyScoreSchema>;

export const ImpactScoreSchema = z.number().min(0.0).max(1.0);
export type ImpactScore = z.infer<typeof ImpactScoreSchema>;

// Dates arrive as ISO strings when read back from the graph store.
export const TimestampedModelSchema = z.object({
  created_at: z.coerce.date().default(() => new Date()),
  updated_at: z.coerce.date().default(() => new Date()),
});

export type TimestampedModel = z.infer<typeof TimestampedModelSchema>;

export const RevisionRecordSchema = z.object({
  timestamp: z.coerce.date().default(() => new Date()),
  user_or_process: z.string(),
  action: z.string(),
  changes_made: z.record(z.unknown()).default({}),
  reason: z.string().default(''),
});

export type RevisionRecord = z.infer<typeof RevisionRecordSchema>;

export enum EpistemicStatus {
  ASSUMPTION = "assumption",
  HYPOTHESIS = "hypothesis",
  EVIDENCE_SUPPORTED = "evidence_supported",
  EVIDENCE_CONTRADICTED = "evidence_contradicted",
  THEORETICALLY_DERIVED = "theoretically_derived",
  WIDELY_ACCEPTED = "widely_accepted",
  DISPUTED = "disputed",
  UNKNOWN = "unknown",
  INFERRED = "inferred",
  SPECULATION = "speculation",
}
