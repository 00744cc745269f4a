import { z } from 'zod';
import { EdgeSchema, NodeSchema, NodeType } from './graphElements';

export const STAGE_NAMES = {
  initialization: 'InitializationStage',
  decomposition: 'DecompositionStage',
  hypothesis: 'HypothesisStage',
  evidence: 'EvidenceStage',
  pruningMerging: 'PruningMergingStage',
  subgraphExtraction: 'SubgraphExtractionStage',
  composition: 'CompositionStage',
  reflection: 'ReflectionStage',
} as const;

export type StageName = (typeof STAGE_NAMES)[keyof typeof STAGE_NAMES];

// --- Per-request pipeline parameters ---
export const OperationalParamsSchema = z
  .object({
    include_reasoning_trace: z.boolean().optional(),
    include_graph_state: z.boolean().optional(),
    max_nodes_in_response_graph: z.number().int().min(0).optional(),
    output_detail_level: z.enum(['summary', 'detailed']).optional(),
    initial_disciplinary_tags: z.array(z.string()).optional(),
    initial_layer: z.string().optional(),
    decomposition_dimensions: z.array(z.unknown()).optional(),
    dimension_layer: z.string().optional(),
    hypotheses_per_dimension_min: z.number().int().min(0).optional(),
    hypotheses_per_dimension_max: z.number().int().min(0).optional(),
    evidence_max_iterations: z.number().int().min(0).optional(),
    subgraph_extraction_criteria: z.array(z.unknown()).optional(),
  })
  .passthrough();

export type OperationalParams = z.infer<typeof OperationalParamsSchema>;

// --- Stage context payloads, keyed by stage name in accumulated_context ---
export const InitializationContextSchema = z.object({
  root_node_id: z.string().optional(),
  initial_disciplinary_tags: z.array(z.string()).default([]),
  error: z.string().optional(),
});

export type InitializationContext = z.infer<typeof InitializationContextSchema>;

export const DecompositionContextSchema = z.object({
  dimension_node_ids: z.array(z.string()).default([]),
  decomposition_results: z.array(z.object({ id: z.string(), label: z.string() })).default([]),
  error: z.string().optional(),
});

export type DecompositionContext = z.infer<typeof DecompositionContextSchema>;

export const HypothesisContextSchema = z.object({
  hypothesis_node_ids: z.array(z.string()).default([]),
  hypotheses_results: z
    .array(z.object({ id: z.string(), label: z.string(), dimension_id: z.string() }))
    .default([]),
  error: z.string().optional(),
});

export type HypothesisContext = z.infer<typeof HypothesisContextSchema>;

export const EvidenceIntegrationSummarySchema = z.object({
  total_evidence_integrated: z.number().int().default(0),
  iterations_completed: z.number().int().default(0),
  hypotheses_updated: z.number().int().default(0),
  ibns_created: z.number().int().default(0),
  hyperedges_created: z.number().int().default(0),
});

export type EvidenceIntegrationSummary = z.infer<typeof EvidenceIntegrationSummarySchema>;

export const EvidenceContextSchema = z.object({
  evidence_integration_completed: z.boolean().default(false),
  evidence_nodes_added_count: z.number().int().default(0),
  evidence_integration_summary: EvidenceIntegrationSummarySchema.default({}),
  error: z.string().optional(),
});

export type EvidenceContext = z.infer<typeof EvidenceContextSchema>;

export const PruningMergingContextSchema = z.object({
  pruning_merging_completed: z.boolean().default(false),
  nodes_remaining: z.number().int().default(0),
  edges_remaining: z.number().int().default(0),
});

export type PruningMergingContext = z.infer<typeof PruningMergingContextSchema>;

export const SubgraphCriterionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  min_avg_confidence: z.number().min(0).max(1).optional(),
  min_impact_score: z.number().min(0).max(1).optional(),
  node_types: z.array(z.nativeEnum(NodeType)).optional(),
  include_disciplinary_tags: z.array(z.string()).optional(),
  exclude_disciplinary_tags: z.array(z.string()).optional(),
  layer_ids: z.array(z.string()).optional(),
  is_knowledge_gap: z.boolean().optional(),
  include_neighbors_depth: z.number().int().min(0).max(5).default(0),
});

export type SubgraphCriterion = z.infer<typeof SubgraphCriterionSchema>;
export type SubgraphCriterionInput = z.input<typeof SubgraphCriterionSchema>;

export const ExtractedSubgraphSchema = z.object({
  name: z.string(),
  description: z.string(),
  nodes: z.array(NodeSchema),
  relationships: z.array(EdgeSchema),
  metrics: z.object({
    node_count: z.number().int(),
    relationship_count: z.number().int(),
    avg_node_confidence: z.number(),
    avg_node_impact: z.number(),
  }),
});

export type ExtractedSubgraph = z.infer<typeof ExtractedSubgraphSchema>;

export const SubgraphExtractionContextSchema = z.object({
  subgraphs: z.array(ExtractedSubgraphSchema).default([]),
  subgraph_extraction_details: z
    .object({
      nodes_extracted: z.number().int().default(0),
      subgraphs_extracted: z.number().int().default(0),
    })
    .default({}),
});

export type SubgraphExtractionContext = z.infer<typeof SubgraphExtractionContextSchema>;

// Validated by the processor, not here: an invalid output is reported, not thrown.
export const CompositionContextSchema = z.object({
  final_composed_output: z.unknown().optional(),
});

export enum AuditStatus {
  PASS = 'PASS',
  WARNING = 'WARNING',
  FAIL = 'FAIL',
  NOT_APPLICABLE = 'NOT_APPLICABLE',
  NOT_RUN = 'NOT_RUN',
}

export const AuditCheckResultSchema = z.object({
  check_name: z.string(),
  status: z.nativeEnum(AuditStatus),
  message: z.string(),
});

export type AuditCheckResult = z.infer<typeof AuditCheckResultSchema>;

export const ReflectionContextSchema = z.object({
  final_confidence_vector_from_reflection: z.array(z.number()).length(4).optional(),
  audit_check_results: z.array(AuditCheckResultSchema).default([]),
});

export type ReflectionContext = z.infer<typeof ReflectionContextSchema>;

/** Reads the context a previous stage left under its name. Missing entries yield the schema defaults. */
export function readStageContext<S extends z.ZodTypeAny>(
  accumulatedContext: Record<string, unknown>,
  stageName: string,
  schema: S
): z.infer<S> {
  return schema.parse(accumulatedContext[stageName] ?? {});
}
