import { z } from 'zod';
import { randomUUID } from 'crypto';
import {
  TimestampedModelSchema,
  CertaintyScoreSchema,
  ConfidenceVector,
  ConfidenceVectorSchema,
  EpistemicStatus,
  ImpactScoreSchema,
  RevisionRecordSchema,
} from './common';

// --- Enumerations ---
export enum NodeType {
  ROOT = "root",
  TASK_UNDERSTANDING = "task_understanding",
  DECOMPOSITION_DIMENSION = "decomposition_dimension",
  HYPOTHESIS = "hypothesis",
  EVIDENCE = "evidence",
  PLACEHOLDER_GAP = "placeholder_gap",
  INTERDISCIPLINARY_BRIDGE = "interdisciplinary_bridge",
  RESEARCH_QUESTION = "research_question",
  HYPEREDGE_CENTER = "hyperedge_center",
}

export enum EdgeType {
  DECOMPOSITION_OF = "decomposition_of",
  GENERATES_HYPOTHESIS = "generates_hypothesis",
  HAS_SUBQUESTION = "has_subquestion",
  CORRELATIVE = "correlative",
  SUPPORTIVE = "supportive",
  CONTRADICTORY = "contradictory",
  PREREQUISITE = "prerequisite",
  GENERALIZATION = "generalization",
  SPECIALIZATION = "specialization",
  ASSOCIATIVE = "associative",
  EXAMPLE_OF = "example_of",
  RELEVANT_TO = "relevant_to",
  CAUSES = "causes",
  CAUSED_BY = "caused_by",
  ENABLES = "enables",
  PREVENTS = "prevents",
  INFLUENCES_POSITIVELY = "influences_positively",
  INFLUENCES_NEGATIVELY = "influences_negatively",
  COUNTERFACTUAL_TO = "counterfactual_to",
  CONFOUNDED_BY = "confounded_by",
  TEMPORAL_PRECEDES = "temporal_precedes",
  TEMPORAL_FOLLOWS = "temporal_follows",
  COOCCURS_WITH = "cooccurs_with",
  OVERLAPS_WITH = "overlaps_with",
  CYCLIC_RELATIONSHIP = "cyclic_relationship",
  DELAYED_EFFECT_OF = "delayed_effect_of",
  SEQUENTIAL_DEPENDENCY = "sequential_dependency",
  IBN_SOURCE_LINK = "ibn_source_link",
  IBN_TARGET_LINK = "ibn_target_link",
  HYPEREDGE_COMPONENT = "hyperedge_component",
  OTHER = "other",
}

// --- Metadata models ---
export const FalsificationCriteriaSchema = z.object({
  description: z.string(),
  testable_conditions: z.array(z.string()).default([]),
});

export type FalsificationCriteria = z.infer<typeof FalsificationCriteriaSchema>;

export const BiasFlagSchema = z.object({
  bias_type: z.string(),
  description: z.string().default(''),
  assessment_stage_id: z.string().default(''),
  mitigation_suggested: z.string().default(''),
  severity: z.enum(['low', 'medium', 'high']).default('low'),
});

export type BiasFlag = z.infer<typeof BiasFlagSchema>;

export const PlanSchema = z.object({
  type: z.string(),
  description: z.string(),
  estimated_cost: z.number().default(0.0),
  estimated_duration: z.number().default(0.0),
  required_resources: z.array(z.string()).default([]),
});

export type Plan = z.infer<typeof PlanSchema>;

export const InterdisciplinaryInfoSchema = z.object({
  source_disciplines: z.array(z.string()).default([]),
  target_disciplines: z.array(z.string()).default([]),
  bridging_concept: z.string().default(''),
});

export type InterdisciplinaryInfo = z.infer<typeof InterdisciplinaryInfoSchema>;

export const InformationTheoreticMetricsSchema = z.object({
  entropy: z.number().default(0.0),
  information_gain: z.number().default(0.0),
  kl_divergence_from_prior: z.number().default(0.0),
});

export type InformationTheoreticMetrics = z.infer<typeof InformationTheoreticMetricsSchema>;

export const StatisticalPowerSchema = z.object({
  value: CertaintyScoreSchema.default(0.8),
  sample_size: z.number().int().default(0),
  effect_size: z.number().default(0.0),
  p_value: z.number().default(0.0),
  confidence_interval: z.tuple([z.number(), z.number()]).default([0.0, 1.0]),
  method_description: z.string().default(''),
});

export type StatisticalPower = z.infer<typeof StatisticalPowerSchema>;

export const AttributionSchema = z.object({
  source_id: z.string().default(''),
  contributor: z.string().default(''),
  timestamp: z.string().default(''),
  role: z.string().default('author'),
});

export type Attribution = z.infer<typeof AttributionSchema>;

// --- Core graph element models ---
export const NodeMetadataSchema = TimestampedModelSchema.extend({
  description: z.string().default(''),
  query_context: z.string().default(''),
  source_description: z.string().default(''),
  epistemic_status: z.nativeEnum(EpistemicStatus).default(EpistemicStatus.UNKNOWN),
  disciplinary_tags: z.array(z.string()).default([]),
  layer_id: z.string().default(''),
  impact_score: ImpactScoreSchema.default(0.1),
  is_knowledge_gap: z.boolean().default(false),
  plan: PlanSchema.optional(),
  falsification_criteria: FalsificationCriteriaSchema.optional(),
  bias_flags: z.array(BiasFlagSchema).default([]),
  statistical_power: StatisticalPowerSchema.optional(),
  interdisciplinary_info: InterdisciplinaryInfoSchema.optional(),
  information_metrics: InformationTheoreticMetricsSchema.optional(),
  attribution: z.array(AttributionSchema).default([]),
  revision_history: z.array(RevisionRecordSchema).default([]),
});

export type NodeMetadata = z.infer<typeof NodeMetadataSchema>;

export const NodeSchema = TimestampedModelSchema.extend({
  id: z.string().min(1).default(() => randomUUID()),
  label: z.string().default(''),
  type: z.nativeEnum(NodeType).default(NodeType.HYPOTHESIS),
  confidence: ConfidenceVectorSchema.default({}),
  metadata: NodeMetadataSchema.default({}),
});

export type Node = z.infer<typeof NodeSchema>;
export type NodeInput = z.input<typeof NodeSchema>;

export const createNode = (data: NodeInput = {}): Node => NodeSchema.parse(data);

/**
 * Returns a copy of `node` carrying `newConfidence`, with the change recorded
 * in its revision history.
 */
export const updateNodeConfidence = (
  node: Node,
  newConfidence: ConfidenceVector,
  updatedBy: string,
  reason = ''
): Node => {
  const now = new Date();
  const revision = RevisionRecordSchema.parse({
    timestamp: now,
    user_or_process: updatedBy,
    action: 'update_confidence',
    changes_made: {
      confidence: { old: node.confidence, new: newConfidence },
    },
    reason,
  });
  return {
    ...node,
    confidence: newConfidence,
    updated_at: now,
    metadata: {
      ...node.metadata,
      updated_at: now,
      revision_history: [...node.metadata.revision_history, revision],
    },
  };
};

export const EdgeMetadataSchema = TimestampedModelSchema.extend({
  description: z.string().default(''),
  weight: z.number().default(1.0),
});

export type EdgeMetadata = z.infer<typeof EdgeMetadataSchema>;

export const EdgeSchema = TimestampedModelSchema.extend({
  id: z.string().min(1).default(() => randomUUID()),
  source_id: z.string().min(1),
  target_id: z.string().min(1),
  type: z.nativeEnum(EdgeType).default(EdgeType.SUPPORTIVE),
  confidence: CertaintyScoreSchema.default(0.7),
  metadata: EdgeMetadataSchema.default({}),
});

export type Edge = z.infer<typeof EdgeSchema>;
export type EdgeInput = z.input<typeof EdgeSchema>;

export const createEdge = (data: EdgeInput): Edge => EdgeSchema.parse(data);

export const HyperedgeMetadataSchema = TimestampedModelSchema.extend({
  description: z.string().default(''),
  relationship_descriptor: z.string().default(''),
  layer_id: z.string().default(''),
});

export type HyperedgeMetadata = z.infer<typeof HyperedgeMetadataSchema>;

export const HyperedgeSchema = TimestampedModelSchema.extend({
  id: z.string().min(1).default(() => randomUUID()),
  node_ids: z.array(z.string()).min(2, 'A hyperedge joins at least two nodes'),
  confidence: ConfidenceVectorSchema.default({}),
  metadata: HyperedgeMetadataSchema.default({}),
});

export type Hyperedge = z.infer<typeof HyperedgeSchema>;
export type HyperedgeInput = z.input<typeof HyperedgeSchema>;

export const createHyperedge = (data: HyperedgeInput): Hyperedge => HyperedgeSchema.parse(data);

/**
 * The graph store has no native hyperedges, so a hyperedge is stored as a
 * HYPEREDGE_CENTER node with one HYPEREDGE_COMPONENT edge per member.
 */
export const hyperedgeToGraphElements = (
  hyperedge: Hyperedge,
  queryContext: string,
  label: string
): { center: Node; components: Edge[] } => {
  const center = createNode({
    id: hyperedge.id,
    label,
    type: NodeType.HYPEREDGE_CENTER,
    confidence: hyperedge.confidence,
    metadata: {
      description: hyperedge.metadata.description,
      query_context: queryContext,
      source_description: hyperedge.metadata.relationship_descriptor,
      layer_id: hyperedge.metadata.layer_id,
      impact_score: 0.5,
    },
  });
  const components = hyperedge.node_ids.map((memberId) =>
    createEdge({
      id: `${hyperedge.id}_has_member_${memberId}`,
      source_id: hyperedge.id,
      target_id: memberId,
      type: EdgeType.HYPEREDGE_COMPONENT,
      confidence: 1.0,
      metadata: { description: 'HAS_MEMBER' },
    })
  );
  return { center, components };
};
