import { v4 as uuidv4 } from 'uuid';
import { createLogger, errorMessage } from '../../logger';
import { GoTProcessorSessionData } from '../models/commonTypes';
import {
  BiasFlag,
  BiasFlagSchema,
  createEdge,
  createNode,
  Edge,
  EdgeType,
  FalsificationCriteria,
  FalsificationCriteriaSchema,
  Node,
  NodeType,
  Plan,
  PlanSchema,
} from '../models/graphElements';
import { confidenceFromList, EpistemicStatus } from '../models/common';
import { DecompositionContextSchema, HypothesisContext, STAGE_NAMES } from '../models/stageContexts';
import { truncate } from '../utils/metadataHelpers';
import { choice, randomInt, sample, uniform } from '../utils/random';
import { BaseStage, StageOutput } from './baseStage';

const logger = createLogger('HypothesisStage');

const FALLBACK_PLAN_TYPES = ['Experiment', 'Simulation', 'Literature Review'];
const PLAN_RESOURCES = ['dataset_X', 'computational_cluster', 'expert_A'];
const BIAS_TYPES = ['Confirmation Bias', 'Availability Heuristic', 'Anchoring Bias'];

interface HypothesisContent {
  label: string;
  plan: Plan;
  falsificationCriteria: FalsificationCriteria;
  biasFlags: BiasFlag[];
  impactScore: number;
  disciplinaryTags: string[];
}

export class HypothesisStage extends BaseStage {
  static STAGE_NAME: string = STAGE_NAMES.hypothesis;
  readonly stageName: string = HypothesisStage.STAGE_NAME;

  private generateHypothesisContent(
    dimension: Node,
    hypoIndex: number,
    initialQuery: string
  ): HypothesisContent {
    const label = `Hypothesis ${hypoIndex + 1} regarding '${dimension.label}' for query '${truncate(initialQuery, 30)}'`;
    const planTypes = this.params.default_plan_types.length > 0 ? this.params.default_plan_types : FALLBACK_PLAN_TYPES;
    const planType = choice(this.random, planTypes);
    const plan = PlanSchema.parse({
      type: planType,
      description: `Plan to evaluate '${label}' via ${planType}.`,
      estimated_cost: uniform(this.random, 0.2, 0.8),
      estimated_duration: uniform(this.random, 1.0, 5.0),
      required_resources: [choice(this.random, PLAN_RESOURCES)],
    });

    const conditions = [
      `Observe contradictory evidence from ${planType}`,
      `Find statistical insignificance in ${choice(this.random, ['key_metric_A', 'key_metric_B'])}`,
    ];
    const falsificationCriteria = FalsificationCriteriaSchema.parse({
      description: `This hypothesis could be falsified if ${conditions[0].toLowerCase()} or if ${conditions[1].toLowerCase()}.`,
      testable_conditions: conditions,
    });

    const biasFlags: BiasFlag[] = [];
    if (this.random() < 0.15) {
      const biasType = choice(this.random, BIAS_TYPES);
      biasFlags.push(
        BiasFlagSchema.parse({
          bias_type: biasType,
          description: `Potential ${biasType} in formulating or prioritizing this hypothesis.`,
          assessment_stage_id: this.stageName,
          severity: choice(this.random, ['low', 'medium']),
        })
      );
    }

    const impactScore = uniform(this.random, 0.2, 0.9);
    const defaults = this.params.default_disciplinary_tags;
    const sampledTags = defaults.length > 0
      ? sample(this.random, defaults, randomInt(this.random, 1, Math.min(2, defaults.length)))
      : [];

    return {
      label,
      plan,
      falsificationCriteria,
      biasFlags,
      impactScore,
      disciplinaryTags: [...new Set([...sampledTags, ...dimension.metadata.disciplinary_tags])],
    };
  }

  async execute(currentSessionData: GoTProcessorSessionData): Promise<StageOutput> {
    this.logStart(currentSessionData.session_id);

    const { dimension_node_ids: dimensionNodeIds } = this.contextOf(
      currentSessionData,
      STAGE_NAMES.decomposition,
      DecompositionContextSchema
    );
    const operationalParams = this.operationalParams(currentSessionData);

    if (dimensionNodeIds.length === 0) {
      const message = "No dimensions found to generate hypotheses from.";
      logger.warn(message);
      return this.output(
        false,
        message,
        { error: message, hypothesis_node_ids: [], hypotheses_results: [] },
        { hypotheses_created: 0, relationships_created: 0 },
        message
      );
    }

    const kMin = operationalParams.hypotheses_per_dimension_min ?? this.params.hypotheses_per_dimension.min;
    const kMax = Math.max(kMin, operationalParams.hypotheses_per_dimension_max ?? this.params.hypotheses_per_dimension.max);

    const hypothesisNodes: Node[] = [];
    const edges: Edge[] = [];
    const results: HypothesisContext['hypotheses_results'] = [];

    try {
      const dimensions = await this.repository.findNodes({ ids: dimensionNodeIds });
      const found = new Set(dimensions.map((dimension) => dimension.id));
      dimensionNodeIds
        .filter((id) => !found.has(id))
        .forEach((id) => logger.warn(`Dimension node ${id} not found. Skipping hypothesis generation for it.`));

      for (const dimension of dimensions) {
        const count = randomInt(this.random, kMin, kMax);
        logger.debug(`Preparing ${count} hypotheses for dimension: '${dimension.label}' (ID: ${dimension.id})`);

        for (let i = 0; i < count; i++) {
          const content = this.generateHypothesisContent(dimension, i, currentSessionData.query);
          const hypothesis = createNode({
            id: `hypo_${dimension.id}_${i}_${uuidv4()}`,
            label: content.label,
            type: NodeType.HYPOTHESIS,
            confidence: confidenceFromList(this.params.hypothesis_confidence),
            metadata: {
              description: `A hypothesis related to dimension: '${dimension.label}'.`,
              query_context: currentSessionData.query,
              source_description: "HypothesisStage",
              epistemic_status: EpistemicStatus.HYPOTHESIS,
              disciplinary_tags: content.disciplinaryTags,
              layer_id: dimension.metadata.layer_id,
              impact_score: content.impactScore,
              plan: content.plan,
              falsification_criteria: content.falsificationCriteria,
              bias_flags: content.biasFlags,
            },
          });
          hypothesisNodes.push(hypothesis);
          edges.push(
            createEdge({
              id: `edge_${dimension.id}_genhyp_${hypothesis.id}`,
              source_id: dimension.id,
              target_id: hypothesis.id,
              type: EdgeType.GENERATES_HYPOTHESIS,
              confidence: 0.9,
              metadata: {
                description: `Hypothesis '${content.label}' generated for dimension '${dimension.label}'.`,
              },
            })
          );
          results.push({ id: hypothesis.id, label: hypothesis.label, dimension_id: dimension.id });
        }
      }

      await this.repository.saveNodes(hypothesisNodes);
      const savedEdges = await this.repository.saveEdges(edges);

      const summary = `Generated ${hypothesisNodes.length} hypotheses across ${dimensions.length} dimensions.`;
      const output = this.output(
        true,
        summary,
        { hypothesis_node_ids: hypothesisNodes.map((node) => node.id), hypotheses_results: results },
        {
          hypotheses_created: hypothesisNodes.length,
          relationships_created: savedEdges.length,
          avg_hypotheses_per_dimension: dimensions.length > 0 ? hypothesisNodes.length / dimensions.length : 0,
        }
      );
      this.logEnd(currentSessionData.session_id, output);
      return output;
    } catch (error) {
      const message = `Graph store error during hypothesis generation: ${errorMessage(error)}`;
      logger.error(message);
      return this.output(
        false,
        message,
        { error: message, hypothesis_node_ids: [], hypotheses_results: [] },
        { hypotheses_created: 0, relationships_created: 0 },
        message
      );
    }
  }
}
