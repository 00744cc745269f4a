import { Settings } from '../../config';
import { createLogger, errorMessage } from '../../logger';
import { EvidenceCandidate, EvidenceSource } from '../interfaces/evidenceSource';
import { GoTProcessorSessionData } from '../models/commonTypes';
import {
  createEdge,
  createHyperedge,
  createNode,
  Edge,
  EdgeType,
  hyperedgeToGraphElements,
  Node,
  NodeType,
  updateNodeConfidence,
} from '../models/graphElements';
import { confidenceFromList, confidenceToList, EpistemicStatus } from '../models/common';
import { EvidenceIntegrationSummary, HypothesisContextSchema, STAGE_NAMES } from '../models/stageContexts';
import { SimulatedEvidenceSource } from '../services/simulatedEvidenceSource';
import { bayesianUpdateConfidence, calculateInformationGain } from '../utils/mathHelpers';
import { calculateSemanticSimilarity, truncate } from '../utils/metadataHelpers';
import { BaseStage, StageDependencies, StageOutput } from './baseStage';

const logger = createLogger('EvidenceStage');

const selectionScore = (hypothesis: Node): number => {
  const spread = confidenceToList(hypothesis.confidence).reduce((sum, c) => sum + (c - 0.5) ** 2, 0) / 4.0;
  return hypothesis.metadata.impact_score + spread;
};

// Filled in as elements are persisted, so a failure part-way still reports what was written.
interface IntegrationTally {
  evidenceNodes: Node[];
  ibnsCreated: number;
  hyperedgesCreated: number;
  hypothesisUpdated: boolean;
}

const emptyTally = (): IntegrationTally => ({
  evidenceNodes: [],
  ibnsCreated: 0,
  hyperedgesCreated: 0,
  hypothesisUpdated: false,
});

export class EvidenceStage extends BaseStage {
  static STAGE_NAME: string = STAGE_NAMES.evidence;
  readonly stageName: string = EvidenceStage.STAGE_NAME;
  private readonly evidenceSource: EvidenceSource;

  constructor(settings: Settings, deps: StageDependencies) {
    super(settings, deps);
    this.evidenceSource =
      deps.evidenceSource ?? new SimulatedEvidenceSource(this.random, this.params.default_disciplinary_tags);
    logger.debug(`Evidence source: ${this.evidenceSource.name}`);
  }

  private selectHypothesis(candidates: Node[]): Node | undefined {
    return candidates.reduce<Node | undefined>(
      (best, candidate) => (!best || selectionScore(candidate) > selectionScore(best) ? candidate : best),
      undefined
    );
  }

  private buildEvidenceNode(
    hypothesis: Node,
    evidence: EvidenceCandidate,
    iteration: number,
    index: number,
    queryContext: string
  ): Node {
    return createNode({
      id: `ev_${hypothesis.id}_${iteration}_${index}`,
      label: `Evidence ${index + 1} for H: ${truncate(hypothesis.label, 20)}`,
      type: NodeType.EVIDENCE,
      confidence: confidenceFromList([evidence.strength, 0.5, 0.8 * evidence.strength, 0.5]),
      metadata: {
        description: evidence.content,
        query_context: queryContext,
        source_description: evidence.source_description,
        epistemic_status: evidence.supports_hypothesis
          ? EpistemicStatus.EVIDENCE_SUPPORTED
          : EpistemicStatus.EVIDENCE_CONTRADICTED,
        disciplinary_tags: evidence.disciplinary_tags,
        layer_id: hypothesis.metadata.layer_id,
        impact_score: evidence.strength * evidence.statistical_power.value,
        statistical_power: evidence.statistical_power,
        created_at: evidence.timestamp,
      },
    });
  }

  /** Bridges evidence and hypothesis when they share no discipline but their labels overlap. */
  private buildInterdisciplinaryBridge(
    evidenceNode: Node,
    hypothesis: Node,
    queryContext: string
  ): { node: Node; edges: Edge[] } | undefined {
    const evidenceTags = new Set(evidenceNode.metadata.disciplinary_tags);
    const hypothesisTags = new Set(hypothesis.metadata.disciplinary_tags);
    if (evidenceTags.size === 0 || hypothesisTags.size === 0) {
      return undefined;
    }
    if ([...evidenceTags].some((tag) => hypothesisTags.has(tag))) {
      return undefined;
    }
    const similarity = calculateSemanticSimilarity(evidenceNode.label, hypothesis.label);
    if (similarity < this.params.ibn_similarity_threshold) {
      return undefined;
    }

    const ibnId = `ibn_${evidenceNode.id}_${hypothesis.id}`;
    const node = createNode({
      id: ibnId,
      label: `IBN: ${truncate(evidenceNode.label, 20)} <-> ${truncate(hypothesis.label, 20)}`,
      type: NodeType.INTERDISCIPLINARY_BRIDGE,
      confidence: confidenceFromList([similarity, 0.4, 0.5, 0.3]),
      metadata: {
        description: `Potential bridge between evidence and hypothesis (label similarity ${similarity.toFixed(2)}).`,
        query_context: queryContext,
        source_description: "EvidenceStage IBN detection",
        epistemic_status: EpistemicStatus.INFERRED,
        disciplinary_tags: [...new Set([...evidenceTags, ...hypothesisTags])],
        layer_id: hypothesis.metadata.layer_id,
        impact_score: 0.6,
        interdisciplinary_info: {
          source_disciplines: [...evidenceTags],
          target_disciplines: [...hypothesisTags],
          bridging_concept: `Connects '${truncate(evidenceNode.label, 20)}' with '${truncate(hypothesis.label, 20)}'`,
        },
      },
    });
    const edges = [
      createEdge({
        id: `edge_${evidenceNode.id}_ibnsrc_${ibnId}`,
        source_id: evidenceNode.id,
        target_id: ibnId,
        type: EdgeType.IBN_SOURCE_LINK,
        confidence: 0.8,
      }),
      createEdge({
        id: `edge_${ibnId}_ibntgt_${hypothesis.id}`,
        source_id: ibnId,
        target_id: hypothesis.id,
        type: EdgeType.IBN_TARGET_LINK,
        confidence: 0.8,
      }),
    ];
    return { node, edges };
  }

  private async integrateEvidence(
    hypothesis: Node,
    iteration: number,
    queryContext: string,
    tally: IntegrationTally
  ): Promise<void> {
    const candidates = await this.evidenceSource.gatherEvidence(hypothesis);
    logger.info(`Found ${candidates.length} evidence piece(s) for hypothesis '${hypothesis.label}'.`);

    const evidenceNodes = tally.evidenceNodes;
    let updatedHypothesis = hypothesis;

    for (const [index, evidence] of candidates.entries()) {
      const evidenceNode = this.buildEvidenceNode(hypothesis, evidence, iteration, index, queryContext);
      const edgeType = evidence.supports_hypothesis ? EdgeType.SUPPORTIVE : EdgeType.CONTRADICTORY;
      await this.repository.saveNodes([evidenceNode]);
      await this.repository.saveEdges([
        createEdge({
          id: `edge_${evidenceNode.id}_${edgeType}_${hypothesis.id}`,
          source_id: evidenceNode.id,
          target_id: hypothesis.id,
          type: edgeType,
          confidence: evidence.strength,
          metadata: {
            description: `Evidence ${evidence.supports_hypothesis ? 'supports' : 'contradicts'} hypothesis.`,
          },
        }),
      ]);
      evidenceNodes.push(evidenceNode);

      const prior = updatedHypothesis.confidence;
      const posterior = bayesianUpdateConfidence(
        prior,
        evidence.strength,
        evidence.supports_hypothesis,
        evidence.statistical_power,
        edgeType
      );
      const revised = updateNodeConfidence(
        updatedHypothesis,
        posterior,
        this.stageName,
        `Evidence ${evidenceNode.id} integrated (${edgeType}).`
      );
      updatedHypothesis = {
        ...revised,
        metadata: {
          ...revised.metadata,
          information_metrics: {
            entropy: 0.0,
            kl_divergence_from_prior: 0.0,
            ...revised.metadata.information_metrics,
            information_gain: calculateInformationGain(confidenceToList(prior), confidenceToList(posterior)),
          },
        },
      };

      const bridge = this.buildInterdisciplinaryBridge(evidenceNode, updatedHypothesis, queryContext);
      if (bridge) {
        await this.repository.saveNodes([bridge.node]);
        await this.repository.saveEdges(bridge.edges);
        tally.ibnsCreated += 1;
        logger.info(`Created interdisciplinary bridge '${bridge.node.id}'.`);
      }
    }

    if (evidenceNodes.length > 0) {
      await this.repository.saveNodes([updatedHypothesis]);
      tally.hypothesisUpdated = true;
    }

    if (evidenceNodes.length >= this.params.min_nodes_for_hyperedge) {
      const meanEmpirical =
        evidenceNodes.reduce((sum, node) => sum + node.confidence.empirical_support, 0) / evidenceNodes.length;
      const hyperedge = createHyperedge({
        id: `hyperedge_${hypothesis.id}_${iteration}`,
        node_ids: [hypothesis.id, ...evidenceNodes.map((node) => node.id)],
        confidence: confidenceFromList([meanEmpirical, 0.4, 0.5, 0.4]),
        metadata: {
          description: `Joint influence of ${evidenceNodes.length} evidence pieces on hypothesis '${truncate(hypothesis.label, 20)}'.`,
          relationship_descriptor: "Joint Support/Contradiction (Simulated)",
          layer_id: hypothesis.metadata.layer_id,
        },
      });
      const { center, components } = hyperedgeToGraphElements(
        hyperedge,
        queryContext,
        `Hyperedge for H: ${truncate(hypothesis.label, 20)}`
      );
      await this.repository.saveNodes([center]);
      await this.repository.saveEdges(components);
      tally.hyperedgesCreated = 1;
    }
  }

  async execute(currentSessionData: GoTProcessorSessionData): Promise<StageOutput> {
    this.logStart(currentSessionData.session_id);

    const { hypothesis_node_ids: hypothesisIds } = this.contextOf(
      currentSessionData,
      STAGE_NAMES.hypothesis,
      HypothesisContextSchema
    );
    const summaryData: EvidenceIntegrationSummary = {
      total_evidence_integrated: 0,
      iterations_completed: 0,
      hypotheses_updated: 0,
      ibns_created: 0,
      hyperedges_created: 0,
    };

    if (hypothesisIds.length === 0) {
      const message = "No hypotheses found to integrate evidence for.";
      logger.warn(message);
      return this.output(
        false,
        message,
        {
          error: message,
          evidence_integration_completed: false,
          evidence_nodes_added_count: 0,
          evidence_integration_summary: summaryData,
        },
        { iterations_completed: 0, evidence_nodes_created: 0 },
        message
      );
    }

    const maxIterations =
      this.operationalParams(currentSessionData).evidence_max_iterations ?? this.params.evidence_max_iterations;
    const processed = new Set<string>();
    const failures: string[] = [];

    while (summaryData.iterations_completed < maxIterations) {
      const remaining = hypothesisIds.filter((id) => !processed.has(id));
      if (remaining.length === 0) {
        logger.info('All hypotheses have been evaluated.');
        break;
      }
      const hypothesis = this.selectHypothesis(await this.repository.findNodes({ ids: remaining }));
      if (!hypothesis) {
        logger.warn('No remaining hypotheses found in the graph store.');
        break;
      }
      processed.add(hypothesis.id);
      summaryData.iterations_completed += 1;

      const tally = emptyTally();
      try {
        await this.integrateEvidence(hypothesis, summaryData.iterations_completed, currentSessionData.query, tally);
      } catch (error) {
        const failure = `Evidence integration failed for hypothesis ${hypothesis.id}: ${errorMessage(error)}`;
        logger.error(failure);
        failures.push(failure);
      }
      summaryData.total_evidence_integrated += tally.evidenceNodes.length;
      summaryData.ibns_created += tally.ibnsCreated;
      summaryData.hyperedges_created += tally.hyperedgesCreated;
      if (tally.hypothesisUpdated) {
        summaryData.hypotheses_updated += 1;
      }
    }

    const summary =
      `Evidence integration completed. Iterations: ${summaryData.iterations_completed}. ` +
      `Evidence integrated: ${summaryData.total_evidence_integrated}. ` +
      `IBNs: ${summaryData.ibns_created}. Hyperedges: ${summaryData.hyperedges_created}.`;
    const output = this.output(
      true,
      summary,
      {
        evidence_integration_completed: true,
        evidence_nodes_added_count: summaryData.total_evidence_integrated,
        evidence_integration_summary: summaryData,
      },
      {
        iterations_completed: summaryData.iterations_completed,
        evidence_nodes_created: summaryData.total_evidence_integrated,
        hypotheses_updated: summaryData.hypotheses_updated,
        ibns_created: summaryData.ibns_created,
        hyperedges_created: summaryData.hyperedges_created,
      },
      failures.length > 0 ? failures.join('; ') : undefined
    );
    this.logEnd(currentSessionData.session_id, output);
    return output;
  }
}
