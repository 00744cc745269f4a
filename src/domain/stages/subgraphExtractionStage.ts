import { Settings } from '../../config';
import { createLogger, errorMessage } from '../../logger';
import { GoTProcessorSessionData } from '../models/commonTypes';
import { Edge, Node, NodeType } from '../models/graphElements';
import { averageConfidence } from '../models/common';
import {
  ExtractedSubgraph,
  STAGE_NAMES,
  SubgraphCriterion,
  SubgraphCriterionSchema,
} from '../models/stageContexts';
import { BaseStage, StageDependencies, StageOutput } from './baseStage';

const logger = createLogger('SubgraphExtractionStage');

const mean = (values: number[]): number =>
  values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;

export function matchesCriterion(node: Node, criterion: SubgraphCriterion): boolean {
  if (criterion.min_avg_confidence !== undefined && averageConfidence(node.confidence) < criterion.min_avg_confidence) {
    return false;
  }
  if (criterion.min_impact_score !== undefined && node.metadata.impact_score < criterion.min_impact_score) {
    return false;
  }
  if (criterion.node_types && criterion.node_types.length > 0 && !criterion.node_types.includes(node.type)) {
    return false;
  }
  if (criterion.layer_ids && criterion.layer_ids.length > 0 && !criterion.layer_ids.includes(node.metadata.layer_id)) {
    return false;
  }
  if (criterion.is_knowledge_gap !== undefined && node.metadata.is_knowledge_gap !== criterion.is_knowledge_gap) {
    return false;
  }
  const tags = node.metadata.disciplinary_tags;
  if (
    criterion.include_disciplinary_tags &&
    criterion.include_disciplinary_tags.length > 0 &&
    !criterion.include_disciplinary_tags.some((tag) => tags.includes(tag))
  ) {
    return false;
  }
  if (criterion.exclude_disciplinary_tags && criterion.exclude_disciplinary_tags.some((tag) => tags.includes(tag))) {
    return false;
  }
  return true;
}

export class SubgraphExtractionStage extends BaseStage {
  static STAGE_NAME: string = STAGE_NAMES.subgraphExtraction;
  readonly stageName: string = SubgraphExtractionStage.STAGE_NAME;
  private readonly defaultExtractionCriteria: SubgraphCriterion[];

  constructor(settings: Settings, deps: StageDependencies) {
    super(settings, deps);
    this.defaultExtractionCriteria = [
      SubgraphCriterionSchema.parse({
        name: "high_confidence_core",
        description: "Nodes with high average confidence and impact.",
        min_avg_confidence: this.params.subgraph_min_confidence_threshold,
        min_impact_score: this.params.subgraph_min_impact_threshold,
        node_types: [NodeType.HYPOTHESIS, NodeType.EVIDENCE, NodeType.INTERDISCIPLINARY_BRIDGE],
        include_neighbors_depth: 1,
      }),
      SubgraphCriterionSchema.parse({
        name: "key_hypotheses_and_support",
        description: "Key hypotheses and their direct support.",
        node_types: [NodeType.HYPOTHESIS],
        min_avg_confidence: 0.5,
        min_impact_score: 0.5,
        include_neighbors_depth: 1,
      }),
      SubgraphCriterionSchema.parse({
        name: "knowledge_gaps_focus",
        description: "Identified knowledge gaps.",
        is_knowledge_gap: true,
        node_types: [NodeType.PLACEHOLDER_GAP, NodeType.RESEARCH_QUESTION],
        include_neighbors_depth: 1,
      }),
    ];
  }

  private criteriaFor(session: GoTProcessorSessionData): SubgraphCriterion[] {
    const custom = this.operationalParams(session).subgraph_extraction_criteria;
    if (!custom || custom.length === 0) {
      return this.defaultExtractionCriteria;
    }
    const parsed: SubgraphCriterion[] = [];
    custom.forEach((raw, index) => {
      const result = SubgraphCriterionSchema.safeParse(raw);
      if (result.success) {
        parsed.push(result.data);
      } else {
        logger.warn(`Skipping invalid subgraph criterion at index ${index}: ${result.error.message}`);
      }
    });
    if (parsed.length === 0) {
      logger.warn('No valid custom subgraph criteria. Using defaults.');
      return this.defaultExtractionCriteria;
    }
    return parsed;
  }

  private extractSubgraph(criterion: SubgraphCriterion, nodes: Node[], edges: Edge[]): ExtractedSubgraph | undefined {
    const nodesById = new Map(nodes.map((node) => [node.id, node]));
    const selected = new Set(nodes.filter((node) => matchesCriterion(node, criterion)).map((node) => node.id));
    if (selected.size === 0) {
      logger.debug(`No seed nodes for criterion '${criterion.name}'.`);
      return undefined;
    }

    let frontier = [...selected];
    for (let depth = 0; depth < criterion.include_neighbors_depth && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const edge of edges) {
        for (const [from, to] of [
          [edge.source_id, edge.target_id],
          [edge.target_id, edge.source_id],
        ]) {
          if (frontier.includes(from) && !selected.has(to) && nodesById.has(to)) {
            selected.add(to);
            next.push(to);
          }
        }
      }
      frontier = next;
    }

    const subgraphNodes = nodes.filter((node) => selected.has(node.id));
    const relationships = edges.filter((edge) => selected.has(edge.source_id) && selected.has(edge.target_id));
    return {
      name: criterion.name,
      description: criterion.description,
      nodes: subgraphNodes,
      relationships,
      metrics: {
        node_count: subgraphNodes.length,
        relationship_count: relationships.length,
        avg_node_confidence: mean(subgraphNodes.map((node) => averageConfidence(node.confidence))),
        avg_node_impact: mean(subgraphNodes.map((node) => node.metadata.impact_score)),
      },
    };
  }

  async execute(currentSessionData: GoTProcessorSessionData): Promise<StageOutput> {
    this.logStart(currentSessionData.session_id);

    let nodes: Node[];
    let edges: Edge[];
    try {
      nodes = await this.repository.findNodes({ queryContext: currentSessionData.query });
      edges = nodes.length > 0 ? await this.repository.findEdges({ nodeIds: nodes.map((node) => node.id) }) : [];
    } catch (error) {
      const message = `Graph store error during subgraph extraction: ${errorMessage(error)}`;
      logger.error(message);
      return this.output(
        false,
        message,
        { subgraphs: [], subgraph_extraction_details: { nodes_extracted: 0, subgraphs_extracted: 0 }, error: message },
        {},
        message
      );
    }

    const subgraphs: ExtractedSubgraph[] = [];
    for (const criterion of this.criteriaFor(currentSessionData)) {
      const subgraph = this.extractSubgraph(criterion, nodes, edges);
      if (subgraph) {
        subgraphs.push(subgraph);
        logger.info(
          `Extracted subgraph '${subgraph.name}' with ${subgraph.metrics.node_count} nodes and ` +
            `${subgraph.metrics.relationship_count} relationships.`
        );
      }
    }

    const nodesExtracted = new Set(subgraphs.flatMap((subgraph) => subgraph.nodes.map((node) => node.id))).size;
    const summary =
      subgraphs.length > 0
        ? `Extracted ${subgraphs.length} subgraphs: ${subgraphs
            .map((s) => `${s.name} (${s.metrics.node_count} nodes, ${s.metrics.relationship_count} relationships)`)
            .join(', ')}.`
        : "No subgraphs met the extraction criteria.";

    const output = this.output(
      true,
      summary,
      {
        subgraphs,
        subgraph_extraction_details: { nodes_extracted: nodesExtracted, subgraphs_extracted: subgraphs.length },
      },
      { subgraphs_extracted: subgraphs.length, nodes_extracted: nodesExtracted }
    );
    this.logEnd(currentSessionData.session_id, output);
    return output;
  }
}
