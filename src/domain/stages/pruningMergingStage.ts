import { createLogger, errorMessage } from '../../logger';
import { GoTProcessorSessionData } from '../models/commonTypes';
import { Edge, Node, NodeType, updateNodeConfidence } from '../models/graphElements';
import { confidenceFromList, confidenceToList, minConfidence } from '../models/common';
import { STAGE_NAMES } from '../models/stageContexts';
import { calculateNodeSimilarity } from '../utils/metadataHelpers';
import { BaseStage, StageOutput } from './baseStage';

const logger = createLogger('PruningMergingStage');

const PRUNABLE_TYPES: ReadonlySet<NodeType> = new Set([
  NodeType.HYPOTHESIS,
  NodeType.EVIDENCE,
  NodeType.INTERDISCIPLINARY_BRIDGE,
]);
const MERGEABLE_TYPES: ReadonlySet<NodeType> = new Set([NodeType.HYPOTHESIS, NodeType.EVIDENCE]);

const edgeKey = (edge: Edge): string => `${edge.source_id}|${edge.type}|${edge.target_id}`;

export class PruningMergingStage extends BaseStage {
  static STAGE_NAME: string = STAGE_NAMES.pruningMerging;
  readonly stageName: string = PruningMergingStage.STAGE_NAME;

  private async loadGraph(queryContext: string): Promise<{ nodes: Node[]; edges: Edge[] }> {
    const nodes = await this.repository.findNodes({ queryContext });
    const edges = nodes.length > 0 ? await this.repository.findEdges({ nodeIds: nodes.map((node) => node.id) }) : [];
    return { nodes, edges };
  }

  private async pruneLowConfidenceNodes(nodes: Node[]): Promise<number> {
    const doomed = nodes.filter(
      (node) =>
        PRUNABLE_TYPES.has(node.type) &&
        minConfidence(node.confidence) < this.params.pruning_confidence_threshold &&
        node.metadata.impact_score < this.params.pruning_impact_threshold
    );
    const pruned = await this.repository.deleteNodes(doomed.map((node) => node.id));
    if (pruned > 0) {
      logger.info(`Pruned ${pruned} low-confidence, low-impact nodes.`);
    }
    return pruned;
  }

  private async pruneLowConfidenceEdges(edges: Edge[]): Promise<number> {
    const doomed = edges.filter((edge) => edge.confidence < this.params.pruning_edge_confidence_threshold);
    const pruned = await this.repository.deleteEdges(doomed.map((edge) => edge.id));
    if (pruned > 0) {
      logger.info(`Pruned ${pruned} low-confidence edges.`);
    }
    return pruned;
  }

  private async pruneIsolatedNodes(nodes: Node[], edges: Edge[]): Promise<number> {
    const connected = new Set(edges.flatMap((edge) => [edge.source_id, edge.target_id]));
    const isolated = nodes.filter((node) => node.type !== NodeType.ROOT && !connected.has(node.id));
    const pruned = await this.repository.deleteNodes(isolated.map((node) => node.id));
    if (pruned > 0) {
      logger.info(`Pruned ${pruned} isolated nodes.`);
    }
    return pruned;
  }

  /** Folds `absorbed` into `survivor`, rewiring the absorbed node's edges. */
  private async mergePair(survivor: Node, absorbed: Node, edges: Edge[]): Promise<Node> {
    const survivorValues = confidenceToList(survivor.confidence);
    const absorbedValues = confidenceToList(absorbed.confidence);
    const averaged = confidenceFromList(survivorValues.map((value, i) => (value + absorbedValues[i]) / 2));

    const revised = updateNodeConfidence(survivor, averaged, this.stageName, `Merged with node ${absorbed.id}.`);
    const merged: Node = {
      ...revised,
      label: absorbed.label.length > survivor.label.length ? absorbed.label : survivor.label,
      metadata: {
        ...revised.metadata,
        disciplinary_tags: [
          ...new Set([...survivor.metadata.disciplinary_tags, ...absorbed.metadata.disciplinary_tags]),
        ],
        impact_score: Math.max(survivor.metadata.impact_score, absorbed.metadata.impact_score),
      },
    };

    const existing = new Set(
      edges.filter((edge) => edge.source_id === survivor.id || edge.target_id === survivor.id).map(edgeKey)
    );
    const rewired: Edge[] = [];
    for (const edge of edges) {
      if (edge.source_id !== absorbed.id && edge.target_id !== absorbed.id) {
        continue;
      }
      const source = edge.source_id === absorbed.id ? survivor.id : edge.source_id;
      const target = edge.target_id === absorbed.id ? survivor.id : edge.target_id;
      if (source === target) {
        continue;
      }
      const candidate: Edge = { ...edge, id: `${edge.id}_merged`, source_id: source, target_id: target };
      if (!existing.has(edgeKey(candidate))) {
        existing.add(edgeKey(candidate));
        rewired.push(candidate);
      }
    }

    await this.repository.saveNodes([merged]);
    await this.repository.deleteNodes([absorbed.id]);
    await this.repository.saveEdges(rewired);
    return merged;
  }

  private async mergeSimilarNodes(queryContext: string): Promise<number> {
    const { nodes, edges } = await this.loadGraph(queryContext);
    const candidates = nodes
      .filter((node) => MERGEABLE_TYPES.has(node.type))
      .sort((a, b) => a.id.localeCompare(b.id));
    const absorbedIds = new Set<string>();
    const current = new Map(candidates.map((node) => [node.id, node]));
    let liveEdges = edges;
    let mergedCount = 0;

    for (let i = 0; i < candidates.length; i++) {
      for (let j = i + 1; j < candidates.length; j++) {
        const first = current.get(candidates[i].id);
        const second = current.get(candidates[j].id);
        if (!first || !second || absorbedIds.has(first.id) || absorbedIds.has(second.id)) {
          continue;
        }
        if (first.type !== second.type) {
          continue;
        }
        const similarity = calculateNodeSimilarity(first, second);
        if (similarity < this.params.merging_semantic_overlap_threshold) {
          continue;
        }
        const merged = await this.mergePair(first, second, liveEdges);
        current.set(merged.id, merged);
        absorbedIds.add(second.id);
        mergedCount += 1;
        liveEdges = await this.repository.findEdges({ nodeIds: [...current.keys()].filter((id) => !absorbedIds.has(id)) });
        logger.info(`Merged node ${second.id} into ${first.id} (similarity: ${similarity.toFixed(3)}).`);
      }
    }
    return mergedCount;
  }

  async execute(currentSessionData: GoTProcessorSessionData): Promise<StageOutput> {
    this.logStart(currentSessionData.session_id);
    const queryContext = currentSessionData.query;

    try {
      let graph = await this.loadGraph(queryContext);
      const nodesPrunedLow = await this.pruneLowConfidenceNodes(graph.nodes);

      graph = await this.loadGraph(queryContext);
      const edgesPruned = await this.pruneLowConfidenceEdges(graph.edges);

      graph = await this.loadGraph(queryContext);
      const nodesPrunedIsolated = await this.pruneIsolatedNodes(graph.nodes, graph.edges);

      const nodesMerged = await this.mergeSimilarNodes(queryContext);
      const remaining = await this.repository.countElements(queryContext);

      const nodesPruned = nodesPrunedLow + nodesPrunedIsolated;
      const summary =
        `Pruning and merging completed. Nodes pruned: ${nodesPruned}, edges pruned: ${edgesPruned}, ` +
        `nodes merged: ${nodesMerged}. Remaining: ${remaining.nodes} nodes, ${remaining.edges} edges.`;
      const output = this.output(
        true,
        summary,
        {
          pruning_merging_completed: true,
          nodes_remaining: remaining.nodes,
          edges_remaining: remaining.edges,
        },
        {
          nodes_pruned: nodesPruned,
          edges_pruned: edgesPruned,
          nodes_merged: nodesMerged,
          nodes_remaining: remaining.nodes,
          edges_remaining: remaining.edges,
        }
      );
      this.logEnd(currentSessionData.session_id, output);
      return output;
    } catch (error) {
      const message = `Graph store error during pruning and merging: ${errorMessage(error)}`;
      logger.error(message);
      return this.output(
        false,
        message,
        { pruning_merging_completed: false, nodes_remaining: 0, edges_remaining: 0, error: message },
        {},
        message
      );
    }
  }
}
