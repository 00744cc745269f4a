import { GraphRepository } from '../domain/interfaces/graphRepository';
import { EdgeType, Node, NodeType } from '../domain/models/graphElements';
import { averageConfidence, confidenceToList } from '../domain/models/common';
import { GraphHyperedge, GraphState } from '../domain/models/graphState';
import { createLogger } from '../logger';

const logger = createLogger('GraphStateExporter');

export interface GraphStateExportOptions {
  query: string;
  sessionId: string;
  /** Keeps ROOT first, then the highest-impact nodes. */
  maxNodes?: number;
}

const byRootThenImpact = (a: Node, b: Node): number => {
  const rootOrder = Number(b.type === NodeType.ROOT) - Number(a.type === NodeType.ROOT);
  return rootOrder || b.metadata.impact_score - a.metadata.impact_score;
};

/** Snapshot of one query's reasoning graph, shaped for API responses. */
export class GraphStateExporter {
  constructor(private readonly repository: GraphRepository) {}

  async export({ query, sessionId, maxNodes }: GraphStateExportOptions): Promise<GraphState> {
    const allNodes = await this.repository.findNodes({ queryContext: query });
    const ranked = [...allNodes].sort(byRootThenImpact);
    const kept = maxNodes !== undefined ? ranked.slice(0, maxNodes) : ranked;
    const keptIds = new Set(kept.map((node) => node.id));

    const touching = keptIds.size > 0 ? await this.repository.findEdges({ nodeIds: [...keptIds] }) : [];
    const edges = touching.filter((edge) => keptIds.has(edge.source_id) && keptIds.has(edge.target_id));
    const { edges: totalEdges } = await this.repository.countElements(query);

    const hyperedges: GraphHyperedge[] = kept
      .filter((node) => node.type === NodeType.HYPEREDGE_CENTER)
      .map((center) => ({
        edge_id: center.id,
        nodes: touching
          .filter((edge) => edge.type === EdgeType.HYPEREDGE_COMPONENT && edge.source_id === center.id)
          .map((edge) => edge.target_id),
        confidence: averageConfidence(center.confidence),
        metadata: {
          description: center.metadata.description,
          relationship_descriptor: center.metadata.source_description,
          layer_id: center.metadata.layer_id,
        },
      }));

    const layers: Record<string, string[]> = {};
    for (const node of kept) {
      const layer = node.metadata.layer_id || 'unassigned';
      layers[layer] = [...(layers[layer] ?? []), node.id];
    }

    const truncated = kept.length < allNodes.length;
    if (truncated) {
      logger.debug(`Graph state truncated to ${kept.length} of ${allNodes.length} nodes.`);
    }

    return {
      nodes: kept.map((node) => ({
        node_id: node.id,
        label: node.label,
        type: node.type,
        confidence: confidenceToList(node.confidence),
        metadata: { ...node.metadata },
      })),
      edges: edges.map((edge) => ({
        edge_id: edge.id,
        source: edge.source_id,
        target: edge.target_id,
        edge_type: edge.type,
        confidence: edge.confidence,
        metadata: { ...edge.metadata },
      })),
      hyperedges,
      layers,
      statistics: {
        node_count: kept.length,
        edge_count: edges.length,
        hyperedge_count: hyperedges.length,
        layer_count: Object.keys(layers).length,
      },
      metadata: {
        query,
        session_id: sessionId,
        total_nodes: allNodes.length,
        total_edges: totalEdges,
        truncated,
      },
    };
  }
}
