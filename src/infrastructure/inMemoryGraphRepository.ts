import { EdgeQuery, GraphCounts, GraphRepository, NodeQuery } from '../domain/interfaces/graphRepository';
import { Edge, Node } from '../domain/models/graphElements';
import { createLogger } from '../logger';

const logger = createLogger('InMemoryGraphRepository');

/**
 * Process-local graph store with the same semantics as the Neo4j
 * repository. Values are cloned on the way in and out so callers never
 * share references with the store.
 */
export class InMemoryGraphRepository implements GraphRepository {
  readonly backend = 'memory' as const;
  private nodes = new Map<string, Node>();
  private edges = new Map<string, Edge>();

  async saveNodes(nodes: Node[]): Promise<string[]> {
    for (const node of nodes) {
      this.nodes.set(node.id, structuredClone(node));
    }
    return nodes.map((node) => node.id);
  }

  async saveEdges(edges: Edge[]): Promise<string[]> {
    const saved: string[] = [];
    for (const edge of edges) {
      if (!this.nodes.has(edge.source_id) || !this.nodes.has(edge.target_id)) {
        logger.warn(`Skipping edge '${edge.id}': endpoint '${edge.source_id}' or '${edge.target_id}' does not exist.`);
        continue;
      }
      this.edges.set(edge.id, structuredClone(edge));
      saved.push(edge.id);
    }
    return saved;
  }

  async getNode(id: string): Promise<Node | undefined> {
    const node = this.nodes.get(id);
    return node ? structuredClone(node) : undefined;
  }

  async findNodes(query: NodeQuery = {}): Promise<Node[]> {
    const ids = query.ids ? new Set(query.ids) : undefined;
    return [...this.nodes.values()]
      .filter((node) => !ids || ids.has(node.id))
      .filter((node) => !query.types || query.types.includes(node.type))
      .filter((node) => query.queryContext === undefined || node.metadata.query_context === query.queryContext)
      .map((node) => structuredClone(node));
  }

  async findEdges(query: EdgeQuery = {}): Promise<Edge[]> {
    const ids = query.ids ? new Set(query.ids) : undefined;
    const nodeIds = query.nodeIds ? new Set(query.nodeIds) : undefined;
    return [...this.edges.values()]
      .filter((edge) => !ids || ids.has(edge.id))
      .filter((edge) => !query.types || query.types.includes(edge.type))
      .filter((edge) => !nodeIds || nodeIds.has(edge.source_id) || nodeIds.has(edge.target_id))
      .map((edge) => structuredClone(edge));
  }

  async deleteNodes(ids: string[]): Promise<number> {
    let deleted = 0;
    for (const id of ids) {
      if (!this.nodes.delete(id)) {
        continue;
      }
      deleted += 1;
      for (const [edgeId, edge] of this.edges) {
        if (edge.source_id === id || edge.target_id === id) {
          this.edges.delete(edgeId);
        }
      }
    }
    return deleted;
  }

  async deleteEdges(ids: string[]): Promise<number> {
    return ids.filter((id) => this.edges.delete(id)).length;
  }

  async countElements(queryContext?: string): Promise<GraphCounts> {
    if (queryContext === undefined) {
      return { nodes: this.nodes.size, edges: this.edges.size };
    }
    const scoped = new Set(
      [...this.nodes.values()].filter((node) => node.metadata.query_context === queryContext).map((node) => node.id)
    );
    const edges = [...this.edges.values()].filter((edge) => scoped.has(edge.source_id) || scoped.has(edge.target_id));
    return { nodes: scoped.size, edges: edges.length };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    logger.debug(`In-memory graph store closed with ${this.nodes.size} nodes and ${this.edges.size} edges.`);
  }
}
