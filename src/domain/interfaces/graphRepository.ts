import { Edge, EdgeType, Node, NodeType } from '../models/graphElements';
import type { GraphStoreBackend } from '../../config';

export interface NodeQuery {
  ids?: string[];
  types?: NodeType[];
  /** Matches `metadata.query_context`. */
  queryContext?: string;
}

export interface EdgeQuery {
  ids?: string[];
  types?: EdgeType[];
  /** Edges with either endpoint in this list. */
  nodeIds?: string[];
}

export interface GraphCounts {
  nodes: number;
  edges: number;
}

/**
 * Persistence port for the reasoning graph. Stages only talk to this
 * interface; Neo4j and the in-process store both implement it.
 */
export interface GraphRepository {
  readonly backend: GraphStoreBackend;

  /** Upserts by id and returns the stored ids. */
  saveNodes(nodes: Node[]): Promise<string[]>;
  /** Upserts by id. Edges whose endpoints do not exist are skipped. */
  saveEdges(edges: Edge[]): Promise<string[]>;

  getNode(id: string): Promise<Node | undefined>;
  findNodes(query?: NodeQuery): Promise<Node[]>;
  findEdges(query?: EdgeQuery): Promise<Edge[]>;

  /** Detach-deletes the nodes. Returns how many existed. */
  deleteNodes(ids: string[]): Promise<number>;
  deleteEdges(ids: string[]): Promise<number>;

  /** Counts nodes in a query context and the edges touching them (everything when omitted). */
  countElements(queryContext?: string): Promise<GraphCounts>;

  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
