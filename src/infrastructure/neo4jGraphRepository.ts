import neo4j from 'neo4j-driver';
import { EdgeQuery, GraphCounts, GraphRepository, NodeQuery } from '../domain/interfaces/graphRepository';
import { Edge, Node } from '../domain/models/graphElements';
import {
  edgeFromNeo4jProperties,
  nodeFromNeo4jProperties,
  prepareEdgePropertiesForNeo4j,
  prepareNodePropertiesForNeo4j,
} from '../domain/utils/neo4jHelpers';
import { buildNodeUpsertQuery, buildRelationshipUpsertQuery } from '../utils/cypherValidation';
import { isRecord } from '../config';
import { createLogger } from '../logger';
import { CypherExecutor, QueryRow } from './neo4jDatabaseManager';

const logger = createLogger('Neo4jGraphRepository');

const groupBy = <T, K extends string>(items: T[], key: (item: T) => K): Map<K, T[]> => {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const bucket = groups.get(key(item)) ?? [];
    bucket.push(item);
    groups.set(key(item), bucket);
  }
  return groups;
};

const toNumber = (value: unknown): number => {
  if (neo4j.isInt(value)) {
    return value.toNumber();
  }
  return typeof value === 'number' ? value : 0;
};

const idsFrom = (rows: QueryRow[]): string[] =>
  rows.map((row) => row.id).filter((id): id is string => typeof id === 'string');

const propsFrom = (rows: QueryRow[]): Record<string, unknown>[] =>
  rows.map((row) => row.props).filter(isRecord);

export class Neo4jGraphRepository implements GraphRepository {
  readonly backend = 'neo4j' as const;

  constructor(private readonly db: CypherExecutor) {}

  async ensureSchema(): Promise<void> {
    await this.db.executeQuery(
      'CREATE CONSTRAINT node_id_unique IF NOT EXISTS FOR (n:Node) REQUIRE n.id IS UNIQUE',
      {},
      'write'
    );
    await this.db.executeQuery(
      'CREATE INDEX node_query_context IF NOT EXISTS FOR (n:Node) ON (n.metadata_query_context)',
      {},
      'write'
    );
    logger.info('Neo4j constraints and indexes ensured.');
  }

  async saveNodes(nodes: Node[]): Promise<string[]> {
    const saved: string[] = [];
    for (const [type, group] of groupBy(nodes, (node) => node.type)) {
      const rows = await this.db.executeQuery(
        buildNodeUpsertQuery(type),
        { batch: group.map(prepareNodePropertiesForNeo4j) },
        'write'
      );
      saved.push(...idsFrom(rows));
    }
    logger.debug(`Upserted ${saved.length}/${nodes.length} nodes.`);
    return saved;
  }

  async saveEdges(edges: Edge[]): Promise<string[]> {
    const saved: string[] = [];
    for (const [type, group] of groupBy(edges, (edge) => edge.type)) {
      const rows = await this.db.executeQuery(
        buildRelationshipUpsertQuery(type),
        { batch: group.map(prepareEdgePropertiesForNeo4j) },
        'write'
      );
      saved.push(...idsFrom(rows));
    }
    if (saved.length < edges.length) {
      logger.warn(`${edges.length - saved.length} edge(s) skipped because an endpoint does not exist.`);
    }
    return saved;
  }

  async getNode(id: string): Promise<Node | undefined> {
    const rows = await this.db.executeQuery(
      'MATCH (n:Node {id: $id}) RETURN properties(n) AS props LIMIT 1',
      { id },
      'read'
    );
    const [props] = propsFrom(rows);
    return props ? nodeFromNeo4jProperties(props) : undefined;
  }

  async findNodes(query: NodeQuery = {}): Promise<Node[]> {
    const conditions: string[] = [];
    const params: Record<string, unknown> = {};
    if (query.ids) {
      conditions.push('n.id IN $ids');
      params.ids = query.ids;
    }
    if (query.types) {
      conditions.push('n.type IN $types');
      params.types = query.types;
    }
    if (query.queryContext !== undefined) {
      conditions.push('n.metadata_query_context = $queryContext');
      params.queryContext = query.queryContext;
    }
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await this.db.executeQuery(
      `MATCH (n:Node) ${where} RETURN properties(n) AS props ORDER BY n.created_at, n.id`,
      params,
      'read'
    );
    return propsFrom(rows).map(nodeFromNeo4jProperties);
  }

  async findEdges(query: EdgeQuery = {}): Promise<Edge[]> {
    const conditions: string[] = [];
    const params: Record<string, unknown> = {};
    if (query.ids) {
      conditions.push('r.id IN $ids');
      params.ids = query.ids;
    }
    if (query.types) {
      conditions.push('r.type IN $types');
      params.types = query.types;
    }
    if (query.nodeIds) {
      conditions.push('(source.id IN $nodeIds OR target.id IN $nodeIds)');
      params.nodeIds = query.nodeIds;
    }
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await this.db.executeQuery(
      `MATCH (source:Node)-[r]->(target:Node) ${where} RETURN properties(r) AS props ORDER BY r.created_at, r.id`,
      params,
      'read'
    );
    return propsFrom(rows).map(edgeFromNeo4jProperties);
  }

  async deleteNodes(ids: string[]): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }
    const rows = await this.db.executeQuery(
      'MATCH (n:Node) WHERE n.id IN $ids WITH n DETACH DELETE n RETURN count(*) AS deleted',
      { ids },
      'write'
    );
    return toNumber(rows[0]?.deleted);
  }

  async deleteEdges(ids: string[]): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }
    const rows = await this.db.executeQuery(
      'MATCH ()-[r]->() WHERE r.id IN $ids WITH r DELETE r RETURN count(*) AS deleted',
      { ids },
      'write'
    );
    return toNumber(rows[0]?.deleted);
  }

  async countElements(queryContext?: string): Promise<GraphCounts> {
    const scoped = queryContext !== undefined;
    const params = scoped ? { queryContext } : {};
    const nodeRows = await this.db.executeQuery(
      scoped
        ? 'MATCH (n:Node) WHERE n.metadata_query_context = $queryContext RETURN count(n) AS total'
        : 'MATCH (n:Node) RETURN count(n) AS total',
      params,
      'read'
    );
    const edgeRows = await this.db.executeQuery(
      scoped
        ? 'MATCH (s:Node)-[r]->(t:Node) WHERE s.metadata_query_context = $queryContext OR t.metadata_query_context = $queryContext RETURN count(DISTINCT r) AS total'
        : 'MATCH (:Node)-[r]->(:Node) RETURN count(r) AS total',
      params,
      'read'
    );
    return { nodes: toNumber(nodeRows[0]?.total), edges: toNumber(edgeRows[0]?.total) };
  }

  healthCheck(): Promise<boolean> {
    return this.db.healthCheck();
  }

  close(): Promise<void> {
    return this.db.close();
  }
}
