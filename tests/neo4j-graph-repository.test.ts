import { describe, expect, test } from '@jest/globals';
import neo4j from 'neo4j-driver';
import { Neo4jGraphRepository } from '../src/infrastructure/neo4jGraphRepository';
import { CypherExecutor, QueryRow, TransactionType } from '../src/infrastructure/neo4jDatabaseManager';
import { createEdge, createNode, EdgeType, NodeType } from '../src/domain/models/graphElements';
import { prepareNodePropertiesForNeo4j } from '../src/domain/utils/neo4jHelpers';

interface RecordedQuery {
  query: string;
  parameters: Record<string, unknown>;
  txType: TransactionType;
}

/** Records every query and answers from a queue of canned results. */
class FakeCypherExecutor implements CypherExecutor {
  readonly calls: RecordedQuery[] = [];
  closed = false;

  constructor(private readonly responses: QueryRow[][] = []) {}

  async executeQuery(
    query: string,
    parameters: Record<string, unknown> = {},
    txType: TransactionType = 'read'
  ): Promise<QueryRow[]> {
    this.calls.push({ query, parameters, txType });
    return this.responses.shift() ?? [];
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

describe('Neo4jGraphRepository', () => {
  test('upserts nodes in one batch per type label', async () => {
    const db = new FakeCypherExecutor([[{ id: 'r' }], [{ id: 'h1' }, { id: 'h2' }]]);
    const repository = new Neo4jGraphRepository(db);
    const saved = await repository.saveNodes([
      createNode({ id: 'r', type: NodeType.ROOT }),
      createNode({ id: 'h1', type: NodeType.HYPOTHESIS }),
      createNode({ id: 'h2', type: NodeType.HYPOTHESIS }),
    ]);

    expect(saved).toEqual(['r', 'h1', 'h2']);
    expect(db.calls).toHaveLength(2);
    expect(db.calls[0].query).toContain('SET n:ROOT');
    expect(db.calls[1].query).toContain('SET n:HYPOTHESIS');
    expect(db.calls[1].txType).toBe('write');
    expect(db.calls[1].parameters.batch).toHaveLength(2);
  });

  test('returns only the edges the database matched', async () => {
    const db = new FakeCypherExecutor([[{ id: 'e1' }]]);
    const repository = new Neo4jGraphRepository(db);
    const saved = await repository.saveEdges([
      createEdge({ id: 'e1', source_id: 'a', target_id: 'b', type: EdgeType.SUPPORTIVE }),
      createEdge({ id: 'e2', source_id: 'a', target_id: 'ghost', type: EdgeType.SUPPORTIVE }),
    ]);
    expect(saved).toEqual(['e1']);
    expect(db.calls[0].query).toContain('[r:SUPPORTIVE {id: props.id}]');
  });

  test('builds filters as query parameters', async () => {
    const db = new FakeCypherExecutor();
    const repository = new Neo4jGraphRepository(db);
    await repository.findNodes({ types: [NodeType.EVIDENCE], queryContext: 'q' });
    expect(db.calls[0].query).toContain('WHERE n.type IN $types AND n.metadata_query_context = $queryContext');
    expect(db.calls[0].parameters).toEqual({ types: ['evidence'], queryContext: 'q' });

    await repository.findEdges({ nodeIds: ['a'] });
    expect(db.calls[1].query).toContain('(source.id IN $nodeIds OR target.id IN $nodeIds)');
    expect(db.calls[1].parameters).toEqual({ nodeIds: ['a'] });
  });

  test('rebuilds nodes from stored properties', async () => {
    const node = createNode({ id: 'n1', label: 'Stored', type: NodeType.EVIDENCE, metadata: { impact_score: 0.4 } });
    const db = new FakeCypherExecutor([[{ props: prepareNodePropertiesForNeo4j(node) }]]);
    const repository = new Neo4jGraphRepository(db);
    expect(await repository.getNode('n1')).toEqual(node);
    expect(db.calls[0].parameters).toEqual({ id: 'n1' });
  });

  test('converts driver integers in delete and count results', async () => {
    const db = new FakeCypherExecutor([
      [{ deleted: neo4j.int(3) }],
      [{ total: neo4j.int(5) }],
      [{ total: 7 }],
    ]);
    const repository = new Neo4jGraphRepository(db);
    expect(await repository.deleteNodes(['a', 'b', 'c'])).toBe(3);
    expect(await repository.countElements('q')).toEqual({ nodes: 5, edges: 7 });
    expect(db.calls[1].parameters).toEqual({ queryContext: 'q' });
  });

  test('skips the round trip for empty deletes and closes the executor', async () => {
    const db = new FakeCypherExecutor();
    const repository = new Neo4jGraphRepository(db);
    expect(await repository.deleteNodes([])).toBe(0);
    expect(await repository.deleteEdges([])).toBe(0);
    expect(db.calls).toHaveLength(0);
    await repository.close();
    expect(db.closed).toBe(true);
  });
});
