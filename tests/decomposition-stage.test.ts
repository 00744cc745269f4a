import { beforeEach, describe, expect, test } from '@jest/globals';
import { DecompositionStage } from '../src/domain/stages/decompositionStage';
import { InMemoryGraphRepository } from '../src/infrastructure/inMemoryGraphRepository';
import { createNode, EdgeType, NodeType } from '../src/domain/models/graphElements';
import { DecompositionContextSchema, readStageContext } from '../src/domain/models/stageContexts';
import { makeSession, makeSettings } from './helpers';

describe('DecompositionStage', () => {
  const query = 'How does sleep affect memory?';
  let repository: InMemoryGraphRepository;
  let stage: DecompositionStage;

  beforeEach(async () => {
    repository = new InMemoryGraphRepository();
    stage = new DecompositionStage(makeSettings(), { repository });
    await repository.saveNodes([
      createNode({
        id: 'root',
        label: 'Task Understanding',
        type: NodeType.ROOT,
        metadata: { query_context: query, layer_id: 'root_layer', disciplinary_tags: ['neuroscience'] },
      }),
    ]);
  });

  const withRoot = (operationalParams: Record<string, unknown> = {}) =>
    makeSession(query, {
      operational_params: operationalParams,
      InitializationStage: { root_node_id: 'root' },
    });

  test('creates the default dimensions linked to the root', async () => {
    const output = await stage.execute(withRoot());
    const context = readStageContext(output.nextStageContextUpdate, 'DecompositionStage', DecompositionContextSchema);

    expect(output.success).toBe(true);
    expect(output.summary).toBe(
      'Task decomposed into 7 dimensions: Scope, Objectives, Constraints, Data Needs, Use Cases, Potential Biases, Knowledge Gaps.'
    );
    expect(context.dimension_node_ids[0]).toBe('dim_root_0');
    expect(context.decomposition_results[6]).toEqual({ id: 'dim_root_6', label: 'Knowledge Gaps' });
    expect(output.metrics).toEqual({ dimensions_created: 7, relationships_created: 7 });

    const dimension = await repository.getNode('dim_root_0');
    expect(dimension?.type).toBe(NodeType.DECOMPOSITION_DIMENSION);
    expect(dimension?.metadata.disciplinary_tags).toEqual(['neuroscience']);
    expect(dimension?.metadata.layer_id).toBe('root_layer');
    expect(dimension?.confidence.empirical_support).toBe(0.8);

    const [edge] = await repository.findEdges({ ids: ['edge_dim_root_0_decomp_of_root'] });
    expect(edge.type).toBe(EdgeType.DECOMPOSITION_OF);
    expect(edge.target_id).toBe('root');
    expect(edge.confidence).toBe(0.95);
    expect(edge.metadata.description).toBe("'Scope' is a decomposition of 'How does sleep affect memory?'");
  });

  test('prefers valid operational dimensions and layer', async () => {
    const output = await stage.execute(
      withRoot({
        decomposition_dimensions: [{ label: 'Mechanisms', description: 'Biological pathways.' }, { label: 'Incomplete' }],
        dimension_layer: 'analysis_layer',
      })
    );
    expect(output.summary).toBe('Task decomposed into 1 dimensions: Mechanisms.');
    const dimension = await repository.getNode('dim_root_0');
    expect(dimension?.metadata.description).toBe('Biological pathways.');
    expect(dimension?.metadata.layer_id).toBe('analysis_layer');
  });

  test('falls back to defaults when no operational dimension is usable', async () => {
    const output = await stage.execute(withRoot({ decomposition_dimensions: [{ label: 'No description' }] }));
    expect(output.metrics.dimensions_created).toBe(7);
  });

  test('fails without a root id in context', async () => {
    const output = await stage.execute(makeSession(query));
    expect(output.success).toBe(false);
    expect(output.errorMessage).toBe('Root node ID not found in session context. Cannot proceed.');
    expect(output.nextStageContextUpdate).toEqual({
      DecompositionStage: {
        dimension_node_ids: [],
        decomposition_results: [],
        error: 'Root node ID not found in session context. Cannot proceed.',
      },
    });
  });

  test('fails when the root is missing from the store', async () => {
    const output = await stage.execute(makeSession(query, { InitializationStage: { root_node_id: 'ghost' } }));
    expect(output.errorMessage).toBe("Root node 'ghost' not found in graph store.");
  });
});
