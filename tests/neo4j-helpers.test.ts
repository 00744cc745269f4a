import { describe, expect, test } from '@jest/globals';
import {
  edgeFromNeo4jProperties,
  nodeFromNeo4jProperties,
  prepareEdgePropertiesForNeo4j,
  prepareNodePropertiesForNeo4j,
} from '../src/domain/utils/neo4jHelpers';
import { createEdge, createNode, EdgeType, NodeType } from '../src/domain/models/graphElements';

describe('neo4jHelpers', () => {
  const node = createNode({
    id: 'hypo_1',
    label: 'Hypothesis 1',
    type: NodeType.HYPOTHESIS,
    confidence: { empirical_support: 0.4, theoretical_basis: 0.5, methodological_rigor: 0.6, consensus_alignment: 0.7 },
    metadata: {
      query_context: 'q',
      disciplinary_tags: ['biology', 'statistics'],
      plan: { type: 'simulation', description: 'Run it' },
      impact_score: 0.8,
    },
  });

  test('flattens nodes into primitive properties', () => {
    const props = prepareNodePropertiesForNeo4j(node);
    expect(props.id).toBe('hypo_1');
    expect(props.type).toBe('hypothesis');
    expect(props.confidence_methodological_rigor).toBe(0.6);
    expect(props.metadata_disciplinary_tags).toEqual(['biology', 'statistics']);
    expect(props.metadata_impact_score).toBe(0.8);
    expect(props.metadata_created_at).toBe(node.metadata.created_at.toISOString());
    expect(JSON.parse(String(props.metadata_plan_json))).toEqual({
      type: 'simulation',
      description: 'Run it',
      estimated_cost: 0,
      estimated_duration: 0,
      required_resources: [],
    });
    expect('metadata_falsification_criteria' in props).toBe(false);
  });

  test('rebuilds the node from its stored properties', () => {
    expect(nodeFromNeo4jProperties(prepareNodePropertiesForNeo4j(node))).toEqual(node);
  });

  test('keeps edge endpoints and confidence', () => {
    const edge = createEdge({
      id: 'e1',
      source_id: 'a',
      target_id: 'b',
      type: EdgeType.CONTRADICTORY,
      confidence: 0.35,
      metadata: { description: 'disagrees' },
    });
    const props = prepareEdgePropertiesForNeo4j(edge);
    expect(props).toMatchObject({
      id: 'e1',
      source_id: 'a',
      target_id: 'b',
      type: 'contradictory',
      confidence: 0.35,
      metadata_description: 'disagrees',
      metadata_weight: 1,
    });
    expect(edgeFromNeo4jProperties(props)).toEqual(edge);
  });
});
