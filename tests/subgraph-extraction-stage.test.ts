import { beforeEach, describe, expect, test } from '@jest/globals';
import { matchesCriterion, SubgraphExtractionStage } from '../src/domain/stages/subgraphExtractionStage';
import { InMemoryGraphRepository } from '../src/infrastructure/inMemoryGraphRepository';
import { createEdge, createNode, EdgeType, NodeType } from '../src/domain/models/graphElements';
import {
  readStageContext,
  SubgraphCriterionSchema,
  SubgraphExtractionContextSchema,
} from '../src/domain/models/stageContexts';
import { makeSession, makeSettings } from './helpers';

const uniformConfidence = (value: number) => ({
  empirical_support: value,
  theoretical_basis: value,
  methodological_rigor: value,
  consensus_alignment: value,
});

describe('SubgraphExtractionStage', () => {
  const query = 'Why do migratory birds navigate accurately?';
  let repository: InMemoryGraphRepository;
  let stage: SubgraphExtractionStage;

  const node = (id: string, type: NodeType, confidence: number, impact: number, extra: Record<string, unknown> = {}) =>
    createNode({
      id,
      label: id,
      type,
      confidence: uniformConfidence(confidence),
      metadata: { query_context: query, impact_score: impact, ...extra },
    });

  beforeEach(async () => {
    repository = new InMemoryGraphRepository();
    stage = new SubgraphExtractionStage(makeSettings(), { repository });
    await repository.saveNodes([
      node('root', NodeType.ROOT, 0.9, 0.9),
      node('h1', NodeType.HYPOTHESIS, 0.8, 0.8, { disciplinary_tags: ['biology'] }),
      node('h2', NodeType.HYPOTHESIS, 0.55, 0.55),
      node('ev1', NodeType.EVIDENCE, 0.3, 0.2),
      node('gap', NodeType.PLACEHOLDER_GAP, 0.5, 0.3, { is_knowledge_gap: true }),
    ]);
    await repository.saveEdges([
      createEdge({ id: 'e1', source_id: 'root', target_id: 'h1', type: EdgeType.GENERATES_HYPOTHESIS }),
      createEdge({ id: 'e2', source_id: 'ev1', target_id: 'h1', type: EdgeType.SUPPORTIVE }),
      createEdge({ id: 'e3', source_id: 'root', target_id: 'h2', type: EdgeType.GENERATES_HYPOTHESIS }),
    ]);
  });

  test('extracts the default subgraphs with their one-hop neighbourhoods', async () => {
    const output = await stage.execute(makeSession(query));
    const context = readStageContext(output.nextStageContextUpdate, 'SubgraphExtractionStage', SubgraphExtractionContextSchema);

    expect(output.success).toBe(true);
    expect(output.summary).toBe(
      'Extracted 3 subgraphs: high_confidence_core (3 nodes, 2 relationships), ' +
        'key_hypotheses_and_support (4 nodes, 3 relationships), knowledge_gaps_focus (1 nodes, 0 relationships).'
    );
    expect(context.subgraph_extraction_details).toEqual({ nodes_extracted: 5, subgraphs_extracted: 3 });

    const [core, hypotheses, gaps] = context.subgraphs;
    expect(core.nodes.map((n) => n.id)).toEqual(['root', 'h1', 'ev1']);
    expect(core.relationships.map((r) => r.id)).toEqual(['e1', 'e2']);
    expect(core.metrics.avg_node_impact).toBeCloseTo((0.9 + 0.8 + 0.2) / 3);
    expect(hypotheses.nodes.map((n) => n.id)).toEqual(['root', 'h1', 'h2', 'ev1']);
    expect(gaps.nodes.map((n) => n.id)).toEqual(['gap']);
  });

  test('uses valid custom criteria and skips invalid ones', async () => {
    const session = makeSession(query, {
      operational_params: {
        subgraph_extraction_criteria: [{ name: 'evidence_only', node_types: ['evidence'] }, { name: '' }],
      },
    });
    const output = await stage.execute(session);
    const context = readStageContext(output.nextStageContextUpdate, 'SubgraphExtractionStage', SubgraphExtractionContextSchema);

    expect(context.subgraphs).toHaveLength(1);
    expect(context.subgraphs[0].name).toBe('evidence_only');
    expect(context.subgraphs[0].nodes.map((n) => n.id)).toEqual(['ev1']);
  });

  test('falls back to the defaults when every custom criterion is invalid', async () => {
    const session = makeSession(query, {
      operational_params: { subgraph_extraction_criteria: [{ min_avg_confidence: 2 }] },
    });
    const output = await stage.execute(session);

    expect(output.metrics.subgraphs_extracted).toBe(3);
  });

  test('reports when nothing matches', async () => {
    const output = await stage.execute(makeSession('a query with no graph'));

    expect(output.success).toBe(true);
    expect(output.summary).toBe('No subgraphs met the extraction criteria.');
    expect(output.metrics).toEqual({ subgraphs_extracted: 0, nodes_extracted: 0 });
  });
});

describe('matchesCriterion', () => {
  const tagged = createNode({
    type: NodeType.HYPOTHESIS,
    metadata: { disciplinary_tags: ['biology', 'physics'], layer_id: 'analysis_layer' },
  });

  test('honours tag inclusion and exclusion', () => {
    expect(matchesCriterion(tagged, SubgraphCriterionSchema.parse({ name: 'c', include_disciplinary_tags: ['physics'] }))).toBe(true);
    expect(matchesCriterion(tagged, SubgraphCriterionSchema.parse({ name: 'c', include_disciplinary_tags: ['law'] }))).toBe(false);
    expect(matchesCriterion(tagged, SubgraphCriterionSchema.parse({ name: 'c', exclude_disciplinary_tags: ['biology'] }))).toBe(false);
  });

  test('filters on layer', () => {
    expect(matchesCriterion(tagged, SubgraphCriterionSchema.parse({ name: 'c', layer_ids: ['analysis_layer'] }))).toBe(true);
    expect(matchesCriterion(tagged, SubgraphCriterionSchema.parse({ name: 'c', layer_ids: ['root_layer'] }))).toBe(false);
  });
});
