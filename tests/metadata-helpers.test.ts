import { describe, expect, test } from '@jest/globals';
import {
  assessFalsifiabilityScore,
  calculateNodeSimilarity,
  calculateSemanticSimilarity,
  toTitleCase,
  truncate,
} from '../src/domain/utils/metadataHelpers';
import { createNode } from '../src/domain/models/graphElements';

describe('metadataHelpers', () => {
  test('semantic similarity is word-level Jaccard', () => {
    expect(calculateSemanticSimilarity('a b c', 'b c d')).toBeCloseTo(0.5);
    expect(calculateSemanticSimilarity('Gut Flora', 'gut flora')).toBe(1);
    expect(calculateSemanticSimilarity('', 'anything')).toBe(0);
  });

  test('node similarity mixes text and tag overlap', () => {
    const a = createNode({ id: 'a', label: 'alpha beta', metadata: { disciplinary_tags: ['x'] } });
    const b = createNode({ id: 'b', label: 'alpha, beta!', metadata: { disciplinary_tags: ['x'] } });
    const c = createNode({ id: 'c', label: 'alpha beta' });
    expect(calculateNodeSimilarity(a, b)).toBeCloseTo(1.0);
    expect(calculateNodeSimilarity(a, c)).toBeCloseTo(0.7);
  });

  test('truncate appends an ellipsis only when text is cut', () => {
    expect(truncate('abcdef', 3)).toBe('abc...');
    expect(truncate('abc', 3)).toBe('abc');
  });

  test('toTitleCase splits on underscores and spaces', () => {
    expect(toTitleCase('high_confidence_core')).toBe('High Confidence Core');
    expect(toTitleCase('knowledge gaps_focus')).toBe('Knowledge Gaps Focus');
  });

  test('falsifiability score reflects presence of criteria', () => {
    expect(assessFalsifiabilityScore(undefined)).toBe(0);
    expect(assessFalsifiabilityScore({ description: 'd', testable_conditions: [] })).toBe(0.5);
  });
});
