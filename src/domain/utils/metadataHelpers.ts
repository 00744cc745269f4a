import { BiasFlag, FalsificationCriteria, Node } from '../models/graphElements';

const jaccard = (a: ReadonlySet<string>, b: ReadonlySet<string>): number => {
  if (a.size === 0 || b.size === 0) {
    return 0.0;
  }
  let shared = 0;
  a.forEach((item) => {
    if (b.has(item)) {
      shared += 1;
    }
  });
  return shared / (a.size + b.size - shared);
};

/** Word-overlap (Jaccard) similarity of two texts, used for IBN creation. */
export function calculateSemanticSimilarity(text1: string, text2: string): number {
  if (!text1 || !text2) {
    return 0.0;
  }
  const words = (text: string) => new Set(text.toLowerCase().split(/\s+/).filter((w) => w.length > 0));
  return jaccard(words(text1), words(text2));
}

const tokenize = (text: string): Set<string> =>
  new Set(text.toLowerCase().split(/[^a-z0-9]+/).filter((token) => token.length > 0));

/**
 * Similarity used when merging nodes: 70% token overlap of label plus
 * description, 30% overlap of disciplinary tags.
 */
export function calculateNodeSimilarity(a: Node, b: Node): number {
  const textSimilarity = jaccard(
    tokenize(`${a.label} ${a.metadata.description}`),
    tokenize(`${b.label} ${b.metadata.description}`)
  );
  const tagSimilarity = jaccard(new Set(a.metadata.disciplinary_tags), new Set(b.metadata.disciplinary_tags));
  return textSimilarity * 0.7 + tagSimilarity * 0.3;
}

export function assessFalsifiabilityScore(criteria?: FalsificationCriteria): number {
  return criteria ? 0.5 : 0.0;
}

export function detectPotentialBiases(node: Node): BiasFlag[] {
  return node.metadata.bias_flags;
}

export const truncate = (text: string, length: number): string =>
  text.length > length ? `${text.slice(0, length)}...` : text;

export const toTitleCase = (name: string): string =>
  name
    .split(/[_\s]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
