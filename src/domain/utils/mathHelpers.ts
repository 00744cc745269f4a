import { ConfidenceVector, CertaintyScore, confidenceFromList, confidenceToList } from '../models/common';
import { EdgeType, StatisticalPower } from '../models/graphElements';
import { createLogger } from '../../logger';

const logger = createLogger('mathHelpers');

export const clamp = (value: number, min = 0.0, max = 1.0): number => Math.max(min, Math.min(max, value));

const edgeTypeFactor = (edgeType?: EdgeType): number => {
  switch (edgeType) {
    case EdgeType.CAUSES:
    case EdgeType.SUPPORTIVE:
      return 1.1;
    case EdgeType.CORRELATIVE:
      return 0.9;
    default:
      // CONTRADICTORY is carried by supportsHypothesis=false
      return 1.0;
  }
};

/**
 * Moves every confidence component toward 1 (supporting evidence) or 0
 * (contradicting evidence) by a weight derived from evidence strength,
 * statistical power and the type of the connecting edge.
 */
export function bayesianUpdateConfidence(
  prior: ConfidenceVector,
  evidenceStrength: CertaintyScore,
  supportsHypothesis: boolean,
  statisticalPower?: StatisticalPower,
  edgeType?: EdgeType
): ConfidenceVector {
  const powerMultiplier = statisticalPower ? statisticalPower.value : 0.5;
  const weight = clamp(evidenceStrength * powerMultiplier * edgeTypeFactor(edgeType));
  const target = supportsHypothesis ? 1.0 : 0.0;

  const priorValues = confidenceToList(prior);
  const updated = priorValues.map((current) => clamp(current + weight * (target - current)));

  logger.debug(
    `Bayesian update: prior ${JSON.stringify(priorValues)}, strength ${evidenceStrength}, ` +
      `supports ${supportsHypothesis}, power ${powerMultiplier}, edge ${edgeType ?? 'none'} -> ${JSON.stringify(updated)}`
  );
  return confidenceFromList(updated);
}

// Mean absolute change between two distributions of equal length.
export function calculateInformationGain(prior: readonly number[], posterior: readonly number[]): number {
  if (prior.length !== posterior.length || prior.length === 0) {
    return 0.0;
  }
  const total = prior.reduce((sum, p, i) => sum + Math.abs(p - posterior[i]), 0);
  return total / prior.length;
}
