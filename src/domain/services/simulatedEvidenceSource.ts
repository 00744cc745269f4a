import { EvidenceCandidate, EvidenceSource } from '../interfaces/evidenceSource';
import { Node, StatisticalPowerSchema } from '../models/graphElements';
import { truncate } from '../utils/metadataHelpers';
import { RandomSource, randomInt, sample, uniform } from '../utils/random';

/**
 * Produces one or two synthetic evidence pieces per hypothesis. Stands in
 * for a literature or experiment backend.
 */
export class SimulatedEvidenceSource implements EvidenceSource {
  readonly name = 'simulated';

  constructor(
    private readonly random: RandomSource,
    private readonly defaultTags: readonly string[]
  ) {}

  async gatherEvidence(hypothesis: Node): Promise<EvidenceCandidate[]> {
    const planType = hypothesis.metadata.plan?.type ?? 'SimulatedPlanExecution';
    const count = randomInt(this.random, 1, 2);
    const evidence: EvidenceCandidate[] = [];

    for (let i = 0; i < count; i++) {
      const supports = this.random() > 0.25;
      const strength = uniform(this.random, 0.4, 0.9);
      const statisticalPower = StatisticalPowerSchema.parse({
        value: uniform(this.random, 0.5, 0.95),
        method_description: 'Simulated statistical power.',
      });

      const tags = this.defaultTags.length > 0
        ? sample(this.random, this.defaultTags, randomInt(this.random, 1, this.defaultTags.length))
        : [];
      if (this.random() < 0.3) {
        tags.push(`special_evidence_domain_${randomInt(this.random, 1, 3)}`);
      }

      evidence.push({
        content:
          `Evidence piece ${i + 1} ${supports ? 'supporting' : 'contradicting'} hypothesis ` +
          `'${truncate(hypothesis.label, 30)}' (Strength: ${strength.toFixed(2)})`,
        source_description: `Simulated ${planType} execution`,
        supports_hypothesis: supports,
        strength,
        statistical_power: statisticalPower,
        disciplinary_tags: tags,
        timestamp: new Date(),
      });
    }
    return evidence;
  }
}
