import { Node, StatisticalPower } from '../models/graphElements';

export interface EvidenceCandidate {
  content: string;
  source_description: string;
  supports_hypothesis: boolean;
  strength: number;
  statistical_power: StatisticalPower;
  disciplinary_tags: string[];
  timestamp: Date;
}

/** Where the evidence stage gets evidence for a hypothesis from. */
export interface EvidenceSource {
  readonly name: string;
  gatherEvidence(hypothesis: Node): Promise<EvidenceCandidate[]>;
}
