import { createLogger, errorMessage } from '../../logger';
import { ComposedOutput, ComposedOutputSchema, GoTProcessorSessionData } from '../models/commonTypes';
import { Node, NodeType } from '../models/graphElements';
import { averageConfidence, confidenceFromList, ConfidenceVector, confidenceToList } from '../models/common';
import { AuditCheckResult, AuditStatus, STAGE_NAMES } from '../models/stageContexts';
import { clamp } from '../utils/mathHelpers';
import { detectPotentialBiases } from '../utils/metadataHelpers';
import { BaseStage, StageOutput } from './baseStage';

const logger = createLogger('ReflectionStage');

const HIGH_CONFIDENCE_THRESHOLD = 0.7;
const HIGH_IMPACT_THRESHOLD = 0.7;
const MIN_FALSIFIABLE_HYPOTHESIS_RATIO = 0.6;
const ADEQUATE_STATISTICAL_POWER = 0.7;

type Adjustment = Partial<Record<AuditStatus, number>>;

// Shifts applied to the baseline confidence per audit outcome.
const CONFIDENCE_ADJUSTMENTS: Record<string, { component: keyof ConfidenceVector; delta: Adjustment }> = {
  hypothesis_falsifiability: {
    component: 'methodological_rigor',
    delta: { [AuditStatus.PASS]: 0.15, [AuditStatus.WARNING]: 0.05, [AuditStatus.FAIL]: -0.2 },
  },
  bias_flags_assessment: {
    component: 'methodological_rigor',
    delta: { [AuditStatus.PASS]: 0.1, [AuditStatus.WARNING]: 0.0, [AuditStatus.FAIL]: -0.15 },
  },
  statistical_rigor_of_evidence: {
    component: 'empirical_support',
    delta: { [AuditStatus.PASS]: 0.2, [AuditStatus.WARNING]: -0.05, [AuditStatus.FAIL]: -0.1 },
  },
};

const result = (check_name: string, status: AuditStatus, message: string): AuditCheckResult => ({
  check_name,
  status,
  message,
});

export class ReflectionStage extends BaseStage {
  static STAGE_NAME: string = STAGE_NAMES.reflection;
  readonly stageName: string = ReflectionStage.STAGE_NAME;

  private checkHighConfidenceImpactCoverage(nodes: Node[]): AuditCheckResult {
    const relevant = nodes.filter((node) =>
      [NodeType.HYPOTHESIS, NodeType.EVIDENCE, NodeType.INTERDISCIPLINARY_BRIDGE].includes(node.type)
    );
    if (relevant.length === 0) {
      return result("high_confidence_impact_coverage", AuditStatus.NOT_APPLICABLE, "No relevant nodes found.");
    }
    const confCoverage =
      relevant.filter((node) => averageConfidence(node.confidence) >= HIGH_CONFIDENCE_THRESHOLD).length / relevant.length;
    const impactCoverage =
      relevant.filter((node) => node.metadata.impact_score >= HIGH_IMPACT_THRESHOLD).length / relevant.length;

    let status = AuditStatus.FAIL;
    if (confCoverage >= 0.3 && impactCoverage >= 0.2) {
      status = AuditStatus.PASS;
    } else if (confCoverage >= 0.1 || impactCoverage >= 0.1) {
      status = AuditStatus.WARNING;
    }
    return result(
      "high_confidence_impact_coverage",
      status,
      `Confidence coverage: ${confCoverage.toFixed(2)}. Impact coverage: ${impactCoverage.toFixed(2)}.`
    );
  }

  private checkBiasFlags(nodes: Node[]): AuditCheckResult {
    const flagged = nodes.filter((node) => detectPotentialBiases(node).length > 0);
    const highSeverity = flagged
      .flatMap((node) => detectPotentialBiases(node))
      .filter((flag) => flag.severity === 'high').length;

    let status = AuditStatus.PASS;
    if (highSeverity > this.params.high_severity_bias_max) {
      status = AuditStatus.FAIL;
    } else if (flagged.length > 0) {
      status = AuditStatus.WARNING;
    }
    return result(
      "bias_flags_assessment",
      status,
      `Found ${flagged.length} nodes with bias flags. ${highSeverity} have high severity.`
    );
  }

  private checkKnowledgeGapsAddressed(nodes: Node[], composed?: ComposedOutput): AuditCheckResult {
    if (!nodes.some((node) => node.metadata.is_knowledge_gap)) {
      return result("knowledge_gaps_addressed", AuditStatus.NOT_APPLICABLE, "No explicit knowledge gap nodes in graph.");
    }
    const mentioned = (composed?.sections ?? []).some(
      (section) => section.title.toLowerCase().includes('gap') || section.type.toLowerCase().includes('gap')
    );
    return mentioned
      ? result("knowledge_gaps_addressed", AuditStatus.PASS, "Knowledge gaps found in graph were addressed in output.")
      : result(
          "knowledge_gaps_addressed",
          AuditStatus.WARNING,
          "Knowledge gaps found but might not be explicitly in output."
        );
  }

  private checkHypothesisFalsifiability(nodes: Node[]): AuditCheckResult {
    const hypotheses = nodes.filter((node) => node.type === NodeType.HYPOTHESIS);
    if (hypotheses.length === 0) {
      return result("hypothesis_falsifiability", AuditStatus.NOT_APPLICABLE, "No hypotheses found.");
    }
    const falsifiable = hypotheses.filter((node) => node.metadata.falsification_criteria !== undefined).length;
    const ratio = falsifiable / hypotheses.length;

    let status = AuditStatus.FAIL;
    if (ratio >= MIN_FALSIFIABLE_HYPOTHESIS_RATIO) {
      status = AuditStatus.PASS;
    } else if (ratio > 0) {
      status = AuditStatus.WARNING;
    }
    return result(
      "hypothesis_falsifiability",
      status,
      `${falsifiable}/${hypotheses.length} (${ratio.toFixed(2)}) hypotheses have falsifiability criteria.`
    );
  }

  private checkStatisticalRigor(nodes: Node[]): AuditCheckResult {
    const evidence = nodes.filter((node) => node.type === NodeType.EVIDENCE);
    if (evidence.length === 0) {
      return result("statistical_rigor_of_evidence", AuditStatus.NOT_APPLICABLE, "No evidence nodes.");
    }
    const powered = evidence.filter(
      (node) => (node.metadata.statistical_power?.value ?? 0) >= ADEQUATE_STATISTICAL_POWER
    ).length;
    const ratio = powered / evidence.length;
    return result(
      "statistical_rigor_of_evidence",
      ratio >= this.params.min_powered_evidence_ratio ? AuditStatus.PASS : AuditStatus.WARNING,
      `${powered}/${evidence.length} (${ratio.toFixed(2)}) evidence nodes meet power criteria (>=${ADEQUATE_STATISTICAL_POWER}).`
    );
  }

  calculateFinalConfidence(auditResults: AuditCheckResult[]): ConfidenceVector {
    const finalConf = confidenceFromList(this.params.initial_confidence);

    for (const check of auditResults) {
      const adjustment = CONFIDENCE_ADJUSTMENTS[check.check_name];
      if (adjustment) {
        const delta = adjustment.delta[check.status] ?? 0;
        finalConf[adjustment.component] = clamp(finalConf[adjustment.component] + delta);
      }
    }

    const active = auditResults.filter(
      (check) => check.status !== AuditStatus.NOT_RUN && check.status !== AuditStatus.NOT_APPLICABLE
    );
    const passes = active.filter((check) => check.status === AuditStatus.PASS).length;
    const consensusShift = active.length > 0 ? (passes / active.length - 0.5) * 0.2 : 0;
    finalConf.consensus_alignment = clamp(finalConf.consensus_alignment + consensusShift);

    logger.info(`Calculated final confidence vector: ${JSON.stringify(finalConf)}`);
    return finalConf;
  }

  private readComposedOutput(session: GoTProcessorSessionData): ComposedOutput | undefined {
    const compositionContext = session.accumulated_context[STAGE_NAMES.composition];
    if (compositionContext === undefined || compositionContext === null || typeof compositionContext !== 'object') {
      return undefined;
    }
    const parsed = ComposedOutputSchema.safeParse(
      'final_composed_output' in compositionContext ? compositionContext.final_composed_output : undefined
    );
    if (!parsed.success) {
      logger.warn(`Could not parse composed output for reflection: ${parsed.error.message}`);
      return undefined;
    }
    return parsed.data;
  }

  async execute(currentSessionData: GoTProcessorSessionData): Promise<StageOutput> {
    this.logStart(currentSessionData.session_id);

    let nodes: Node[];
    try {
      nodes = await this.repository.findNodes({ queryContext: currentSessionData.query });
    } catch (error) {
      const message = `Graph store error during reflection: ${errorMessage(error)}`;
      logger.error(message);
      return this.output(false, message, { audit_check_results: [], error: message }, {}, message);
    }
    const composed = this.readComposedOutput(currentSessionData);

    const auditResults: AuditCheckResult[] = [
      this.checkHighConfidenceImpactCoverage(nodes),
      this.checkBiasFlags(nodes),
      this.checkKnowledgeGapsAddressed(nodes, composed),
      this.checkHypothesisFalsifiability(nodes),
      result("causal_claim_validity", AuditStatus.NOT_RUN, "Causal claim validity check is not implemented."),
      result("temporal_consistency", AuditStatus.NOT_RUN, "Temporal consistency check is not implemented."),
      this.checkStatisticalRigor(nodes),
      result("collaboration_attributions_check", AuditStatus.NOT_RUN, "Attribution check is not implemented."),
    ];

    const finalConfidence = this.calculateFinalConfidence(auditResults);
    const active = auditResults.filter((check) => check.status !== AuditStatus.NOT_RUN);
    const count = (status: AuditStatus) => active.filter((check) => check.status === status).length;

    const summary =
      `Reflection stage complete. Performed ${active.length} active audit checks. ` +
      `Final overall confidence assessed. PASS: ${count(AuditStatus.PASS)}, ` +
      `WARNING: ${count(AuditStatus.WARNING)}, FAIL: ${count(AuditStatus.FAIL)}.`;

    const output = this.output(
      true,
      summary,
      {
        final_confidence_vector_from_reflection: confidenceToList(finalConfidence),
        audit_check_results: auditResults,
      },
      {
        audit_checks_performed_count: active.length,
        audit_pass_count: count(AuditStatus.PASS),
        audit_warning_count: count(AuditStatus.WARNING),
        audit_fail_count: count(AuditStatus.FAIL),
        final_confidence_empirical: finalConfidence.empirical_support,
        final_confidence_theoretical: finalConfidence.theoretical_basis,
        final_confidence_methodological: finalConfidence.methodological_rigor,
        final_confidence_consensus: finalConfidence.consensus_alignment,
      }
    );
    this.logEnd(currentSessionData.session_id, output);
    return output;
  }
}
