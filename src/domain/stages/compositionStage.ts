import { createLogger } from '../../logger';
import {
  Citation,
  ComposedOutput,
  ComposedOutputSchema,
  ComposedSection,
  ComposedSectionSchema,
  GoTProcessorSessionData,
} from '../models/commonTypes';
import { Node, NodeType } from '../models/graphElements';
import { averageConfidence } from '../models/common';
import { ExtractedSubgraph, STAGE_NAMES, SubgraphExtractionContextSchema } from '../models/stageContexts';
import { toTitleCase, truncate } from '../utils/metadataHelpers';
import { sample } from '../utils/random';
import { BaseStage, StageOutput } from './baseStage';

const logger = createLogger('CompositionStage');

const CLAIM_TYPES: ReadonlySet<NodeType> = new Set([
  NodeType.HYPOTHESIS,
  NodeType.EVIDENCE,
  NodeType.INTERDISCIPLINARY_BRIDGE,
]);
const MAX_KEY_POINTS = 3;

export class CompositionStage extends BaseStage {
  static STAGE_NAME: string = STAGE_NAMES.composition;
  readonly stageName: string = CompositionStage.STAGE_NAME;

  private generateExecutiveSummary(subgraphs: ExtractedSubgraph[], initialQuery: string): string {
    const names = subgraphs.map((subgraph) => subgraph.name);
    const highlighted = sample(this.random, names, Math.min(2, names.length));
    return (
      `Executive summary for the analysis of query: '${initialQuery}'.\n` +
      `The NexusMind process identified ${subgraphs.length} key subgraphs of interest: ${names.join(', ')}. ` +
      `These subgraphs highlight various facets of the research topic, including ${highlighted.join(', ')}. ` +
      `Further details are provided in the subsequent sections.`
    );
  }

  private formatNodeAsClaim(node: Node): { claim: string; citation: Citation } {
    let claim = `Claim based on Node ${node.id} ('${node.label}', Type: ${node.type})`;
    if (node.metadata.description) {
      claim += `: ${truncate(node.metadata.description, 100)}`;
    }
    const created = node.created_at.toISOString().split('T')[0];
    const citation: Citation = {
      id: `Node-${node.id}`,
      text: `NexusMind Internal Node. ID: ${node.id}. Label: ${node.label}. Type: ${node.type}. Created: ${created}.`,
      source_node_id: node.id,
    };
    return { claim: `${claim} [${citation.id}]`, citation };
  }

  private generateSection(subgraph: ExtractedSubgraph): { section: ComposedSection; citations: Citation[] } {
    const contentParts = [
      `This section discusses findings from the '${subgraph.name}' subgraph, which focuses on: ${subgraph.description}.`,
    ];
    const citations: Citation[] = [];
    const keyFindings: string[] = [];

    const keyNodes = subgraph.nodes
      .filter(
        (node) =>
          CLAIM_TYPES.has(node.type) &&
          (averageConfidence(node.confidence) > 0.6 || node.metadata.impact_score > 0.6)
      )
      .sort(
        (a, b) =>
          b.metadata.impact_score - a.metadata.impact_score ||
          averageConfidence(b.confidence) - averageConfidence(a.confidence)
      )
      .slice(0, MAX_KEY_POINTS);

    keyNodes.forEach((node, index) => {
      const { claim, citation } = this.formatNodeAsClaim(node);
      contentParts.push(`Key Point ${index + 1}: ${claim}`);
      keyFindings.push(claim);
      citations.push(citation);

      const incoming = subgraph.relationships
        .filter((rel) => rel.target_id === node.id)
        .map((rel) => `${rel.type} from ${rel.source_id}`);
      const outgoing = subgraph.relationships
        .filter((rel) => rel.source_id === node.id)
        .map((rel) => `${rel.type} to ${rel.target_id}`);
      if (incoming.length > 0) {
        contentParts.push(`  - Connected from: ${incoming.slice(0, 2).join(', ')}`);
      }
      if (outgoing.length > 0) {
        contentParts.push(`  - Connects to: ${outgoing.slice(0, 2).join(', ')}`);
      }
    });

    if (keyNodes.length === 0) {
      contentParts.push("No specific high-impact claims identified in this subgraph based on current criteria.");
    }

    const section = ComposedSectionSchema.parse({
      title: `Analysis: ${toTitleCase(subgraph.name)}`,
      content: contentParts.join('\n'),
      type: "analysis_subgraph",
      referenced_subgraph_name: subgraph.name,
      related_node_ids: subgraph.nodes.map((node) => node.id),
      key_findings: keyFindings,
    });
    return { section, citations };
  }

  private reasoningTraceAppendix(session: GoTProcessorSessionData): string {
    const lines = ["Summary of Reasoning Trace Appendix:"];
    for (const entry of session.stage_outputs_trace) {
      lines.push(`  Stage ${entry.stage_number}. ${entry.stage_name}: ${entry.summary} (${entry.duration_ms}ms)`);
    }
    return lines.join('\n');
  }

  private readSubgraphs(session: GoTProcessorSessionData): ExtractedSubgraph[] {
    const parsed = SubgraphExtractionContextSchema.safeParse(
      session.accumulated_context[STAGE_NAMES.subgraphExtraction] ?? {}
    );
    if (!parsed.success) {
      logger.error(`Error parsing extracted subgraph definitions: ${parsed.error.message}`);
      return [];
    }
    return parsed.data.subgraphs;
  }

  async execute(currentSessionData: GoTProcessorSessionData): Promise<StageOutput> {
    this.logStart(currentSessionData.session_id);
    const initialQuery = currentSessionData.query;
    const subgraphs = this.readSubgraphs(currentSessionData);

    if (subgraphs.length === 0) {
      logger.warn("No subgraphs available. Composition will be minimal.");
      const minimal: ComposedOutput = ComposedOutputSchema.parse({
        title: `NexusMind Analysis (Minimal): ${truncate(initialQuery, 50)}`,
        executive_summary: "No specific subgraphs were extracted or parsed for detailed composition.",
        reasoning_trace_appendix_summary: this.reasoningTraceAppendix(currentSessionData),
      });
      return this.output(
        true,
        "Composition complete (minimal due to no subgraphs).",
        { final_composed_output: minimal },
        { sections_generated: 0, citations_generated: 0 }
      );
    }

    const sections: ComposedSection[] = [];
    const citationsById = new Map<string, Citation>();
    for (const subgraph of subgraphs) {
      const { section, citations } = this.generateSection(subgraph);
      sections.push(section);
      citations.forEach((citation) => {
        if (!citationsById.has(citation.id)) {
          citationsById.set(citation.id, citation);
        }
      });
    }
    const citations = [...citationsById.values()];

    const distinctNodes = new Set(subgraphs.flatMap((s) => s.nodes.map((node) => node.id))).size;
    const distinctRelationships = new Set(subgraphs.flatMap((s) => s.relationships.map((rel) => rel.id))).size;

    const composed: ComposedOutput = ComposedOutputSchema.parse({
      title: `NexusMind Analysis: ${truncate(initialQuery, 50)}`,
      executive_summary: this.generateExecutiveSummary(subgraphs, initialQuery),
      sections,
      citations,
      reasoning_trace_appendix_summary: this.reasoningTraceAppendix(currentSessionData),
      graph_topology_summary: `The extracted subgraphs cover ${distinctNodes} distinct nodes and ${distinctRelationships} relationships.`,
    });

    const output = this.output(
      true,
      `Composed final output with ${sections.length} sections and ${citations.length} citations.`,
      { final_composed_output: composed },
      {
        sections_generated: sections.length,
        citations_generated: citations.length,
        subgraphs_processed: subgraphs.length,
      }
    );
    this.logEnd(currentSessionData.session_id, output);
    return output;
  }
}
