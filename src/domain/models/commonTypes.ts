import { z } from 'zod';
import { GraphStateSchema } from './graphState';

export const StageTraceEntrySchema = z.object({
  stage_number: z.number().int(),
  stage_name: z.string(),
  duration_ms: z.number(),
  summary: z.string(),
  error: z.string().optional(),
  metrics: z.record(z.unknown()).optional(),
  timestamp: z.string().optional(),
});

export type StageTraceEntry = z.infer<typeof StageTraceEntrySchema>;

export const GoTProcessorSessionDataSchema = z.object({
  session_id: z.string(),
  query: z.string(),
  final_answer: z.string().default(''),
  final_confidence_vector: z.array(z.number()).length(4).default([0.5, 0.5, 0.5, 0.5]),
  accumulated_context: z.record(z.unknown()).default({}),
  stage_outputs_trace: z.array(StageTraceEntrySchema).default([]),
  graph_state: GraphStateSchema.optional(),
});

export type GoTProcessorSessionData = z.infer<typeof GoTProcessorSessionDataSchema>;

export const CitationSchema = z.object({
  id: z.string(),
  text: z.string(),
  source_node_id: z.string().optional(),
});

export type Citation = z.infer<typeof CitationSchema>;

export const ComposedSectionSchema = z.object({
  title: z.string(),
  content: z.string(),
  type: z.string().default('generic'),
  referenced_subgraph_name: z.string().optional(),
  related_node_ids: z.array(z.string()).default([]),
  key_findings: z.array(z.string()).default([]),
});

export type ComposedSection = z.infer<typeof ComposedSectionSchema>;

export const ComposedOutputSchema = z.object({
  title: z.string(),
  executive_summary: z.string(),
  sections: z.array(ComposedSectionSchema).default([]),
  citations: z.array(CitationSchema).default([]),
  reasoning_trace_appendix_summary: z.string().optional(),
  graph_topology_summary: z.string().optional(),
});

export type ComposedOutput = z.infer<typeof ComposedOutputSchema>;
