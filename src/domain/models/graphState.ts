import { z } from 'zod';

export const GraphNodeSchema = z.object({
  node_id: z.string(),
  label: z.string(),
  type: z.string(),
  confidence: z.array(z.number()).optional(),
  metadata: z.record(z.unknown()).default({}),
});

export type GraphNode = z.infer<typeof GraphNodeSchema>;

export const GraphEdgeSchema = z.object({
  edge_id: z.string(),
  source: z.string(),
  target: z.string(),
  edge_type: z.string(),
  confidence: z.number().optional(),
  metadata: z.record(z.unknown()).default({}),
});

export type GraphEdge = z.infer<typeof GraphEdgeSchema>;

export const GraphHyperedgeSchema = z.object({
  edge_id: z.string(),
  nodes: z.array(z.string()),
  confidence: z.number().optional(),
  metadata: z.record(z.unknown()).default({}),
});

export type GraphHyperedge = z.infer<typeof GraphHyperedgeSchema>;

export const GraphStatisticsSchema = z.object({
  node_count: z.number().int().default(0),
  edge_count: z.number().int().default(0),
  hyperedge_count: z.number().int().default(0),
  layer_count: z.number().int().default(0),
});

export type GraphStatistics = z.infer<typeof GraphStatisticsSchema>;

export const GraphStateSchema = z.object({
  nodes: z.array(GraphNodeSchema).default([]),
  edges: z.array(GraphEdgeSchema).default([]),
  hyperedges: z.array(GraphHyperedgeSchema).default([]),
  layers: z.record(z.array(z.string())).optional(),
  statistics: GraphStatisticsSchema.optional(),
  metadata: z.record(z.unknown()).default({}),
});

export type GraphState = z.infer<typeof GraphStateSchema>;
