import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const ConfidenceListSchema = z.array(z.number().min(0).max(1)).length(4);

const RateLimitSettingsSchema = z.object({
  max_requests: z.number().int().min(1).default(100),
  per_seconds: z.number().int().min(1).default(3600),
});

const AppSettingsSchema = z.object({
  name: z.string().default('NexusMind'),
  version: z.string().default('0.1.0'),
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(1).max(65535).default(8000),
  log_level: z.string().default('INFO'),
  cors_allowed_origins_str: z.string().default('*'),
  auth_token: z.string().min(1).optional(),
  rate_limit: RateLimitSettingsSchema.default({}),
});

export type AppSettings = z.infer<typeof AppSettingsSchema>;

const StageConfigSchema = z.object({
  name: z.string(),
  stage: z.string(),
  enabled: z.boolean().default(true),
});

export type StageConfig = z.infer<typeof StageConfigSchema>;

const DecompositionDimensionSchema = z.object({
  label: z.string().min(1),
  description: z.string().min(1),
});

export type DecompositionDimension = z.infer<typeof DecompositionDimensionSchema>;

const HypothesisRangeSchema = z
  .object({
    min: z.number().int().min(0).default(2),
    max: z.number().int().min(0).default(4),
  })
  .refine((range) => range.min <= range.max, 'hypotheses_per_dimension.min must not exceed max');

const ASRGoTDefaultParamsSchema = z.object({
  initial_confidence: ConfidenceListSchema.default([0.9, 0.9, 0.9, 0.9]),
  initial_layer: z.string().default('root_layer'),
  default_disciplinary_tags: z.array(z.string()).default([]),
  default_decomposition_dimensions: z.array(DecompositionDimensionSchema).default([]),
  dimension_confidence: ConfidenceListSchema.default([0.8, 0.8, 0.8, 0.8]),
  hypotheses_per_dimension: HypothesisRangeSchema.default({}),
  hypothesis_confidence: ConfidenceListSchema.default([0.5, 0.5, 0.5, 0.5]),
  default_plan_types: z.array(z.string()).default([]),
  evidence_max_iterations: z.number().int().min(0).default(5),
  ibn_similarity_threshold: z.number().min(0).max(1).default(0.5),
  min_nodes_for_hyperedge: z.number().int().min(2).default(2),
  pruning_confidence_threshold: z.number().min(0).max(1).default(0.2),
  pruning_impact_threshold: z.number().min(0).max(1).default(0.3),
  pruning_edge_confidence_threshold: z.number().min(0).max(1).default(0.1),
  merging_semantic_overlap_threshold: z.number().min(0).max(1).default(0.9),
  subgraph_min_confidence_threshold: z.number().min(0).max(1).default(0.6),
  subgraph_min_impact_threshold: z.number().min(0).max(1).default(0.5),
  high_severity_bias_max: z.number().int().min(0).default(0),
  min_powered_evidence_ratio: z.number().min(0).max(1).default(0.5),
  stage_retry_attempts: z.number().int().min(0).max(5).default(0),
  stage_retry_delay_ms: z.number().int().min(0).default(500),
  random_seed: z.number().int().optional(),
});

export type ASRGoTDefaultParams = z.infer<typeof ASRGoTDefaultParamsSchema>;

export const DEFAULT_PIPELINE_STAGES: StageConfig[] = [
  { name: 'Initialization', stage: 'InitializationStage', enabled: true },
  { name: 'Decomposition', stage: 'DecompositionStage', enabled: true },
  { name: 'Hypothesis Generation', stage: 'HypothesisStage', enabled: true },
  { name: 'Evidence Integration', stage: 'EvidenceStage', enabled: true },
  { name: 'Pruning and Merging', stage: 'PruningMergingStage', enabled: true },
  { name: 'Subgraph Extraction', stage: 'SubgraphExtractionStage', enabled: true },
  { name: 'Composition', stage: 'CompositionStage', enabled: true },
  { name: 'Reflection', stage: 'ReflectionStage', enabled: true },
];

const LayerDefinitionSchema = z.object({
  description: z.string().default(''),
});

const ASRGoTConfigSchema = z.object({
  default_parameters: ASRGoTDefaultParamsSchema.default({}),
  pipeline_stages: z.array(StageConfigSchema).default(DEFAULT_PIPELINE_STAGES),
  layers: z.record(LayerDefinitionSchema).default({}),
});

const Neo4jSettingsSchema = z.object({
  uri: z.string().min(1, 'Neo4j URI is required').refine(
    (uri) => /^(neo4j|bolt)(\+s|\+ssc)?:\/\//.test(uri),
    'Neo4j URI must start with neo4j:// or bolt://'
  ),
  user: z.string().min(1, 'Neo4j user is required'),
  password: z.string().min(1, 'Neo4j password is required'),
  database: z.string().default('neo4j'),
});

export type Neo4jSettings = z.infer<typeof Neo4jSettingsSchema>;

const MCPSettingsSchema = z.object({
  protocol_version: z.string().default('2024-11-05'),
  server_name: z.string().default('NexusMind MCP Server'),
  server_version: z.string().default('0.1.0'),
});

export type MCPSettings = z.infer<typeof MCPSettingsSchema>;

const GraphStoreSettingsSchema = z.object({
  backend: z.enum(['neo4j', 'memory']).default('neo4j'),
});

export type GraphStoreBackend = z.infer<typeof GraphStoreSettingsSchema>['backend'];

const SettingsSchema = z.object({
  app: AppSettingsSchema.default({}),
  asr_got: ASRGoTConfigSchema.default({}),
  mcp_settings: MCPSettingsSchema.default({}),
  neo4j: Neo4jSettingsSchema.default({
    uri: 'bolt://localhost:7687',
    user: 'neo4j',
    password: 'change-me',
    database: 'neo4j',
  }),
  graph_store: GraphStoreSettingsSchema.default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;

const SETTINGS_SECTIONS = ['app', 'asr_got', 'mcp_settings', 'neo4j', 'graph_store'];

const FLAT_ENV_OVERRIDES: Array<[string, string[], 'string' | 'number']> = [
  ['NEO4J_URI', ['neo4j', 'uri'], 'string'],
  ['NEO4J_USER', ['neo4j', 'user'], 'string'],
  ['NEO4J_PASSWORD', ['neo4j', 'password'], 'string'],
  ['NEO4J_DATABASE', ['neo4j', 'database'], 'string'],
  ['APP_HOST', ['app', 'host'], 'string'],
  ['APP_PORT', ['app', 'port'], 'number'],
  ['APP_LOG_LEVEL', ['app', 'log_level'], 'string'],
  ['APP_AUTH_TOKEN', ['app', 'auth_token'], 'string'],
  ['APP_CORS_ALLOWED_ORIGINS_STR', ['app', 'cors_allowed_origins_str'], 'string'],
  ['GRAPH_STORE_BACKEND', ['graph_store', 'backend'], 'string'],
];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, keys: string[], value: unknown): void {
  let cursor = target;
  keys.slice(0, -1).forEach((key) => {
    const next = cursor[key];
    if (isRecord(next)) {
      cursor = next;
    } else {
      const created: Record<string, unknown> = {};
      cursor[key] = created;
      cursor = created;
    }
  });
  cursor[keys[keys.length - 1]] = value;
}

function parseEnvValue(raw: string): unknown {
  try {
    return yaml.load(raw);
  } catch {
    return raw;
  }
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.NEXUSMIND_CONFIG_PATH) {
    return path.resolve(env.NEXUSMIND_CONFIG_PATH);
  }
  // src/config.ts at dev time, dist/src/config.js once built
  const candidates = [
    path.resolve(__dirname, '..', 'config', 'settings.yaml'),
    path.resolve(__dirname, '..', '..', 'config', 'settings.yaml'),
  ];
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? candidates[0];
}

function readSettingsFile(yamlPath: string): Record<string, unknown> {
  if (!fs.existsSync(yamlPath)) {
    console.warn(`Configuration file ${yamlPath} not found. Using environment variables and defaults.`);
    return {};
  }
  const fileContents = fs.readFileSync(yamlPath, 'utf8');
  if (!fileContents.trim()) {
    console.warn(`Configuration file ${yamlPath} is empty. Using defaults.`);
    return {};
  }
  let loaded: unknown;
  try {
    loaded = yaml.load(fileContents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to parse ${yamlPath}: ${reason}`);
  }
  if (!isRecord(loaded)) {
    throw new ConfigurationError(`Invalid YAML structure in ${yamlPath}: expected a mapping at the top level.`);
  }
  return loaded;
}

function applyEnvironmentOverrides(data: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  for (const [variable, keys, kind] of FLAT_ENV_OVERRIDES) {
    const raw = env[variable];
    if (raw === undefined || raw === '') {
      continue;
    }
    if (kind === 'number') {
      const parsed = Number(raw);
      if (Number.isNaN(parsed)) {
        throw new ConfigurationError(`${variable} must be numeric, got '${raw}'.`);
      }
      setPath(data, keys, parsed);
    } else {
      setPath(data, keys, raw);
    }
  }

  // Nested overrides such as APP__PORT=9000 or ASR_GOT__DEFAULT_PARAMETERS__EVIDENCE_MAX_ITERATIONS=2
  for (const [variable, raw] of Object.entries(env)) {
    if (!variable.includes('__') || raw === undefined) {
      continue;
    }
    const keys = variable.toLowerCase().split('__').filter((key) => key.length > 0);
    if (keys.length < 2 || !SETTINGS_SECTIONS.includes(keys[0])) {
      continue;
    }
    setPath(data, keys, parseEnvValue(raw));
  }
}

export interface LoadSettingsOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env;
  const yamlPath = options.configPath ?? resolveConfigPath(env);
  const data = readSettingsFile(yamlPath);

  applyEnvironmentOverrides(data, env);

  const result = SettingsSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Runtime settings validation failed. ${issues}`);
  }
  return result.data;
}

export const settings: Settings = loadSettings();
