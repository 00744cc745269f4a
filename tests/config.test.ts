import { afterAll, beforeAll, describe, expect, test } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigurationError, loadSettings, resolveConfigPath } from '../src/config';
import { SETTINGS_PATH } from './helpers';

describe('loadSettings', () => {
  let dir: string;

  const writeConfig = (name: string, contents: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, contents, 'utf8');
    return file;
  };

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nexusmind-config-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('falls back to defaults when the file is missing', () => {
    const settings = loadSettings({ configPath: path.join(dir, 'missing.yaml'), env: {} });
    expect(settings.app.port).toBe(8000);
    expect(settings.graph_store.backend).toBe('neo4j');
    expect(settings.asr_got.pipeline_stages.map((stage) => stage.stage)).toEqual([
      'InitializationStage',
      'DecompositionStage',
      'HypothesisStage',
      'EvidenceStage',
      'PruningMergingStage',
      'SubgraphExtractionStage',
      'CompositionStage',
      'ReflectionStage',
    ]);
  });

  test('loads the bundled settings file', () => {
    const settings = loadSettings({ configPath: SETTINGS_PATH, env: {} });
    expect(settings.app.name).toBe('NexusMind');
    expect(settings.asr_got.default_parameters.default_decomposition_dimensions).toHaveLength(7);
    expect(settings.asr_got.default_parameters.hypotheses_per_dimension).toEqual({ min: 2, max: 4 });
    expect(settings.mcp_settings.server_name).toBe('NexusMind MCP Server');
  });

  test('flat environment variables override the file', () => {
    const file = writeConfig('port.yaml', 'app:\n  port: 9000\n  log_level: DEBUG\n');
    const settings = loadSettings({ configPath: file, env: { APP_PORT: '9100', APP_AUTH_TOKEN: 'test-secret' } });
    expect(settings.app.port).toBe(9100);
    expect(settings.app.log_level).toBe('DEBUG');
    expect(settings.app.auth_token).toBe('test-secret');
  });

  test('nested double-underscore variables reach deep keys', () => {
    const settings = loadSettings({
      configPath: path.join(dir, 'missing.yaml'),
      env: {
        ASR_GOT__DEFAULT_PARAMETERS__EVIDENCE_MAX_ITERATIONS: '2',
        GRAPH_STORE__BACKEND: 'memory',
        UNRELATED__VALUE: 'ignored',
      },
    });
    expect(settings.asr_got.default_parameters.evidence_max_iterations).toBe(2);
    expect(settings.graph_store.backend).toBe('memory');
  });

  test('rejects a non-numeric port', () => {
    expect(() => loadSettings({ configPath: path.join(dir, 'missing.yaml'), env: { APP_PORT: 'abc' } })).toThrow(
      "APP_PORT must be numeric, got 'abc'."
    );
  });

  test('rejects a YAML document that is not a mapping', () => {
    const file = writeConfig('list.yaml', '- a\n- b\n');
    expect(() => loadSettings({ configPath: file, env: {} })).toThrow(ConfigurationError);
  });

  test('reports validation failures with their path', () => {
    const file = writeConfig(
      'range.yaml',
      'asr_got:\n  default_parameters:\n    hypotheses_per_dimension:\n      min: 5\n      max: 2\n'
    );
    expect(() => loadSettings({ configPath: file, env: {} })).toThrow(
      'hypotheses_per_dimension.min must not exceed max'
    );
  });

  test('rejects a Neo4j URI with an unsupported scheme', () => {
    expect(() =>
      loadSettings({ configPath: path.join(dir, 'missing.yaml'), env: { NEO4J_URI: 'http://localhost:7474' } })
    ).toThrow('Neo4j URI must start with neo4j:// or bolt://');
  });

  test('resolveConfigPath honours NEXUSMIND_CONFIG_PATH', () => {
    expect(resolveConfigPath({ NEXUSMIND_CONFIG_PATH: '/etc/nexusmind/settings.yaml' })).toBe(
      path.resolve('/etc/nexusmind/settings.yaml')
    );
  });
});
