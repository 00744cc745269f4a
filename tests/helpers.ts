import path from 'path';
import { ASRGoTDefaultParams, loadSettings, Settings, StageConfig } from '../src/config';
import { GoTProcessorSessionData } from '../src/domain/models/commonTypes';
import { RandomSource } from '../src/domain/utils/random';

export const SETTINGS_PATH = path.resolve(__dirname, '..', 'config', 'settings.yaml');

export const constantRandom = (value: number): RandomSource => () => value;

export interface TestSettingsOverrides {
  params?: Partial<ASRGoTDefaultParams>;
  stages?: StageConfig[];
  app?: Partial<Settings['app']>;
}

/** Bundled settings on the in-memory backend, with optional overrides. */
export function makeSettings(overrides: TestSettingsOverrides = {}): Settings {
  const base = loadSettings({ configPath: SETTINGS_PATH, env: { GRAPH_STORE_BACKEND: 'memory' } });
  return {
    ...base,
    app: { ...base.app, ...overrides.app },
    asr_got: {
      ...base.asr_got,
      default_parameters: { ...base.asr_got.default_parameters, ...overrides.params },
      pipeline_stages: overrides.stages ?? base.asr_got.pipeline_stages,
    },
  };
}

export function makeSession(
  query: string,
  accumulatedContext: Record<string, unknown> = {}
): GoTProcessorSessionData {
  return {
    session_id: 'session-test',
    query,
    final_answer: '',
    final_confidence_vector: [0.5, 0.5, 0.5, 0.5],
    accumulated_context: { operational_params: {}, ...accumulatedContext },
    stage_outputs_trace: [],
  };
}
