import { z } from 'zod';
import { ASRGoTDefaultParams, Settings } from '../../config';
import { createLogger } from '../../logger';
import { EvidenceSource } from '../interfaces/evidenceSource';
import { GraphRepository } from '../interfaces/graphRepository';
import { GoTProcessorSessionData } from '../models/commonTypes';
import { OperationalParams, OperationalParamsSchema, readStageContext } from '../models/stageContexts';
import { RandomSource, defaultRandom } from '../utils/random';

const logger = createLogger('BaseStage');

export type StageMetrics = Record<string, number | boolean | string>;

export class StageOutput {
  constructor(
    public success: boolean,
    public summary: string,
    public nextStageContextUpdate: Record<string, unknown> = {},
    public errorMessage?: string,
    public metrics: StageMetrics = {}
  ) {}
}

export interface StageDependencies {
  repository: GraphRepository;
  random?: RandomSource;
  evidenceSource?: EvidenceSource;
}

export type StageClass = {
  new (settings: Settings, deps: StageDependencies): BaseStage;
  STAGE_NAME: string;
};

export abstract class BaseStage {
  static STAGE_NAME: string;
  abstract readonly stageName: string;

  protected readonly params: ASRGoTDefaultParams;
  protected readonly repository: GraphRepository;
  protected readonly random: RandomSource;

  constructor(protected readonly settings: Settings, deps: StageDependencies) {
    this.params = settings.asr_got.default_parameters;
    this.repository = deps.repository;
    this.random = deps.random ?? defaultRandom;
  }

  abstract execute(currentSessionData: GoTProcessorSessionData): Promise<StageOutput>;

  async cleanup(): Promise<void> {
    // Stages hold no resources by default.
  }

  protected logStart(sessionId: string): void {
    logger.info(`[${this.stageName}] Starting for session: ${sessionId}`);
  }

  protected logEnd(sessionId: string, output: StageOutput): void {
    logger.info(`[${this.stageName}] Finished for session: ${sessionId}. Summary: ${output.summary}`);
  }

  protected operationalParams(session: GoTProcessorSessionData): OperationalParams {
    const parsed = OperationalParamsSchema.safeParse(session.accumulated_context.operational_params ?? {});
    if (!parsed.success) {
      logger.warn(`[${this.stageName}] Ignoring malformed operational parameters: ${parsed.error.message}`);
      return {};
    }
    return parsed.data;
  }

  protected contextOf<S extends z.ZodTypeAny>(
    session: GoTProcessorSessionData,
    stageName: string,
    schema: S
  ): z.infer<S> {
    return readStageContext(session.accumulated_context, stageName, schema);
  }

  /** Wraps a context payload under this stage's name. */
  protected output(
    success: boolean,
    summary: string,
    context: Record<string, unknown>,
    metrics: StageMetrics = {},
    errorMessage?: string
  ): StageOutput {
    return new StageOutput(success, summary, { [this.stageName]: context }, errorMessage, metrics);
  }
}
