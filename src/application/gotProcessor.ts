import { setTimeout as sleep } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { Settings } from '../config';
import { createLogger, errorMessage } from '../logger';
import {
  ComposedOutput,
  ComposedOutputSchema,
  GoTProcessorSessionData,
  StageTraceEntry,
} from '../domain/models/commonTypes';
import {
  DecompositionContextSchema,
  EvidenceContextSchema,
  HypothesisContextSchema,
  InitializationContextSchema,
  OperationalParamsSchema,
  readStageContext,
  ReflectionContextSchema,
  STAGE_NAMES,
  SubgraphExtractionContextSchema,
} from '../domain/models/stageContexts';
import { StageExecutionError, StageInitializationError } from '../domain/services/exceptions';
import { BaseStage, StageClass, StageDependencies, StageOutput } from '../domain/stages/baseStage';
import { InitializationStage } from '../domain/stages/initializationStage';
import { DecompositionStage } from '../domain/stages/decompositionStage';
import { HypothesisStage } from '../domain/stages/hypothesisStage';
import { EvidenceStage } from '../domain/stages/evidenceStage';
import { PruningMergingStage } from '../domain/stages/pruningMergingStage';
import { SubgraphExtractionStage } from '../domain/stages/subgraphExtractionStage';
import { CompositionStage } from '../domain/stages/compositionStage';
import { ReflectionStage } from '../domain/stages/reflectionStage';
import { createSeededRandom } from '../domain/utils/random';
import { GraphStateExporter } from './graphStateExporter';

const logger = createLogger('GoTProcessor');

export const STAGE_REGISTRY: Record<string, StageClass> = {
  [InitializationStage.STAGE_NAME]: InitializationStage,
  [DecompositionStage.STAGE_NAME]: DecompositionStage,
  [HypothesisStage.STAGE_NAME]: HypothesisStage,
  [EvidenceStage.STAGE_NAME]: EvidenceStage,
  [PruningMergingStage.STAGE_NAME]: PruningMergingStage,
  [SubgraphExtractionStage.STAGE_NAME]: SubgraphExtractionStage,
  [CompositionStage.STAGE_NAME]: CompositionStage,
  [ReflectionStage.STAGE_NAME]: ReflectionStage,
};

const ZERO_CONFIDENCE = [0.0, 0.0, 0.0, 0.0];
const FALLBACK_CONFIDENCE = [0.1, 0.1, 0.1, 0.1];

/** Executive summary followed by every report section, for `output_detail_level: 'detailed'`. */
export const formatDetailedAnswer = (composed: ComposedOutput): string =>
  [composed.executive_summary, ...composed.sections.map((section) => `## ${section.title}\n${section.content}`)].join(
    '\n\n'
  );

export interface ProcessQueryOptions {
  sessionId?: string;
  operationalParams?: Record<string, unknown>;
  initialContext?: Record<string, unknown>;
}

interface PipelineStage {
  displayName: string;
  instance: BaseStage;
}

interface HaltDecision {
  reason: string;
  logMessage: string;
}

export class GoTProcessor {
  private readonly stages: PipelineStage[];
  private readonly exporter: GraphStateExporter;

  constructor(private readonly settings: Settings, deps: StageDependencies) {
    logger.info("Initializing GoTProcessor");
    const seed = settings.asr_got.default_parameters.random_seed;
    const stageDeps: StageDependencies = {
      ...deps,
      random: deps.random ?? (seed !== undefined ? createSeededRandom(seed) : undefined),
    };
    this.stages = this.initializeStages(stageDeps);
    this.exporter = new GraphStateExporter(deps.repository);
    logger.info(`GoTProcessor initialized with ${this.stages.length} configured and enabled stages.`);
  }

  get stageCount(): number {
    return this.stages.length;
  }

  private initializeStages(deps: StageDependencies): PipelineStage[] {
    const initialized: PipelineStage[] = [];
    for (const stageConfig of this.settings.asr_got.pipeline_stages) {
      if (!stageConfig.enabled) {
        logger.info(`Stage '${stageConfig.name}' is disabled and will not be loaded.`);
        continue;
      }
      const StageImpl = STAGE_REGISTRY[stageConfig.stage];
      if (!StageImpl) {
        throw new StageInitializationError(
          `Unknown stage '${stageConfig.stage}' configured for '${stageConfig.name}'. ` +
            `Known stages: ${Object.keys(STAGE_REGISTRY).join(', ')}`
        );
      }
      initialized.push({ displayName: stageConfig.name, instance: new StageImpl(this.settings, deps) });
      logger.info(`Loaded stage '${stageConfig.name}' (${stageConfig.stage}).`);
    }
    if (initialized.length === 0) {
      logger.warn("No pipeline stages are enabled. Processor will have no stages.");
    }
    return initialized;
  }

  private async executeWithRetries(stage: PipelineStage, session: GoTProcessorSessionData): Promise<StageOutput> {
    const { stage_retry_attempts: retries, stage_retry_delay_ms: delayMs } = this.settings.asr_got.default_parameters;
    let lastError: unknown;
    for (let attempt = 0; attempt <= retries; attempt++) {
      if (attempt > 0) {
        logger.info(`Retrying stage ${stage.displayName}, attempt ${attempt + 1}/${retries + 1}`);
        await sleep(delayMs * attempt);
      }
      try {
        return await stage.instance.execute(session);
      } catch (error) {
        lastError = error;
        logger.warn(`Stage ${stage.displayName} failed on attempt ${attempt + 1}: ${errorMessage(error)}`);
      }
    }
    const cause = lastError instanceof Error ? lastError : new Error(String(lastError));
    throw new StageExecutionError(stage.displayName, cause, retries + 1);
  }

  private recordTrace(
    session: GoTProcessorSessionData,
    stageNumber: number,
    stageName: string,
    durationMs: number,
    output: StageOutput
  ): void {
    const entry: StageTraceEntry = {
      stage_number: stageNumber,
      stage_name: stageName,
      duration_ms: Math.round(durationMs),
      summary: output.summary || `Completed ${stageName}`,
      metrics: output.metrics,
      timestamp: new Date().toISOString(),
    };
    if (output.errorMessage) {
      entry.error = output.errorMessage;
      if (!entry.summary.includes(output.errorMessage)) {
        entry.summary = `${entry.summary} (Reported Error: ${output.errorMessage})`;
      }
    }
    session.stage_outputs_trace.push(entry);
    logger.info(`Completed stage ${stageNumber}: ${stageName} in ${durationMs.toFixed(2)}ms`);
  }

  /** Decides whether the pipeline cannot continue after `stage`. */
  private checkHalt(stage: PipelineStage, output: StageOutput, session: GoTProcessorSessionData): HaltDecision | undefined {
    const context = session.accumulated_context;
    switch (stage.instance.stageName) {
      case STAGE_NAMES.initialization: {
        const { root_node_id: rootNodeId } = readStageContext(context, STAGE_NAMES.initialization, InitializationContextSchema);
        if (output.errorMessage || !rootNodeId) {
          const err = output.errorMessage ?? "Root node ID was not produced.";
          return {
            reason: `Processing halted: ${stage.displayName} failed: ${err}`,
            logMessage: `Halting due to critical error in ${stage.displayName}: ${err}`,
          };
        }
        return undefined;
      }
      case STAGE_NAMES.decomposition: {
        const { decomposition_results: components } = readStageContext(
          context,
          STAGE_NAMES.decomposition,
          DecompositionContextSchema
        );
        return components.length === 0
          ? {
              reason: "Processing halted: The query could not be broken down into actionable components.",
              logMessage: `Halting: No components after ${stage.displayName}.`,
            }
          : undefined;
      }
      case STAGE_NAMES.hypothesis: {
        const { hypotheses_results: hypotheses } = readStageContext(context, STAGE_NAMES.hypothesis, HypothesisContextSchema);
        return hypotheses.length === 0
          ? {
              reason: "Processing halted: No hypotheses could be generated.",
              logMessage: `Halting: No hypotheses generated after ${stage.displayName}.`,
            }
          : undefined;
      }
      case STAGE_NAMES.evidence: {
        const { evidence_integration_summary: summary } = readStageContext(context, STAGE_NAMES.evidence, EvidenceContextSchema);
        if (summary.total_evidence_integrated === 0) {
          logger.warn(`No evidence was integrated during ${stage.displayName}.`);
          context.no_evidence_found = true;
        }
        return undefined;
      }
      case STAGE_NAMES.subgraphExtraction: {
        const { subgraph_extraction_details: details } = readStageContext(
          context,
          STAGE_NAMES.subgraphExtraction,
          SubgraphExtractionContextSchema
        );
        if (details.nodes_extracted === 0) {
          logger.warn(`No nodes were extracted during ${stage.displayName}.`);
          context.no_subgraph_extracted = true;
        }
        return undefined;
      }
      default:
        return undefined;
    }
  }

  private applyHalt(session: GoTProcessorSessionData, halt: HaltDecision): void {
    logger.error(halt.logMessage);
    const last = session.stage_outputs_trace[session.stage_outputs_trace.length - 1];
    if (last) {
      if (!last.error) {
        last.error = halt.logMessage;
        last.summary = halt.reason;
      } else if (!last.error.includes(halt.logMessage)) {
        last.error = `${last.error}; ${halt.logMessage}`;
      }
    }
    session.final_answer = halt.reason;
    session.final_confidence_vector = [...ZERO_CONFIDENCE];
  }

  private recordUnhandled(session: GoTProcessorSessionData, stageNumber: number, stage: PipelineStage, error: unknown): void {
    const cause = error instanceof StageExecutionError ? error.originalError : error;
    const message = errorMessage(cause);
    logger.error(`Critical unhandled exception in stage ${stage.displayName}: ${message}`);

    const entry: StageTraceEntry = {
      stage_number: stageNumber,
      stage_name: stage.displayName,
      duration_ms: 0,
      summary: `Stage ${stage.displayName} failed with an unhandled exception.`,
      error: `Unhandled Critical Exception: ${message}`,
      timestamp: new Date().toISOString(),
    };
    const trace = session.stage_outputs_trace;
    const last = trace[trace.length - 1];
    if (last && last.stage_number === stageNumber) {
      trace[trace.length - 1] = { ...entry, duration_ms: last.duration_ms };
    } else {
      trace.push(entry);
    }
    session.final_answer = `A critical unhandled error occurred during the '${stage.displayName}' stage. Processing cannot continue.`;
    session.final_confidence_vector = [...ZERO_CONFIDENCE];
  }

  private composeFinalAnswer(session: GoTProcessorSessionData): void {
    const context = session.accumulated_context;
    try {
      const composition = context[STAGE_NAMES.composition];
      const raw =
        composition !== null && typeof composition === 'object' && 'final_composed_output' in composition
          ? composition.final_composed_output
          : undefined;
      const composed = ComposedOutputSchema.safeParse(raw);
      if (composed.success) {
        const params = OperationalParamsSchema.safeParse(context.operational_params ?? {});
        const detailed = params.success && params.data.output_detail_level === 'detailed';
        session.final_answer = detailed
          ? formatDetailedAnswer(composed.data)
          : `${composed.data.executive_summary}\n\n(Full report details generated)`;
      } else {
        logger.warn(`${STAGE_NAMES.composition} did not produce a valid final output structure.`);
        session.final_answer = `${STAGE_NAMES.composition} did not produce a valid final output structure.`;
      }
      const reflection = readStageContext(context, STAGE_NAMES.reflection, ReflectionContextSchema);
      session.final_confidence_vector = reflection.final_confidence_vector_from_reflection ?? [...FALLBACK_CONFIDENCE];
    } catch (error) {
      logger.error(`Error during final composition of answer: ${errorMessage(error)}`);
      session.final_answer = "Error during final composition of answer.";
      session.final_confidence_vector = [...FALLBACK_CONFIDENCE];
    }
  }

  async processQuery(query: string, options: ProcessQueryOptions = {}): Promise<GoTProcessorSessionData> {
    const startedAt = process.hrtime.bigint();
    logger.info(`Starting NexusMind query processing for: ${query.substring(0, 100)}`);

    const session: GoTProcessorSessionData = {
      session_id: options.sessionId ?? `session-${uuidv4()}`,
      query,
      final_answer: '',
      final_confidence_vector: [0.5, 0.5, 0.5, 0.5],
      accumulated_context: {
        operational_params: options.operationalParams ?? {},
        ...(options.initialContext ? { initial_context: options.initialContext } : {}),
      },
      stage_outputs_trace: [],
    };

    if (this.stages.length === 0) {
      logger.error("No stages initialized for GoTProcessor. Cannot process query.");
      session.final_answer = "Error: Query processor is not configured with any processing stages.";
      session.final_confidence_vector = [...ZERO_CONFIDENCE];
      return session;
    }

    let halted = false;
    for (const [index, stage] of this.stages.entries()) {
      const stageNumber = index + 1;
      logger.info(`Executing stage ${stageNumber}/${this.stages.length}: ${stage.displayName}`);
      const stageStart = process.hrtime.bigint();
      try {
        const output = await this.executeWithRetries(stage, session);
        if (output.errorMessage) {
          logger.error(`Stage ${stage.displayName} reported an error: ${output.errorMessage}`);
        }
        Object.assign(session.accumulated_context, output.nextStageContextUpdate);
        this.recordTrace(
          session,
          stageNumber,
          stage.displayName,
          Number(process.hrtime.bigint() - stageStart) / 1_000_000,
          output
        );

        const halt = this.checkHalt(stage, output, session);
        if (halt) {
          this.applyHalt(session, halt);
          halted = true;
          break;
        }
      } catch (error) {
        this.recordUnhandled(session, stageNumber, stage, error);
        halted = true;
        break;
      }
    }

    if (!halted) {
      this.composeFinalAnswer(session);
    }

    const params = OperationalParamsSchema.safeParse(session.accumulated_context.operational_params);
    if (params.success && params.data.include_graph_state) {
      try {
        session.graph_state = await this.exporter.export({
          query,
          sessionId: session.session_id,
          maxNodes: params.data.max_nodes_in_response_graph,
        });
      } catch (error) {
        logger.error(`Could not export graph state: ${errorMessage(error)}`);
      }
    }

    const totalMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
    logger.info(
      `GoTProcessor completed in ${totalMs.toFixed(2)}ms with ${session.stage_outputs_trace.length} traced stages`
    );
    return session;
  }

  async shutdownResources(): Promise<void> {
    logger.info("Shutting down GoTProcessor resources");
    for (const stage of this.stages) {
      try {
        await stage.instance.cleanup();
      } catch (error) {
        logger.warn(`Cleanup failed for ${stage.displayName}: ${errorMessage(error)}`);
      }
    }
    logger.info("GoTProcessor resources shutdown complete");
  }
}
