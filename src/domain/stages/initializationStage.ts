import { v4 as uuidv4 } from 'uuid';
import { createLogger, errorMessage } from '../../logger';
import { GoTProcessorSessionData } from '../models/commonTypes';
import { createNode, NodeType } from '../models/graphElements';
import { averageConfidence, confidenceFromList, EpistemicStatus } from '../models/common';
import { InitializationContext, STAGE_NAMES } from '../models/stageContexts';
import { BaseStage, StageMetrics, StageOutput } from './baseStage';

const logger = createLogger('InitializationStage');

export class InitializationStage extends BaseStage {
  static STAGE_NAME: string = STAGE_NAMES.initialization;
  readonly stageName: string = InitializationStage.STAGE_NAME;
  private rootNodeLabel = "Task Understanding";

  async execute(currentSessionData: GoTProcessorSessionData): Promise<StageOutput> {
    this.logStart(currentSessionData.session_id);
    const initialQuery = currentSessionData.query;
    const operationalParams = this.operationalParams(currentSessionData);

    const metrics: StageMetrics = {
      nodes_created: 0,
      used_existing_node: false,
      updated_existing_node_tags: false,
      initial_confidence_avg: 0,
    };

    if (!initialQuery || !initialQuery.trim()) {
      const message = "Invalid initial query. It must be a non-empty string.";
      logger.error(message);
      return this.output(false, message, { error: message }, metrics, message);
    }

    logger.info(`Finding or creating ROOT node for query: ${initialQuery.substring(0, 100)}`);

    let context: InitializationContext;
    let summary: string;
    try {
      const [existingRoot] = await this.repository.findNodes({
        types: [NodeType.ROOT],
        queryContext: initialQuery,
      });

      if (existingRoot) {
        metrics.used_existing_node = true;
        const currentTags = existingRoot.metadata.disciplinary_tags;
        const combinedTags = [...new Set([...currentTags, ...(operationalParams.initial_disciplinary_tags ?? [])])];

        if (combinedTags.length !== currentTags.length) {
          await this.repository.saveNodes([
            {
              ...existingRoot,
              updated_at: new Date(),
              metadata: { ...existingRoot.metadata, disciplinary_tags: combinedTags },
            },
          ]);
          metrics.updated_existing_node_tags = true;
          logger.info(`Updated disciplinary tags for ROOT node '${existingRoot.id}' to: ${combinedTags.join(', ')}`);
        }

        metrics.initial_confidence_avg = averageConfidence(existingRoot.confidence);
        context = { root_node_id: existingRoot.id, initial_disciplinary_tags: combinedTags };
        summary = `Using existing ROOT node '${existingRoot.id}'. Disciplinary tags ensured.`;
      } else {
        const tags = [
          ...new Set(operationalParams.initial_disciplinary_tags ?? this.params.default_disciplinary_tags),
        ];
        const rootNode = createNode({
          id: uuidv4(),
          label: this.rootNodeLabel,
          type: NodeType.ROOT,
          confidence: confidenceFromList(this.params.initial_confidence),
          metadata: {
            description: `Initial understanding of the task based on the query: '${initialQuery}'.`,
            query_context: initialQuery,
            source_description: "User query",
            epistemic_status: EpistemicStatus.ASSUMPTION,
            disciplinary_tags: tags,
            layer_id: operationalParams.initial_layer ?? this.params.initial_layer,
            impact_score: 0.9,
          },
        });

        await this.repository.saveNodes([rootNode]);
        metrics.nodes_created = 1;
        metrics.initial_confidence_avg = averageConfidence(rootNode.confidence);
        context = { root_node_id: rootNode.id, initial_disciplinary_tags: tags };
        summary = `New ROOT node '${rootNode.id}' created.`;
        logger.info(summary);
      }
    } catch (error) {
      const message = `Graph store error during ROOT node initialization: ${errorMessage(error)}`;
      logger.error(message);
      return this.output(false, message, { error: message }, metrics, message);
    }

    const output = this.output(true, summary, context, metrics);
    this.logEnd(currentSessionData.session_id, output);
    return output;
  }
}
