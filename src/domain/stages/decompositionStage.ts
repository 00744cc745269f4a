import { DecompositionDimension, isRecord } from '../../config';
import { createLogger, errorMessage } from '../../logger';
import { GoTProcessorSessionData } from '../models/commonTypes';
import { createEdge, createNode, Edge, EdgeType, Node, NodeType } from '../models/graphElements';
import { confidenceFromList, EpistemicStatus } from '../models/common';
import { InitializationContextSchema, STAGE_NAMES } from '../models/stageContexts';
import { truncate } from '../utils/metadataHelpers';
import { BaseStage, StageOutput } from './baseStage';

const logger = createLogger('DecompositionStage');

const toDimension = (value: unknown): DecompositionDimension | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  const { label, description } = value;
  if (typeof label === 'string' && label && typeof description === 'string' && description) {
    return { label, description };
  }
  return undefined;
};

export class DecompositionStage extends BaseStage {
  static STAGE_NAME: string = STAGE_NAMES.decomposition;
  readonly stageName: string = DecompositionStage.STAGE_NAME;

  private dimensionsFor(session: GoTProcessorSessionData): DecompositionDimension[] {
    const requested = this.operationalParams(session).decomposition_dimensions;
    if (requested && requested.length > 0) {
      const valid = requested.map(toDimension).filter((dim): dim is DecompositionDimension => dim !== undefined);
      if (valid.length > 0) {
        logger.info(`Using ${valid.length} decomposition dimension(s) from operational parameters.`);
        return valid;
      }
      logger.warn('Operational decomposition_dimensions had no entry with both label and description. Falling back to defaults.');
    }
    return this.params.default_decomposition_dimensions;
  }

  async execute(currentSessionData: GoTProcessorSessionData): Promise<StageOutput> {
    this.logStart(currentSessionData.session_id);

    const emptyContext = { dimension_node_ids: [], decomposition_results: [] };
    const { root_node_id: rootNodeId } = this.contextOf(
      currentSessionData,
      STAGE_NAMES.initialization,
      InitializationContextSchema
    );

    if (!rootNodeId) {
      const message = "Root node ID not found in session context. Cannot proceed.";
      logger.error(message);
      return this.output(false, message, { ...emptyContext, error: message }, {}, message);
    }

    const dimensionNodes: Node[] = [];
    const edges: Edge[] = [];
    try {
      const rootNode = await this.repository.getNode(rootNodeId);
      if (!rootNode) {
        const message = `Root node '${rootNodeId}' not found in graph store.`;
        logger.error(message);
        return this.output(false, message, { ...emptyContext, error: message }, {}, message);
      }

      const operationalParams = this.operationalParams(currentSessionData);
      const layerId = operationalParams.dimension_layer ?? rootNode.metadata.layer_id;
      const rootText = rootNode.metadata.query_context || rootNode.label;

      this.dimensionsFor(currentSessionData).forEach((dimension, index) => {
        const dimensionNode = createNode({
          id: `dim_${rootNodeId}_${index}`,
          label: dimension.label,
          type: NodeType.DECOMPOSITION_DIMENSION,
          confidence: confidenceFromList(this.params.dimension_confidence),
          metadata: {
            description: dimension.description,
            query_context: currentSessionData.query,
            source_description: "DecompositionStage",
            epistemic_status: EpistemicStatus.ASSUMPTION,
            disciplinary_tags: rootNode.metadata.disciplinary_tags,
            layer_id: layerId,
            impact_score: 0.7,
          },
        });
        dimensionNodes.push(dimensionNode);
        edges.push(
          createEdge({
            id: `edge_${dimensionNode.id}_decomp_of_${rootNodeId}`,
            source_id: dimensionNode.id,
            target_id: rootNodeId,
            type: EdgeType.DECOMPOSITION_OF,
            confidence: 0.95,
            metadata: {
              description: `'${dimension.label}' is a decomposition of '${truncate(rootText, 30)}'`,
            },
          })
        );
      });

      await this.repository.saveNodes(dimensionNodes);
      const savedEdges = await this.repository.saveEdges(edges);

      const labels = dimensionNodes.map((node) => node.label);
      const summary = `Task decomposed into ${dimensionNodes.length} dimensions: ${labels.join(', ')}.`;
      const output = this.output(
        true,
        summary,
        {
          dimension_node_ids: dimensionNodes.map((node) => node.id),
          decomposition_results: dimensionNodes.map((node) => ({ id: node.id, label: node.label })),
        },
        { dimensions_created: dimensionNodes.length, relationships_created: savedEdges.length }
      );
      this.logEnd(currentSessionData.session_id, output);
      return output;
    } catch (error) {
      const message = `Graph store error during decomposition: ${errorMessage(error)}`;
      logger.error(message);
      return this.output(false, message, { ...emptyContext, error: message }, {}, message);
    }
  }
}
