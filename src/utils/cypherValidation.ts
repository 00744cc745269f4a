import { EdgeType, NodeType } from '../domain/models/graphElements';

export class CypherValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CypherValidationError';
  }
}

export const validateRelationshipType = (edgeType: string): EdgeType => {
  const match = Object.values(EdgeType).find((allowed) => allowed === edgeType);
  if (!match) {
    throw new CypherValidationError(
      `Invalid relationship type: ${edgeType}. Allowed types: ${Object.values(EdgeType).join(', ')}`
    );
  }
  return match;
};

export const validateNodeType = (nodeType: string): NodeType => {
  const match = Object.values(NodeType).find((allowed) => allowed === nodeType);
  if (!match) {
    throw new CypherValidationError(
      `Invalid node type: ${nodeType}. Allowed types: ${Object.values(NodeType).join(', ')}`
    );
  }
  return match;
};

export const sanitizeCypherIdentifier = (identifier: string): string => {
  if (!identifier) {
    throw new CypherValidationError('Identifier must be a non-empty string');
  }

  if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(identifier)) {
    throw new CypherValidationError(`Invalid identifier format: ${identifier}. Must contain only letters, numbers, and underscores, and start with a letter or underscore.`);
  }

  if (identifier.length > 100) {
    throw new CypherValidationError(`Identifier too long: ${identifier}. Maximum length is 100 characters.`);
  }

  return identifier;
};

// Labels and relationship types cannot be query parameters, so they are
// validated against the enums before being interpolated.
export const nodeTypeLabel = (nodeType: string): string =>
  sanitizeCypherIdentifier(validateNodeType(nodeType).toUpperCase());

export const relationshipTypeName = (edgeType: string): string =>
  sanitizeCypherIdentifier(validateRelationshipType(edgeType).toUpperCase());

export const buildNodeUpsertQuery = (nodeType: NodeType): string => `
    UNWIND $batch AS props
    MERGE (n:Node {id: props.id})
    SET n = props
    SET n:${nodeTypeLabel(nodeType)}
    RETURN n.id AS id
  `;

export const buildRelationshipUpsertQuery = (edgeType: EdgeType): string => `
    UNWIND $batch AS props
    MATCH (source:Node {id: props.source_id})
    MATCH (target:Node {id: props.target_id})
    MERGE (source)-[r:${relationshipTypeName(edgeType)} {id: props.id}]->(target)
    SET r = props
    RETURN r.id AS id
  `;
