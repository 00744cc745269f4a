import { Edge, EdgeSchema, Node, NodeSchema } from '../models/graphElements';
import { CONFIDENCE_COMPONENTS } from '../models/common';

export type Neo4jPropertyValue = string | number | boolean | string[];
export type Neo4jProperties = Record<string, Neo4jPropertyValue>;

// Neo4j properties are primitives or homogeneous lists; anything richer is stored as JSON.
const JSON_SUFFIX = '_json';
const METADATA_PREFIX = 'metadata_';

const isStringList = (value: unknown[]): value is string[] => value.every((item) => typeof item === 'string');

function flattenMetadata(metadata: Record<string, unknown>, properties: Neo4jProperties): void {
  for (const [key, value] of Object.entries(metadata)) {
    const propertyKey = `${METADATA_PREFIX}${key}`;
    if (value === undefined || value === null) {
      continue;
    }
    if (value instanceof Date) {
      properties[propertyKey] = value.toISOString();
    } else if (Array.isArray(value) && isStringList(value)) {
      properties[propertyKey] = value;
    } else if (typeof value === 'object') {
      properties[`${propertyKey}${JSON_SUFFIX}`] = JSON.stringify(value);
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      properties[propertyKey] = value;
    }
  }
}

function unflattenMetadata(properties: Record<string, unknown>): Record<string, unknown> {
  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(properties)) {
    if (!key.startsWith(METADATA_PREFIX)) {
      continue;
    }
    const name = key.slice(METADATA_PREFIX.length);
    if (name.endsWith(JSON_SUFFIX) && typeof value === 'string') {
      const parsed: unknown = JSON.parse(value);
      metadata[name.slice(0, -JSON_SUFFIX.length)] = parsed;
    } else {
      metadata[name] = value;
    }
  }
  return metadata;
}

export function prepareNodePropertiesForNeo4j(node: Node): Neo4jProperties {
  const properties: Neo4jProperties = {
    id: node.id,
    label: node.label,
    type: node.type,
    created_at: node.created_at.toISOString(),
    updated_at: node.updated_at.toISOString(),
  };
  for (const component of CONFIDENCE_COMPONENTS) {
    properties[`confidence_${component}`] = node.confidence[component];
  }
  flattenMetadata(node.metadata, properties);
  return properties;
}

export function prepareEdgePropertiesForNeo4j(edge: Edge): Neo4jProperties {
  const properties: Neo4jProperties = {
    id: edge.id,
    source_id: edge.source_id,
    target_id: edge.target_id,
    type: edge.type,
    confidence: edge.confidence,
    created_at: edge.created_at.toISOString(),
    updated_at: edge.updated_at.toISOString(),
  };
  flattenMetadata(edge.metadata, properties);
  return properties;
}

/** Rebuilds a validated Node from the flat property map stored in Neo4j. */
export function nodeFromNeo4jProperties(properties: Record<string, unknown>): Node {
  const confidence: Record<string, unknown> = {};
  for (const component of CONFIDENCE_COMPONENTS) {
    confidence[component] = properties[`confidence_${component}`];
  }
  return NodeSchema.parse({
    id: properties.id,
    label: properties.label,
    type: properties.type,
    created_at: properties.created_at,
    updated_at: properties.updated_at,
    confidence,
    metadata: unflattenMetadata(properties),
  });
}

export function edgeFromNeo4jProperties(properties: Record<string, unknown>): Edge {
  return EdgeSchema.parse({
    id: properties.id,
    source_id: properties.source_id,
    target_id: properties.target_id,
    type: properties.type,
    confidence: properties.confidence,
    created_at: properties.created_at,
    updated_at: properties.updated_at,
    metadata: unflattenMetadata(properties),
  });
}
