import { Settings } from '../config';
import { GraphRepository } from '../domain/interfaces/graphRepository';
import { createLogger } from '../logger';
import { InMemoryGraphRepository } from './inMemoryGraphRepository';
import { Neo4jDatabaseManager } from './neo4jDatabaseManager';
import { Neo4jGraphRepository } from './neo4jGraphRepository';

const logger = createLogger('graphRepositoryFactory');

export async function createGraphRepository(settings: Settings): Promise<GraphRepository> {
  if (settings.graph_store.backend === 'memory') {
    logger.info('Using the in-memory graph store. Data is lost when the process exits.');
    return new InMemoryGraphRepository();
  }
  const repository = new Neo4jGraphRepository(new Neo4jDatabaseManager(settings.neo4j));
  if (await repository.healthCheck()) {
    await repository.ensureSchema();
  } else {
    logger.error('Neo4j is not reachable; queries will fail until it becomes available.');
  }
  return repository;
}
