import neo4j, { Driver, Session, ManagedTransaction, auth } from 'neo4j-driver';
import { Neo4jSettings } from '../config';
import { GraphStoreError } from '../domain/services/exceptions';
import { createLogger, errorMessage } from '../logger';

const logger = createLogger('Neo4jDatabaseManager');

export type TransactionType = 'read' | 'write';
export type QueryRow = Record<string, unknown>;

/** The slice of the database manager the repository needs; lets tests substitute a fake. */
export interface CypherExecutor {
  executeQuery(query: string, parameters?: Record<string, unknown>, txType?: TransactionType): Promise<QueryRow[]>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

export const sanitizeErrorMessage = (error: unknown): string => {
  const message = errorMessage(error);
  if (!message) {
    return 'Unknown database error';
  }
  return message
    .replace(/password=[^&\s]*/gi, 'password=***')
    .replace(/user=[^&\s]*/gi, 'user=***')
    .replace(/uri=[^&\s]*/gi, 'uri=***');
};

export class Neo4jDatabaseManager implements CypherExecutor {
  private driver: Driver;
  private maxPoolSize = 50;
  private connectionTimeout = 30000; // 30 seconds
  private maxTransactionRetryTime = 15000; // 15 seconds

  constructor(private readonly neo4jSettings: Neo4jSettings) {
    // Encryption follows the URI scheme (neo4j+s://, bolt+s://).
    this.driver = neo4j.driver(
      neo4jSettings.uri,
      auth.basic(neo4jSettings.user, neo4jSettings.password),
      {
        maxConnectionPoolSize: this.maxPoolSize,
        connectionAcquisitionTimeout: this.connectionTimeout,
        maxTransactionRetryTime: this.maxTransactionRetryTime,
        connectionTimeout: this.connectionTimeout,
      }
    );
    logger.info(`Neo4j driver created for ${neo4jSettings.uri} (database '${neo4jSettings.database}').`);
  }

  private openSession(txType: TransactionType): Session {
    return this.driver.session({
      database: this.neo4jSettings.database,
      defaultAccessMode: txType === 'read' ? neo4j.session.READ : neo4j.session.WRITE,
    });
  }

  async executeQuery(
    query: string,
    parameters: Record<string, unknown> = {},
    txType: TransactionType = 'read'
  ): Promise<QueryRow[]> {
    if (!query.trim()) {
      throw new GraphStoreError('Query must be a non-empty string', 'executeQuery');
    }
    const session = this.openSession(txType);
    try {
      const work = (tx: ManagedTransaction) => tx.run(query, parameters);
      const result = txType === 'read' ? await session.executeRead(work) : await session.executeWrite(work);
      return result.records.map((record): QueryRow => record.toObject());
    } catch (error) {
      const sanitizedError = sanitizeErrorMessage(error);
      logger.error(`Error executing Neo4j query: ${sanitizedError}`);
      throw new GraphStoreError(`Database query failed: ${sanitizedError}`, 'executeQuery');
    } finally {
      await session.close();
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.driver.verifyConnectivity();
      return true;
    } catch (error) {
      logger.warn(`Neo4j connectivity check failed: ${sanitizeErrorMessage(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    try {
      await this.driver.close();
      logger.info("Neo4j driver closed.");
    } catch (error) {
      logger.error(`Error closing Neo4j connection: ${sanitizeErrorMessage(error)}`);
    }
  }
}
