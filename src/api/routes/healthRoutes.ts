import { Router, Request, Response } from 'express';
import { Settings } from '../../config';
import { createLogger, errorMessage } from '../../logger';
import { GraphRepository } from '../../domain/interfaces/graphRepository';
import { catchAsync } from '../../middleware/errorHandler';

const logger = createLogger('Health');

type ServiceStatus = 'healthy' | 'unhealthy' | 'error';

interface GraphStoreHealth {
  backend: string;
  status: ServiceStatus;
  checked_at: string;
  error?: string;
}

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  version: string;
  services: { graph_store: GraphStoreHealth };
  response_time_ms: number;
}

const checkGraphStore = async (repository: GraphRepository): Promise<GraphStoreHealth> => {
  try {
    const healthy = await repository.healthCheck();
    return {
      backend: repository.backend,
      status: healthy ? 'healthy' : 'unhealthy',
      checked_at: new Date().toISOString(),
    };
  } catch (error) {
    logger.error(`Health check failed: ${errorMessage(error)}`);
    return {
      backend: repository.backend,
      status: 'error',
      error: 'Connection check failed',
      checked_at: new Date().toISOString(),
    };
  }
};

/** Mounted at `/health`. Unauthenticated. */
export const createHealthRouter = (repository: GraphRepository, settings: Settings): Router => {
  const router = Router();

  router.get('/', catchAsync(async (_req: Request, res: Response): Promise<void> => {
    logger.debug('Health check endpoint was called.');
    const startTime = Date.now();

    const graphStore = await checkGraphStore(repository);
    const status = graphStore.status === 'healthy' ? 'healthy' : 'unhealthy';
    const report: HealthReport = {
      status,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: settings.app.version,
      services: { graph_store: graphStore },
      response_time_ms: Date.now() - startTime,
    };

    res.status(status === 'healthy' ? 200 : 503).json({
      success: status === 'healthy',
      data: report,
    });
  }));

  return router;
};
