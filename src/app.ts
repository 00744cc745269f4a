import express, { Express } from 'express';
import cors, { CorsOptions } from 'cors';
import helmet from 'helmet';
import { settings as defaultSettings, Settings } from './config';
import { createLogger } from './logger';
import { GraphRepository } from './domain/interfaces/graphRepository';
import { correlationId, errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createMcpRouter, jsonRpcParseErrorHandler, QueryProcessor } from './api/routes/mcpRoutes';
import { createHealthRouter } from './api/routes/healthRoutes';

const logger = createLogger('App');

export interface CreateAppOptions {
  processor?: QueryProcessor;
  repository: GraphRepository;
  settings?: Settings;
}

const DEV_ORIGINS = ['http://localhost:3000', 'https://localhost:3000'];

export const resolveCorsOrigins = (allowedOriginsStr: string): CorsOptions['origin'] => {
  if (allowedOriginsStr.trim() === '*') {
    if (process.env.NODE_ENV === 'production') {
      logger.warn('SECURITY WARNING: CORS is configured to allow all origins (*) in production.');
    }
    return true;
  }
  const origins = allowedOriginsStr
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  if (origins.length === 0) {
    logger.warn("APP_CORS_ALLOWED_ORIGINS_STR was not '*' and parsed to an empty list. Defaulting to localhost.");
    return DEV_ORIGINS;
  }
  return origins;
};

export const createApp = ({ processor, repository, settings = defaultSettings }: CreateAppOptions): Express => {
  const app = express();

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
      },
    },
  }));
  app.set('trust proxy', 1);

  app.use(correlationId);
  app.use(express.json({ limit: '10mb' }));

  const origin = resolveCorsOrigins(settings.app.cors_allowed_origins_str);
  app.use(cors({
    origin,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-ID'],
    exposedHeaders: ['X-Correlation-ID', 'X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
    maxAge: 86400,
  }));

  app.use('/health', createHealthRouter(repository, settings));
  app.use('/mcp', jsonRpcParseErrorHandler);
  app.use('/mcp', createMcpRouter({ processor, settings }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  logger.info(`${settings.app.name} v${settings.app.version} application instance created.`);
  return app;
};
