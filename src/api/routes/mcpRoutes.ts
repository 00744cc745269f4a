import { Router, Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { isRecord, Settings } from '../../config';
import { createLogger, errorMessage } from '../../logger';
import { GoTProcessor } from '../../application/gotProcessor';
import { GoTProcessorSessionData } from '../../domain/models/commonTypes';
import { catchAsync, RateLimitError } from '../../middleware/errorHandler';
import { createBearerAuth } from '../../middleware/auth';
import { createRateLimitMiddleware, RateLimiter } from '../../services/rateLimiter';
import {
  createJsonRpcError,
  createJsonRpcResult,
  JSONRPC_ERRORS,
  JSONRPCId,
  JSONRPCIdSchema,
  JSONRPCRequestSchema,
  JSONRPCResponse,
  MCPASRGoTQueryParams,
  MCPASRGoTQueryParamsSchema,
  MCPASRGoTQueryResult,
  MCPInitializeParamsSchema,
  MCPInitializeResult,
} from '../schemas';

const logger = createLogger('MCP');

export type QueryProcessor = Pick<GoTProcessor, 'processQuery'>;

export interface McpRouterOptions {
  processor?: QueryProcessor;
  settings: Settings;
}

type MethodHandler = (params: unknown, id: JSONRPCId) => Promise<JSONRPCResponse>;

const describeZodError = (error: ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

const invalidParams = (id: JSONRPCId, method: string, error: ZodError): JSONRPCResponse =>
  createJsonRpcError(id, JSONRPC_ERRORS.INVALID_PARAMS, "Invalid parameters.", {
    details: describeZodError(error),
    method,
  });

export const formatReasoningTrace = (session: GoTProcessorSessionData, requested: boolean): string => {
  if (!requested) {
    return "Reasoning trace not requested or not available.";
  }
  if (session.stage_outputs_trace.length === 0) {
    return "Reasoning trace requested, but no trace data was generated.";
  }
  return session.stage_outputs_trace
    .map((entry) => `Stage ${entry.stage_number}. ${entry.stage_name}: ${entry.summary} (${entry.duration_ms}ms)`)
    .join('\n');
};

const buildQueryResult = (
  session: GoTProcessorSessionData,
  params: MCPASRGoTQueryParams,
  executionTimeMs: number
): MCPASRGoTQueryResult => {
  const result: MCPASRGoTQueryResult = {
    answer: session.final_answer || "Processing complete, but no explicit answer generated.",
    reasoning_trace_summary: formatReasoningTrace(session, params.parameters.include_reasoning_trace),
    confidence_vector: session.final_confidence_vector,
    execution_time_ms: Math.round(executionTimeMs),
    session_id: session.session_id,
  };
  if (params.parameters.include_graph_state && session.graph_state) {
    result.graph_state_full = session.graph_state;
  }
  return result;
};

/** JSON bodies that fail to parse under `/mcp` still get a JSON-RPC envelope. */
export const jsonRpcParseErrorHandler = (error: unknown, _req: Request, res: Response, next: NextFunction): void => {
  if (error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed') {
    logger.warn(`Rejected malformed JSON-RPC body: ${error.message}`);
    res.status(200).json(createJsonRpcError(null, JSONRPC_ERRORS.PARSE_ERROR, "Parse error."));
    return;
  }
  next(error);
};

const requestIdOf = (body: unknown): JSONRPCId => {
  const id = isRecord(body) ? JSONRPCIdSchema.safeParse(body.id) : undefined;
  return id?.success ? id.data : null;
};

/** Rate-limited `/mcp` calls get a JSON-RPC envelope, like the 401 from the auth guard. */
export const jsonRpcRateLimitHandler = (error: unknown, req: Request, res: Response, next: NextFunction): void => {
  if (!(error instanceof RateLimitError)) {
    next(error);
    return;
  }
  logger.warn(`Rate limit exceeded for ${req.ip ?? 'unknown client'}`);
  if (error.retryAfterSeconds !== undefined) {
    res.setHeader('Retry-After', String(error.retryAfterSeconds));
  }
  res.status(429).json(
    createJsonRpcError(requestIdOf(req.body), JSONRPC_ERRORS.RATE_LIMITED, "Too many requests.", {
      retry_after: error.retryAfterSeconds,
    })
  );
};

export const createMcpRouter = ({ processor, settings }: McpRouterOptions): Router => {
  const router = Router();
  const rateLimitConfig = {
    maxRequests: settings.app.rate_limit.max_requests,
    perSeconds: settings.app.rate_limit.per_seconds,
  };

  const handleInitialize: MethodHandler = async (params, id) => {
    const parsed = MCPInitializeParamsSchema.safeParse(params ?? {});
    if (!parsed.success) {
      return invalidParams(id, 'initialize', parsed.error);
    }
    const client = parsed.data.client_info;
    logger.info(
      `MCP initialize from ${client.client_name ?? 'unknown client'} ${client.client_version ?? ''}`.trim()
    );
    const result: MCPInitializeResult = {
      server_name: settings.mcp_settings.server_name,
      server_version: settings.mcp_settings.server_version,
      mcp_version: settings.mcp_settings.protocol_version,
    };
    return createJsonRpcResult(id, result);
  };

  const handleQuery: MethodHandler = async (params, id) => {
    const parsed = MCPASRGoTQueryParamsSchema.safeParse(params ?? {});
    if (!parsed.success) {
      return invalidParams(id, 'asr_got.query', parsed.error);
    }
    if (!processor) {
      logger.error("asr_got.query called but no processor is configured.");
      return createJsonRpcError(id, JSONRPC_ERRORS.PROCESSOR_UNAVAILABLE, "NexusMind Core Processor is not available.");
    }

    const queryParams = parsed.data;
    logger.info(`Processing asr_got.query: ${queryParams.query.substring(0, 100)}`);
    const startedAt = process.hrtime.bigint();
    let session: GoTProcessorSessionData;
    try {
      session = await processor.processQuery(queryParams.query, {
        sessionId: queryParams.session_id,
        operationalParams: queryParams.parameters,
        initialContext: queryParams.context,
      });
    } catch (error) {
      logger.error(`Error processing asr_got.query: ${errorMessage(error)}`);
      return createJsonRpcError(id, JSONRPC_ERRORS.PROCESSING_ERROR, "Error processing ASR-GoT query.", {
        details: errorMessage(error),
        method: 'asr_got.query',
      });
    }
    // Failures while shaping the result surface as internal errors.
    const elapsedMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
    return createJsonRpcResult(id, buildQueryResult(session, queryParams, elapsedMs));
  };

  const handleShutdown: MethodHandler = async (_params, id) => {
    logger.info("MCP shutdown requested by client.");
    return createJsonRpcResult(id, null);
  };

  const methods: Record<string, MethodHandler> = {
    initialize: handleInitialize,
    'asr_got.query': handleQuery,
    shutdown: handleShutdown,
  };

  router.use(createRateLimitMiddleware(new RateLimiter(rateLimitConfig), rateLimitConfig));
  router.use(createBearerAuth(settings.app.auth_token));

  router.post(
    '/',
    catchAsync(async (req: Request, res: Response): Promise<void> => {
      const envelope = JSONRPCRequestSchema.safeParse(req.body);
      if (!envelope.success) {
        res.json(
          createJsonRpcError(requestIdOf(req.body), JSONRPC_ERRORS.INVALID_REQUEST, "Invalid Request.", {
            details: describeZodError(envelope.error),
          })
        );
        return;
      }

      const { method, params } = envelope.data;
      const id = envelope.data.id ?? null;
      const handler = Object.prototype.hasOwnProperty.call(methods, method) ? methods[method] : undefined;
      if (!handler) {
        logger.warn(`Unknown MCP method requested: ${method}`);
        res.json(createJsonRpcError(id, JSONRPC_ERRORS.METHOD_NOT_FOUND, `Method '${method}' not found.`));
        return;
      }

      try {
        res.json(await handler(params, id));
      } catch (error) {
        logger.error(`Unhandled error in MCP method ${method}: ${errorMessage(error)}`);
        res.json(
          createJsonRpcError(id, JSONRPC_ERRORS.INTERNAL_ERROR, `Internal error processing request for method '${method}'.`, {
            details: errorMessage(error),
            method,
          })
        );
      }
    })
  );
  router.use(jsonRpcRateLimitHandler);

  return router;
};
