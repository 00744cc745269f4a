import { RequestHandler } from 'express';
import crypto from 'crypto';
import { isRecord } from '../config';
import { createLogger } from '../logger';
import { createJsonRpcError, JSONRPC_ERRORS, JSONRPCIdSchema } from '../api/schemas';

const logger = createLogger('Auth');

const secureCompare = (a: string, b: string): boolean => {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    return false;
  }
  return crypto.timingSafeEqual(left, right);
};

/** Extracts the token from an `Authorization: Bearer <token>` header. */
export const bearerTokenOf = (header: string | undefined): string | undefined => {
  if (!header) {
    return undefined;
  }
  const [type, token] = header.trim().split(/\s+/, 2);
  return type?.toLowerCase() === 'bearer' && token ? token : undefined;
};

/**
 * Bearer-token guard for the JSON-RPC endpoint. Passes everything through when no
 * token is configured.
 */
export const createBearerAuth = (expectedToken: string | undefined): RequestHandler => {
  if (!expectedToken) {
    logger.warn('No APP_AUTH_TOKEN configured. The MCP endpoint accepts unauthenticated requests.');
    return (_req, _res, next) => next();
  }

  return (req, res, next) => {
    const token = bearerTokenOf(req.headers.authorization);
    if (token !== undefined && secureCompare(token, expectedToken)) {
      next();
      return;
    }

    logger.warn(`Rejected unauthenticated request to ${req.path}`);
    const requestId = isRecord(req.body) ? JSONRPCIdSchema.safeParse(req.body.id) : undefined;
    res.setHeader('WWW-Authenticate', 'Bearer realm="nexusmind"');
    res
      .status(401)
      .json(createJsonRpcError(requestId?.success ? requestId.data : null, JSONRPC_ERRORS.UNAUTHORIZED, "Unauthorized."));
  };
};
