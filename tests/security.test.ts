import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import express from 'express';
import request from 'supertest';
import { correlationId, errorHandler, RateLimitError, sanitizeErrorMessage } from '../src/middleware/errorHandler';
import { bearerTokenOf } from '../src/middleware/auth';
import { RateLimiter } from '../src/services/rateLimiter';
import {
  buildNodeUpsertQuery,
  CypherValidationError,
  nodeTypeLabel,
  relationshipTypeName,
  sanitizeCypherIdentifier,
} from '../src/utils/cypherValidation';
import { NodeType } from '../src/domain/models/graphElements';
import { resolveCorsOrigins } from '../src/app';

describe('Security', () => {
  describe('Error sanitisation', () => {
    test('masks credentials embedded in messages', () => {
      expect(sanitizeErrorMessage('connect failed password=hunter2&user=neo4j token=abc')).toBe(
        'connect failed password=***&user=neo4j token=***'
      );
      expect(sanitizeErrorMessage('Authorization: Bearer abc.def')).toBe('Authorization: Bearer ***');
    });
  });

  describe('Error handler', () => {
    test('answers rate-limit errors with Retry-After outside the JSON-RPC route', async () => {
      const app = express();
      app.use(correlationId);
      app.get('/limited', (_req, _res, next) => next(new RateLimitError('Slow down.', 7)));
      app.use(errorHandler);

      const response = await request(app).get('/limited').set('X-Correlation-ID', 'corr-7');

      expect(response.status).toBe(429);
      expect(response.headers['retry-after']).toBe('7');
      expect(response.body).toEqual({
        success: false,
        error: {
          message: 'Slow down.',
          code: 'RATE_LIMIT_ERROR',
          statusCode: 429,
          correlationId: 'corr-7',
          details: { retryAfter: 7 },
        },
      });
    });
  });

  describe('CORS origins', () => {
    test('parses the configured origin list', () => {
      expect(resolveCorsOrigins('*')).toBe(true);
      expect(resolveCorsOrigins('https://a.example, https://b.example')).toEqual(['https://a.example', 'https://b.example']);
      expect(resolveCorsOrigins(' , ')).toEqual(['http://localhost:3000', 'https://localhost:3000']);
    });
  });

  describe('Bearer tokens', () => {
    test('extracts the token from a bearer header', () => {
      expect(bearerTokenOf('Bearer test-secret')).toBe('test-secret');
      expect(bearerTokenOf('bearer   test-secret')).toBe('test-secret');
    });

    test('ignores other schemes and empty headers', () => {
      expect(bearerTokenOf('Basic dXNlcjpwYXNz')).toBeUndefined();
      expect(bearerTokenOf('Bearer')).toBeUndefined();
      expect(bearerTokenOf(undefined)).toBeUndefined();
    });
  });

  describe('Rate limiting', () => {
    let clock: number;
    let limiter: RateLimiter;

    beforeEach(() => {
      clock = 1000;
      limiter = new RateLimiter({ maxRequests: 2, perSeconds: 10 }, () => clock);
    });

    afterEach(() => {
      limiter.destroy();
    });

    test('allows up to the limit within the window', () => {
      expect(limiter.isAllowed('a')).toEqual({ allowed: true, remaining: 1, resetTime: 1010 });
      clock = 1001;
      expect(limiter.isAllowed('a')).toEqual({ allowed: true, remaining: 0, resetTime: 1010 });
      clock = 1002;
      expect(limiter.isAllowed('a')).toEqual({ allowed: false, remaining: 0, resetTime: 1010 });
      expect(limiter.isAllowed('b').allowed).toBe(true);
    });

    test('slides the window forward', () => {
      limiter.isAllowed('a');
      clock = 1001;
      limiter.isAllowed('a');
      clock = 1010.5;
      expect(limiter.isAllowed('a')).toEqual({ allowed: true, remaining: 0, resetTime: 1011 });
    });

    test('cleanup forgets idle clients', () => {
      limiter.isAllowed('a');
      limiter.isAllowed('b');
      expect(limiter.trackedClients).toBe(2);
      clock = 1100;
      limiter.cleanup();
      expect(limiter.trackedClients).toBe(0);
    });
  });

  describe('Cypher identifiers', () => {
    test('maps node and edge types to labels', () => {
      expect(nodeTypeLabel('hypothesis')).toBe('HYPOTHESIS');
      expect(relationshipTypeName('supportive')).toBe('SUPPORTIVE');
      expect(buildNodeUpsertQuery(NodeType.ROOT)).toContain('SET n:ROOT');
    });

    test('rejects injected or malformed identifiers', () => {
      expect(() => relationshipTypeName('supportive]->() DETACH DELETE n //')).toThrow(CypherValidationError);
      expect(() => sanitizeCypherIdentifier('1abc')).toThrow(CypherValidationError);
      expect(() => sanitizeCypherIdentifier('a'.repeat(101))).toThrow('Identifier too long');
    });
  });
});
