import { beforeEach, describe, expect, jest, test } from '@jest/globals';
import request from 'supertest';
import { createApp } from '../src/app';
import { QueryProcessor } from '../src/api/routes/mcpRoutes';
import { InMemoryGraphRepository } from '../src/infrastructure/inMemoryGraphRepository';
import { GoTProcessorSessionData } from '../src/domain/models/commonTypes';
import { ProcessQueryOptions } from '../src/application/gotProcessor';
import { makeSettings } from './helpers';

const sessionFor = (query: string, options: ProcessQueryOptions = {}): GoTProcessorSessionData => ({
  session_id: options.sessionId ?? 'session-generated',
  query,
  final_answer: 'Sleep consolidates memories.',
  final_confidence_vector: [0.7, 0.6, 0.5, 0.4],
  accumulated_context: {},
  stage_outputs_trace: [
    { stage_number: 1, stage_name: 'Initialization', duration_ms: 3, summary: "New ROOT node 'n1' created." },
  ],
  graph_state: { nodes: [], edges: [], hyperedges: [], metadata: {} },
});

const rpc = (method: string, params?: unknown, id: string | number = 1) => ({ jsonrpc: '2.0', method, params, id });

describe('MCP JSON-RPC endpoint', () => {
  let processQuery: jest.Mock<QueryProcessor['processQuery']>;

  const appWith = (overrides: Parameters<typeof makeSettings>[0] = {}, withProcessor = true) =>
    createApp({
      processor: withProcessor ? { processQuery } : undefined,
      repository: new InMemoryGraphRepository(),
      settings: makeSettings(overrides),
    });

  beforeEach(() => {
    processQuery = jest.fn<QueryProcessor['processQuery']>(async (query, options) => sessionFor(query, options));
  });

  test('initialize reports the server identity', async () => {
    const response = await request(appWith()).post('/mcp').send(rpc('initialize', { client_info: { client_name: 'cli' } }));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: { server_name: 'NexusMind MCP Server', server_version: '0.1.0', mcp_version: '2024-11-05' },
    });
  });

  test('asr_got.query runs the processor and shapes the result', async () => {
    const response = await request(appWith())
      .post('/mcp')
      .send(rpc('asr_got.query', { query: '  How does sleep affect memory?  ', session_id: 'client-session' }, 'q-1'));

    expect(response.status).toBe(200);
    expect(response.body.id).toBe('q-1');
    expect(response.body.result).toMatchObject({
      answer: 'Sleep consolidates memories.',
      reasoning_trace_summary: "Stage 1. Initialization: New ROOT node 'n1' created. (3ms)",
      confidence_vector: [0.7, 0.6, 0.5, 0.4],
      session_id: 'client-session',
      graph_state_full: { nodes: [], edges: [], hyperedges: [], metadata: {} },
    });
    expect(typeof response.body.result.execution_time_ms).toBe('number');

    expect(processQuery).toHaveBeenCalledWith('How does sleep affect memory?', {
      sessionId: 'client-session',
      operationalParams: {
        include_reasoning_trace: true,
        include_graph_state: true,
        max_nodes_in_response_graph: 50,
        output_detail_level: 'summary',
      },
      initialContext: {},
    });
  });

  test('asr_got.query honours the trace and graph-state switches', async () => {
    const response = await request(appWith())
      .post('/mcp')
      .send(
        rpc('asr_got.query', {
          query: 'Why is the sky blue?',
          parameters: { include_reasoning_trace: false, include_graph_state: false },
        })
      );

    expect(response.body.result.reasoning_trace_summary).toBe('Reasoning trace not requested or not available.');
    expect(response.body.result).not.toHaveProperty('graph_state_full');
  });

  test('rejects an empty query with invalid params', async () => {
    const response = await request(appWith()).post('/mcp').send(rpc('asr_got.query', { query: '   ' }));

    expect(response.body).toEqual({
      jsonrpc: '2.0',
      id: 1,
      error: {
        code: -32602,
        message: 'Invalid parameters.',
        data: { details: 'query: query must be a non-empty string', method: 'asr_got.query' },
      },
    });
    expect(processQuery).not.toHaveBeenCalled();
  });

  test('wraps processor failures in a processing error', async () => {
    processQuery.mockRejectedValueOnce(new Error('graph store offline'));
    const response = await request(appWith()).post('/mcp').send(rpc('asr_got.query', { query: 'Why?' }));

    expect(response.body.error).toEqual({
      code: -32000,
      message: 'Error processing ASR-GoT query.',
      data: { details: 'graph store offline', method: 'asr_got.query' },
    });
  });

  test('reports an internal error when the result cannot be built', async () => {
    const broken = sessionFor('Why?');
    Object.defineProperty(broken, 'stage_outputs_trace', {
      get: () => {
        throw new Error('trace unavailable');
      },
    });
    processQuery.mockResolvedValueOnce(broken);
    const response = await request(appWith()).post('/mcp').send(rpc('asr_got.query', { query: 'Why?' }, 5));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      jsonrpc: '2.0',
      id: 5,
      error: {
        code: -32603,
        message: "Internal error processing request for method 'asr_got.query'.",
        data: { details: 'trace unavailable', method: 'asr_got.query' },
      },
    });
  });

  test('reports a missing processor', async () => {
    const response = await request(appWith({}, false)).post('/mcp').send(rpc('asr_got.query', { query: 'Why?' }));

    expect(response.body.error).toEqual({ code: -32002, message: 'NexusMind Core Processor is not available.' });
  });

  test('answers shutdown with a null result', async () => {
    const response = await request(appWith()).post('/mcp').send(rpc('shutdown', undefined, 9));

    expect(response.body).toEqual({ jsonrpc: '2.0', id: 9, result: null });
  });

  test('notifications still get a response with a null id', async () => {
    const response = await request(appWith()).post('/mcp').send({ jsonrpc: '2.0', method: 'shutdown' });

    expect(response.body).toEqual({ jsonrpc: '2.0', id: null, result: null });
  });

  test('unknown methods are not found', async () => {
    const response = await request(appWith()).post('/mcp').send(rpc('tools/list', {}, 4));

    expect(response.body).toEqual({
      jsonrpc: '2.0',
      id: 4,
      error: { code: -32601, message: "Method 'tools/list' not found." },
    });
  });

  test('malformed envelopes are invalid requests', async () => {
    const response = await request(appWith()).post('/mcp').send({ jsonrpc: '1.0', method: 'initialize', id: 7 });

    expect(response.status).toBe(200);
    expect(response.body.id).toBe(7);
    expect(response.body.error.code).toBe(-32600);
    expect(response.body.error.message).toBe('Invalid Request.');
  });

  test('unparseable JSON yields a parse error', async () => {
    const response = await request(appWith())
      .post('/mcp')
      .set('Content-Type', 'application/json')
      .send('{"jsonrpc": "2.0", ');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error.' } });
  });

  describe('with a configured token', () => {
    const secured = () => appWith({ app: { auth_token: 'test-secret' } });

    test('rejects requests without the bearer token', async () => {
      const response = await request(secured()).post('/mcp').send(rpc('initialize', {}, 3));

      expect(response.status).toBe(401);
      expect(response.headers['www-authenticate']).toBe('Bearer realm="nexusmind"');
      expect(response.body).toEqual({ jsonrpc: '2.0', id: 3, error: { code: -32001, message: 'Unauthorized.' } });
    });

    test('rejects a wrong token', async () => {
      const response = await request(secured())
        .post('/mcp')
        .set('Authorization', 'Bearer not-the-secret')
        .send(rpc('initialize'));

      expect(response.status).toBe(401);
    });

    test('accepts the bearer token', async () => {
      const response = await request(secured())
        .post('/mcp')
        .set('Authorization', 'Bearer test-secret')
        .send(rpc('initialize'));

      expect(response.status).toBe(200);
      expect(response.body.result.server_name).toBe('NexusMind MCP Server');
    });
  });

  test('rate limits each client', async () => {
    const app = appWith({ app: { rate_limit: { max_requests: 2, per_seconds: 60 } } });

    const first = await request(app).post('/mcp').send(rpc('initialize'));
    await request(app).post('/mcp').send(rpc('initialize'));
    const third = await request(app).post('/mcp').send(rpc('initialize'));

    expect(first.headers['x-ratelimit-limit']).toBe('2');
    expect(first.headers['x-ratelimit-remaining']).toBe('1');
    expect(third.status).toBe(429);
    expect(third.headers['x-ratelimit-remaining']).toBe('0');
    expect(Number(third.headers['retry-after'])).toBeGreaterThanOrEqual(1);
    expect(third.body).toEqual({
      jsonrpc: '2.0',
      id: 1,
      error: { code: -32003, message: 'Too many requests.', data: { retry_after: Number(third.headers['retry-after']) } },
    });
  });
});
