process.env.NODE_ENV = 'test';
process.env.APP_LOG_LEVEL = 'error';
process.env.GRAPH_STORE_BACKEND = 'memory';
delete process.env.APP_AUTH_TOKEN;
