// Setup environment variables before any tests run
process.env.VITEST = 'true';
process.env.NODE_ENV = 'test';
process.env.CHAT_PROVIDER = 'openai';
process.env.OPENAI_API_KEY = 'test-openai-key';
process.env.ANTHROPIC_API_KEY = 'test-anthropic-key';
process.env.LOG_LEVEL = 'silent';
delete process.env.ASSISTANT_API_KEY;
delete process.env.REQUEST_TIMEOUT_MS;
