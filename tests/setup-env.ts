// Loaded before every test file so src/config.ts validates against test values
process.env.NODE_ENV = 'test';
process.env.API_SECRET_KEY = 'test-secret-key-1234';
process.env.DATABASE_URL = 'postgres://localhost:5432/test';
process.env.LOG_LEVEL = 'silent';
delete process.env.REDIS_URL;
delete process.env.ANTHROPIC_API_KEY;
