/**
 * Vitest global test setup
 */

// Set test environment variables before any logger or config is created
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
delete process.env.SCHEMASMITH_CONFIG;
delete process.env.SCHEMASMITH_OUTPUT_DIR;
