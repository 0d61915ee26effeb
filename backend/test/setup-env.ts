/**
 * WHY:
 * - The logger reads LOG_LEVEL at import time; tests keep it quiet unless overridden.
 * - Tests never talk to real Postgres/Redis; these values only satisfy config parsing.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
process.env.SERVICE_NAME = process.env.SERVICE_NAME ?? 'squadlink-backend';
