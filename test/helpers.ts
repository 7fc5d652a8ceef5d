// Shared fixtures for the test suites.

import Fastify, { type FastifyBaseLogger } from 'fastify';
import { loadConfig, type AppConfig } from '../src/config/config.js';

// This helper returns a logger that discards every record.
export function silentLogger(): FastifyBaseLogger {
  return Fastify({ logger: false }).log;
}

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    LOG_LEVEL: 'silent',
    ...overrides
  });
}
