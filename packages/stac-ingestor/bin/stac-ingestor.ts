#!/usr/bin/env tsx
/**
 * STAC Ingestor CLI Entry Point
 *
 * Log level is settled before any module creates its logger.
 *
 * @module stac-ingestor-cli
 */

if (process.argv.includes('--verbose') || process.argv.includes('-v')) {
  process.env.LOG_LEVEL = 'debug';
} else if (process.env.LOG_LEVEL === undefined) {
  process.env.LOG_LEVEL = 'warn';
}

const { main } = await import('../src/cli/index.js');

process.exitCode = await main(process.argv);

export {};
