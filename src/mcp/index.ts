#!/usr/bin/env node
/**
 * procdoc MCP Server - Entry Point
 *
 * Headless Node.js process communicating over stdio using JSON-RPC 2.0.
 * stdout is reserved for the MCP protocol; all logging goes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfigFromEnvironment } from '../config/config.js';
import { FfmpegToolkit } from '../media/MediaToolkit.js';
import { SessionPipeline } from '../session/SessionPipeline.js';
import { describeError } from '../shared/errors.js';
import { configureLogging, createLogger } from '../utils/Logger.js';
import { VERSION } from '../version.js';
import { createServer } from './server.js';
import { SessionRegistry } from './session/SessionRegistry.js';

const config = loadConfigFromEnvironment();
configureLogging({ level: config.logging.level, file: config.logging.file, stderr: true, prefix: 'procdoc-mcp' });
const log = createLogger('mcp');

log.info(`procdoc MCP server v${VERSION} starting...`);

const toolkit = new FfmpegToolkit();
const registry = new SessionRegistry(config.workDir);
const pipeline = new SessionPipeline(config, { toolkit });

async function shutdown(code: number): Promise<never> {
  toolkit.killAll();
  await registry.closeAll();
  process.exit(code);
}

process.on('uncaughtException', (error) => {
  log.error(`Uncaught exception: ${describeError(error)}`);
  void shutdown(1);
});

process.on('unhandledRejection', (reason) => {
  log.error(`Unhandled rejection: ${describeError(reason)}`);
  void shutdown(1);
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    log.info(`${signal} received, closing sessions`);
    void shutdown(0);
  });
}

try {
  const server = createServer({ config, pipeline, registry });
  const transport = new StdioServerTransport();
  await server.connect(transport);
} catch (error) {
  log.error(`Failed to start MCP server: ${describeError(error)}`);
  await shutdown(1);
}
