/**
 * Shared context handed to every MCP tool and resource registration.
 */

import type { AppConfig } from '../config/config.js';
import type { SessionPipeline } from '../session/SessionPipeline.js';
import type { SessionRegistry } from './session/SessionRegistry.js';

export interface McpContext {
  config: AppConfig;
  pipeline: SessionPipeline;
  registry: SessionRegistry;
}
