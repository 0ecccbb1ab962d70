/**
 * Session Resources: MCP resource registration for session state.
 *
 * Registers:
 *   session://active   snapshot of the active session
 *   session://{id}     snapshot of a specific session by ID
 *
 * Both return application/json content with SessionSnapshot fields.
 */

import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { McpContext } from '../types.js';

function jsonContent(uri: string, value: unknown) {
  return {
    contents: [
      {
        uri,
        mimeType: 'application/json',
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

export function registerResources(server: McpServer, ctx: McpContext): void {
  server.resource(
    'active-session',
    'session://active',
    { description: 'State and artifacts of the active SOP session', mimeType: 'application/json' },
    async () => {
      const session = ctx.registry.find();
      return jsonContent('session://active', session ? session.snapshot() : { error: 'No active session' });
    }
  );

  server.resource(
    'session-by-id',
    new ResourceTemplate('session://{id}', {
      list: async () => ({
        resources: ctx.registry.list().map((session) => ({
          uri: `session://${session.id}`,
          name: `SOP session ${session.id}`,
          mimeType: 'application/json',
        })),
      }),
    }),
    { description: 'State and artifacts of a specific SOP session', mimeType: 'application/json' },
    async (uri, variables) => {
      const raw = variables.id;
      const id = Array.isArray(raw) ? raw[0] : raw;
      const session = id ? ctx.registry.find(id) : undefined;
      return jsonContent(uri.href, session ? session.snapshot() : { error: `Session not found: ${id}` });
    }
  );
}
