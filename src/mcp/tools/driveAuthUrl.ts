/**
 * Tool: drive_auth_url
 *
 * Google sign-in URL for the drive.file scope. The code Google returns is
 * passed to upload_document.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { McpContext } from '../types.js';
import { runTool, sessionIdParam, textResult } from '../utils/toolResult.js';

export function register(server: McpServer, ctx: McpContext): void {
  server.tool(
    'drive_auth_url',
    'Get the Google sign-in URL that grants access to files this app creates in Drive.',
    { sessionId: sessionIdParam },
    async ({ sessionId }) =>
      runTool('drive_auth_url', () => {
        const session = ctx.registry.get('upload', sessionId);
        const url = ctx.pipeline.driveAuthUrl(session);
        return textResult([
          'Open this URL, approve access, then call upload_document with the returned code:',
          url,
        ]);
      })
  );
}
