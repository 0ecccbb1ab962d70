/**
 * Tool: upload_document
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { McpContext } from '../types.js';
import { runTool, sessionIdParam, sessionLine, textResult } from '../utils/toolResult.js';

export function register(server: McpServer, ctx: McpContext): void {
  server.tool(
    'upload_document',
    'Upload the exported .docx to Google Drive.',
    {
      sessionId: sessionIdParam,
      authCode: z
        .string()
        .optional()
        .describe('Authorization code from the drive_auth_url sign-in (needed once per session)'),
      folderId: z.string().optional().describe('Drive folder id (default: My Drive root)'),
    },
    async ({ sessionId, authCode, folderId }) =>
      runTool('upload_document', async () => {
        const session = ctx.registry.get('upload', sessionId);
        if (authCode) {
          await ctx.pipeline.authenticateDrive(session, authCode);
        }
        const file = await ctx.pipeline.upload(session, { folderId });
        return textResult([
          sessionLine(session.snapshot()),
          `Uploaded ${file.name} (id ${file.id})`,
          ...(file.webViewLink ? [`Link: ${file.webViewLink}`] : []),
        ]);
      })
  );
}
