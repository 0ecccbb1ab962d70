/**
 * Tool: export_document
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { resolve } from 'path';

import type { McpContext } from '../types.js';
import { runTool, sessionIdParam, sessionLine, textResult } from '../utils/toolResult.js';

export function register(server: McpServer, ctx: McpContext): void {
  server.tool(
    'export_document',
    'Write the SOP as a Word (.docx) file with the frames embedded.',
    {
      sessionId: sessionIdParam,
      outputDir: z.string().describe('Directory to write the .docx file to'),
      fileName: z.string().optional().describe('File name (default: <video>-sop-YYYYMMDD-HHMMSS.docx)'),
    },
    async ({ sessionId, outputDir, fileName }) =>
      runTool('export_document', async () => {
        const session = ctx.registry.get('export', sessionId);
        const written = await ctx.pipeline.exportDocument(session, { outputDir: resolve(outputDir), fileName });
        return textResult([
          sessionLine(session.snapshot()),
          `Document: ${written.stepCount} step(s), ${written.imageCount} image(s), ${written.sizeBytes} bytes`,
          `OUTPUT:${written.path}`,
          ctx.pipeline.driveEnabled
            ? 'Next: drive_auth_url and upload_document, or finish_session'
            : 'Next: finish_session',
        ]);
      })
  );
}
