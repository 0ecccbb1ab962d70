/**
 * Tool: generate_document
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { McpContext } from '../types.js';
import { runTool, sessionIdParam, sessionLine, textResult } from '../utils/toolResult.js';

export function register(server: McpServer, ctx: McpContext): void {
  server.tool(
    'generate_document',
    'Write the SOP narrative from the transcript, confirmed moments and frames.',
    {
      sessionId: sessionIdParam,
      title: z.string().optional().describe('Document title (default: chosen by the model)'),
    },
    async ({ sessionId, title }) =>
      runTool('generate_document', async () => {
        const session = ctx.registry.get('generation', sessionId);
        const document = await ctx.pipeline.generateDocument(session, { title });
        const steps = document.sections.filter((s) => s.kind === 'step').length;
        return textResult([
          sessionLine(session.snapshot()),
          `Document: ${document.sections.length} section(s), ${steps} step(s)` +
            (document.degraded ? ' (skeleton: narrative unavailable)' : ''),
          ...document.warnings.map((w) => `Warning: ${w}`),
          'Next: export_document',
        ]);
      })
  );
}
