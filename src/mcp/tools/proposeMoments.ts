/**
 * Tool: propose_moments
 *
 * Ask the model for key moments. An unreadable reply leaves an empty list
 * with a warning; the reviewer adds moments with edit_moments.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { McpContext } from '../types.js';
import { formatMoments, runTool, sessionIdParam, sessionLine, textResult } from '../utils/toolResult.js';

export function register(server: McpServer, ctx: McpContext): void {
  server.tool(
    'propose_moments',
    'Propose the key moments of the procedure from the transcript, for review before frames are extracted.',
    { sessionId: sessionIdParam },
    async ({ sessionId }) =>
      runTool('propose_moments', async () => {
        const session = ctx.registry.get('moments', sessionId);
        const { moments, warnings } = await ctx.pipeline.proposeMoments(session);
        return textResult([
          sessionLine(session.snapshot()),
          `Proposed moments (${moments.length}):`,
          ...formatMoments(moments),
          ...warnings.map((w) => `Warning: ${w}`),
          'Next: review with edit_moments, then confirm_moments',
        ]);
      })
  );
}
