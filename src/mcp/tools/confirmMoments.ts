/**
 * Tool: confirm_moments
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { McpContext } from '../types.js';
import { formatMoments, runTool, sessionIdParam, sessionLine, textResult } from '../utils/toolResult.js';

export function register(server: McpServer, ctx: McpContext): void {
  server.tool(
    'confirm_moments',
    'Confirm the reviewed moment list. Frames are extracted only for confirmed moments.',
    { sessionId: sessionIdParam },
    async ({ sessionId }) =>
      runTool('confirm_moments', () => {
        const session = ctx.registry.get('review', sessionId);
        const confirmed = ctx.pipeline.confirmMoments(session);
        return textResult([
          sessionLine(session.snapshot()),
          `Confirmed moments (${confirmed.length}):`,
          ...formatMoments(confirmed),
          'Next: extract_frames',
        ]);
      })
  );
}
