/**
 * Tool: extract_frames
 *
 * One frame per confirmed moment. Out-of-range timestamps are clamped and
 * reported as approximate; a failed frame does not fail the others.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { McpContext } from '../types.js';
import { runTool, sessionIdParam, sessionLine, textResult } from '../utils/toolResult.js';
import { formatTimestamp } from '../../shared/time.js';

export function register(server: McpServer, ctx: McpContext): void {
  server.tool(
    'extract_frames',
    'Extract a still frame at each confirmed moment.',
    { sessionId: sessionIdParam },
    async ({ sessionId }) =>
      runTool('extract_frames', async () => {
        const session = ctx.registry.get('frames', sessionId);
        const outcomes = await ctx.pipeline.extractFrames(session);
        const lines = outcomes.map((outcome) => {
          if (!outcome.result.ok) {
            return `  ${outcome.momentId}: failed (${outcome.result.error.message})`;
          }
          const frame = outcome.result.value;
          const approx = frame.approximate
            ? ` approximate, requested ${formatTimestamp(frame.requestedTimestamp)}`
            : '';
          return `  ${outcome.momentId}: ${frame.id} at ${formatTimestamp(frame.timestamp)}${approx} -> ${frame.path}`;
        });
        const extracted = outcomes.filter((o) => o.result.ok).length;
        return textResult([
          sessionLine(session.snapshot()),
          `Frames: ${extracted}/${outcomes.length} extracted`,
          ...lines,
          'Next: generate_document',
        ]);
      })
  );
}
