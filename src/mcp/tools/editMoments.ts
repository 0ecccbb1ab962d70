/**
 * Tool: edit_moments
 *
 * Add, update or remove moments. Editing after confirmation returns the
 * session to moments-proposed and discards frames and documents.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { McpContext } from '../types.js';
import { formatMoments, runTool, sessionIdParam, sessionLine, textResult } from '../utils/toolResult.js';
import { MomentEditSchema } from '../../pipeline/MomentEditor.js';

export function register(server: McpServer, ctx: McpContext): void {
  server.tool(
    'edit_moments',
    'Edit the moment list. Each edit is {op:"add", timestamp, description, navigationPath?}, ' +
      '{op:"update", id, timestamp?, description?, navigationPath?} or {op:"remove", id}. Timestamps are seconds.',
    {
      sessionId: sessionIdParam,
      edits: z.array(MomentEditSchema).min(1).describe('Edits applied in order'),
    },
    async ({ sessionId, edits }) =>
      runTool('edit_moments', () => {
        const session = ctx.registry.get('review', sessionId);
        const moments = ctx.pipeline.editMoments(session, edits);
        return textResult([
          sessionLine(session.snapshot()),
          `Moments (${moments.length}):`,
          ...formatMoments(moments),
        ]);
      })
  );
}
