/**
 * Tool: finish_session
 *
 * Ends the session and deletes its temporary video, audio and frame files.
 * The exported document is kept.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { McpContext } from '../types.js';
import { runTool, sessionIdParam, textResult } from '../utils/toolResult.js';

export function register(server: McpServer, ctx: McpContext): void {
  server.tool(
    'finish_session',
    'End the session and delete its temporary files. Exported documents are kept.',
    { sessionId: sessionIdParam },
    async ({ sessionId }) =>
      runTool('finish_session', async () => {
        const session = ctx.registry.find(sessionId);
        const exported = session?.artifacts.exported?.path;
        const finished = await ctx.registry.finish(sessionId);
        return textResult([
          `Session ${finished.id} finished; temporary files removed.`,
          ...(exported ? [`Document kept at ${exported}`] : []),
        ]);
      })
  );
}
