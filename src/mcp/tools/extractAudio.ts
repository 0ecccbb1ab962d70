/**
 * Tool: extract_audio
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { McpContext } from '../types.js';
import { runTool, sessionIdParam, sessionLine, textResult } from '../utils/toolResult.js';

export function register(server: McpServer, ctx: McpContext): void {
  server.tool(
    'extract_audio',
    'Extract the narration track of the session video as 16 kHz mono audio.',
    { sessionId: sessionIdParam },
    async ({ sessionId }) =>
      runTool('extract_audio', async () => {
        const session = ctx.registry.get('audio', sessionId);
        const audio = await ctx.pipeline.extractAudio(session);
        return textResult([
          sessionLine(session.snapshot()),
          `Audio: ${audio.durationSeconds.toFixed(1)}s at ${audio.sampleRate} Hz`,
          'Next: transcribe',
        ]);
      })
  );
}
