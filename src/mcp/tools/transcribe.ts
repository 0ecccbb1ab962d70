/**
 * Tool: transcribe
 *
 * Send the extracted audio to the speech-to-text service and return the
 * timestamped transcript.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { McpContext } from '../types.js';
import { runTool, sessionIdParam, sessionLine, textResult } from '../utils/toolResult.js';
import { formatTranscript } from '../../pipeline/MomentAnalyzer.js';

export function register(server: McpServer, ctx: McpContext): void {
  server.tool(
    'transcribe',
    'Transcribe the session audio. Returns timestamped transcript lines.',
    {
      sessionId: sessionIdParam,
      language: z.string().optional().describe('Language hint such as "en" or "de" (default: auto-detect)'),
    },
    async ({ sessionId, language }) =>
      runTool('transcribe', async () => {
        const session = ctx.registry.get('transcription', sessionId);
        const segments = await ctx.pipeline.transcribe(session, { language });
        return textResult([
          sessionLine(session.snapshot()),
          `Transcript: ${segments.length} segment(s)`,
          formatTranscript(segments) || '(no speech detected)',
          'Next: propose_moments',
        ]);
      })
  );
}
