/**
 * Tool: create_session
 *
 * Start a session from a local video file: copies it into a private temp
 * directory and probes it. The new session becomes the active one.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { McpContext } from '../types.js';
import { errorResult, runTool, sessionLine, textResult } from '../utils/toolResult.js';

export function register(server: McpServer, ctx: McpContext): void {
  server.tool(
    'create_session',
    'Start a new SOP session from a narrated screen recording (MP4, MOV, AVI, WebM or MKV). Copies and probes the video.',
    {
      videoPath: z.string().describe('Absolute path to the video file'),
    },
    async ({ videoPath }) =>
      runTool('create_session', async () => {
        const session = await ctx.registry.create();
        try {
          const video = await ctx.pipeline.ingest(session, videoPath);
          return textResult([
            sessionLine(session.snapshot()),
            `Video: ${video.originalName} (${video.durationSeconds.toFixed(1)}s, ${video.width}x${video.height}, ` +
              `${video.frameRate.toFixed(2)} fps, audio: ${video.hasAudio ? 'yes' : 'no'})`,
            `sessionId: ${session.id}`,
            'Next: extract_audio',
          ]);
        } catch (error) {
          await ctx.registry.finish(session.id);
          return errorResult(error);
        }
      })
  );
}
