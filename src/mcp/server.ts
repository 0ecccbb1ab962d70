/**
 * MCP Server Factory
 *
 * Creates the procdoc MCP server with every stage tool and the session
 * resources registered. One tool per pipeline stage lets a person review
 * the proposed moments before frames are extracted.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { VERSION } from '../version.js';
import type { McpContext } from './types.js';

// Tool registrations
import { register as registerCreateSession } from './tools/createSession.js';
import { register as registerExtractAudio } from './tools/extractAudio.js';
import { register as registerTranscribe } from './tools/transcribe.js';
import { register as registerProposeMoments } from './tools/proposeMoments.js';
import { register as registerEditMoments } from './tools/editMoments.js';
import { register as registerConfirmMoments } from './tools/confirmMoments.js';
import { register as registerExtractFrames } from './tools/extractFrames.js';
import { register as registerGenerateDocument } from './tools/generateDocument.js';
import { register as registerExportDocument } from './tools/exportDocument.js';
import { register as registerDriveAuthUrl } from './tools/driveAuthUrl.js';
import { register as registerUploadDocument } from './tools/uploadDocument.js';
import { register as registerFinishSession } from './tools/finishSession.js';

// Resource registrations
import { registerResources } from './resources/sessionResource.js';

export function createServer(ctx: McpContext): McpServer {
  const server = new McpServer({
    name: 'procdoc',
    version: VERSION,
  });

  registerCreateSession(server, ctx);
  registerExtractAudio(server, ctx);
  registerTranscribe(server, ctx);
  registerProposeMoments(server, ctx);
  registerEditMoments(server, ctx);
  registerConfirmMoments(server, ctx);
  registerExtractFrames(server, ctx);
  registerGenerateDocument(server, ctx);
  registerExportDocument(server, ctx);
  registerDriveAuthUrl(server, ctx);
  registerUploadDocument(server, ctx);
  registerFinishSession(server, ctx);

  // session://active, session://{id}
  registerResources(server, ctx);

  return server;
}
