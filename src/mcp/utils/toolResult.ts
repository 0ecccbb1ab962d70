/**
 * Helpers for shaping MCP tool results.
 *
 * Tools never throw to the transport: pipeline errors become isError
 * results naming the failed stage and the remediation.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { PipelineError, describeError } from '../../shared/errors.js';
import type { SessionSnapshot } from '../../session/Session.js';
import type { Moment } from '../../shared/types.js';
import { formatTimestamp } from '../../shared/time.js';
import { createLogger } from '../../utils/Logger.js';

const log = createLogger('mcp');

export function textResult(lines: string[]): CallToolResult {
  return { content: [{ type: 'text', text: lines.join('\n') }] };
}

export function errorResult(error: unknown): CallToolResult {
  const text = error instanceof PipelineError ? error.toUserMessage() : `Error: ${describeError(error)}`;
  return { content: [{ type: 'text', text }], isError: true };
}

/**
 * Run a tool body, converting any thrown error into an error result.
 */
export async function runTool(
  name: string,
  body: () => Promise<CallToolResult> | CallToolResult
): Promise<CallToolResult> {
  try {
    return await body();
  } catch (error) {
    log.warn(`${name} failed: ${describeError(error)}`);
    return errorResult(error);
  }
}

/**
 * One-line summary of where a session stands.
 */
export function sessionLine(snapshot: Pick<SessionSnapshot, 'id' | 'state' | 'progress'>): string {
  const detail = snapshot.state === 'error' ? ` (last completed: ${snapshot.progress})` : '';
  return `Session ${snapshot.id}: ${snapshot.state}${detail}`;
}

/** Optional session id accepted by every stage tool */
export const sessionIdParam = z
  .string()
  .optional()
  .describe('Session id returned by create_session (default: the active session)');

export function formatMoments(moments: Moment[]): string[] {
  if (moments.length === 0) return ['  (no moments)'];
  return moments.map((m) => {
    const nav = m.navigationPath ? ` (${m.navigationPath})` : '';
    const edited = m.userEdited ? ' [edited]' : '';
    return `  ${m.id} [${formatTimestamp(m.timestamp)}] ${m.description}${nav}${edited}`;
  });
}
