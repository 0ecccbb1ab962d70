/**
 * MomentAnalyzer.ts - LLM key-moment detection
 *
 * Sends the timestamped transcript to the language model and decodes its
 * reply into Moments: the points in the recording where the narrator
 * performs or describes an action worth a screenshot.
 *
 * A reply that cannot be decoded never fails the session. The analyzer
 * returns an empty list with a warning, and the user adds moments by hand.
 */

import { z } from 'zod';

import type { LlmClient } from '../ai/AnthropicClient.js';
import { extractJson } from '../ai/jsonResponse.js';
import type { Moment, TranscriptSegment } from '../shared/types.js';
import { MomentParseError, PipelineError, describeError } from '../shared/errors.js';
import { err, ok, type Result } from '../shared/result.js';
import { createId, type IdFactory } from '../shared/ids.js';
import { formatTimestamp, parseTimestamp } from '../shared/time.js';
import { createLogger } from '../utils/Logger.js';

const log = createLogger('MomentAnalyzer');

// ============================================================================
// Constants
// ============================================================================

/** Moments closer than this to the previous kept moment are merged into it */
export const MOMENT_MERGE_EPSILON_SECONDS = 1.0;

const SYSTEM_PROMPT = `You are a technical writer who turns narrated screen recordings into \
standard operating procedures.

You receive a transcript where every line starts with [MM:SS], the time the narrator said it. \
Identify the key moments: each point where the narrator performs a distinct action on screen \
(opens a menu, clicks a button, fills a field, reviews a result) that a reader would need a \
screenshot of to repeat the procedure.

Rules:
- Use the timestamp of the line where the action happens, in seconds from the start.
- Describe each moment as one short imperative sentence ("Open the Reports menu").
- When the narrator names where in the application the action happens, add it as \
navigation_path ("Finance > Reports > Monthly close").
- Skip greetings, filler and commentary that has no visible action.

Respond with JSON only, no markdown:
{"moments": [{"timestamp": 12.5, "description": "...", "navigation_path": "..."}]}`;

// ============================================================================
// Types
// ============================================================================

export interface MomentAnalysis {
  moments: Moment[];
  warnings: string[];
}

export interface MomentAnalyzerOptions {
  idFactory?: IdFactory;
  maxTokens?: number;
  timeoutMs?: number;
}

export interface AnalyzeRequest {
  segments: TranscriptSegment[];
  signal?: AbortSignal;
}

// ============================================================================
// Decoding
// ============================================================================

const RawMomentSchema = z.object({
  timestamp: z.union([z.number(), z.string()]),
  description: z.string().trim().min(1),
  navigation_path: z.string().nullish(),
  navigationPath: z.string().nullish(),
});

const RawMomentListSchema = z.union([
  z.array(z.unknown()),
  z.object({ moments: z.array(z.unknown()) }).transform((value) => value.moments),
]);

function toSeconds(value: number | string): number | null {
  const seconds = typeof value === 'number' ? value : parseTimestamp(value);
  return seconds !== null && Number.isFinite(seconds) ? seconds : null;
}

/**
 * Decode a model reply into moments.
 *
 * Individual entries that are malformed are skipped with a warning; the
 * reply as a whole fails when it is not JSON, is not a list of moments, or
 * contains entries but none usable.
 */
export function decodeMoments(
  raw: string,
  idFactory: IdFactory = createId
): Result<MomentAnalysis, MomentParseError> {
  const json = extractJson(raw);
  if (!json.ok) {
    return err(new MomentParseError(json.error.message, { cause: json.error }));
  }

  const list = RawMomentListSchema.safeParse(json.value);
  if (!list.success) {
    return err(new MomentParseError('Response is not a list of moments'));
  }

  const warnings: string[] = [];
  const moments: Moment[] = [];

  list.data.forEach((entry, index) => {
    const parsed = RawMomentSchema.safeParse(entry);
    if (!parsed.success) {
      warnings.push(`Skipped moment ${index + 1}: missing timestamp or description`);
      return;
    }

    const seconds = toSeconds(parsed.data.timestamp);
    if (seconds === null) {
      warnings.push(`Skipped moment ${index + 1}: unreadable timestamp "${parsed.data.timestamp}"`);
      return;
    }

    if (seconds < 0) {
      warnings.push(`Moment ${index + 1} had a negative timestamp and was moved to 00:00`);
    }

    const navigationPath = (parsed.data.navigation_path ?? parsed.data.navigationPath ?? '').trim();
    moments.push({
      id: idFactory('moment'),
      timestamp: Math.max(0, seconds),
      description: parsed.data.description,
      navigationPath: navigationPath || undefined,
      userEdited: false,
    });
  });

  if (list.data.length > 0 && moments.length === 0) {
    return err(new MomentParseError('No usable moments in response', { details: { warnings } }));
  }

  const merged = mergeNearbyMoments(moments);
  return ok({ moments: merged.moments, warnings: [...warnings, ...merged.warnings] });
}

/**
 * Sort by timestamp and fold each moment that falls within
 * MOMENT_MERGE_EPSILON_SECONDS of the previous kept moment into it. The kept
 * moment keeps its timestamp; distinct descriptions are joined.
 */
export function mergeNearbyMoments(moments: Moment[]): MomentAnalysis {
  const sorted = [...moments].sort((a, b) => a.timestamp - b.timestamp);
  const result: Moment[] = [];
  const warnings: string[] = [];

  for (const current of sorted) {
    const previous = result[result.length - 1];
    if (previous && current.timestamp - previous.timestamp < MOMENT_MERGE_EPSILON_SECONDS) {
      const description =
        previous.description === current.description
          ? previous.description
          : `${previous.description}; ${current.description}`;
      result[result.length - 1] = {
        ...previous,
        description,
        navigationPath: previous.navigationPath ?? current.navigationPath,
      };
      warnings.push(
        `Merged moment at ${formatTimestamp(current.timestamp)} into the moment at ` +
          `${formatTimestamp(previous.timestamp)}`
      );
    } else {
      result.push(current);
    }
  }

  return { moments: result, warnings };
}

/**
 * Render segments as "[MM:SS] text" lines.
 */
export function formatTranscript(segments: TranscriptSegment[]): string {
  return segments.map((s) => `[${formatTimestamp(s.startTime)}] ${s.text}`).join('\n');
}

// ============================================================================
// MomentAnalyzer Class
// ============================================================================

export class MomentAnalyzer {
  private idFactory: IdFactory;
  private maxTokens?: number;
  private timeoutMs?: number;

  constructor(
    private llm: LlmClient,
    options: MomentAnalyzerOptions = {}
  ) {
    this.idFactory = options.idFactory ?? createId;
    this.maxTokens = options.maxTokens;
    this.timeoutMs = options.timeoutMs;
  }

  async analyze(request: AnalyzeRequest): Promise<MomentAnalysis> {
    const { segments, signal } = request;

    if (segments.length === 0) {
      log.warn('Transcript is empty, no moments proposed');
      return { moments: [], warnings: ['The transcript is empty; add moments manually.'] };
    }

    let reply: string;
    try {
      reply = await this.llm.complete({
        purpose: 'moment-analysis',
        system: SYSTEM_PROMPT,
        content: [{ type: 'text', text: `Transcript:\n${formatTranscript(segments)}` }],
        maxTokens: this.maxTokens,
        timeoutMs: this.timeoutMs,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new PipelineError(
        `Moment analysis request failed: ${describeError(error)}`,
        'MOMENT_ANALYSIS_FAILED',
        'moments',
        'Check your network connection and ANTHROPIC_API_KEY, then retry moment analysis.',
        { cause: error }
      );
    }

    const decoded = decodeMoments(reply, this.idFactory);
    if (!decoded.ok) {
      log.warn(`Could not decode moments: ${decoded.error.message}`);
      return {
        moments: [],
        warnings: [
          `The model's reply could not be read as moments (${decoded.error.message}); add moments manually.`,
        ],
      };
    }

    for (const warning of decoded.value.warnings) {
      log.warn(warning);
    }
    log.info(`Proposed ${decoded.value.moments.length} moment(s)`);
    return decoded.value;
  }
}
