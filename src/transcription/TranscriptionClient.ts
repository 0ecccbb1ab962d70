/**
 * TranscriptionClient - Batch transcription via the Deepgram prerecorded API
 *
 * Sends the extracted WAV file to Deepgram with utterance detection enabled
 * and returns ordered TranscriptSegments. Transient failures (network,
 * rate limit, 5xx, per-attempt timeout) are retried by a RetryPolicy; auth
 * failures and malformed responses fail immediately with TranscriptionError.
 */

import { readFile } from 'fs/promises';
import { createClient } from '@deepgram/sdk';
import { z } from 'zod';

import type { AudioHandle, TranscriptSegment } from '../shared/types.js';
import { TranscriptionError, describeError } from '../shared/errors.js';
import { RetryPolicy } from '../utils/RetryPolicy.js';
import { attemptSignal, raceAbort } from '../utils/abort.js';
import { createLogger } from '../utils/Logger.js';

const log = createLogger('TranscriptionClient');

// ============================================================================
// Types
// ============================================================================

export interface SpeechToTextOptions {
  model: string;
  language?: string;
}

/**
 * Minimal speech-to-text contract: raw provider JSON for an audio buffer.
 */
export interface SpeechToText {
  transcribe(audio: Buffer, options: SpeechToTextOptions): Promise<unknown>;
}

export interface TranscriptionClientOptions {
  model: string;
  language?: string;
  /** Per-attempt timeout; 0 disables */
  timeoutMs: number;
}

export interface TranscribeRequest {
  audio: AudioHandle;
  language?: string;
  signal?: AbortSignal;
}

// ============================================================================
// Deepgram provider
// ============================================================================

/**
 * Error carrying the HTTP status Deepgram reported, so the retry policy can
 * classify it.
 */
export class SpeechToTextApiError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'SpeechToTextApiError';
    this.status = status;
  }
}

export class DeepgramSpeechToText implements SpeechToText {
  private client: ReturnType<typeof createClient>;

  constructor(apiKey: string) {
    this.client = createClient(apiKey);
  }

  async transcribe(audio: Buffer, options: SpeechToTextOptions): Promise<unknown> {
    const { result, error } = await this.client.listen.prerecorded.transcribeFile(audio, {
      model: options.model,
      language: options.language,
      detect_language: options.language ? undefined : true,
      smart_format: true,
      punctuate: true,
      utterances: true,
    });

    if (error) {
      const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
      throw new SpeechToTextApiError(`Deepgram request failed: ${error.message}`, status);
    }

    return result;
  }
}

// ============================================================================
// Response parsing
// ============================================================================

const PrerecordedSchema = z.object({
  results: z.object({
    utterances: z
      .array(
        z.object({
          transcript: z.string().default(''),
          start: z.number(),
          end: z.number(),
          confidence: z.number().default(0),
        })
      )
      .optional(),
    channels: z
      .array(
        z.object({
          alternatives: z
            .array(
              z.object({
                transcript: z.string().default(''),
                confidence: z.number().default(0),
                words: z
                  .array(z.object({ start: z.number(), end: z.number() }))
                  .default([]),
              })
            )
            .default([]),
        })
      )
      .default([]),
  }),
});

/**
 * Convert a prerecorded response into ordered, well-formed segments.
 * Prefers utterances; falls back to the first channel's best alternative.
 */
export function parseTranscriptResponse(raw: unknown): TranscriptSegment[] {
  const parsed = PrerecordedSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TranscriptionError(
      `Malformed transcription response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`
    );
  }

  const { utterances, channels } = parsed.data.results;
  let segments: TranscriptSegment[];

  if (utterances && utterances.length > 0) {
    segments = utterances.map((u) => ({
      text: u.transcript.trim(),
      startTime: u.start,
      endTime: u.end,
      confidence: u.confidence,
    }));
  } else {
    const best = channels[0]?.alternatives[0];
    if (!best || best.transcript.trim().length === 0) {
      return [];
    }
    const first = best.words[0];
    const last = best.words[best.words.length - 1];
    segments = [
      {
        text: best.transcript.trim(),
        startTime: first?.start ?? 0,
        endTime: last?.end ?? first?.start ?? 0,
        confidence: best.confidence,
      },
    ];
  }

  return normalizeSegments(segments);
}

/**
 * Drop empty segments, clamp negative times, force startTime <= endTime and
 * sort by start time.
 */
export function normalizeSegments(segments: TranscriptSegment[]): TranscriptSegment[] {
  return segments
    .filter((s) => s.text.trim().length > 0 && Number.isFinite(s.startTime) && Number.isFinite(s.endTime))
    .map((s) => {
      const startTime = Math.max(0, s.startTime);
      return {
        text: s.text.trim(),
        startTime,
        endTime: Math.max(startTime, s.endTime),
        confidence: s.confidence,
      };
    })
    .sort((a, b) => a.startTime - b.startTime);
}

// ============================================================================
// TranscriptionClient Class
// ============================================================================

export class TranscriptionClient {
  constructor(
    private provider: SpeechToText,
    private options: TranscriptionClientOptions,
    private retryPolicy: RetryPolicy = new RetryPolicy()
  ) {}

  async transcribe(request: TranscribeRequest): Promise<TranscriptSegment[]> {
    const { audio, signal } = request;
    const language = request.language ?? this.options.language;

    let buffer: Buffer;
    try {
      buffer = await readFile(audio.path);
    } catch (error) {
      throw new TranscriptionError(`Cannot read extracted audio: ${describeError(error)}`, { cause: error });
    }

    if (buffer.byteLength === 0) {
      return [];
    }

    let raw: unknown;
    try {
      raw = await this.retryPolicy.execute(
        async (attempt) => {
          log.info(`Transcribing ${audio.durationSeconds.toFixed(1)}s of audio (attempt ${attempt})`);
          return raceAbort(
            this.provider.transcribe(buffer, { model: this.options.model, language }),
            attemptSignal(signal, this.options.timeoutMs)
          );
        },
        {
          signal,
          onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
            log.warn(
              `Transcription attempt ${attempt}/${maxAttempts} failed (${describeError(error)}), ` +
                `retrying in ${Math.round(delayMs)}ms`
            );
          },
        }
      );
    } catch (error) {
      if (signal?.aborted) throw error;
      const status = error instanceof SpeechToTextApiError ? error.status : undefined;
      const message =
        status === 401 || status === 403
          ? 'Deepgram rejected the API key'
          : describeError(error);
      throw new TranscriptionError(message, { cause: error, details: status ? { status } : undefined });
    }

    const segments = parseTranscriptResponse(raw);
    log.info(`Transcription complete: ${segments.length} segment(s)`);
    return segments;
  }
}
