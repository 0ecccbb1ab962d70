/**
 * TranscriptionClient Unit Tests
 *
 * Tests:
 * - Utterance parsing, fallback to the channel transcript
 * - Segment normalization (empty, negative, unordered)
 * - Retry of transient failures, immediate failure on auth errors
 * - Empty audio
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import {
  SpeechToTextApiError,
  TranscriptionClient,
  normalizeSegments,
  parseTranscriptResponse,
} from '../../../src/transcription/TranscriptionClient.js';
import { TranscriptionError } from '../../../src/shared/errors.js';
import type { AudioHandle } from '../../../src/shared/types.js';
import { FakeSpeechToText, instantRetry, utteranceResponse } from '../../helpers/fakes.js';

describe('parseTranscriptResponse', () => {
  it('maps utterances to segments', () => {
    const segments = parseTranscriptResponse(
      utteranceResponse([
        { start: 4.2, end: 6, transcript: ' Now click Save. ' },
        { start: 0.5, end: 3.9, transcript: 'Open the billing page.' },
      ])
    );

    expect(segments).toEqual([
      { text: 'Open the billing page.', startTime: 0.5, endTime: 3.9, confidence: 0.95 },
      { text: 'Now click Save.', startTime: 4.2, endTime: 6, confidence: 0.95 },
    ]);
  });

  it('falls back to the best channel alternative', () => {
    const segments = parseTranscriptResponse({
      results: {
        channels: [
          {
            alternatives: [
              {
                transcript: 'Open settings and enable backups.',
                confidence: 0.8,
                words: [
                  { start: 1, end: 1.4 },
                  { start: 3.5, end: 4 },
                ],
              },
            ],
          },
        ],
      },
    });

    expect(segments).toEqual([
      { text: 'Open settings and enable backups.', startTime: 1, endTime: 4, confidence: 0.8 },
    ]);
  });

  it('returns no segments for silence', () => {
    expect(parseTranscriptResponse({ results: { channels: [{ alternatives: [{ transcript: '' }] }] } })).toEqual([]);
  });

  it('rejects a malformed response', () => {
    expect(() => parseTranscriptResponse({ metadata: {} })).toThrow(TranscriptionError);
  });
});

describe('normalizeSegments', () => {
  it('drops empty text, clamps times and sorts', () => {
    expect(
      normalizeSegments([
        { text: 'second', startTime: 5, endTime: 4, confidence: 1 },
        { text: '   ', startTime: 1, endTime: 2, confidence: 1 },
        { text: 'first', startTime: -1, endTime: 2, confidence: 1 },
      ])
    ).toEqual([
      { text: 'first', startTime: 0, endTime: 2, confidence: 1 },
      { text: 'second', startTime: 5, endTime: 5, confidence: 1 },
    ]);
  });
});

describe('TranscriptionClient', () => {
  let dir: string;
  let audio: AudioHandle;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'procdoc-stt-test-'));
    audio = { path: join(dir, 'audio.wav'), durationSeconds: 10, sampleRate: 16_000 };
    await writeFile(audio.path, 'RIFF-test-audio');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('passes model and language to the provider', async () => {
    const provider = new FakeSpeechToText(async () =>
      utteranceResponse([{ start: 0, end: 2, transcript: 'Hello.' }])
    );
    const client = new TranscriptionClient(provider, { model: 'nova-3', language: 'en', timeoutMs: 0 }, instantRetry());

    const segments = await client.transcribe({ audio, language: 'de' });

    expect(segments).toHaveLength(1);
    expect(provider.calls).toEqual([{ model: 'nova-3', language: 'de' }]);
  });

  it('retries transient failures', async () => {
    let calls = 0;
    const provider = new FakeSpeechToText(async () => {
      calls++;
      if (calls === 1) throw new SpeechToTextApiError('Deepgram request failed: busy', 503);
      return utteranceResponse([{ start: 0, end: 2, transcript: 'Hello.' }]);
    });
    const client = new TranscriptionClient(provider, { model: 'nova-3', timeoutMs: 0 }, instantRetry());

    await expect(client.transcribe({ audio })).resolves.toHaveLength(1);
    expect(calls).toBe(2);
  });

  it('fails immediately when the key is rejected', async () => {
    const provider = new FakeSpeechToText(async () => {
      throw new SpeechToTextApiError('Deepgram request failed: Invalid credentials', 401);
    });
    const client = new TranscriptionClient(provider, { model: 'nova-3', timeoutMs: 0 }, instantRetry());

    const error = await client.transcribe({ audio }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscriptionError);
    expect(error).toHaveProperty('message', 'Deepgram rejected the API key');
    expect(provider.calls).toHaveLength(1);
  });

  it('returns no segments for empty audio without calling the provider', async () => {
    await writeFile(audio.path, '');
    const provider = new FakeSpeechToText(async () => utteranceResponse([]));
    const client = new TranscriptionClient(provider, { model: 'nova-3', timeoutMs: 0 }, instantRetry());

    await expect(client.transcribe({ audio })).resolves.toEqual([]);
    expect(provider.calls).toEqual([]);
  });
});
