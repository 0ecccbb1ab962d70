/**
 * AudioExtractor Unit Tests
 *
 * Tests:
 * - ffmpeg arguments for 16 kHz mono WAV
 * - Audio handle from the probed WAV
 * - Videos without audio, undecodable audio tracks
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { AudioExtractor } from '../../../src/pipeline/AudioExtractor.js';
import { UnsupportedFormatError } from '../../../src/shared/errors.js';
import type { VideoHandle } from '../../../src/shared/types.js';
import { FakeToolkit } from '../../helpers/fakes.js';

function video(overrides: Partial<VideoHandle> = {}): VideoHandle {
  return {
    path: '/session/source.mp4',
    originalName: 'demo.mp4',
    container: 'mp4',
    durationSeconds: 30,
    frameRate: 30,
    width: 1280,
    height: 720,
    hasAudio: true,
    sizeBytes: 2048,
    ...overrides,
  };
}

describe('AudioExtractor', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'procdoc-audio-test-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('extracts a 16 kHz mono WAV and probes its duration', async () => {
    const toolkit = new FakeToolkit({ audioDurationSeconds: 29.8 });

    const audio = await new AudioExtractor(toolkit).extract({ video: video(), workDir });

    const outputPath = join(workDir, 'audio.wav');
    expect(toolkit.ffmpegCalls).toEqual([
      ['-i', '/session/source.mp4', '-vn', '-ar', '16000', '-ac', '1', '-acodec', 'pcm_s16le', '-f', 'wav', '-y', outputPath],
    ]);
    expect(audio).toEqual({ path: outputPath, durationSeconds: 29.8, sampleRate: 16_000 });
  });

  it('rejects a video without an audio track', async () => {
    const toolkit = new FakeToolkit();

    await expect(
      new AudioExtractor(toolkit).extract({ video: video({ hasAudio: false }), workDir })
    ).rejects.toThrow('demo.mp4 has no audio track to transcribe');
    expect(toolkit.ffmpegCalls).toEqual([]);
  });

  it('reports an undecodable audio track as an unsupported format', async () => {
    const toolkit = new FakeToolkit();
    toolkit.ffmpeg = async () => {
      throw new Error('Invalid data found when processing input');
    };

    const error = await new AudioExtractor(toolkit).extract({ video: video(), workDir }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnsupportedFormatError);
    expect(error).toHaveProperty('stage', 'audio');
    expect(error).toHaveProperty('message', 'Audio track could not be decoded: Invalid data found when processing input');
  });
});
