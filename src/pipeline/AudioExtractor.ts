/**
 * AudioExtractor.ts - Pull the narration track out of the video
 *
 * Writes a single 16 kHz mono WAV file into the session directory and
 * verifies its duration against the source video.
 */

import { chmod } from 'fs/promises';
import { join } from 'path';

import type { MediaToolkit } from '../media/MediaToolkit.js';
import type { AudioHandle, VideoHandle } from '../shared/types.js';
import { UnsupportedFormatError, describeError } from '../shared/errors.js';
import { createLogger } from '../utils/Logger.js';

const log = createLogger('AudioExtractor');

/** Sample rate expected by the speech-to-text service */
export const AUDIO_SAMPLE_RATE = 16_000;

/** Allowed drift between audio and video duration before warning */
export const DURATION_TOLERANCE_SECONDS = 0.5;

export interface AudioExtractionRequest {
  video: VideoHandle;
  workDir: string;
  signal?: AbortSignal;
}

export class AudioExtractor {
  constructor(private toolkit: MediaToolkit) {}

  async extract(request: AudioExtractionRequest): Promise<AudioHandle> {
    const { video, workDir, signal } = request;

    if (!video.hasAudio) {
      throw new UnsupportedFormatError(
        `${video.originalName} has no audio track to transcribe`,
        'audio'
      );
    }

    const outputPath = join(workDir, 'audio.wav');

    try {
      await this.toolkit.ffmpeg(
        [
          '-i', video.path,
          '-vn',
          '-ar', String(AUDIO_SAMPLE_RATE),
          '-ac', '1',
          '-acodec', 'pcm_s16le',
          '-f', 'wav',
          '-y',
          outputPath,
        ],
        { signal }
      );
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new UnsupportedFormatError(
        `Audio track could not be decoded: ${describeError(error)}`,
        'audio',
        { cause: error }
      );
    }

    await chmod(outputPath, 0o600).catch((error: unknown) => {
      log.warn(`Could not restrict permissions on ${outputPath}: ${describeError(error)}`);
    });

    const probe = await this.toolkit.probe(outputPath, { signal });
    const durationSeconds = probe.durationSeconds;

    if (Math.abs(durationSeconds - video.durationSeconds) > DURATION_TOLERANCE_SECONDS) {
      log.warn(
        `Audio duration ${durationSeconds.toFixed(2)}s differs from video duration ` +
          `${video.durationSeconds.toFixed(2)}s`
      );
    }

    log.info(`Extracted audio: ${durationSeconds.toFixed(2)}s`);
    return { path: outputPath, durationSeconds, sampleRate: AUDIO_SAMPLE_RATE };
  }
}
