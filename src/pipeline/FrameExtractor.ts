/**
 * FrameExtractor.ts - Video Frame Extraction via ffmpeg
 *
 * Extracts one PNG frame per confirmed moment using frame-accurate seeking.
 * Timestamps outside the decodable range are clamped; those outside the
 * video itself flag the frame as approximate. A failure for one moment is
 * reported in its own outcome and never stops the others, but a batch in
 * which every frame fails raises FrameExtractionError.
 */

import { mkdir, readFile } from 'fs/promises';
import { join } from 'path';
import sharp from 'sharp';

import type { MediaToolkit } from '../media/MediaToolkit.js';
import type { Frame, Moment, VideoHandle } from '../shared/types.js';
import { FrameExtractionError, describeError } from '../shared/errors.js';
import { err, ok, type Result } from '../shared/result.js';
import { runWithConcurrency } from '../utils/concurrency.js';
import { createLogger } from '../utils/Logger.js';

const log = createLogger('FrameExtractor');

// ============================================================================
// Types
// ============================================================================

export interface FrameExtractionRequest {
  video: VideoHandle;
  moments: Moment[];
  workDir: string;
  signal?: AbortSignal;
}

export interface FrameOutcome {
  momentId: string;
  result: Result<Frame, FrameExtractionError>;
}

export interface FrameExtractorOptions {
  /** Timeout for a single ffmpeg frame extraction */
  frameTimeoutMs: number;
  /** Frames decoded in parallel */
  concurrency: number;
}

export interface ClampedTimestamp {
  timestamp: number;
  approximate: boolean;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_FRAME_EXTRACTOR_OPTIONS: FrameExtractorOptions = {
  frameTimeoutMs: 10_000,
  concurrency: 1,
};

// ============================================================================
// Helpers
// ============================================================================

/**
 * Clamp a requested timestamp to [0, duration - 1/fps]. Only timestamps
 * outside [0, duration] are approximate; the last frame interval snaps to
 * the last frame.
 */
export function clampTimestamp(
  requested: number,
  video: Pick<VideoHandle, 'durationSeconds' | 'frameRate'>
): ClampedTimestamp {
  const frameDuration = video.frameRate > 0 ? 1 / video.frameRate : 0;
  const lastFrame = Math.max(0, video.durationSeconds - frameDuration);

  if (requested < 0) {
    return { timestamp: 0, approximate: true };
  }
  if (requested > lastFrame) {
    return { timestamp: lastFrame, approximate: requested > video.durationSeconds };
  }
  return { timestamp: requested, approximate: false };
}

// ============================================================================
// FrameExtractor Class
// ============================================================================

export class FrameExtractor {
  private options: FrameExtractorOptions;

  constructor(
    private toolkit: MediaToolkit,
    options: Partial<FrameExtractorOptions> = {}
  ) {
    this.options = { ...DEFAULT_FRAME_EXTRACTOR_OPTIONS, ...options };
  }

  /**
   * Extract one frame per moment, in moment order.
   */
  async extract(request: FrameExtractionRequest): Promise<FrameOutcome[]> {
    const { video, moments, workDir, signal } = request;

    const framesDir = join(workDir, 'frames');
    await mkdir(framesDir, { recursive: true });

    const tasks = moments.map((moment, index) => async (): Promise<FrameOutcome> => {
      if (signal?.aborted) {
        throw signal.reason;
      }
      const frameNumber = String(index + 1).padStart(3, '0');
      const outputPath = join(framesDir, `frame-${frameNumber}.png`);
      return {
        momentId: moment.id,
        result: await this.extractOne(video, moment, outputPath, frameNumber, signal),
      };
    });

    const outcomes = await runWithConcurrency(tasks, this.options.concurrency);

    const failures = outcomes.flatMap((o) => (o.result.ok ? [] : [o.result.error]));
    log.info(`Extracted ${outcomes.length - failures.length}/${outcomes.length} frame(s)`);

    const [first] = failures;
    if (first && failures.length === outcomes.length) {
      throw new FrameExtractionError(
        `None of the ${outcomes.length} frame(s) could be extracted. First failure: ${first.message}`,
        first.momentId,
        { cause: first }
      );
    }
    return outcomes;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async extractOne(
    video: VideoHandle,
    moment: Moment,
    outputPath: string,
    frameNumber: string,
    signal?: AbortSignal
  ): Promise<Result<Frame, FrameExtractionError>> {
    const { timestamp, approximate } = clampTimestamp(moment.timestamp, video);
    if (approximate) {
      log.warn(
        `Moment ${moment.id} at ${moment.timestamp.toFixed(2)}s is outside the video ` +
          `(${video.durationSeconds.toFixed(2)}s); using ${timestamp.toFixed(2)}s`
      );
    }

    try {
      // -accurate_seek with -ss before -i: fast input seek, then decode up to the exact frame
      await this.toolkit.ffmpeg(
        [
          '-accurate_seek',
          '-ss', timestamp.toFixed(3),
          '-i', video.path,
          '-frames:v', '1',
          '-an',
          '-y',
          outputPath,
        ],
        { signal, timeoutMs: this.options.frameTimeoutMs }
      );

      const image = await readFile(outputPath);
      if (image.byteLength === 0) {
        throw new Error('ffmpeg produced an empty image');
      }

      const metadata = await sharp(image).metadata();

      log.info(`Extracted frame ${frameNumber} at ${timestamp.toFixed(2)}s`);
      return ok({
        id: `frame-${frameNumber}`,
        momentId: moment.id,
        requestedTimestamp: moment.timestamp,
        timestamp,
        path: outputPath,
        image,
        width: metadata.width ?? video.width,
        height: metadata.height ?? video.height,
        approximate,
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      log.warn(`Failed to extract frame at ${timestamp.toFixed(2)}s: ${describeError(error)}`);
      return err(
        new FrameExtractionError(
          `Could not extract a frame at ${timestamp.toFixed(2)}s: ${describeError(error)}`,
          moment.id,
          { cause: error }
        )
      );
    }
  }
}
