/**
 * MediaIngest.ts - Accept an uploaded recording into a session
 *
 * Validates the container by extension, copies the file into the session's
 * temporary directory (the session owns that copy exclusively) and probes it
 * with ffprobe for duration, frame rate, dimensions and an audio track.
 */

import { copyFile, stat } from 'fs/promises';
import { basename, extname, join } from 'path';

import type { MediaProbe, MediaToolkit } from '../media/MediaToolkit.js';
import { SUPPORTED_CONTAINERS, type VideoContainer, type VideoHandle } from '../shared/types.js';
import { UnsupportedFormatError, describeError } from '../shared/errors.js';
import { createLogger } from '../utils/Logger.js';

const log = createLogger('MediaIngest');

export interface IngestRequest {
  sourcePath: string;
  workDir: string;
  signal?: AbortSignal;
}

export function containerFromPath(path: string): VideoContainer | null {
  const ext = extname(path).slice(1).toLowerCase();
  return SUPPORTED_CONTAINERS.find((container) => container === ext) ?? null;
}

export class MediaIngest {
  constructor(private toolkit: MediaToolkit) {}

  async ingest(request: IngestRequest): Promise<VideoHandle> {
    const { sourcePath, workDir, signal } = request;
    const originalName = basename(sourcePath);

    const container = containerFromPath(sourcePath);
    if (!container) {
      throw new UnsupportedFormatError(
        `Unsupported file type "${extname(sourcePath) || originalName}". ` +
          `Supported: ${SUPPORTED_CONTAINERS.join(', ')}`
      );
    }

    let sizeBytes: number;
    try {
      const stats = await stat(sourcePath);
      if (!stats.isFile()) {
        throw new UnsupportedFormatError(`Not a regular file: ${sourcePath}`);
      }
      sizeBytes = stats.size;
    } catch (error) {
      if (error instanceof UnsupportedFormatError) throw error;
      throw new UnsupportedFormatError(`Video file not found: ${sourcePath}`, 'ingest', { cause: error });
    }

    if (sizeBytes === 0) {
      throw new UnsupportedFormatError(`Video file is empty (0 bytes): ${sourcePath}`);
    }

    const targetPath = join(workDir, `source.${container}`);
    await copyFile(sourcePath, targetPath);
    log.info(`Copied ${originalName} (${sizeBytes} bytes) into session storage`);

    let probe: MediaProbe;
    try {
      probe = await this.toolkit.probe(targetPath, { signal });
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new UnsupportedFormatError(`Cannot read video file: ${describeError(error)}`, 'ingest', {
        cause: error,
      });
    }

    if (!probe.video) {
      throw new UnsupportedFormatError(`No video stream found in ${originalName}`);
    }

    if (!(probe.durationSeconds > 0)) {
      throw new UnsupportedFormatError(`Could not determine the duration of ${originalName}`);
    }

    const handle: VideoHandle = {
      path: targetPath,
      originalName,
      container,
      durationSeconds: probe.durationSeconds,
      frameRate: probe.video.frameRate,
      width: probe.video.width,
      height: probe.video.height,
      hasAudio: probe.audio !== undefined,
      sizeBytes,
    };

    log.info(
      `Ingested ${originalName}: ${handle.durationSeconds.toFixed(2)}s, ` +
        `${handle.width}x${handle.height} @ ${handle.frameRate.toFixed(2)}fps, ` +
        `audio=${handle.hasAudio}`
    );
    return handle;
  }
}
