/**
 * MediaToolkit.ts - ffmpeg / ffprobe wrapper
 *
 * Runs the system-installed ffmpeg binaries with a restricted child
 * environment, tracks running processes so a session can kill them on
 * teardown, and parses ffprobe's JSON output into a typed probe result.
 */

import { execFile as execFileCb, type ChildProcess } from 'child_process';
import { z } from 'zod';

// ============================================================================
// Types
// ============================================================================

export interface VideoStreamInfo {
  codec: string;
  width: number;
  height: number;
  frameRate: number;
  durationSeconds?: number;
}

export interface AudioStreamInfo {
  codec: string;
  sampleRate: number;
  channels: number;
  durationSeconds?: number;
}

export interface MediaProbe {
  formatName: string;
  durationSeconds: number;
  sizeBytes: number;
  video?: VideoStreamInfo;
  audio?: AudioStreamInfo;
}

export interface RunOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface MediaToolkit {
  isAvailable(): Promise<boolean>;
  probe(path: string, options?: RunOptions): Promise<MediaProbe>;
  ffmpeg(args: string[], options?: RunOptions): Promise<ExecResult>;
}

// ============================================================================
// Constants
// ============================================================================

/** Timeout for ffmpeg/ffprobe version checks */
const VERSION_CHECK_TIMEOUT_MS = 5_000;

/** Timeout for a probe of a local file */
const PROBE_TIMEOUT_MS = 15_000;

const MAX_BUFFER_BYTES = 16 * 1024 * 1024;

const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
  TMPDIR: process.env.TMPDIR || process.env.TEMP,
  TEMP: process.env.TEMP,
};

// ============================================================================
// ffprobe output schema
// ============================================================================

const numeric = z.union([z.string(), z.number()]).optional();

const ProbeSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        codec_name: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
        r_frame_rate: z.string().optional(),
        avg_frame_rate: z.string().optional(),
        sample_rate: numeric,
        channels: z.number().optional(),
        duration: numeric,
      })
    )
    .default([]),
  format: z
    .object({
      format_name: z.string().optional(),
      duration: numeric,
      size: numeric,
    })
    .default({}),
});

function toNumber(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Parse ffprobe rates such as "30000/1001" or "25/1".
 */
export function parseFrameRate(rate: string | undefined): number | undefined {
  if (!rate) return undefined;
  const [num, den] = rate.split('/');
  const numerator = Number.parseFloat(num);
  const denominator = den === undefined ? 1 : Number.parseFloat(den);
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
    return undefined;
  }
  const fps = numerator / denominator;
  return fps > 0 ? fps : undefined;
}

/**
 * Convert raw ffprobe JSON into a MediaProbe.
 */
export function parseProbeOutput(stdout: string): MediaProbe {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    throw new Error('ffprobe returned invalid JSON');
  }

  const parsed = ProbeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unexpected ffprobe output: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }

  const { streams, format } = parsed.data;
  const videoStream = streams.find((s) => s.codec_type === 'video');
  const audioStream = streams.find((s) => s.codec_type === 'audio');

  const video: VideoStreamInfo | undefined = videoStream
    ? {
        codec: videoStream.codec_name ?? 'unknown',
        width: videoStream.width ?? 0,
        height: videoStream.height ?? 0,
        frameRate:
          parseFrameRate(videoStream.avg_frame_rate) ?? parseFrameRate(videoStream.r_frame_rate) ?? 30,
        durationSeconds: toNumber(videoStream.duration),
      }
    : undefined;

  const audio: AudioStreamInfo | undefined = audioStream
    ? {
        codec: audioStream.codec_name ?? 'unknown',
        sampleRate: toNumber(audioStream.sample_rate) ?? 0,
        channels: audioStream.channels ?? 0,
        durationSeconds: toNumber(audioStream.duration),
      }
    : undefined;

  const durationSeconds =
    toNumber(format.duration) ?? video?.durationSeconds ?? audio?.durationSeconds ?? 0;

  return {
    formatName: format.format_name ?? 'unknown',
    durationSeconds,
    sizeBytes: toNumber(format.size) ?? 0,
    video,
    audio,
  };
}

// ============================================================================
// FfmpegToolkit Class
// ============================================================================

export class FfmpegToolkit implements MediaToolkit {
  private ffmpegPath: string;
  private ffprobePath: string;
  private activeProcesses: Set<ChildProcess> = new Set();
  private availability: Promise<boolean> | null = null;

  constructor(options: { ffmpegPath?: string; ffprobePath?: string } = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
  }

  /**
   * Check that both ffmpeg and ffprobe run. Cached after the first check.
   */
  isAvailable(): Promise<boolean> {
    if (!this.availability) {
      this.availability = Promise.all([
        this.exec(this.ffmpegPath, ['-version'], { timeoutMs: VERSION_CHECK_TIMEOUT_MS }),
        this.exec(this.ffprobePath, ['-version'], { timeoutMs: VERSION_CHECK_TIMEOUT_MS }),
      ]).then(
        () => true,
        () => false
      );
    }
    return this.availability;
  }

  async probe(path: string, options: RunOptions = {}): Promise<MediaProbe> {
    const { stdout } = await this.exec(
      this.ffprobePath,
      ['-v', 'error', '-print_format', 'json', '-show_format', '-show_streams', path],
      { timeoutMs: PROBE_TIMEOUT_MS, ...options }
    );
    return parseProbeOutput(stdout);
  }

  ffmpeg(args: string[], options: RunOptions = {}): Promise<ExecResult> {
    return this.exec(this.ffmpegPath, ['-hide_banner', '-loglevel', 'error', ...args], options);
  }

  /**
   * Kill every child process still running.
   */
  killAll(): void {
    for (const child of this.activeProcesses) {
      child.kill('SIGTERM');
    }
    this.activeProcesses.clear();
  }

  private exec(command: string, args: string[], options: RunOptions): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      const child = execFileCb(
        command,
        args,
        {
          env: SAFE_CHILD_ENV,
          timeout: options.timeoutMs ?? 0,
          signal: options.signal,
          maxBuffer: MAX_BUFFER_BYTES,
        },
        (error, stdout, stderr) => {
          this.activeProcesses.delete(child);
          if (error) {
            const detail = stderr?.toString().trim();
            if (detail && !error.message.includes(detail)) {
              error.message = `${error.message}\n${detail}`;
            }
            reject(error);
          } else {
            resolve({ stdout: stdout?.toString() ?? '', stderr: stderr?.toString() ?? '' });
          }
        }
      );
      this.activeProcesses.add(child);
    });
  }
}
