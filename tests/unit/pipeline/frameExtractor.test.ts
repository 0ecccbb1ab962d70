/**
 * FrameExtractor Unit Tests
 *
 * Tests:
 * - Timestamp clamping to the last decodable frame
 * - One frame per moment, in moment order
 * - Approximate frames for out-of-range timestamps
 * - Per-moment failures reported without failing the batch
 * - A batch where every frame fails raises FrameExtractionError
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import type { Moment, VideoHandle } from '../../../src/shared/types.js';
import { FrameExtractionError } from '../../../src/shared/errors.js';
import { FakeToolkit, TINY_PNG } from '../../helpers/fakes.js';

// =============================================================================
// Hoisted mocks
// =============================================================================

const { mockMetadata } = vi.hoisted(() => ({
  mockMetadata: vi.fn(),
}));

vi.mock('sharp', () => ({
  default: vi.fn(() => ({ metadata: mockMetadata })),
}));

import { FrameExtractor, clampTimestamp } from '../../../src/pipeline/FrameExtractor.js';

function moment(id: string, timestamp: number): Moment {
  return { id, timestamp, description: `Action ${id}`, userEdited: false };
}

describe('clampTimestamp', () => {
  const video = { durationSeconds: 10, frameRate: 25 };

  it('keeps timestamps inside the video', () => {
    expect(clampTimestamp(4, video)).toEqual({ timestamp: 4, approximate: false });
    expect(clampTimestamp(0, video)).toEqual({ timestamp: 0, approximate: false });
  });

  it('snaps the last frame interval to the last frame without flagging it', () => {
    expect(clampTimestamp(9.98, video)).toEqual({ timestamp: 9.96, approximate: false });
    expect(clampTimestamp(10, video)).toEqual({ timestamp: 9.96, approximate: false });
  });

  it('clamps past the end of the video and flags it', () => {
    expect(clampTimestamp(10.5, video)).toEqual({ timestamp: 9.96, approximate: true });
    expect(clampTimestamp(45, video)).toEqual({ timestamp: 9.96, approximate: true });
  });

  it('clamps negative timestamps to zero', () => {
    expect(clampTimestamp(-1, video)).toEqual({ timestamp: 0, approximate: true });
  });
});

describe('FrameExtractor', () => {
  let workDir: string;
  let video: VideoHandle;

  beforeEach(async () => {
    vi.clearAllMocks();
    mockMetadata.mockResolvedValue({ width: 1280, height: 720 });
    workDir = await mkdtemp(join(tmpdir(), 'procdoc-frames-test-'));
    video = {
      path: join(workDir, 'source.mp4'),
      originalName: 'demo.mp4',
      container: 'mp4',
      durationSeconds: 30,
      frameRate: 25,
      width: 1920,
      height: 1080,
      hasAudio: true,
      sizeBytes: 2048,
    };
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('extracts one frame per moment, marking out-of-range ones approximate', async () => {
    const toolkit = new FakeToolkit();
    const extractor = new FrameExtractor(toolkit, { concurrency: 2 });

    const outcomes = await extractor.extract({
      video,
      moments: [moment('m1', 2), moment('m2', 12.5), moment('m3', 45)],
      workDir,
    });

    expect(outcomes.map((o) => o.momentId)).toEqual(['m1', 'm2', 'm3']);
    const frames = outcomes.map((o) => (o.result.ok ? o.result.value : null));
    expect(frames.map((f) => f && [f.id, f.timestamp, f.requestedTimestamp, f.approximate])).toEqual([
      ['frame-001', 2, 2, false],
      ['frame-002', 12.5, 12.5, false],
      ['frame-003', 29.96, 45, true],
    ]);
    expect(frames[0]?.path).toBe(join(workDir, 'frames', 'frame-001.png'));
    expect(frames[0]?.width).toBe(1280);
    await expect(readFile(join(workDir, 'frames', 'frame-003.png'))).resolves.toEqual(TINY_PNG);
  });

  it('seeks accurately before the input', async () => {
    const toolkit = new FakeToolkit();

    await new FrameExtractor(toolkit).extract({ video, moments: [moment('m1', 7.25)], workDir });

    expect(toolkit.ffmpegCalls[0]).toEqual([
      '-accurate_seek',
      '-ss',
      '7.250',
      '-i',
      video.path,
      '-frames:v',
      '1',
      '-an',
      '-y',
      join(workDir, 'frames', 'frame-001.png'),
    ]);
  });

  it('reports a failed moment without failing the others', async () => {
    const toolkit = new FakeToolkit({ frame: (timestamp) => (timestamp === 5 ? null : TINY_PNG) });

    const outcomes = await new FrameExtractor(toolkit).extract({
      video,
      moments: [moment('m1', 1), moment('m2', 5)],
      workDir,
    });

    expect(outcomes[0].result.ok).toBe(true);
    const failed = outcomes[1].result;
    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error.momentId).toBe('m2');
      expect(failed.error.message).toBe(
        'Could not extract a frame at 5.00s: Output file is empty, nothing was encoded at 5'
      );
    }
  });

  it('rejects an empty image file', async () => {
    const toolkit = new FakeToolkit({ frame: (timestamp) => (timestamp === 1 ? Buffer.alloc(0) : TINY_PNG) });

    const [outcome] = await new FrameExtractor(toolkit).extract({
      video,
      moments: [moment('m1', 1), moment('m2', 2)],
      workDir,
    });

    expect(outcome.result.ok).toBe(false);
    if (!outcome.result.ok) {
      expect(outcome.result.error.message).toBe('Could not extract a frame at 1.00s: ffmpeg produced an empty image');
    }
  });

  it('falls back to the video size when the image has no dimensions', async () => {
    mockMetadata.mockResolvedValue({});

    const [outcome] = await new FrameExtractor(new FakeToolkit()).extract({ video, moments: [moment('m1', 1)], workDir });

    expect(outcome.result.ok && [outcome.result.value.width, outcome.result.value.height]).toEqual([1920, 1080]);
  });

  it('raises FrameExtractionError when every frame fails', async () => {
    const toolkit = new FakeToolkit({ frame: () => null });

    const extraction = new FrameExtractor(toolkit).extract({
      video,
      moments: [moment('m1', 1), moment('m2', 5)],
      workDir,
    });

    await expect(extraction).rejects.toBeInstanceOf(FrameExtractionError);
    await expect(extraction).rejects.toMatchObject({
      momentId: 'm1',
      stage: 'frames',
      message:
        'None of the 2 frame(s) could be extracted. First failure: ' +
        'Could not extract a frame at 1.00s: Output file is empty, nothing was encoded at 1',
    });
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('session closed'));

    await expect(
      new FrameExtractor(new FakeToolkit()).extract({ video, moments: [moment('m1', 1)], workDir, signal: controller.signal })
    ).rejects.toThrow('session closed');
  });
});
