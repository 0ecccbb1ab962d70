/**
 * MediaIngest Unit Tests
 *
 * Tests:
 * - Container detection by extension
 * - Copy into the session directory and probe
 * - Rejection of unsupported, missing, empty and unreadable files
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { MediaIngest, containerFromPath } from '../../../src/pipeline/MediaIngest.js';
import { UnsupportedFormatError } from '../../../src/shared/errors.js';
import type { MediaProbe } from '../../../src/media/MediaToolkit.js';
import { FakeToolkit, videoProbe } from '../../helpers/fakes.js';

describe('containerFromPath', () => {
  it('accepts supported extensions case-insensitively', () => {
    expect(containerFromPath('/videos/demo.MP4')).toBe('mp4');
    expect(containerFromPath('clip.webm')).toBe('webm');
  });

  it('rejects anything else', () => {
    expect(containerFromPath('notes.txt')).toBeNull();
    expect(containerFromPath('recording')).toBeNull();
  });
});

describe('MediaIngest', () => {
  let root: string;
  let workDir: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'procdoc-ingest-test-'));
    workDir = join(root, 'session');
    await mkdir(workDir);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function source(name: string, contents = 'fake video bytes'): Promise<string> {
    const path = join(root, name);
    await writeFile(path, contents);
    return path;
  }

  it('copies the video into the session and returns its properties', async () => {
    const toolkit = new FakeToolkit({ videoProbe: videoProbe({ durationSeconds: 42.5 }) });
    const sourcePath = await source('Demo Recording.mov');

    const handle = await new MediaIngest(toolkit).ingest({ sourcePath, workDir });

    expect(handle).toEqual({
      path: join(workDir, 'source.mov'),
      originalName: 'Demo Recording.mov',
      container: 'mov',
      durationSeconds: 42.5,
      frameRate: 30,
      width: 1280,
      height: 720,
      hasAudio: true,
      sizeBytes: 16,
    });
    await expect(readFile(handle.path, 'utf-8')).resolves.toBe('fake video bytes');
    expect(toolkit.probeCalls).toEqual([join(workDir, 'source.mov')]);
  });

  it('reports a video without an audio track', async () => {
    const toolkit = new FakeToolkit({ videoProbe: videoProbe({ audio: undefined }) });
    const handle = await new MediaIngest(toolkit).ingest({ sourcePath: await source('silent.mp4'), workDir });

    expect(handle.hasAudio).toBe(false);
  });

  it('rejects unsupported extensions before touching the file', async () => {
    const toolkit = new FakeToolkit();

    await expect(
      new MediaIngest(toolkit).ingest({ sourcePath: join(root, 'slides.pdf'), workDir })
    ).rejects.toThrow('Unsupported file type ".pdf". Supported: mp4, mov, avi, webm, mkv');
    expect(toolkit.probeCalls).toEqual([]);
  });

  it('rejects a missing file', async () => {
    const missing = join(root, 'missing.mp4');

    await expect(new MediaIngest(new FakeToolkit()).ingest({ sourcePath: missing, workDir })).rejects.toThrow(
      `Video file not found: ${missing}`
    );
  });

  it('rejects an empty file', async () => {
    const empty = await source('empty.mp4', '');

    await expect(new MediaIngest(new FakeToolkit()).ingest({ sourcePath: empty, workDir })).rejects.toThrow(
      `Video file is empty (0 bytes): ${empty}`
    );
  });

  it('rejects a file ffprobe cannot read', async () => {
    const toolkit = new FakeToolkit();
    toolkit.probe = async () => {
      throw new Error('moov atom not found');
    };

    const error = await new MediaIngest(toolkit)
      .ingest({ sourcePath: await source('broken.mp4'), workDir })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnsupportedFormatError);
    expect(error).toHaveProperty('message', 'Cannot read video file: moov atom not found');
  });

  it('rejects a file without a video stream or duration', async () => {
    const audioOnly: MediaProbe = { ...videoProbe(), video: undefined };
    await expect(
      new MediaIngest(new FakeToolkit({ videoProbe: audioOnly })).ingest({ sourcePath: await source('a.mp4'), workDir })
    ).rejects.toThrow('No video stream found in a.mp4');

    await expect(
      new MediaIngest(new FakeToolkit({ videoProbe: videoProbe({ durationSeconds: 0 }) })).ingest({
        sourcePath: await source('b.mp4'),
        workDir,
      })
    ).rejects.toThrow('Could not determine the duration of b.mp4');
  });
});
