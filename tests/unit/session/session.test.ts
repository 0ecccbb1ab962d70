/**
 * Session Unit Tests
 *
 * Tests the per-recording state machine:
 * - Stage ordering and the single running stage
 * - Completing a stage discards the artifacts of later stages
 * - Failures keep earlier artifacts and allow a retry
 * - destroy() aborts, removes the work directory and drops late results
 * - Snapshot shape
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { Session } from '../../../src/session/Session.js';
import {
  PipelineError,
  SessionClosedError,
  StageOrderError,
  TranscriptionError,
} from '../../../src/shared/errors.js';
import type { Moment, VideoHandle } from '../../../src/shared/types.js';

// =============================================================================
// Fixtures
// =============================================================================

const video: VideoHandle = {
  path: '/tmp/session/source.mp4',
  originalName: 'onboarding.mp4',
  container: 'mp4',
  durationSeconds: 42,
  frameRate: 30,
  width: 1280,
  height: 720,
  hasAudio: true,
  sizeBytes: 4096,
};

const moments: Moment[] = [{ id: 'moment-1', timestamp: 4, description: 'Open Users', userEdited: false }];

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('Session', () => {
  let baseDir: string;
  let session: Session;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'procdoc-session-test-'));
    session = await Session.create({
      baseDir,
      id: 'session-test',
      now: () => new Date('2026-01-02T03:04:05Z'),
    });
  });

  afterEach(async () => {
    await session.destroy();
    await rm(baseDir, { recursive: true, force: true });
  });

  // ===========================================================================
  // Creation
  // ===========================================================================

  it('starts idle with its own work directory', async () => {
    expect(session.state).toBe('idle');
    expect(session.workDir.startsWith(join(baseDir, 'procdoc-'))).toBe(true);
    expect(await exists(session.workDir)).toBe(true);
  });

  // ===========================================================================
  // Ordering
  // ===========================================================================

  describe('stage ordering', () => {
    it('rejects a stage whose prerequisite state is not reached', () => {
      expect(() => session.begin('transcription')).toThrow(StageOrderError);
      expect(() => session.begin('transcription')).toThrow(
        'Transcription needs the session to be at least "audio-extracted" (currently "idle")'
      );
    });

    it('allows only one running stage', () => {
      session.begin('ingest');

      expect(() => session.begin('ingest')).toThrow('Video upload is still running');
    });

    it('advances progress when a stage completes', () => {
      session.begin('ingest');
      expect(session.complete('ingest', 'uploaded', { video })).toBe(true);

      expect(session.state).toBe('uploaded');
      expect(session.hasReached('uploaded')).toBe(true);
      expect(session.hasReached('audio-extracted')).toBe(false);
      expect(() => session.begin('audio')).not.toThrow();
    });
  });

  // ===========================================================================
  // Invalidation
  // ===========================================================================

  describe('invalidation', () => {
    it('drops artifacts produced after the completed state', () => {
      session.complete('ingest', 'uploaded', { video });
      session.complete('audio', 'audio-extracted', {
        audio: { path: '/tmp/a.wav', durationSeconds: 42, sampleRate: 16_000 },
      });
      session.complete('transcription', 'transcribed', { transcript: [] });
      session.complete('moments', 'moments-proposed', { moments, momentWarnings: ['merged'] });
      session.complete('review', 'moments-confirmed', { confirmedMoments: moments });

      // Re-running audio extraction discards everything built on the old audio
      session.complete('audio', 'audio-extracted', {
        audio: { path: '/tmp/b.wav', durationSeconds: 42, sampleRate: 16_000 },
      });

      expect(session.state).toBe('audio-extracted');
      expect(session.artifacts.video).toEqual(video);
      expect(session.artifacts.audio?.path).toBe('/tmp/b.wav');
      expect(session.artifacts.transcript).toBeUndefined();
      expect(session.artifacts.moments).toBeUndefined();
      expect(session.artifacts.confirmedMoments).toBeUndefined();
      expect(session.artifacts.momentWarnings).toEqual([]);
    });

    it('returns to moments-proposed when moments change after confirmation', () => {
      session.complete('moments', 'moments-proposed', { moments, momentWarnings: [] });
      session.complete('review', 'moments-confirmed', { confirmedMoments: moments });

      const edited = [{ ...moments[0], description: 'Open the Users page', userEdited: true }];
      session.setMoments(edited);

      expect(session.state).toBe('moments-proposed');
      expect(session.artifacts.moments).toEqual(edited);
      expect(session.artifacts.confirmedMoments).toBeUndefined();
    });
  });

  // ===========================================================================
  // Failure
  // ===========================================================================

  describe('failure', () => {
    it('keeps earlier artifacts and allows the stage to be retried', () => {
      session.complete('ingest', 'uploaded', { video });
      session.complete('audio', 'audio-extracted', {
        audio: { path: '/tmp/a.wav', durationSeconds: 42, sampleRate: 16_000 },
      });
      session.begin('transcription');
      session.fail('transcription', new TranscriptionError('Deepgram unavailable'));

      const status = session.status;
      expect(status.state).toBe('error');
      if (status.state === 'error') {
        expect(status.stage).toBe('transcription');
        expect(status.progress).toBe('audio-extracted');
        expect(status.error.message).toBe('Deepgram unavailable');
      }
      expect(session.artifacts.audio?.path).toBe('/tmp/a.wav');

      session.begin('transcription');
      session.complete('transcription', 'transcribed', { transcript: [] });
      expect(session.state).toBe('transcribed');
    });

    it('reports the error in the snapshot', () => {
      session.fail(
        'ingest',
        new PipelineError('disk full', 'STAGE_FAILED', 'ingest', 'Free up space.')
      );

      expect(session.snapshot().error).toEqual({
        stage: 'ingest',
        code: 'STAGE_FAILED',
        message: 'disk full',
        remediation: 'Free up space.',
      });
    });
  });

  // ===========================================================================
  // Destroy
  // ===========================================================================

  describe('destroy', () => {
    it('aborts the signal and removes the work directory', async () => {
      await writeFile(join(session.workDir, 'audio.wav'), 'x');
      const signal = session.begin('ingest');

      await session.destroy('User cancelled');

      expect(signal.aborted).toBe(true);
      expect(signal.reason).toBeInstanceOf(SessionClosedError);
      expect(await exists(session.workDir)).toBe(false);
      expect(session.state).toBe('destroyed');
    });

    it('discards results that arrive after destroy', async () => {
      session.begin('ingest');
      await session.destroy();

      expect(session.complete('ingest', 'uploaded', { video })).toBe(false);
      expect(session.artifacts.video).toBeUndefined();
      expect(session.state).toBe('destroyed');
    });

    it('rejects further stages and credentials', async () => {
      await session.destroy();

      expect(() => session.begin('ingest')).toThrow(SessionClosedError);
      expect(() => session.setDriveCredentials({ accessToken: 'test-token' })).toThrow(SessionClosedError);
    });

    it('can be called more than once', async () => {
      await session.destroy();
      await expect(session.destroy()).resolves.toBeUndefined();
    });
  });

  // ===========================================================================
  // Snapshot
  // ===========================================================================

  it('snapshots artifacts without internal paths', () => {
    session.complete('ingest', 'uploaded', { video });
    session.setDriveCredentials({ accessToken: 'test-token' });

    const snapshot = session.snapshot();
    const { path: _path, ...publicVideo } = video;

    expect(snapshot).toEqual({
      id: 'session-test',
      state: 'uploaded',
      progress: 'uploaded',
      createdAt: '2026-01-02T03:04:05.000Z',
      momentWarnings: [],
      driveAuthenticated: true,
      video: publicVideo,
    });
  });
});
