/**
 * Session - One recording's trip through the pipeline
 *
 * Holds every artifact a stage produces, the furthest state reached and
 * the last failure. Stages run one at a time. Completing a stage discards
 * the artifacts of every later stage, so re-running a stage never leaves
 * stale frames or documents behind.
 *
 * Each session owns a private temp directory and an AbortController.
 * destroy() aborts in-flight work, deletes the directory and makes the
 * session reject every further operation; results that arrive afterwards
 * are dropped.
 */

import { mkdtemp, rm } from 'fs/promises';
import { join } from 'path';

import type {
  AudioHandle,
  Frame,
  Moment,
  SopDocument,
  TranscriptSegment,
  VideoHandle,
} from '../shared/types.js';
import type { FrameOutcome } from '../pipeline/FrameExtractor.js';
import type { WrittenDocument } from '../output/DocumentBuilder.js';
import type { DriveCredentials, DriveFile } from '../integrations/drive/types.js';
import {
  PipelineError,
  SessionClosedError,
  StageOrderError,
  STAGE_LABELS,
  describeError,
  type PipelineStage,
} from '../shared/errors.js';
import { createId } from '../shared/ids.js';
import { createLogger } from '../utils/Logger.js';

const log = createLogger('Session');

// ============================================================================
// States
// ============================================================================

export const SESSION_STATES = [
  'idle',
  'uploaded',
  'audio-extracted',
  'transcribed',
  'moments-proposed',
  'moments-confirmed',
  'frames-extracted',
  'document-generated',
  'exported',
] as const;

export type SessionState = (typeof SESSION_STATES)[number];

export type SessionStatus =
  | { state: SessionState }
  | { state: 'error'; stage: PipelineStage; error: PipelineError; progress: SessionState }
  | { state: 'destroyed' };

/** State a stage needs before it can run */
export const STAGE_REQUIRES: Record<PipelineStage, SessionState> = {
  ingest: 'idle',
  audio: 'uploaded',
  transcription: 'audio-extracted',
  moments: 'transcribed',
  review: 'moments-proposed',
  frames: 'moments-confirmed',
  generation: 'frames-extracted',
  export: 'document-generated',
  upload: 'exported',
};

function rank(state: SessionState): number {
  return SESSION_STATES.indexOf(state);
}

// ============================================================================
// Artifacts
// ============================================================================

export interface SessionArtifacts {
  video?: VideoHandle;
  audio?: AudioHandle;
  transcript?: TranscriptSegment[];
  /** Proposed moments, then the reviewed list */
  moments?: Moment[];
  momentWarnings: string[];
  confirmedMoments?: Moment[];
  frameOutcomes?: FrameOutcome[];
  document?: SopDocument;
  exported?: WrittenDocument;
  upload?: DriveFile;
}

/** State at which each artifact is produced */
const ARTIFACT_STATES: Record<Exclude<keyof SessionArtifacts, 'momentWarnings'>, SessionState> = {
  video: 'uploaded',
  audio: 'audio-extracted',
  transcript: 'transcribed',
  moments: 'moments-proposed',
  confirmedMoments: 'moments-confirmed',
  frameOutcomes: 'frames-extracted',
  document: 'document-generated',
  exported: 'exported',
  upload: 'exported',
};

// ============================================================================
// Snapshot
// ============================================================================

export interface SessionSnapshot {
  id: string;
  state: SessionState | 'error' | 'destroyed';
  progress: SessionState;
  createdAt: string;
  error?: { stage: PipelineStage; code: string; message: string; remediation: string };
  video?: Omit<VideoHandle, 'path'>;
  audio?: { durationSeconds: number; sampleRate: number };
  transcript?: TranscriptSegment[];
  moments?: Moment[];
  momentWarnings: string[];
  confirmedMoments?: Moment[];
  frames?: Array<
    | { momentId: string; ok: true; frameId: string; timestamp: number; approximate: boolean; path: string }
    | { momentId: string; ok: false; error: string }
  >;
  document?: SopDocument;
  exported?: WrittenDocument;
  upload?: DriveFile;
  driveAuthenticated: boolean;
}

// ============================================================================
// Session Class
// ============================================================================

export interface CreateSessionOptions {
  /** Parent directory for the session's temp directory */
  baseDir: string;
  id?: string;
  now?: () => Date;
}

export class Session {
  readonly id: string;
  readonly workDir: string;
  readonly createdAt: Date;

  private controller = new AbortController();
  private progress: SessionState = 'idle';
  private failure: { stage: PipelineStage; error: PipelineError } | null = null;
  private destroyed = false;
  private running: PipelineStage | null = null;
  private artifactStore: SessionArtifacts = { momentWarnings: [] };
  private credentials: DriveCredentials | null = null;

  private constructor(id: string, workDir: string, createdAt: Date) {
    this.id = id;
    this.workDir = workDir;
    this.createdAt = createdAt;
  }

  static async create(options: CreateSessionOptions): Promise<Session> {
    const workDir = await mkdtemp(join(options.baseDir, 'procdoc-'));
    const createdAt = options.now ? options.now() : new Date();
    const session = new Session(options.id ?? createId('session'), workDir, createdAt);
    log.info(`Session ${session.id} created in ${workDir}`);
    return session;
  }

  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  get status(): SessionStatus {
    if (this.destroyed) return { state: 'destroyed' };
    if (this.failure) {
      return { state: 'error', stage: this.failure.stage, error: this.failure.error, progress: this.progress };
    }
    return { state: this.progress };
  }

  get state(): SessionState | 'error' | 'destroyed' {
    return this.status.state;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get artifacts(): Readonly<SessionArtifacts> {
    return this.artifactStore;
  }

  get driveCredentials(): DriveCredentials | null {
    return this.credentials;
  }

  hasReached(state: SessionState): boolean {
    return rank(this.progress) >= rank(state);
  }

  assertActive(stage: PipelineStage): void {
    if (this.destroyed) {
      throw new SessionClosedError(stage);
    }
  }

  /**
   * Check that a stage may start now.
   */
  assertCanRun(stage: PipelineStage): void {
    this.assertActive(stage);
    if (this.running) {
      throw new StageOrderError(stage, `${STAGE_LABELS[this.running]} is still running`);
    }
    const required = STAGE_REQUIRES[stage];
    if (!this.hasReached(required)) {
      throw new StageOrderError(
        stage,
        `${STAGE_LABELS[stage]} needs the session to be at least "${required}" (currently "${this.progress}")`
      );
    }
  }

  /**
   * Mark a stage as running. Returns the session's abort signal.
   */
  begin(stage: PipelineStage): AbortSignal {
    this.assertCanRun(stage);
    this.running = stage;
    return this.controller.signal;
  }

  /**
   * Record a stage result. Drops every artifact produced after `state`,
   * overwrites the ones given and moves progress to `state`. Returns false
   * (and changes nothing) once the session is destroyed.
   */
  complete(stage: PipelineStage, state: SessionState, artifacts: Partial<SessionArtifacts>): boolean {
    if (this.running === stage) this.running = null;
    if (this.destroyed) {
      log.warn(`Discarding ${stage} result for destroyed session ${this.id}`);
      return false;
    }

    this.invalidateAfter(state);
    this.artifactStore = { ...this.artifactStore, ...artifacts };
    this.progress = state;
    this.failure = null;
    return true;
  }

  /**
   * Move to error(stage, cause). Earlier artifacts are kept so the stage can
   * be retried.
   */
  fail(stage: PipelineStage, error: PipelineError): void {
    if (this.running === stage) this.running = null;
    if (this.destroyed) return;
    this.failure = { stage, error };
    log.error(`Session ${this.id}: ${error.toString()}`);
  }

  /**
   * Replace the reviewed moment list. Any confirmation and everything built
   * from it is discarded, returning the session to moments-proposed.
   */
  setMoments(moments: Moment[]): void {
    this.assertCanRun('review');
    this.complete('review', 'moments-proposed', { moments });
  }

  setDriveCredentials(credentials: DriveCredentials): void {
    this.assertActive('upload');
    this.credentials = credentials;
  }

  // --------------------------------------------------------------------------
  // Teardown
  // --------------------------------------------------------------------------

  /**
   * Abort in-flight work and delete the session directory. Safe to call
   * more than once.
   */
  async destroy(reason = 'Session closed'): Promise<void> {
    if (this.destroyed) return;
    const interrupted = this.running ?? 'ingest';
    this.destroyed = true;
    this.running = null;
    this.credentials = null;
    this.controller.abort(new SessionClosedError(interrupted, reason));

    try {
      await rm(this.workDir, { recursive: true, force: true });
      log.info(`Session ${this.id} destroyed; removed ${this.workDir}`);
    } catch (error) {
      log.error(`Session ${this.id}: could not remove ${this.workDir}: ${describeError(error)}`);
      throw error;
    }
  }

  // --------------------------------------------------------------------------
  // Snapshot
  // --------------------------------------------------------------------------

  snapshot(): SessionSnapshot {
    const a = this.artifactStore;
    const status = this.status;
    const snapshot: SessionSnapshot = {
      id: this.id,
      state: status.state,
      progress: this.progress,
      createdAt: this.createdAt.toISOString(),
      momentWarnings: [...a.momentWarnings],
      driveAuthenticated: this.credentials !== null,
    };

    if (status.state === 'error') {
      snapshot.error = {
        stage: status.stage,
        code: status.error.code,
        message: status.error.message,
        remediation: status.error.remediation,
      };
    }
    if (a.video) {
      const { path: _path, ...video } = a.video;
      snapshot.video = video;
    }
    if (a.audio) snapshot.audio = { durationSeconds: a.audio.durationSeconds, sampleRate: a.audio.sampleRate };
    if (a.transcript) snapshot.transcript = a.transcript;
    if (a.moments) snapshot.moments = a.moments;
    if (a.confirmedMoments) snapshot.confirmedMoments = a.confirmedMoments;
    if (a.frameOutcomes) {
      snapshot.frames = a.frameOutcomes.map((outcome) =>
        outcome.result.ok
          ? {
              momentId: outcome.momentId,
              ok: true as const,
              frameId: outcome.result.value.id,
              timestamp: outcome.result.value.timestamp,
              approximate: outcome.result.value.approximate,
              path: outcome.result.value.path,
            }
          : { momentId: outcome.momentId, ok: false as const, error: outcome.result.error.message }
      );
    }
    if (a.document) snapshot.document = a.document;
    if (a.exported) snapshot.exported = a.exported;
    if (a.upload) snapshot.upload = a.upload;
    return snapshot;
  }

  /**
   * Frames that were extracted, in moment order.
   */
  frames(): Frame[] {
    return (this.artifactStore.frameOutcomes ?? []).flatMap((outcome) =>
      outcome.result.ok ? [outcome.result.value] : []
    );
  }

  // --------------------------------------------------------------------------
  // Private
  // --------------------------------------------------------------------------

  private invalidateAfter(state: SessionState): void {
    const keep = rank(state);
    const next: SessionArtifacts = { ...this.artifactStore };
    for (const [key, producedAt] of Object.entries(ARTIFACT_STATES)) {
      if (rank(producedAt) > keep && isArtifactKey(key)) {
        delete next[key];
      }
    }
    if (rank('moments-proposed') > keep) {
      next.momentWarnings = [];
    }
    this.artifactStore = next;
  }
}

function isArtifactKey(key: string): key is Exclude<keyof SessionArtifacts, 'momentWarnings'> {
  return key in ARTIFACT_STATES;
}
