/**
 * SessionPipeline - Runs pipeline stages against a Session
 *
 * Each public method is one stage. A stage checks that the session has
 * reached the state it needs, runs with the session's AbortSignal, and on
 * success stores its artifacts; on failure the session moves to
 * error(stage, cause) with earlier artifacts intact, so calling the same
 * method again retries only that stage.
 *
 * External clients are created lazily so a missing API key surfaces as a
 * configuration error of the stage that needs it.
 */

import type { AppConfig } from '../config/config.js';
import { requireApiKey } from '../config/config.js';
import { AnthropicClient, type LlmClient } from '../ai/AnthropicClient.js';
import { DocumentGenerator } from '../ai/DocumentGenerator.js';
import type { MediaToolkit } from '../media/MediaToolkit.js';
import { MediaIngest } from '../pipeline/MediaIngest.js';
import { AudioExtractor } from '../pipeline/AudioExtractor.js';
import { MomentAnalyzer } from '../pipeline/MomentAnalyzer.js';
import {
  applyMomentEdits,
  replaceMoments,
  validateForConfirmation,
  type MomentEdit,
  type ReviewedMoment,
} from '../pipeline/MomentEditor.js';
import { FrameExtractor } from '../pipeline/FrameExtractor.js';
import {
  DeepgramSpeechToText,
  TranscriptionClient,
  type SpeechToText,
} from '../transcription/TranscriptionClient.js';
import { writeDocument, type WrittenDocument } from '../output/DocumentBuilder.js';
import { DriveUploader } from '../integrations/drive/DriveUploader.js';
import type { DriveClient, DriveFile } from '../integrations/drive/types.js';
import type {
  AudioHandle,
  Moment,
  MomentFramePair,
  SopDocument,
  TranscriptSegment,
  VideoHandle,
} from '../shared/types.js';
import {
  PipelineError,
  SessionClosedError,
  StageOrderError,
  STAGE_LABELS,
  describeError,
  type PipelineStage,
} from '../shared/errors.js';
import { createId, type IdFactory } from '../shared/ids.js';
import { RetryPolicy } from '../utils/RetryPolicy.js';
import { createLogger } from '../utils/Logger.js';
import type { Session, SessionArtifacts, SessionState } from './Session.js';
import type { FrameOutcome } from '../pipeline/FrameExtractor.js';

const log = createLogger('SessionPipeline');

// ============================================================================
// Types
// ============================================================================

export interface SessionPipelineDeps {
  toolkit: MediaToolkit;
  /** Overrides the Anthropic client (tests, alternative providers) */
  llm?: LlmClient;
  /** Overrides the Deepgram provider */
  speechToText?: SpeechToText;
  driveClient?: DriveClient;
  idFactory?: IdFactory;
  now?: () => Date;
}

export interface ExportOptions {
  outputDir: string;
  fileName?: string;
}

export interface GenerateOptions {
  title?: string;
}

// ============================================================================
// Helpers
// ============================================================================

function toStageError(stage: PipelineStage, error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new PipelineError(
      `${STAGE_LABELS[stage]} timed out or was cancelled: ${error.message}`,
      'STAGE_TIMEOUT',
      stage,
      'Retry the stage; if it keeps timing out, raise the stage timeout in your configuration.',
      { cause: error }
    );
  }
  return new PipelineError(
    `${STAGE_LABELS[stage]} failed: ${describeError(error)}`,
    'STAGE_FAILED',
    stage,
    'Retry the stage. Run `procdoc doctor` if the problem persists.',
    { cause: error }
  );
}

function requireArtifact<T>(value: T | undefined, stage: PipelineStage, what: string): T {
  if (value === undefined) {
    throw new StageOrderError(stage, `No ${what} in this session yet`);
  }
  return value;
}

/**
 * Pair every confirmed moment with its extracted frame, if any.
 */
export function pairMomentsWithFrames(moments: Moment[], outcomes: FrameOutcome[]): MomentFramePair[] {
  const frames = new Map(
    outcomes.flatMap((outcome) => (outcome.result.ok ? [[outcome.momentId, outcome.result.value] as const] : []))
  );
  return moments.map((moment) => {
    const frame = frames.get(moment.id);
    return frame ? { moment, frame } : { moment };
  });
}

// ============================================================================
// SessionPipeline Class
// ============================================================================

export class SessionPipeline {
  private ingestStage: MediaIngest;
  private audioStage: AudioExtractor;
  private frameStage: FrameExtractor;
  private drive: DriveUploader;
  private idFactory: IdFactory;
  private now: () => Date;

  private transcriptionClient: TranscriptionClient | null = null;
  private llmClient: LlmClient | null;

  constructor(
    private config: AppConfig,
    private deps: SessionPipelineDeps
  ) {
    this.ingestStage = new MediaIngest(deps.toolkit);
    this.audioStage = new AudioExtractor(deps.toolkit);
    this.frameStage = new FrameExtractor(deps.toolkit, {
      frameTimeoutMs: config.timeouts.frameMs,
      concurrency: config.frameConcurrency,
    });
    this.drive = new DriveUploader(config.drive, deps.driveClient, this.retryPolicy());
    this.idFactory = deps.idFactory ?? createId;
    this.now = deps.now ?? (() => new Date());
    this.llmClient = deps.llm ?? null;
  }

  get driveEnabled(): boolean {
    return this.drive.enabled;
  }

  // --------------------------------------------------------------------------
  // Stages
  // --------------------------------------------------------------------------

  async ingest(session: Session, sourcePath: string): Promise<VideoHandle> {
    return this.runStage(session, 'ingest', 'uploaded', async (signal) => {
      const video = await this.ingestStage.ingest({ sourcePath, workDir: session.workDir, signal });
      return { value: video, artifacts: { video } };
    });
  }

  async extractAudio(session: Session): Promise<AudioHandle> {
    return this.runStage(session, 'audio', 'audio-extracted', async (signal) => {
      const video = requireArtifact(session.artifacts.video, 'audio', 'video');
      const audio = await this.audioStage.extract({ video, workDir: session.workDir, signal });
      return { value: audio, artifacts: { audio } };
    });
  }

  async transcribe(session: Session, options: { language?: string } = {}): Promise<TranscriptSegment[]> {
    return this.runStage(session, 'transcription', 'transcribed', async (signal) => {
      const audio = requireArtifact(session.artifacts.audio, 'transcription', 'extracted audio');
      const transcript = await this.transcription().transcribe({
        audio,
        language: options.language ?? this.config.language,
        signal,
      });
      return { value: transcript, artifacts: { transcript } };
    });
  }

  async proposeMoments(session: Session): Promise<{ moments: Moment[]; warnings: string[] }> {
    return this.runStage(session, 'moments', 'moments-proposed', async (signal) => {
      const segments = requireArtifact(session.artifacts.transcript, 'moments', 'transcript');
      const analyzer = new MomentAnalyzer(this.llm('moments'), {
        idFactory: this.idFactory,
        timeoutMs: this.config.timeouts.analysisMs,
      });
      const result = await analyzer.analyze({ segments, signal });
      return {
        value: result,
        artifacts: { moments: result.moments, momentWarnings: result.warnings },
      };
    });
  }

  /**
   * Apply edits to the current moment list. Returns the session to
   * moments-proposed when it had moved past it.
   */
  editMoments(session: Session, edits: MomentEdit[]): Moment[] {
    session.assertCanRun('review');
    const moments = applyMomentEdits(session.artifacts.moments ?? [], edits, this.idFactory);
    session.setMoments(moments);
    return moments;
  }

  /**
   * Complete moment proposal with an already reviewed list (CLI --moments
   * file) instead of asking the model.
   */
  async useReviewedMoments(session: Session, reviewed: ReviewedMoment[]): Promise<Moment[]> {
    return this.runStage(session, 'moments', 'moments-proposed', async () => {
      const moments = replaceMoments([], reviewed, this.idFactory);
      return { value: moments, artifacts: { moments, momentWarnings: [] } };
    });
  }

  confirmMoments(session: Session): Moment[] {
    session.assertCanRun('review');
    const confirmed = validateForConfirmation(session.artifacts.moments ?? []);
    session.complete('review', 'moments-confirmed', { moments: confirmed, confirmedMoments: confirmed });
    log.info(`Session ${session.id}: ${confirmed.length} moment(s) confirmed`);
    return confirmed;
  }

  async extractFrames(session: Session): Promise<FrameOutcome[]> {
    return this.runStage(session, 'frames', 'frames-extracted', async (signal) => {
      const video = requireArtifact(session.artifacts.video, 'frames', 'video');
      const moments = requireArtifact(session.artifacts.confirmedMoments, 'frames', 'confirmed moments');
      const frameOutcomes = await this.frameStage.extract({ video, moments, workDir: session.workDir, signal });
      return { value: frameOutcomes, artifacts: { frameOutcomes } };
    });
  }

  async generateDocument(session: Session, options: GenerateOptions = {}): Promise<SopDocument> {
    return this.runStage(session, 'generation', 'document-generated', async (signal) => {
      const moments = requireArtifact(session.artifacts.confirmedMoments, 'generation', 'confirmed moments');
      const outcomes = requireArtifact(session.artifacts.frameOutcomes, 'generation', 'frames');
      const generator = new DocumentGenerator(this.llm('generation'), {
        maxTokens: this.config.anthropic.maxTokens,
        timeoutMs: this.config.timeouts.generationMs,
      });
      const document = await generator.generate({
        transcript: session.artifacts.transcript ?? [],
        pairs: pairMomentsWithFrames(moments, outcomes),
        title: options.title,
        sourceName: session.artifacts.video?.originalName,
        signal,
      });
      return { value: document, artifacts: { document } };
    });
  }

  async exportDocument(session: Session, options: ExportOptions): Promise<WrittenDocument> {
    return this.runStage(session, 'export', 'exported', async () => {
      const document = requireArtifact(session.artifacts.document, 'export', 'generated document');
      const moments = session.artifacts.confirmedMoments ?? [];
      const exported = await writeDocument({
        document,
        frames: session.frames(),
        outputDir: options.outputDir,
        fileName: options.fileName,
        metadata: {
          generatedAt: this.now(),
          sourceName: session.artifacts.video?.originalName,
          moments: new Map(
            moments.map((m) => [m.id, { timestamp: m.timestamp, navigationPath: m.navigationPath }])
          ),
        },
      });
      return { value: exported, artifacts: { exported, upload: undefined } };
    });
  }

  // --------------------------------------------------------------------------
  // Drive
  // --------------------------------------------------------------------------

  driveAuthUrl(session: Session): string {
    session.assertActive('upload');
    return this.drive.authUrl(session.id);
  }

  async authenticateDrive(session: Session, code: string): Promise<void> {
    session.assertActive('upload');
    const credentials = await this.drive.authenticate(code);
    if (session.isDestroyed) {
      throw new SessionClosedError('upload');
    }
    session.setDriveCredentials(credentials);
  }

  async upload(session: Session, options: { folderId?: string } = {}): Promise<DriveFile> {
    return this.runStage(session, 'upload', 'exported', async () => {
      const exported = requireArtifact(session.artifacts.exported, 'upload', 'exported document');
      const credentials = session.driveCredentials;
      if (!credentials) {
        throw new StageOrderError('upload', 'Authenticate with Google Drive before uploading');
      }
      const upload = await this.drive.upload({ path: exported.path, credentials, folderId: options.folderId });
      return { value: upload, artifacts: { upload } };
    });
  }

  // --------------------------------------------------------------------------
  // Runner
  // --------------------------------------------------------------------------

  private async runStage<T>(
    session: Session,
    stage: PipelineStage,
    resultState: SessionState,
    work: (signal: AbortSignal) => Promise<{ value: T; artifacts: Partial<SessionArtifacts> }>
  ): Promise<T> {
    const signal = session.begin(stage);
    const started = Date.now();
    log.info(`Session ${session.id}: ${STAGE_LABELS[stage]} started`);

    let outcome: { value: T; artifacts: Partial<SessionArtifacts> };
    try {
      outcome = await work(signal);
    } catch (error) {
      if (session.isDestroyed) {
        session.fail(stage, new SessionClosedError(stage));
        throw new SessionClosedError(stage, 'Session was closed while the stage was running');
      }
      const stageError = toStageError(stage, error);
      session.fail(stage, stageError);
      throw stageError;
    }

    if (!session.complete(stage, resultState, outcome.artifacts)) {
      throw new SessionClosedError(stage, 'Session was closed before the stage finished; its result was discarded');
    }
    log.info(`Session ${session.id}: ${STAGE_LABELS[stage]} finished in ${Date.now() - started}ms`);
    return outcome.value;
  }

  // --------------------------------------------------------------------------
  // Clients
  // --------------------------------------------------------------------------

  private retryPolicy(): RetryPolicy {
    return new RetryPolicy({
      maxAttempts: this.config.retry.maxAttempts,
      baseDelayMs: this.config.retry.baseDelayMs,
    });
  }

  private transcription(): TranscriptionClient {
    if (!this.transcriptionClient) {
      const provider =
        this.deps.speechToText ?? new DeepgramSpeechToText(requireApiKey(this.config, 'deepgram'));
      this.transcriptionClient = new TranscriptionClient(
        provider,
        {
          model: this.config.deepgram.model,
          language: this.config.language,
          timeoutMs: this.config.timeouts.transcriptionMs,
        },
        this.retryPolicy()
      );
    }
    return this.transcriptionClient;
  }

  private llm(stage: 'moments' | 'generation'): LlmClient {
    if (!this.llmClient) {
      const { anthropic, timeouts } = this.config;
      this.llmClient = new AnthropicClient(
        requireApiKey(this.config, 'anthropic', stage),
        {
          model: anthropic.model,
          maxTokens: anthropic.maxTokens,
          baseUrl: anthropic.baseUrl,
          timeoutMs: stage === 'moments' ? timeouts.analysisMs : timeouts.generationMs,
        },
        this.retryPolicy()
      );
    }
    return this.llmClient;
  }
}
