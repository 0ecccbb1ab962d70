/**
 * CLIPipeline.ts - Non-interactive run of the SOP pipeline
 *
 * Drives one session through every stage for the `procdoc` CLI. Review is
 * either skipped (proposed moments are confirmed as-is) or supplied up front
 * as a reviewed moments file, typically written earlier by `procdoc moments`.
 * The session's temp directory is always removed when the run ends.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';

import type { SessionPipeline } from '../session/SessionPipeline.js';
import type { Session } from '../session/Session.js';
import type { DriveFile } from '../integrations/drive/types.js';
import { ReviewedMomentSchema, type ReviewedMoment } from '../pipeline/MomentEditor.js';
import { PipelineError, describeError, type ErrorSeverity } from '../shared/errors.js';
import { formatTimestamp, parseTimestamp } from '../shared/time.js';
import type { Moment } from '../shared/types.js';

// ============================================================================
// Types
// ============================================================================

export interface CLIPipelineOptions {
  videoPath: string;
  outputDir: string;
  language?: string;
  title?: string;
  /** Reviewed moments to use instead of the proposed ones */
  momentsFile?: string;
  upload: boolean;
  /** Google authorization code for the upload */
  authCode?: string;
  folderId?: string;
}

export interface CLIPipelineDeps {
  pipeline: SessionPipeline;
  createSession: () => Promise<Session>;
}

export interface CLIPipelineResult {
  outputPath: string;
  momentCount: number;
  stepCount: number;
  imageCount: number;
  approximateFrames: number;
  failedFrames: number;
  degraded: boolean;
  warnings: string[];
  upload?: DriveFile;
  durationSeconds: number;
}

export interface CLIMomentsResult {
  moments: Moment[];
  warnings: string[];
  outputPath?: string;
}

type LogFn = (message: string) => void;

// ============================================================================
// Exit code constants
// ============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;

// ============================================================================
// Errors
// ============================================================================

export class CLIPipelineError extends Error {
  readonly severity: ErrorSeverity;

  constructor(message: string, severity: ErrorSeverity, options: { cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CLIPipelineError';
    this.severity = severity;
  }
}

function toCliError(error: unknown): CLIPipelineError {
  if (error instanceof CLIPipelineError) return error;
  if (error instanceof PipelineError) {
    return new CLIPipelineError(error.toUserMessage(), error.severity, { cause: error });
  }
  return new CLIPipelineError(describeError(error), 'system', { cause: error });
}

// ============================================================================
// Reviewed moments file
// ============================================================================

const FileTimestampSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const seconds = typeof value === 'number' ? value : parseTimestamp(value);
  if (seconds === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unreadable timestamp "${value}"` });
    return z.NEVER;
  }
  return seconds;
});

const FileMomentSchema = z.object({
  id: z.string().optional(),
  timestamp: FileTimestampSchema,
  description: z.string(),
  navigationPath: z.string().optional(),
});

const MomentsFileSchema = z.union([
  z.array(FileMomentSchema),
  z.object({ moments: z.array(FileMomentSchema) }).transform((file) => file.moments),
]);

/**
 * Read a reviewed moments file. Accepts a bare list or the `{ moments }`
 * object written by `procdoc moments`; timestamps may be seconds or MM:SS.
 */
export async function loadMomentsFile(path: string): Promise<ReviewedMoment[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new CLIPipelineError(`Cannot read moments file ${path}: ${describeError(error)}`, 'user', {
      cause: error,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new CLIPipelineError(`Moments file ${path} is not valid JSON`, 'user', { cause: error });
  }

  const parsed = MomentsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new CLIPipelineError(`Moments file ${path} is invalid: ${formatIssues(parsed.error)}`, 'user');
  }

  const reviewed = z.array(ReviewedMomentSchema).safeParse(parsed.data);
  if (!reviewed.success) {
    throw new CLIPipelineError(`Moments file ${path} is invalid: ${formatIssues(reviewed.error)}`, 'user');
  }
  if (reviewed.data.length === 0) {
    throw new CLIPipelineError(`Moments file ${path} lists no moments`, 'user');
  }
  return reviewed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * JSON written by `procdoc moments`, readable again by `--moments`.
 * Timestamps are seconds to the millisecond.
 */
export function serializeMoments(moments: Moment[], warnings: string[]): string {
  const file = {
    moments: moments.map((moment) => ({
      id: moment.id,
      timestamp: Math.round(moment.timestamp * 1000) / 1000,
      description: moment.description,
      ...(moment.navigationPath ? { navigationPath: moment.navigationPath } : {}),
    })),
    warnings,
  };
  return `${JSON.stringify(file, null, 2)}\n`;
}

// ============================================================================
// CLIPipeline Class
// ============================================================================

export class CLIPipeline {
  private session: Session | null = null;
  private aborted = false;

  constructor(
    private deps: CLIPipelineDeps,
    private options: CLIPipelineOptions,
    private log: LogFn,
    private progress: LogFn = () => {}
  ) {}

  /**
   * Run every stage through export (and upload, when asked for).
   */
  async run(): Promise<CLIPipelineResult> {
    const startTime = Date.now();
    const reviewed = this.options.momentsFile ? await loadMomentsFile(this.options.momentsFile) : undefined;
    if (this.options.upload && !this.deps.pipeline.driveEnabled) {
      throw new CLIPipelineError(
        'Google Drive upload is not configured. Set GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REDIRECT_URI.',
        'user'
      );
    }

    return this.withSession(async (session) => {
      const { pipeline } = this.deps;
      // Authorization codes are short-lived: exchange before the slow stages.
      if (this.options.upload) {
        await this.authorizeDrive(session);
      }
      const warnings = await this.runThroughProposal(session, reviewed);
      const confirmed = pipeline.confirmMoments(session);

      this.progress(`Extracting ${confirmed.length} frame(s)...`);
      const outcomes = await pipeline.extractFrames(session);
      let approximateFrames = 0;
      let failedFrames = 0;
      for (const outcome of outcomes) {
        if (outcome.result.ok) {
          if (outcome.result.value.approximate) approximateFrames++;
        } else {
          failedFrames++;
          warnings.push(outcome.result.error.message);
        }
      }
      this.log(`  ${outcomes.length - failedFrames} frame(s) extracted, ${approximateFrames} approximate`);

      this.progress('Writing the SOP...');
      const document = await pipeline.generateDocument(session, { title: this.options.title });
      warnings.push(...document.warnings);

      this.progress('Exporting .docx...');
      const exported = await pipeline.exportDocument(session, { outputDir: this.options.outputDir });

      let upload: DriveFile | undefined;
      if (this.options.upload) {
        this.progress('Uploading to Google Drive...');
        upload = await pipeline.upload(session, { folderId: this.options.folderId });
      }

      return {
        outputPath: exported.path,
        momentCount: confirmed.length,
        stepCount: exported.stepCount,
        imageCount: exported.imageCount,
        approximateFrames,
        failedFrames,
        degraded: document.degraded,
        warnings,
        upload,
        durationSeconds: (Date.now() - startTime) / 1000,
      };
    });
  }

  /**
   * Run up to the proposed moments and optionally write them to a file for
   * review.
   */
  async proposeMoments(outputPath?: string): Promise<CLIMomentsResult> {
    return this.withSession(async (session) => {
      const warnings = await this.runThroughProposal(session);
      const moments = session.artifacts.moments ?? [];

      if (!outputPath) {
        return { moments, warnings };
      }
      try {
        await mkdir(dirname(outputPath), { recursive: true });
        await writeFile(outputPath, serializeMoments(moments, warnings), 'utf-8');
      } catch (error) {
        throw new CLIPipelineError(`Failed to write moments file ${outputPath}: ${describeError(error)}`, 'system', {
          cause: error,
        });
      }
      return { moments, warnings, outputPath };
    });
  }

  /**
   * Stop the run: cancels the running stage and removes the session's files.
   */
  async abort(): Promise<void> {
    this.aborted = true;
    if (this.session) {
      await this.session.destroy('Interrupted');
    }
  }

  // --------------------------------------------------------------------------
  // Private
  // --------------------------------------------------------------------------

  private async withSession<T>(body: (session: Session) => Promise<T>): Promise<T> {
    if (this.aborted) {
      throw new CLIPipelineError('Run was interrupted', 'user');
    }
    const session = await this.deps.createSession();
    this.session = session;
    try {
      return await body(session);
    } catch (error) {
      throw toCliError(error);
    } finally {
      this.session = null;
      await session.destroy('CLI run finished');
    }
  }

  private async runThroughProposal(session: Session, reviewed?: ReviewedMoment[]): Promise<string[]> {
    const { pipeline } = this.deps;

    this.progress('Reading video...');
    const video = await pipeline.ingest(session, this.options.videoPath);
    this.log(
      `  ${video.originalName}: ${video.durationSeconds.toFixed(1)}s, ${video.width}x${video.height}, ` +
        `${video.frameRate.toFixed(2)} fps`
    );

    this.progress('Extracting audio...');
    await pipeline.extractAudio(session);

    this.progress('Transcribing (this may take a while)...');
    const segments = await pipeline.transcribe(session, { language: this.options.language });
    this.log(`  ${segments.length} transcript segment(s)`);

    if (reviewed) {
      this.progress('Loading reviewed moments...');
      const moments = await pipeline.useReviewedMoments(session, reviewed);
      this.log(`  Using ${moments.length} reviewed moment(s) from ${this.options.momentsFile}`);
      return [];
    }

    this.progress('Finding key moments...');
    const { moments, warnings } = await pipeline.proposeMoments(session);
    this.log(`  Found ${moments.length} key moment(s)`);
    for (const moment of moments) {
      this.log(`    [${formatTimestamp(moment.timestamp)}] ${moment.description}`);
    }
    return [...warnings];
  }

  private async authorizeDrive(session: Session): Promise<void> {
    const { pipeline } = this.deps;
    if (!this.options.authCode) {
      throw new CLIPipelineError(
        'Google Drive authorization required. Open this URL, approve access, then rerun with ' +
          `--auth-code <code>:\n  ${pipeline.driveAuthUrl(session)}`,
        'user'
      );
    }
    await pipeline.authenticateDrive(session, this.options.authCode);
  }
}
