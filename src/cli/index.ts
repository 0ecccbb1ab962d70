#!/usr/bin/env node
/**
 * procdoc CLI - Turn narrated screen recordings into SOP documents
 *
 * Usage:
 *   procdoc document <video-file> [options]
 *   procdoc moments <video-file> [--out moments.json]
 *   procdoc doctor
 *
 * `document` runs the whole pipeline:
 *   1. Copy and probe the video
 *   2. Extract audio and transcribe with Deepgram
 *   3. Find key moments in the transcript
 *   4. Extract a frame per moment
 *   5. Write the SOP and export it as .docx (optionally upload to Drive)
 *
 * To review moments first, run `procdoc moments`, edit the JSON file, then
 * pass it to `procdoc document --moments <file>`.
 */

import { resolve } from 'path';
import { Command } from 'commander';

import { loadConfigFromEnvironment, type AppConfig } from '../config/config.js';
import { FfmpegToolkit } from '../media/MediaToolkit.js';
import { Session } from '../session/Session.js';
import { SessionPipeline } from '../session/SessionPipeline.js';
import { formatTimestamp } from '../shared/time.js';
import { configureLogging } from '../utils/Logger.js';
import { VERSION } from '../version.js';
import {
  CLIPipeline,
  CLIPipelineError,
  type CLIPipelineOptions,
  EXIT_SUCCESS,
  EXIT_USER_ERROR,
  EXIT_SYSTEM_ERROR,
  EXIT_SIGINT,
} from './CLIPipeline.js';
import { runDoctorChecks } from './doctor.js';

// ============================================================================
// Console output helpers
// ============================================================================

const SYMBOLS = {
  check: '✔',
  cross: '✘',
  warn: '⚠',
  arrow: '→',
  bullet: '•',
  line: '─',
} as const;

function banner(): void {
  console.log();
  console.log(`  procdoc v${VERSION} ${SYMBOLS.bullet} SOPs from screen recordings`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

function success(message: string): void {
  console.log(`  ${SYMBOLS.check} ${message}`);
}

function warn(message: string): void {
  console.log(`  ${SYMBOLS.warn} ${message}`);
}

function fail(message: string): void {
  console.log(`  ${SYMBOLS.cross} ${message}`);
}

// ============================================================================
// Setup
// ============================================================================

const toolkit = new FfmpegToolkit();
let activePipeline: CLIPipeline | null = null;

function setupSignalHandlers(): void {
  const handler = async () => {
    console.log('\n  Interrupted, cleaning up...');
    toolkit.killAll();
    try {
      if (activePipeline) {
        await activePipeline.abort();
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      fail(`Cleanup failed: ${message}`);
    }
    process.exit(EXIT_SIGINT);
  };

  process.on('SIGINT', () => void handler());
  process.on('SIGTERM', () => void handler());
}

function loadConfigOrExit(verbose: boolean): AppConfig {
  try {
    const config = loadConfigFromEnvironment();
    configureLogging({
      // info-level pipeline logs would interleave with the progress lines
      level: verbose ? 'debug' : config.logging.level === 'info' ? 'warn' : config.logging.level,
      file: config.logging.file,
      stderr: true,
    });
    return config;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    fail(message);
    process.exit(EXIT_USER_ERROR);
  }
}

function createPipeline(config: AppConfig, options: CLIPipelineOptions, verbose: boolean) {
  const pipeline = new SessionPipeline(config, { toolkit });
  return new CLIPipeline(
    { pipeline, createSession: () => Session.create({ baseDir: config.workDir }) },
    options,
    verbose ? step : () => {},
    step // progress, always visible
  );
}

function exitWithError(error: unknown, verbose: boolean): never {
  console.log();
  const message = error instanceof Error ? error.message : String(error);
  fail(message);

  if (verbose && error instanceof Error && error.stack) {
    console.log();
    console.log(error.stack);
  }

  const exitCode =
    error instanceof CLIPipelineError && error.severity === 'user' ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR;
  process.exit(exitCode);
}

setupSignalHandlers();

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('procdoc')
  .description('Generate step-by-step SOP documents (.docx) from narrated screen recordings')
  .version(VERSION, '-v, --version')
  .showHelpAfterError('(use --help for available options)');

// ============================================================================
// document command
// ============================================================================

program
  .command('document')
  .description('Process a recording end to end and export the SOP as .docx')
  .argument('<video-file>', 'Screen recording (MP4, MOV, AVI, WebM or MKV)')
  .option('--output <dir>', 'Output directory', './procdoc-output')
  .option('--title <title>', 'Document title (default: generated)')
  .option('--language <code>', 'Transcription language, e.g. en or de')
  .option('--moments <file>', 'Reviewed moments JSON (from `procdoc moments`) to use instead of detection')
  .option('--upload', 'Upload the .docx to Google Drive', false)
  .option('--auth-code <code>', 'Google authorization code for --upload')
  .option('--folder <id>', 'Google Drive folder id for --upload')
  .option('--verbose', 'Verbose output', false)
  .action(
    async (
      videoFile: string,
      options: {
        output: string;
        title?: string;
        language?: string;
        moments?: string;
        upload: boolean;
        authCode?: string;
        folder?: string;
        verbose: boolean;
      }
    ) => {
      banner();
      const config = loadConfigOrExit(options.verbose);

      const videoPath = resolve(videoFile);
      const outputDir = resolve(options.output);
      step(`Video:  ${videoPath}`);
      step(`Output: ${outputDir}`);
      console.log();

      const pipeline = createPipeline(
        config,
        {
          videoPath,
          outputDir,
          title: options.title,
          language: options.language ?? config.language,
          momentsFile: options.moments ? resolve(options.moments) : undefined,
          upload: options.upload,
          authCode: options.authCode,
          folderId: options.folder,
        },
        options.verbose
      );
      activePipeline = pipeline;

      try {
        const result = await pipeline.run();

        console.log();
        success('SOP exported!');
        console.log();
        console.log(`  Moments:         ${result.momentCount}`);
        console.log(`  Steps:           ${result.stepCount}`);
        console.log(`  Screenshots:     ${result.imageCount}`);
        if (result.approximateFrames > 0) {
          console.log(`  Approximate:     ${result.approximateFrames} (timestamp past the end of the video)`);
        }
        console.log(`  Processing time: ${result.durationSeconds.toFixed(1)}s`);
        if (result.degraded) {
          console.log();
          warn('The narrative could not be generated; the document is an outline draft.');
        }
        if (result.warnings.length > 0) {
          console.log();
          for (const message of result.warnings) {
            warn(message);
          }
        }
        if (result.upload) {
          console.log();
          success(`Uploaded to Google Drive: ${result.upload.webViewLink ?? result.upload.id}`);
        }
        console.log();
        // Stable prefix so scripts can `grep '^OUTPUT:'`
        console.log(`  Output: ${result.outputPath}`);
        console.log(`OUTPUT:${result.outputPath}`);
        console.log();
      } catch (error) {
        exitWithError(error, options.verbose);
      } finally {
        activePipeline = null;
      }
    }
  );

// ============================================================================
// moments command
// ============================================================================

program
  .command('moments')
  .description('Detect key moments and write them to a JSON file for review')
  .argument('<video-file>', 'Screen recording (MP4, MOV, AVI, WebM or MKV)')
  .option('--out <file>', 'Where to write the moments JSON', './procdoc-moments.json')
  .option('--language <code>', 'Transcription language, e.g. en or de')
  .option('--verbose', 'Verbose output', false)
  .action(async (videoFile: string, options: { out: string; language?: string; verbose: boolean }) => {
    banner();
    const config = loadConfigOrExit(options.verbose);

    const pipeline = createPipeline(
      config,
      {
        videoPath: resolve(videoFile),
        outputDir: config.workDir,
        language: options.language ?? config.language,
        upload: false,
      },
      options.verbose
    );
    activePipeline = pipeline;

    try {
      const result = await pipeline.proposeMoments(resolve(options.out));

      console.log();
      success(`Found ${result.moments.length} moment(s)`);
      for (const moment of result.moments) {
        step(`[${formatTimestamp(moment.timestamp)}] ${moment.description}`);
      }
      for (const message of result.warnings) {
        warn(message);
      }
      console.log();
      console.log('  Edit the file, then run: procdoc document <video-file> --moments <file>');
      console.log(`OUTPUT:${result.outputPath ?? ''}`);
      console.log();
    } catch (error) {
      exitWithError(error, options.verbose);
    } finally {
      activePipeline = null;
    }
  });

// ============================================================================
// doctor command
// ============================================================================

program
  .command('doctor')
  .description('Check that ffmpeg, API keys and the work directory are ready')
  .action(async () => {
    banner();
    const config = loadConfigOrExit(false);
    const result = await runDoctorChecks(config);

    for (const check of result.checks) {
      const line = `${check.name}: ${check.message}`;
      if (check.status === 'pass') success(line);
      else if (check.status === 'warn') warn(line);
      else fail(line);
      if (check.hint && check.status !== 'pass') {
        for (const hint of check.hint.split('\n')) {
          console.log(`      ${hint}`);
        }
      }
    }

    console.log();
    console.log(`  ${result.passed} passed, ${result.warned} warning(s), ${result.failed} failed`);
    console.log();
    process.exit(result.failed > 0 ? EXIT_USER_ERROR : EXIT_SUCCESS);
  });

// Show help if no command provided
if (process.argv.length <= 2) {
  banner();
  program.outputHelp();
  process.exit(EXIT_SUCCESS);
}

await program.parseAsync();
