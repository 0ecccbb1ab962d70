/**
 * doctor.ts - Environment health check for the procdoc CLI
 *
 * Checks that everything a run needs is in place:
 * - Node.js version
 * - ffmpeg / ffprobe on PATH
 * - Deepgram and Anthropic API keys
 * - Google Drive OAuth settings (optional)
 * - Work directory and its free space
 */

import { constants } from 'fs';
import { access, statfs } from 'fs/promises';
import { execFile as execFileCb } from 'child_process';
import { platform } from 'os';

import type { AppConfig } from '../config/config.js';

// ============================================================================
// Types
// ============================================================================

export interface DoctorCheck {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
  hint?: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  passed: number;
  warned: number;
  failed: number;
}

export interface DoctorDeps {
  /** Run a command, resolving stdout or null when it cannot run */
  exec?: (command: string, args: string[]) => Promise<string | null>;
  nodeVersion?: string;
  /** Free bytes on the volume holding `dir` */
  freeBytes?: (dir: string) => Promise<number>;
}

const MIN_NODE_MAJOR = 20;
const LOW_DISK_BYTES = 1024 ** 3;

// ============================================================================
// Helpers
// ============================================================================

const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
};

function execQuiet(command: string, args: string[]): Promise<string | null> {
  return new Promise((resolve) => {
    execFileCb(command, args, { env: SAFE_CHILD_ENV }, (error, stdout) => {
      resolve(error ? null : stdout.toString().trim());
    });
  });
}

async function statfsFreeBytes(dir: string): Promise<number> {
  const stats = await statfs(dir);
  return stats.bavail * stats.bsize;
}

function installHint(): string {
  const os = platform();
  if (os === 'darwin') return 'brew install ffmpeg';
  if (os === 'win32') return 'winget install ffmpeg (or download from https://ffmpeg.org)';
  return 'apt install ffmpeg (or your package manager)';
}

// ============================================================================
// Check functions
// ============================================================================

export function checkNodeVersion(version: string): DoctorCheck {
  const match = version.match(/^v?(\d+)\.\d+\.\d+/);
  if (!match) {
    return {
      name: 'Node.js',
      status: 'warn',
      message: `Unknown version: ${version}`,
      hint: `procdoc requires Node.js >= ${MIN_NODE_MAJOR}`,
    };
  }
  if (Number.parseInt(match[1], 10) >= MIN_NODE_MAJOR) {
    return { name: 'Node.js', status: 'pass', message: `${version} (>= ${MIN_NODE_MAJOR})` };
  }
  return {
    name: 'Node.js',
    status: 'fail',
    message: `${version} is too old`,
    hint: `procdoc requires Node.js >= ${MIN_NODE_MAJOR}. Upgrade at https://nodejs.org`,
  };
}

async function checkTool(
  tool: 'ffmpeg' | 'ffprobe',
  exec: NonNullable<DoctorDeps['exec']>
): Promise<DoctorCheck> {
  const stdout = await exec(tool, ['-version']);
  if (stdout === null) {
    return {
      name: tool,
      status: 'fail',
      message: 'Not found on PATH',
      hint: tool === 'ffmpeg' ? `Install via: ${installHint()}` : 'ffprobe is usually installed alongside ffmpeg',
    };
  }
  const version = stdout.match(new RegExp(`${tool} version (\\S+)`));
  return { name: tool, status: 'pass', message: `Installed (${version ? version[1] : 'unknown'})` };
}

export function checkApiKeys(config: AppConfig): DoctorCheck[] {
  return [
    config.deepgram.apiKey
      ? { name: 'Deepgram API key', status: 'pass', message: `DEEPGRAM_API_KEY is set (model ${config.deepgram.model})` }
      : {
          name: 'Deepgram API key',
          status: 'fail',
          message: 'DEEPGRAM_API_KEY not set',
          hint: 'Required for transcription. Get a key at https://console.deepgram.com',
        },
    config.anthropic.apiKey
      ? { name: 'Anthropic API key', status: 'pass', message: `ANTHROPIC_API_KEY is set (model ${config.anthropic.model})` }
      : {
          name: 'Anthropic API key',
          status: 'fail',
          message: 'ANTHROPIC_API_KEY not set',
          hint: 'Required for moment detection and SOP writing. Get a key at https://console.anthropic.com',
        },
  ];
}

export function checkDrive(config: AppConfig): DoctorCheck {
  if (config.drive.enabled) {
    return { name: 'Google Drive', status: 'pass', message: `OAuth client configured (${config.drive.redirectUri})` };
  }
  return {
    name: 'Google Drive',
    status: 'warn',
    message: 'Upload disabled',
    hint: 'Optional. Set GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REDIRECT_URI to enable --upload',
  };
}

async function checkWorkDir(
  workDir: string,
  freeBytes: NonNullable<DoctorDeps['freeBytes']>
): Promise<DoctorCheck> {
  try {
    await access(workDir, constants.W_OK);
  } catch {
    return {
      name: 'Work directory',
      status: 'fail',
      message: `${workDir} is not writable`,
      hint: 'Set PROCDOC_WORK_DIR to a writable directory',
    };
  }

  let available: number;
  try {
    available = await freeBytes(workDir);
  } catch {
    return { name: 'Work directory', status: 'warn', message: `${workDir} is writable; free space unknown` };
  }

  const gigabytes = (available / LOW_DISK_BYTES).toFixed(1);
  if (available < LOW_DISK_BYTES) {
    return {
      name: 'Work directory',
      status: 'warn',
      message: `${gigabytes} GB available in ${workDir} (low)`,
      hint: 'Each session copies the video and extracts audio and frames. Free up space for long recordings',
    };
  }
  return { name: 'Work directory', status: 'pass', message: `${gigabytes} GB available in ${workDir}` };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run all doctor checks and return the result.
 */
export async function runDoctorChecks(config: AppConfig, deps: DoctorDeps = {}): Promise<DoctorResult> {
  const exec = deps.exec ?? execQuiet;

  const checks = [
    checkNodeVersion(deps.nodeVersion ?? process.version),
    ...(await Promise.all([checkTool('ffmpeg', exec), checkTool('ffprobe', exec)])),
    ...checkApiKeys(config),
    checkDrive(config),
    await checkWorkDir(config.workDir, deps.freeBytes ?? statfsFreeBytes),
  ];

  const passed = checks.filter((c) => c.status === 'pass').length;
  const warned = checks.filter((c) => c.status === 'warn').length;
  const failed = checks.filter((c) => c.status === 'fail').length;

  return { checks, passed, warned, failed };
}
