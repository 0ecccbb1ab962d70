/**
 * Doctor Unit Tests
 *
 * Tests each environment check and the aggregated result:
 * - Node.js version parsing
 * - ffmpeg / ffprobe detection
 * - API keys and optional Drive configuration
 * - Work directory writability and free space
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { checkApiKeys, checkDrive, checkNodeVersion, runDoctorChecks } from '../../../src/cli/doctor.js';
import { driveEnv, testConfig } from '../../helpers/fakes.js';

const GB = 1024 ** 3;

describe('checkNodeVersion', () => {
  it('passes for supported versions', () => {
    expect(checkNodeVersion('v20.11.1')).toEqual({ name: 'Node.js', status: 'pass', message: 'v20.11.1 (>= 20)' });
  });

  it('fails for old versions', () => {
    expect(checkNodeVersion('v18.19.0')).toMatchObject({ status: 'fail', message: 'v18.19.0 is too old' });
  });

  it('warns for unparseable versions', () => {
    expect(checkNodeVersion('nightly')).toMatchObject({ status: 'warn', message: 'Unknown version: nightly' });
  });
});

describe('checkApiKeys', () => {
  it('passes when both keys are set', () => {
    const checks = checkApiKeys(testConfig());

    expect(checks.map((c) => c.status)).toEqual(['pass', 'pass']);
    expect(checks[0].message).toMatch(/^DEEPGRAM_API_KEY is set \(model .+\)$/);
  });

  it('fails for each missing key', () => {
    const checks = checkApiKeys(testConfig({ DEEPGRAM_API_KEY: '', ANTHROPIC_API_KEY: '' }));

    expect(checks.map((c) => [c.status, c.message])).toEqual([
      ['fail', 'DEEPGRAM_API_KEY not set'],
      ['fail', 'ANTHROPIC_API_KEY not set'],
    ]);
  });
});

describe('checkDrive', () => {
  it('passes with a configured OAuth client', () => {
    expect(checkDrive(testConfig(driveEnv()))).toEqual({
      name: 'Google Drive',
      status: 'pass',
      message: 'OAuth client configured (http://localhost:5178/oauth)',
    });
  });

  it('warns when upload is disabled', () => {
    expect(checkDrive(testConfig())).toMatchObject({ status: 'warn', message: 'Upload disabled' });
  });
});

describe('runDoctorChecks', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'procdoc-doctor-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  const installed = async (command: string) => `${command} version 6.1.1 Copyright (c) the FFmpeg developers`;

  it('runs every check in order and counts the results', async () => {
    const result = await runDoctorChecks(testConfig({ PROCDOC_WORK_DIR: workDir }), {
      exec: installed,
      nodeVersion: 'v20.12.0',
      freeBytes: async () => 5 * GB,
    });

    expect(result.checks.map((c) => [c.name, c.status])).toEqual([
      ['Node.js', 'pass'],
      ['ffmpeg', 'pass'],
      ['ffprobe', 'pass'],
      ['Deepgram API key', 'pass'],
      ['Anthropic API key', 'pass'],
      ['Google Drive', 'warn'],
      ['Work directory', 'pass'],
    ]);
    expect(result.checks[1].message).toBe('Installed (6.1.1)');
    expect(result.checks[6].message).toBe(`5.0 GB available in ${workDir}`);
    expect({ passed: result.passed, warned: result.warned, failed: result.failed }).toEqual({
      passed: 6,
      warned: 1,
      failed: 0,
    });
  });

  it('fails when ffmpeg is missing', async () => {
    const result = await runDoctorChecks(testConfig({ PROCDOC_WORK_DIR: workDir }), {
      exec: async () => null,
      nodeVersion: 'v20.12.0',
      freeBytes: async () => 5 * GB,
    });

    expect(result.checks[1]).toMatchObject({ name: 'ffmpeg', status: 'fail', message: 'Not found on PATH' });
    expect(result.checks[2]).toMatchObject({
      name: 'ffprobe',
      status: 'fail',
      hint: 'ffprobe is usually installed alongside ffmpeg',
    });
    expect(result.failed).toBe(2);
  });

  it('warns on low disk space', async () => {
    const result = await runDoctorChecks(testConfig({ PROCDOC_WORK_DIR: workDir }), {
      exec: installed,
      nodeVersion: 'v20.12.0',
      freeBytes: async () => 0.5 * GB,
    });

    expect(result.checks[6]).toMatchObject({ status: 'warn', message: `0.5 GB available in ${workDir} (low)` });
  });

  it('warns when free space cannot be read', async () => {
    const result = await runDoctorChecks(testConfig({ PROCDOC_WORK_DIR: workDir }), {
      exec: installed,
      nodeVersion: 'v20.12.0',
      freeBytes: async () => {
        throw new Error('statfs not supported');
      },
    });

    expect(result.checks[6]).toMatchObject({ status: 'warn', message: `${workDir} is writable; free space unknown` });
  });

  it('fails for a missing work directory', async () => {
    const missing = join(workDir, 'does-not-exist');

    const result = await runDoctorChecks(testConfig({ PROCDOC_WORK_DIR: missing }), {
      exec: installed,
      nodeVersion: 'v20.12.0',
      freeBytes: async () => 5 * GB,
    });

    expect(result.checks[6]).toMatchObject({ status: 'fail', message: `${missing} is not writable` });
  });
});
