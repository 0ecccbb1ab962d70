/**
 * DriveUploader Unit Tests
 *
 * Tests:
 * - Disabled when no OAuth client is configured
 * - Code exchange and auth failures
 * - Upload input (name, MIME type, folder)
 * - Retries on transient failures, AuthError on 401/403
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { DriveUploader } from '../../../src/integrations/drive/DriveUploader.js';
import { DOCX_MIME_TYPE } from '../../../src/integrations/drive/types.js';
import { AuthError, ConfigurationError, PipelineError } from '../../../src/shared/errors.js';
import { FakeDriveClient, driveEnv, instantRetry, testConfig } from '../../helpers/fakes.js';

class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
  }
}

const credentials = { accessToken: 'test-token' };

describe('DriveUploader', () => {
  let client: FakeDriveClient;
  let uploader: DriveUploader;

  beforeEach(() => {
    client = new FakeDriveClient();
    uploader = new DriveUploader(testConfig(driveEnv()).drive, client, instantRetry(3));
  });

  // ===========================================================================
  // Configuration
  // ===========================================================================

  describe('when not configured', () => {
    it('is disabled and raises ConfigurationError', async () => {
      const disabled = new DriveUploader(testConfig().drive, client);

      expect(disabled.enabled).toBe(false);
      expect(() => disabled.authUrl()).toThrow(ConfigurationError);
      await expect(disabled.upload({ path: '/out/sop.docx', credentials })).rejects.toThrow(
        'Google Drive upload is not configured'
      );
    });
  });

  // ===========================================================================
  // Auth
  // ===========================================================================

  describe('authenticate', () => {
    it('builds the consent URL with the given state', () => {
      expect(uploader.enabled).toBe(true);
      expect(uploader.authUrl('session-1')).toBe('https://accounts.example.test/auth?state=session-1');
    });

    it('exchanges a trimmed code for credentials', async () => {
      const result = await uploader.authenticate('  test-code \n');

      expect(client.exchangeCode).toHaveBeenCalledWith('test-code');
      expect(result.accessToken).toBe('token-for-test-code');
    });

    it('wraps exchange failures in AuthError', async () => {
      client.exchangeCode.mockRejectedValueOnce(new Error('invalid_grant'));

      const error = await uploader.authenticate('expired').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ message: 'Google sign-in failed: invalid_grant', severity: 'user' });
    });
  });

  // ===========================================================================
  // Upload
  // ===========================================================================

  describe('upload', () => {
    it('uploads the file as a Word document', async () => {
      const file = await uploader.upload({ path: '/out/billing-sop.docx', credentials, folderId: 'folder-1' });

      expect(file).toEqual({
        id: 'drive-file-1',
        name: 'billing-sop.docx',
        webViewLink: 'https://drive.example.test/file/drive-file-1',
      });
      expect(client.uploads).toEqual([
        {
          input: { path: '/out/billing-sop.docx', name: 'billing-sop.docx', mimeType: DOCX_MIME_TYPE, folderId: 'folder-1' },
          credentials,
        },
      ]);
    });

    it('retries transient failures', async () => {
      let calls = 0;
      client.uploadImpl = async (input) => {
        calls++;
        if (calls < 3) throw new HttpError('Service unavailable', 503);
        return { id: 'drive-file-2', name: input.name };
      };

      const file = await uploader.upload({ path: '/out/sop.docx', credentials });

      expect(calls).toBe(3);
      expect(file.id).toBe('drive-file-2');
    });

    it('raises AuthError on 401 without retrying', async () => {
      let calls = 0;
      client.uploadImpl = async () => {
        calls++;
        throw new HttpError('Invalid Credentials', 401);
      };

      await expect(uploader.upload({ path: '/out/sop.docx', credentials })).rejects.toThrow(
        'Google Drive rejected the credentials'
      );
      expect(calls).toBe(1);
    });

    it('raises a stage error after the last attempt', async () => {
      client.uploadImpl = async () => {
        throw new HttpError('Backend error', 500);
      };

      const error = await uploader.upload({ path: '/out/sop.docx', credentials }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PipelineError);
      expect(error).toMatchObject({
        code: 'DRIVE_UPLOAD_FAILED',
        stage: 'upload',
        message: 'Drive upload failed: Backend error',
      });
      expect(client.uploads).toHaveLength(3);
    });
  });
});
