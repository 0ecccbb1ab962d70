/**
 * DriveUploader - Upload finished SOP documents to Google Drive
 *
 * OAuth2 with the drive.file scope only. Tokens live in memory for the
 * current session; persisting or refreshing them is left to the caller.
 * Upload is disabled (not an error) when no OAuth client is configured.
 */

import { createReadStream } from 'fs';
import { basename } from 'path';
import { google } from 'googleapis';

import type {
  DriveClient,
  DriveCredentials,
  DriveFile,
  DriveOAuthConfig,
  DriveUploadInput,
} from './types.js';
import { DOCX_MIME_TYPE, DRIVE_FILE_SCOPE } from './types.js';
import type { DriveConfig } from '../../config/config.js';
import { AuthError, ConfigurationError, PipelineError, describeError } from '../../shared/errors.js';
import { RetryPolicy, errorStatus } from '../../utils/RetryPolicy.js';
import { createLogger } from '../../utils/Logger.js';

const log = createLogger('DriveUploader');

// ============================================================================
// googleapis client
// ============================================================================

export class GoogleDriveClient implements DriveClient {
  private config: DriveOAuthConfig;

  constructor(config: DriveOAuthConfig) {
    this.config = config;
  }

  private oauthClient() {
    return new google.auth.OAuth2(this.config.clientId, this.config.clientSecret, this.config.redirectUri);
  }

  authUrl(state?: string): string {
    return this.oauthClient().generateAuthUrl({
      access_type: 'online',
      scope: [DRIVE_FILE_SCOPE],
      include_granted_scopes: false,
      state,
    });
  }

  async exchangeCode(code: string): Promise<DriveCredentials> {
    const { tokens } = await this.oauthClient().getToken(code);
    if (!tokens.access_token) {
      throw new AuthError('Google did not return an access token');
    }
    return {
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token ?? undefined,
      expiresAt: tokens.expiry_date ?? undefined,
      scope: tokens.scope ?? undefined,
    };
  }

  async upload(input: DriveUploadInput, credentials: DriveCredentials): Promise<DriveFile> {
    const auth = this.oauthClient();
    auth.setCredentials({
      access_token: credentials.accessToken,
      refresh_token: credentials.refreshToken,
      expiry_date: credentials.expiresAt,
    });

    const drive = google.drive({ version: 'v3', auth });
    const response = await drive.files.create({
      requestBody: {
        name: input.name,
        mimeType: input.mimeType,
        parents: input.folderId ? [input.folderId] : undefined,
      },
      media: { mimeType: input.mimeType, body: createReadStream(input.path) },
      fields: 'id, name, webViewLink',
    });

    const { id, name, webViewLink } = response.data;
    if (!id) {
      throw new Error('Drive did not return a file id');
    }
    return { id, name: name ?? input.name, webViewLink: webViewLink ?? undefined };
  }
}

// ============================================================================
// DriveUploader Class
// ============================================================================

export interface UploadRequest {
  path: string;
  credentials: DriveCredentials;
  name?: string;
  folderId?: string;
}

function toAuthConfig(config: DriveConfig): DriveOAuthConfig | null {
  if (!config.enabled || !config.clientId || !config.clientSecret || !config.redirectUri) {
    return null;
  }
  return { clientId: config.clientId, clientSecret: config.clientSecret, redirectUri: config.redirectUri };
}

export class DriveUploader {
  private client: DriveClient | null;
  private retryPolicy: RetryPolicy;

  constructor(config: DriveConfig, client?: DriveClient, retryPolicy?: RetryPolicy) {
    const authConfig = toAuthConfig(config);
    this.client = authConfig ? (client ?? new GoogleDriveClient(authConfig)) : null;
    this.retryPolicy = retryPolicy ?? new RetryPolicy();
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  authUrl(state?: string): string {
    return this.requireClient().authUrl(state);
  }

  async authenticate(code: string): Promise<DriveCredentials> {
    const client = this.requireClient();
    try {
      return await client.exchangeCode(code.trim());
    } catch (error) {
      if (error instanceof AuthError) throw error;
      throw new AuthError(`Google sign-in failed: ${describeError(error)}`, { cause: error });
    }
  }

  async upload(request: UploadRequest): Promise<DriveFile> {
    const client = this.requireClient();
    const input: DriveUploadInput = {
      path: request.path,
      name: request.name ?? basename(request.path),
      mimeType: DOCX_MIME_TYPE,
      folderId: request.folderId,
    };

    try {
      const file = await this.retryPolicy.execute(() => client.upload(input, request.credentials), {
        onRetry: ({ attempt, maxAttempts, error }) => {
          log.warn(`Upload attempt ${attempt}/${maxAttempts} failed (${describeError(error)}), retrying`);
        },
      });
      log.info(`Uploaded ${input.name} to Drive as ${file.id}`);
      return file;
    } catch (error) {
      const status = errorStatus(error);
      if (status === 401 || status === 403) {
        throw new AuthError('Google Drive rejected the credentials', { cause: error, details: { status } });
      }
      throw new PipelineError(
        `Drive upload failed: ${describeError(error)}`,
        'DRIVE_UPLOAD_FAILED',
        'upload',
        'Check your network connection and retry the upload.',
        { cause: error }
      );
    }
  }

  private requireClient(): DriveClient {
    if (!this.client) {
      throw new ConfigurationError(
        'Google Drive upload is not configured',
        'upload',
        'Set GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REDIRECT_URI to enable upload.'
      );
    }
    return this.client;
  }
}
