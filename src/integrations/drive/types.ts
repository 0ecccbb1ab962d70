/**
 * Google Drive Integration Types
 */

/** Least-privilege scope: only files this app creates or opens */
export const DRIVE_FILE_SCOPE = 'https://www.googleapis.com/auth/drive.file';

export const DOCX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

// ============================================================================
// Auth
// ============================================================================

export interface DriveOAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

/** OAuth tokens for the current session only; never persisted */
export interface DriveCredentials {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: number;
  scope?: string;
}

// ============================================================================
// Upload
// ============================================================================

export interface DriveUploadInput {
  path: string;
  name: string;
  mimeType: string;
  folderId?: string;
}

export interface DriveFile {
  id: string;
  name: string;
  webViewLink?: string;
}

/**
 * Seam between the uploader and the Google client library.
 */
export interface DriveClient {
  authUrl(state?: string): string;
  exchangeCode(code: string): Promise<DriveCredentials>;
  upload(input: DriveUploadInput, credentials: DriveCredentials): Promise<DriveFile>;
}
