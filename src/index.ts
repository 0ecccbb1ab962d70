/**
 * procdoc library entry point.
 *
 * Embedders drive a `Session` through `SessionPipeline` one stage at a time;
 * the CLI and the MCP server are thin layers over the same calls.
 */

export { loadConfig, loadConfigFromEnvironment, requireApiKey } from './config/config.js';
export type { AppConfig, DriveConfig } from './config/config.js';

export { FfmpegToolkit, parseProbeOutput, parseFrameRate } from './media/MediaToolkit.js';
export type { MediaToolkit, MediaProbe } from './media/MediaToolkit.js';

export { Session, SESSION_STATES, STAGE_REQUIRES } from './session/Session.js';
export type { SessionState, SessionStatus, SessionSnapshot, SessionArtifacts } from './session/Session.js';
export { SessionPipeline, pairMomentsWithFrames } from './session/SessionPipeline.js';
export type { SessionPipelineDeps, ExportOptions, GenerateOptions } from './session/SessionPipeline.js';

export { decodeMoments, mergeNearbyMoments, MOMENT_MERGE_EPSILON_SECONDS } from './pipeline/MomentAnalyzer.js';
export {
  MomentEditSchema,
  ReviewedMomentSchema,
  applyMomentEdit,
  applyMomentEdits,
  replaceMoments,
  validateForConfirmation,
} from './pipeline/MomentEditor.js';
export type { MomentEdit, ReviewedMoment } from './pipeline/MomentEditor.js';
export { clampTimestamp } from './pipeline/FrameExtractor.js';
export type { FrameOutcome } from './pipeline/FrameExtractor.js';

export { AnthropicClient } from './ai/AnthropicClient.js';
export type { LlmClient, LlmRequest, LlmContentBlock } from './ai/AnthropicClient.js';
export { DeepgramSpeechToText } from './transcription/TranscriptionClient.js';
export type { SpeechToText } from './transcription/TranscriptionClient.js';
export { layoutDocument, writeDocument } from './output/DocumentBuilder.js';
export type { DocumentLayout, LayoutBlock, WrittenDocument } from './output/DocumentBuilder.js';
export { GoogleDriveClient } from './integrations/drive/DriveUploader.js';
export type { DriveClient, DriveCredentials, DriveFile } from './integrations/drive/types.js';

export * from './shared/errors.js';
export * from './shared/types.js';
export { formatTimestamp, parseTimestamp } from './shared/time.js';
export type { Result } from './shared/result.js';
