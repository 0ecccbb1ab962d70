/**
 * Shared domain types for procdoc.
 *
 * Everything that crosses a pipeline stage boundary lives here: the probed
 * video, the extracted audio, transcript segments, moments, frames and the
 * SOP document model.
 */

// ============================================================================
// Media
// ============================================================================

export const SUPPORTED_CONTAINERS = ['mp4', 'mov', 'avi', 'webm', 'mkv'] as const;

export type VideoContainer = (typeof SUPPORTED_CONTAINERS)[number];

export interface VideoHandle {
  /** Session-scoped copy of the uploaded video */
  path: string;
  /** Original file name as supplied by the user */
  originalName: string;
  container: VideoContainer;
  durationSeconds: number;
  frameRate: number;
  width: number;
  height: number;
  hasAudio: boolean;
  sizeBytes: number;
}

export interface AudioHandle {
  path: string;
  durationSeconds: number;
  sampleRate: number;
}

// ============================================================================
// Transcript
// ============================================================================

export interface TranscriptSegment {
  text: string;
  startTime: number; // seconds from start of recording
  endTime: number;
  confidence: number;
}

// ============================================================================
// Moments & Frames
// ============================================================================

export interface Moment {
  id: string;
  timestamp: number; // seconds from start of recording, >= 0
  description: string;
  navigationPath?: string;
  userEdited: boolean;
}

export interface Frame {
  id: string;
  momentId: string;
  /** Timestamp the moment asked for */
  requestedTimestamp: number;
  /** Timestamp actually decoded (differs when clamped) */
  timestamp: number;
  path: string;
  image: Buffer;
  width: number;
  height: number;
  /** True when the requested timestamp was out of range and clamped */
  approximate: boolean;
}

// ============================================================================
// SOP Document
// ============================================================================

export type DocumentSection =
  | { kind: 'title'; text: string }
  | { kind: 'purpose'; text: string }
  | { kind: 'scope'; text: string }
  | { kind: 'prerequisites'; items: string[] }
  | { kind: 'step'; number: number; text: string; momentId: string; frameId?: string }
  | { kind: 'control-point'; text: string }
  | { kind: 'troubleshooting'; issue: string; resolution: string }
  | { kind: 'frequency'; text: string };

export type DocumentSectionKind = DocumentSection['kind'];

export type StepSection = Extract<DocumentSection, { kind: 'step' }>;

export interface SopDocument {
  sections: DocumentSection[];
  /** True when the narrative could not be generated and the skeleton was used */
  degraded: boolean;
  warnings: string[];
}

export interface MomentFramePair {
  moment: Moment;
  frame?: Frame;
}
