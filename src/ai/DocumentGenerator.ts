/**
 * DocumentGenerator - SOP narrative from transcript, moments and frames
 *
 * Sends one vision request containing the transcript, the ordered moment
 * list and a downscaled image of each extracted frame, then decodes the
 * reply into typed DocumentSections.
 *
 * Key invariant: captured data is never lost. The document always has
 * exactly one step per (moment, frame) pair. When the model call fails or
 * its reply cannot be decoded, a skeleton document is built from the
 * moments and frames alone and marked degraded.
 */

import { z } from 'zod';

import type { LlmClient, LlmContentBlock } from './AnthropicClient.js';
import { extractJson } from './jsonResponse.js';
import { optimizeForModel } from './ImageOptimizer.js';
import type {
  DocumentSection,
  MomentFramePair,
  SopDocument,
  StepSection,
  TranscriptSegment,
} from '../shared/types.js';
import { GenerationError, describeError } from '../shared/errors.js';
import { err, ok, type Result } from '../shared/result.js';
import { formatTimestamp } from '../shared/time.js';
import { formatTranscript } from '../pipeline/MomentAnalyzer.js';
import { createLogger } from '../utils/Logger.js';

const log = createLogger('DocumentGenerator');

// =============================================================================
// Prompt
// =============================================================================

const SYSTEM_PROMPT = `You are a technical writer producing a Standard Operating Procedure (SOP) \
from a narrated screen recording.

You receive the narration transcript, the ordered list of steps the reviewer confirmed \
(each with its timestamp and, when available, a screenshot), and optionally a title.

Write the SOP as JSON only, no markdown, with this shape:
{
  "title": "Short imperative title",
  "purpose": "One or two sentences on why this procedure exists",
  "scope": "Who performs it and which systems it covers",
  "prerequisites": ["Access or data needed before starting"],
  "steps": [{"text": "Instruction for step 1"}],
  "controlPoints": ["Checks or approvals that must happen"],
  "troubleshooting": [{"issue": "...", "resolution": "..."}],
  "frequency": "How often the procedure runs"
}

Rules:
- "steps" must have exactly one entry per confirmed step, in the same order.
- Write each step as a clear instruction a new team member can follow, using what the \
screenshot shows (button names, field labels, menu paths).
- Leave out controlPoints, troubleshooting or frequency when the recording says nothing about them.`;

// =============================================================================
// Types
// =============================================================================

export interface GenerateRequest {
  transcript: TranscriptSegment[];
  pairs: MomentFramePair[];
  /** Overrides the model's title */
  title?: string;
  /** Original video file name, used in the skeleton title */
  sourceName?: string;
  signal?: AbortSignal;
}

export interface DecodeOptions {
  title?: string;
}

// =============================================================================
// Decoding
// =============================================================================

const nonEmpty = z.string().trim().min(1);

const GeneratedDocumentSchema = z.object({
  title: nonEmpty,
  purpose: nonEmpty,
  scope: nonEmpty.optional().catch(undefined),
  prerequisites: z.array(nonEmpty).optional().catch(undefined),
  steps: z.array(z.object({ text: z.string().trim() }).or(z.string().transform((text) => ({ text })))),
  controlPoints: z.array(nonEmpty).optional().catch(undefined),
  troubleshooting: z
    .array(z.object({ issue: nonEmpty, resolution: nonEmpty }))
    .optional()
    .catch(undefined),
  frequency: nonEmpty.optional().catch(undefined),
});

function stepSections(
  pairs: MomentFramePair[],
  stepText: (index: number) => string | undefined
): StepSection[] {
  return pairs.map((pair, index) => {
    const step: StepSection = {
      kind: 'step',
      number: index + 1,
      text: stepText(index) || pair.moment.description,
      momentId: pair.moment.id,
    };
    if (pair.frame) {
      step.frameId = pair.frame.id;
    }
    return step;
  });
}

/**
 * Decode a model reply into an SopDocument with one step per pair.
 */
export function decodeDocument(
  raw: string,
  pairs: MomentFramePair[],
  options: DecodeOptions = {}
): Result<SopDocument, GenerationError> {
  const json = extractJson(raw);
  if (!json.ok) {
    return err(new GenerationError(json.error.message, { cause: json.error }));
  }

  const parsed = GeneratedDocumentSchema.safeParse(json.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return err(new GenerationError(`Unexpected document shape${where}: ${issue?.message ?? 'unknown'}`));
  }

  const doc = parsed.data;
  const warnings: string[] = [];

  if (doc.steps.length !== pairs.length) {
    warnings.push(
      `The model wrote ${doc.steps.length} step(s) for ${pairs.length} confirmed moment(s); ` +
        'missing steps use the moment description'
    );
  }

  const sections: DocumentSection[] = [
    { kind: 'title', text: options.title ?? doc.title },
    { kind: 'purpose', text: doc.purpose },
  ];
  if (doc.scope) sections.push({ kind: 'scope', text: doc.scope });
  if (doc.prerequisites && doc.prerequisites.length > 0) {
    sections.push({ kind: 'prerequisites', items: doc.prerequisites });
  }

  sections.push(...stepSections(pairs, (index) => doc.steps[index]?.text));

  for (const text of doc.controlPoints ?? []) {
    sections.push({ kind: 'control-point', text });
  }
  for (const entry of doc.troubleshooting ?? []) {
    sections.push({ kind: 'troubleshooting', issue: entry.issue, resolution: entry.resolution });
  }
  if (doc.frequency) sections.push({ kind: 'frequency', text: doc.frequency });

  return ok({ sections, degraded: false, warnings });
}

/**
 * Document built from the moments and frames alone.
 */
export function buildSkeletonDocument(
  pairs: MomentFramePair[],
  options: { title?: string; sourceName?: string; reason?: string } = {}
): SopDocument {
  const title = options.title ?? (options.sourceName ? `Procedure: ${options.sourceName}` : 'Recorded procedure');
  const warnings = options.reason
    ? [`The SOP narrative could not be generated (${options.reason}); steps use the reviewed moment descriptions.`]
    : [];

  return {
    sections: [
      { kind: 'title', text: title },
      {
        kind: 'purpose',
        text: 'Steps captured from a narrated screen recording. Review and complete this procedure before use.',
      },
      ...stepSections(pairs, () => undefined),
    ],
    degraded: true,
    warnings,
  };
}

// =============================================================================
// DocumentGenerator Class
// =============================================================================

export class DocumentGenerator {
  constructor(
    private llm: LlmClient,
    private options: { maxTokens?: number; timeoutMs?: number } = {}
  ) {}

  async generate(request: GenerateRequest): Promise<SopDocument> {
    const { pairs, signal } = request;
    const startTime = Date.now();

    try {
      const { content, warnings: imageWarnings } = await this.buildContent(request);

      const reply = await this.llm.complete({
        purpose: 'document-generation',
        system: SYSTEM_PROMPT,
        content,
        maxTokens: this.options.maxTokens,
        timeoutMs: this.options.timeoutMs,
        signal,
      });

      const decoded = decodeDocument(reply, pairs, { title: request.title });
      if (!decoded.ok) {
        throw decoded.error;
      }

      log.info(
        `Generated SOP with ${pairs.length} step(s), ${decoded.value.sections.length} section(s) ` +
          `(${Date.now() - startTime}ms)`
      );
      return { ...decoded.value, warnings: [...imageWarnings, ...decoded.value.warnings] };
    } catch (error) {
      if (signal?.aborted) throw error;

      const failure =
        error instanceof GenerationError
          ? error
          : new GenerationError(`Document generation failed: ${describeError(error)}`, { cause: error });
      log.error(`Falling back to skeleton document after ${Date.now() - startTime}ms: ${failure.message}`);

      return buildSkeletonDocument(pairs, {
        title: request.title,
        sourceName: request.sourceName,
        reason: failure.message,
      });
    }
  }

  private async buildContent(
    request: GenerateRequest
  ): Promise<{ content: LlmContentBlock[]; warnings: string[] }> {
    const warnings: string[] = [];
    const stepLines = request.pairs.map((pair, index) => {
      const nav = pair.moment.navigationPath ? ` (location: ${pair.moment.navigationPath})` : '';
      const shot = pair.frame ? '' : ' [no screenshot]';
      return `${index + 1}. [${formatTimestamp(pair.moment.timestamp)}] ${pair.moment.description}${nav}${shot}`;
    });

    const header = [
      request.title ? `Title: ${request.title}` : null,
      `Transcript:\n${formatTranscript(request.transcript) || '(no narration)'}`,
      `Confirmed steps:\n${stepLines.join('\n')}`,
    ]
      .filter((part): part is string => part !== null)
      .join('\n\n');

    const content: LlmContentBlock[] = [{ type: 'text', text: header }];

    for (const [index, pair] of request.pairs.entries()) {
      if (!pair.frame) continue;
      try {
        const optimized = await optimizeForModel(pair.frame.image);
        content.push({ type: 'text', text: `Screenshot for step ${index + 1}:` });
        content.push({ type: 'image', mediaType: optimized.mediaType, data: optimized.data });
      } catch (error) {
        const message = `Screenshot for step ${index + 1} was not sent to the model: ${describeError(error)}`;
        log.warn(message);
        warnings.push(message);
      }
    }

    return { content, warnings };
  }
}
