/**
 * DocumentBuilder - Render an SopDocument and its frames into a .docx file
 *
 * Two steps:
 * 1. layoutDocument(): pure mapping from document + frames to a flat list
 *    of layout blocks (headings, paragraphs, bullets, images, captions).
 * 2. packDocument(): turns the layout into a Word file with the docx library.
 *
 * The layout carries everything that varies between runs (generation date,
 * source name) as input, so identical input gives an identical layout. The
 * packed archive is normalised afterwards: docx numbers drawing ids from a
 * process-wide counter and stamps zip entries with the wall clock, so both
 * are rewritten from the layout and the generation date. Only
 * docProps/core.xml keeps the packing time.
 */

import { mkdir, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { AlignmentType, Document, HeadingLevel, ImageRun, Packer, Paragraph, TextRun } from 'docx';
import JSZip from 'jszip';

import type { DocumentSection, Frame, SopDocument } from '../shared/types.js';
import { DocumentWriteError, describeError } from '../shared/errors.js';
import { fileTimestamp, formatTimestamp } from '../shared/time.js';
import { createLogger } from '../utils/Logger.js';

const log = createLogger('DocumentBuilder');

// ============================================================================
// Types
// ============================================================================

export type LayoutBlock =
  | { type: 'title'; text: string }
  | { type: 'heading'; text: string }
  | { type: 'step-heading'; number: number; text: string }
  | { type: 'paragraph'; text: string; italic?: boolean }
  | { type: 'bullet'; text: string }
  | { type: 'image'; frameId: string; width: number; height: number }
  | { type: 'caption'; text: string };

export interface DocumentLayout {
  title: string;
  blocks: LayoutBlock[];
  /** Frame ids in the order their images appear */
  imageOrder: string[];
  warnings: string[];
}

export interface LayoutMetadata {
  /** Date printed in the header (YYYY-MM-DD, UTC) */
  generatedAt: Date;
  sourceName?: string;
  /** Moment timestamps and navigation paths for step captions, keyed by moment id */
  moments?: Map<string, { timestamp: number; navigationPath?: string }>;
}

export interface WriteDocumentRequest {
  document: SopDocument;
  frames: Frame[];
  outputDir: string;
  metadata: LayoutMetadata;
  /** Defaults to outputFileName(sourceName, generatedAt) */
  fileName?: string;
}

export interface WrittenDocument {
  path: string;
  sizeBytes: number;
  stepCount: number;
  imageCount: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Width of embedded screenshots, in pixels at 96 dpi (about 6.25in) */
export const MAX_IMAGE_WIDTH = 600;

const SECTION_HEADINGS: Partial<Record<DocumentSection['kind'], string>> = {
  purpose: 'Purpose',
  scope: 'Scope',
  prerequisites: 'Prerequisites',
  step: 'Procedure',
  'control-point': 'Control Points',
  troubleshooting: 'Troubleshooting',
  frequency: 'Frequency',
};

// ============================================================================
// Layout
// ============================================================================

export function imageSize(frame: Pick<Frame, 'width' | 'height'>): { width: number; height: number } {
  if (frame.width <= 0 || frame.height <= 0) {
    return { width: MAX_IMAGE_WIDTH, height: Math.round((MAX_IMAGE_WIDTH * 9) / 16) };
  }
  const width = Math.min(MAX_IMAGE_WIDTH, frame.width);
  return { width, height: Math.round((frame.height * width) / frame.width) };
}

function stepCaption(
  frame: Frame | undefined,
  moment: { timestamp: number; navigationPath?: string } | undefined
): string | null {
  const parts: string[] = [];
  const timestamp = moment?.timestamp ?? frame?.requestedTimestamp;
  if (timestamp !== undefined) parts.push(`At ${formatTimestamp(timestamp)}`);
  if (moment?.navigationPath) parts.push(moment.navigationPath);
  if (frame?.approximate) {
    parts.push(`approximate frame from ${formatTimestamp(frame.timestamp)}`);
  }
  return parts.length > 0 ? parts.join(' | ') : null;
}

export function layoutDocument(
  document: SopDocument,
  frames: Frame[],
  metadata: LayoutMetadata
): DocumentLayout {
  const framesById = new Map(frames.map((frame) => [frame.id, frame]));
  const blocks: LayoutBlock[] = [];
  const imageOrder: string[] = [];
  const warnings: string[] = [];
  let lastHeading: string | undefined;

  const titleSection = document.sections.find((s) => s.kind === 'title');
  const title = titleSection && titleSection.kind === 'title' ? titleSection.text : 'Standard Operating Procedure';

  blocks.push({ type: 'title', text: title });
  const header = [`Generated ${metadata.generatedAt.toISOString().slice(0, 10)}`];
  if (metadata.sourceName) header.push(`Source recording: ${metadata.sourceName}`);
  blocks.push({ type: 'paragraph', text: header.join(' | '), italic: true });

  if (document.degraded) {
    blocks.push({
      type: 'paragraph',
      text: 'Draft: the narrative could not be generated automatically. Steps use the reviewed moment descriptions.',
      italic: true,
    });
  }

  for (const section of document.sections) {
    const heading = SECTION_HEADINGS[section.kind];
    if (heading && heading !== lastHeading) {
      blocks.push({ type: 'heading', text: heading });
      lastHeading = heading;
    }

    switch (section.kind) {
      case 'title':
        break;
      case 'purpose':
      case 'scope':
      case 'frequency':
        blocks.push({ type: 'paragraph', text: section.text });
        break;
      case 'prerequisites':
        for (const item of section.items) blocks.push({ type: 'bullet', text: item });
        break;
      case 'control-point':
        blocks.push({ type: 'bullet', text: section.text });
        break;
      case 'troubleshooting':
        blocks.push({ type: 'bullet', text: `${section.issue}: ${section.resolution}` });
        break;
      case 'step': {
        blocks.push({ type: 'step-heading', number: section.number, text: section.text });
        const frame = section.frameId ? framesById.get(section.frameId) : undefined;
        if (section.frameId && !frame) {
          warnings.push(`Step ${section.number} references missing frame ${section.frameId}; rendered as text only`);
        }
        if (frame) {
          blocks.push({ type: 'image', frameId: frame.id, ...imageSize(frame) });
          imageOrder.push(frame.id);
        }
        const caption = stepCaption(frame, metadata.moments?.get(section.momentId));
        if (caption) blocks.push({ type: 'caption', text: caption });
        break;
      }
    }
  }

  return { title, blocks, imageOrder, warnings };
}

// ============================================================================
// Packing
// ============================================================================

function toParagraph(block: LayoutBlock, framesById: Map<string, Frame>): Paragraph {
  switch (block.type) {
    case 'title':
      return new Paragraph({ text: block.text, heading: HeadingLevel.TITLE });
    case 'heading':
      return new Paragraph({ text: block.text, heading: HeadingLevel.HEADING_1 });
    case 'step-heading':
      return new Paragraph({
        heading: HeadingLevel.HEADING_2,
        children: [new TextRun({ text: `Step ${block.number}: `, bold: true }), new TextRun(block.text)],
      });
    case 'paragraph':
      return new Paragraph({ children: [new TextRun({ text: block.text, italics: block.italic })] });
    case 'bullet':
      return new Paragraph({ text: block.text, bullet: { level: 0 } });
    case 'caption':
      return new Paragraph({
        alignment: AlignmentType.CENTER,
        children: [new TextRun({ text: block.text, italics: true, size: 18 })],
      });
    case 'image': {
      const frame = framesById.get(block.frameId);
      if (!frame) {
        return new Paragraph({ text: '' });
      }
      return new Paragraph({
        alignment: AlignmentType.CENTER,
        children: [
          new ImageRun({
            type: 'png',
            data: frame.image,
            transformation: { width: block.width, height: block.height },
          }),
        ],
      });
    }
  }
}

const DOCUMENT_PART = 'word/document.xml';
const DRAWING_ID = /(<wp:docPr\b[^>]*?\bid=")\d+"/g;

/**
 * Number drawing ids 1..n in document order.
 */
export function renumberDrawingIds(xml: string): string {
  let next = 0;
  return xml.replace(DRAWING_ID, (_match, prefix: string) => `${prefix}${++next}"`);
}

/**
 * Rewrite a packed archive with reproducible drawing ids and entry dates.
 */
async function normalizeArchive(packed: Buffer, entryDate: Date): Promise<Buffer> {
  const source = await JSZip.loadAsync(packed);
  const output = new JSZip();

  for (const entry of Object.values(source.files)) {
    if (entry.dir) continue;
    if (entry.name === DOCUMENT_PART) {
      const xml = await entry.async('string');
      output.file(entry.name, renumberDrawingIds(xml), { date: entryDate, createFolders: false });
    } else {
      const content = await entry.async('uint8array');
      output.file(entry.name, content, { date: entryDate, createFolders: false });
    }
  }

  return output.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

/**
 * Pack a layout into .docx bytes. Entry dates are set to `generatedAt`.
 */
export async function packDocument(
  layout: DocumentLayout,
  frames: Frame[],
  generatedAt: Date
): Promise<Buffer> {
  const framesById = new Map(frames.map((frame) => [frame.id, frame]));
  const doc = new Document({
    title: layout.title,
    description: 'Standard Operating Procedure generated from a narrated screen recording',
    sections: [{ children: layout.blocks.map((block) => toParagraph(block, framesById)) }],
  });
  return normalizeArchive(await Packer.toBuffer(doc), generatedAt);
}

/**
 * Output file name: <video-name>-sop-YYYYMMDD-HHMMSS.docx
 */
export function outputFileName(sourceName: string | undefined, now: Date): string {
  const base = sourceName ? basename(sourceName, extname(sourceName)) : 'procedure';
  const safe = base.replace(/[^A-Za-z0-9._-]+/g, '-').replace(/^-+|-+$/g, '') || 'procedure';
  return `${safe}-sop-${fileTimestamp(now)}.docx`;
}

/**
 * Lay out, pack and write the document.
 */
export async function writeDocument(request: WriteDocumentRequest): Promise<WrittenDocument> {
  const { document, frames, outputDir, metadata } = request;
  const layout = layoutDocument(document, frames, metadata);
  for (const warning of layout.warnings) log.warn(warning);

  let bytes: Buffer;
  try {
    bytes = await packDocument(layout, frames, metadata.generatedAt);
  } catch (error) {
    throw new DocumentWriteError(`Could not assemble the Word document: ${describeError(error)}`, {
      cause: error,
    });
  }

  const fileName = request.fileName ?? outputFileName(metadata.sourceName, metadata.generatedAt);
  const path = join(outputDir, fileName);

  try {
    await mkdir(outputDir, { recursive: true });
    await writeFile(path, bytes);
  } catch (error) {
    throw new DocumentWriteError(`Could not write ${path}: ${describeError(error)}`, { cause: error });
  }

  const stepCount = layout.blocks.filter((b) => b.type === 'step-heading').length;
  log.info(`Wrote ${path} (${bytes.byteLength} bytes, ${stepCount} steps, ${layout.imageOrder.length} images)`);
  return { path, sizeBytes: bytes.byteLength, stepCount, imageCount: layout.imageOrder.length };
}
