/**
 * MomentEditor.ts - Human review of proposed moments
 *
 * Edits are plain data so the CLI (a reviewed JSON file) and the MCP tools
 * (a list of edits) share one code path. Every function returns a new,
 * timestamp-sorted list; nothing is mutated in place.
 */

import { z } from 'zod';

import type { Moment } from '../shared/types.js';
import { MomentEditError } from '../shared/errors.js';
import { createId, type IdFactory } from '../shared/ids.js';

// ============================================================================
// Edit schema
// ============================================================================

const timestampSchema = z.number().finite().nonnegative({ message: 'Timestamp must be 0 or greater' });
const descriptionSchema = z.string().trim().min(1, { message: 'Description must not be empty' });

export const MomentEditSchema = z.discriminatedUnion('op', [
  z.object({
    op: z.literal('add'),
    timestamp: timestampSchema,
    description: descriptionSchema,
    navigationPath: z.string().trim().optional(),
  }),
  z.object({
    op: z.literal('update'),
    id: z.string().min(1),
    timestamp: timestampSchema.optional(),
    description: descriptionSchema.optional(),
    /** Empty string clears the path */
    navigationPath: z.string().trim().optional(),
  }),
  z.object({
    op: z.literal('remove'),
    id: z.string().min(1),
  }),
]);

export type MomentEdit = z.infer<typeof MomentEditSchema>;

/** Shape of a reviewed moment list supplied from a file */
export const ReviewedMomentSchema = z.object({
  id: z.string().min(1).optional(),
  timestamp: timestampSchema,
  description: descriptionSchema,
  navigationPath: z.string().trim().optional(),
});

export type ReviewedMoment = z.infer<typeof ReviewedMomentSchema>;

// ============================================================================
// Operations
// ============================================================================

function sortMoments(moments: Moment[]): Moment[] {
  return [...moments].sort((a, b) => a.timestamp - b.timestamp);
}

function validated(edit: MomentEdit): MomentEdit {
  const parsed = MomentEditSchema.safeParse(edit);
  if (!parsed.success) {
    throw new MomentEditError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

function requireIndex(moments: Moment[], id: string): number {
  const index = moments.findIndex((m) => m.id === id);
  if (index === -1) {
    throw new MomentEditError(`No moment with id "${id}"`);
  }
  return index;
}

export function applyMomentEdit(
  moments: Moment[],
  edit: MomentEdit,
  idFactory: IdFactory = createId
): Moment[] {
  const change = validated(edit);

  switch (change.op) {
    case 'add':
      return sortMoments([
        ...moments,
        {
          id: idFactory('moment'),
          timestamp: change.timestamp,
          description: change.description,
          navigationPath: change.navigationPath || undefined,
          userEdited: true,
        },
      ]);

    case 'update': {
      const index = requireIndex(moments, change.id);
      const current = moments[index];
      const updated: Moment = {
        ...current,
        timestamp: change.timestamp ?? current.timestamp,
        description: change.description ?? current.description,
        navigationPath:
          change.navigationPath === undefined ? current.navigationPath : change.navigationPath || undefined,
        userEdited: true,
      };
      return sortMoments(moments.map((m, i) => (i === index ? updated : m)));
    }

    case 'remove': {
      const index = requireIndex(moments, change.id);
      return moments.filter((_, i) => i !== index);
    }
  }
}

export function applyMomentEdits(
  moments: Moment[],
  edits: MomentEdit[],
  idFactory: IdFactory = createId
): Moment[] {
  return edits.reduce((current, edit) => applyMomentEdit(current, edit, idFactory), moments);
}

/**
 * Replace the proposed list with a reviewed one. Entries that keep an id of
 * an unchanged proposed moment keep its userEdited flag; all others are
 * marked as edited.
 */
export function replaceMoments(
  proposed: Moment[],
  reviewed: ReviewedMoment[],
  idFactory: IdFactory = createId
): Moment[] {
  const byId = new Map(proposed.map((m) => [m.id, m]));
  const seen = new Set<string>();

  return sortMoments(
    reviewed.map((entry) => {
      const parsed = ReviewedMomentSchema.safeParse(entry);
      if (!parsed.success) {
        throw new MomentEditError(parsed.error.issues.map((issue) => issue.message).join('; '));
      }
      const value = parsed.data;
      const original = value.id !== undefined && !seen.has(value.id) ? byId.get(value.id) : undefined;
      if (value.id !== undefined) seen.add(value.id);

      const navigationPath = value.navigationPath || undefined;
      const unchanged =
        original !== undefined &&
        original.timestamp === value.timestamp &&
        original.description === value.description &&
        original.navigationPath === navigationPath;

      return {
        id: original ? original.id : idFactory('moment'),
        timestamp: value.timestamp,
        description: value.description,
        navigationPath,
        userEdited: unchanged ? original.userEdited : true,
      };
    })
  );
}

/**
 * Final check before frames are extracted.
 */
export function validateForConfirmation(moments: Moment[]): Moment[] {
  if (moments.length === 0) {
    throw new MomentEditError('There are no moments to confirm; add at least one moment first');
  }
  return sortMoments(moments);
}
