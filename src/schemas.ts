/**
 * Raw input schemas
 *
 * Validate untyped JSON (files, queue payloads) into assembler pages.
 * Shape only: corner order and duplicate ids are checked by the assembler,
 * which knows the page and line to blame.
 */

import { z } from 'zod';
import type { AssemblyPage } from './types';
import { LAYOUT_LABELS } from './labels';
import { InvalidInputError } from './errors';

const pointSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export const bboxSchema = z.object({
  topLeft: pointSchema,
  bottomRight: pointSchema,
});

export const layoutRegionSchema = z.object({
  id: z.string().min(1),
  label: z.enum(LAYOUT_LABELS),
  bbox: bboxSchema,
  confidence: z.number().min(0).max(1).optional(),
});

export const textLineSchema = z.object({
  text: z.string(),
  words: z.array(bboxSchema),
});

export const assemblyPageSchema = z.object({
  lines: z.array(textLineSchema),
  regions: z.array(layoutRegionSchema),
  dimensions: z.object({
    width: z.number().positive(),
    height: z.number().positive(),
  }).optional(),
});

export const assemblyPagesSchema = z.array(assemblyPageSchema);

/**
 * Parse raw JSON into pages.
 *
 * @throws InvalidInputError with one `path: message` entry per issue
 */
export function parsePages(raw: unknown): AssemblyPage[] {
  const parsed = assemblyPagesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError('Invalid assembly input', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}
