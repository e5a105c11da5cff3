/**
 * Assembler configuration
 *
 * Fills option defaults, applies environment overrides and validates the
 * result with zod. Functions (id generator, logger) pass through untouched.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { AssemblerOptions, NonTextLinePolicy } from './types';
import { DEFAULT_MATCH_THRESHOLD } from './matcher';
import { InvalidInputError } from './errors';
import { logger as rootLogger } from './logger';

export const DEFAULT_DETECTION_ORIGIN = 'doctr';
export const DEFAULT_CONCURRENCY = 4;

export interface ResolvedAssemblerOptions {
  threshold: number;
  detectionOrigin: string;
  metadata: Record<string, unknown>;
  nonTextLines: NonTextLinePolicy;
  generateId: () => string;
  logger: Logger;
  concurrency: number;
}

const optionsSchema = z.object({
  threshold: z.number().finite().min(0).max(1),
  detectionOrigin: z.string().min(1),
  metadata: z.record(z.unknown()),
  nonTextLines: z.enum(['reject', 'drop']),
  concurrency: z.number().int().positive(),
});

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

/**
 * Resolve options against defaults.
 *
 * LAYOUT_MATCH_THRESHOLD applies only when no threshold is passed.
 *
 * @throws InvalidInputError listing every invalid option
 */
export function resolveAssemblerOptions(
  options: AssemblerOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedAssemblerOptions {
  const parsed = optionsSchema.safeParse({
    threshold: options.threshold ?? parseFloatEnv(env.LAYOUT_MATCH_THRESHOLD, DEFAULT_MATCH_THRESHOLD),
    detectionOrigin: options.detectionOrigin ?? DEFAULT_DETECTION_ORIGIN,
    metadata: options.metadata ?? {},
    nonTextLines: options.nonTextLines ?? 'reject',
    concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
  });

  if (!parsed.success) {
    throw new InvalidInputError('Invalid assembler options', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return {
    ...parsed.data,
    generateId: options.generateId ?? randomUUID,
    logger: options.logger ?? rootLogger,
  };
}
