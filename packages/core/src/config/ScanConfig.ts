/**
 * Scan options for OrderedDictionary.
 *
 * @module config/ScanConfig
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../errors';

export const ScanOptionsSchema = z.object({
  /** Iterate from the upper boundary down (default: false) */
  reverse: z.boolean().default(false),
  /** Maximum number of entries to yield */
  limit: z.number().int().positive().optional(),
});

/** Options as accepted from callers (all optional). */
export type ScanOptions = z.input<typeof ScanOptionsSchema>;

/** Options with defaults applied. */
export type ResolvedScanOptions = z.output<typeof ScanOptionsSchema>;

export function resolveScanOptions(options: ScanOptions = {}): ResolvedScanOptions {
  const result = ScanOptionsSchema.safeParse(options);
  if (!result.success) {
    const reason = result.error.issues
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new InvalidArgumentError('options', reason, { cause: result.error });
  }
  return result.data;
}
