// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { z } from 'zod';
import { IniConfigError } from '#errors';

// Character classes and behaviours the reader is parametrized by
// Chosen once per read; the reader never changes them mid-scan
const readerOptionsSchema = z.object({
  // a line whose first non-whitespace text is one of these is skipped
  commentMarkers: z.array(z.string().min(1)).default(['#', ';']),
  // separates key from value, first occurrence wins
  assignment: z.string().min(1).default('='),
  // single: one-line value with escapes; tripled: verbatim multi-line value
  quote: z.string().length(1).default('"'),
  escapes: z.boolean().default(true),
  multiline: z.boolean().default(true),
  // trailing marker joining the next line onto an unquoted value; null disables
  continuation: z.string().min(1).nullable().default('\\'),
}).strict()
  .refine((o) => o.assignment !== o.quote, {
    message: 'Assignment marker must differ from the quote character',
    path: ['assignment'],
  })
  .refine((o) => !o.commentMarkers.includes(o.assignment), {
    message: 'Assignment marker must not be a comment marker',
    path: ['assignment'],
  })
  .refine((o) => !o.commentMarkers.some((m) => m.startsWith('[') || m.startsWith(o.quote)), {
    message: 'Comment markers must not start with \'[\' or the quote character',
    path: ['commentMarkers'],
  });

export interface ReaderOptions {
  readonly commentMarkers: readonly string[];
  readonly assignment: string;
  readonly quote: string;
  readonly escapes: boolean;
  readonly multiline: boolean;
  readonly continuation: string | null;
}

export type ReaderOptionsInput = z.input<typeof readerOptionsSchema>;

export function readerOptions(input: ReaderOptionsInput = {}): ReaderOptions {
  const result = readerOptionsSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.') || '(options)'}: ${i.message}`).join('; ');
    throw new IniConfigError(`Invalid reader options: ${detail}`, { cause: result.error });
  }
  return Object.freeze({ ...result.data, commentMarkers: Object.freeze([...result.data.commentMarkers]) });
}

export const DEFAULT_READER_OPTIONS: ReaderOptions = readerOptions();
