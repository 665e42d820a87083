import type { z } from 'zod';
import { SiphonError } from '#errors';
import type { Section } from '#tree/section';

// Maps the keys of a section onto a record, one schema field per key
// Only keys the section has are handed to the schema, as strings; coerce (z.coerce.number()),
// default or mark optional the fields as needed
//
//   const Window = z.object({ width: z.coerce.number(), title: z.string().default('untitled') });
//   const window = siphon(ini.getSection('window'), Window);
export function siphon<T extends z.ZodRawShape, U extends z.UnknownKeysParam, C extends z.ZodTypeAny>(
  section: Section,
  schema: z.ZodObject<T, U, C>,
): z.output<z.ZodObject<T, U, C>> {
  const raw: Record<string, string> = {};
  for (const field of Object.keys(schema.shape)) {
    const value = section.getKey(field, null);
    if (value !== null) {
      raw[field] = value;
    }
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new SiphonError(`Section '${section.path}' does not fit: ${detail}`, { cause: result.error });
  }
  return result.data;
}
