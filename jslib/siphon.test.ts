import { expect, test } from 'vitest';
import { z } from 'zod';
import { SiphonError } from '#errors';
import { parseString } from '#ini';
import { siphon } from '#siphon';

const Window = z.object({
  width: z.coerce.number().int(),
  title: z.string().default('untitled'),
  fullscreen: z.enum(['yes', 'no']).optional(),
});

test('fields are read from keys of the same name', () => {
  const ini = parseString('[Section]\nvar=3');
  expect(siphon(ini.getSection('Section'), z.object({ var: z.coerce.number() }))).toEqual({ var: 3 });
});

test('missing keys fall back to the schema', () => {
  const ini = parseString('[window]\nwidth = 640\nunrelated = 1');
  expect(siphon(ini.getSection('window'), Window)).toEqual({ width: 640, title: 'untitled' });
});

test('values that do not fit are rejected', () => {
  const ini = parseString('[window]\nwidth = wide');
  expect(() => siphon(ini.getSection('window'), Window)).toThrowError(SiphonError);
  expect(() => siphon(ini.getSection('window'), Window)).toThrowError(/^Section 'window' does not fit: width: /);
});

test('missing required key is rejected', () => {
  const ini = parseString('[window]\ntitle = main');
  expect(() => siphon(ini.getSection('window'), Window)).toThrowError(SiphonError);
});
