import { readFileSync, writeFileSync } from 'node:fs';
import { parseString, type ParseOptions } from '#ini';
import { DEFAULT_READER_OPTIONS } from '#reader/options';
import { serialize } from '#tree/serialize';
import type { Section } from '#tree/section';

export function parseFile(path: string, options: ParseOptions = {}): Section {
  return parseString(readFileSync(path, 'utf8'), options);
}

// Overwrites path
export function saveFile(path: string, section: Section, { reader = DEFAULT_READER_OPTIONS }: Pick<ParseOptions, 'reader'> = {}) {
  writeFileSync(path, serialize(section, reader), 'utf8');
}
