// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { DEFAULT_READER_OPTIONS, type ReaderOptions } from '#reader/options';
import { readDefault } from '#reader/read';
import { build } from '#tree/build';
import { resolveLookups } from '#tree/lookup';
import { Section } from '#tree/section';

export interface ParseOptions {
  reader?: ReaderOptions,
  lookups?: boolean, // resolve %path% markers once the tree is built, default true
}

// Parses data into an existing section, merging with what it already holds
// Keys set beforehand are visible to lookups
// On error the section may be left half-populated and should be discarded
export function parseInto(document: Section, data: string, { reader = DEFAULT_READER_OPTIONS, lookups = true }: ParseOptions = {}): Section {
  build(document, readDefault(data, reader));
  if (lookups) {
    resolveLookups(document);
  }
  return document;
}

export function parseString(data: string, options: ParseOptions = {}): Section {
  return parseInto(new Section(), data, options);
}
