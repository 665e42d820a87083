// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { splitPath } from '#util';
import { LookupError } from '#errors';
import type { Section } from '#tree/section';

// Rewrites %path% markers in every value of section, then of each child section in turn
//
// One pass, no fixpoint: a referenced key is read as it stands at that moment, so a reference into
// a section not yet visited copies its raw text, %markers% and all
export function resolveLookups(section: Section) {
  for (const [key, value] of section.keys) {
    const resolved = substitute(section, key, value);
    if (resolved !== value) {
      section.setKey(key, resolved);
    }
  }

  for (const child of section.sections.values()) {
    resolveLookups(child);
  }
}

// Replaces each %path% pair in value, scanning left to right over the original text only
// A path starting with '.' is anchored at the root, otherwise at section
// A lone trailing % is left as is
export function substitute(section: Section, key: string, value: string): string {
  let out = '', last = 0, open = -1;

  for (let i = 0; i < value.length; i++) {
    if (value[i] !== '%') {
      continue;
    }
    if (open === -1) {
      open = i;
      continue;
    }

    out += value.substring(last, open) + lookup(section, key, value.substring(open + 1, i));
    last = i + 1;
    open = -1;
  }

  return out + value.substring(last);
}

function lookup(section: Section, key: string, path: string): string {
  const rooted = path.startsWith('.');
  const anchor = rooted ? section.root : section;
  const parts = splitPath(rooted ? path.substring(1) : path);
  const name = parts.pop();

  const value = name === undefined ? null : anchor.findSectionEx(parts.join('.'))?.getKey(name, null) ?? null;
  if (value === null) {
    const origin = section.path === '' ? key : `${section.path}.${key}`;
    throw new LookupError(path, `key '${origin}'`);
  }
  return value;
}
