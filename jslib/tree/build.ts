// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { exhaustive } from '#util';
import { LookupError } from '#errors';
import type { IniTokenStream } from '#reader/read';
import { Section } from '#tree/section';

// Consumes reader output into document
//
// Headers never nest lexically: every [name] becomes a child of document, and keys that follow
// go into it until the next header. Keys before the first header go into document itself.
// [name : parent.path] starts name off with a copy of the keys of document.getSectionEx(parent.path)
// A header naming an existing child reopens it; keys are overwritten, last one wins
// No %lookup% substitution happens here
export function build(document: Section, tokens: IniTokenStream): Section {
  let cursor = document;

  for (const token of tokens) {
    switch (token.tag) {
      case 'section': {
        const child = new Section(token.name);
        if (token.inherits !== null) {
          const base = document.findSectionEx(token.inherits);
          if (base === null) {
            throw new LookupError(token.inherits, `header of section '${token.name}' at line {${token.linum}}`);
          }
          child.inherit(base);
        }
        cursor = document.addSection(child);
        break;
      }
      case 'key':
        cursor.setKey(token.key, token.value);
        break;
      /* v8 ignore next */ default: exhaustive(token);
    }
  }

  return document;
}
