// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { IniError, MissingKeyError, MissingSectionError } from '#errors';
import { splitPath } from '#util';

// Named node of the document tree, holding keys and child sections
//
// A section owns its children; the parent link is only a back-reference for upward lookups
// Every section is attached to at most one parent, and parent.sections.get(name) === section
// whenever section.parent === parent, so the tree stays acyclic
export class Section {
  readonly name: string;
  #parent: Section | null = null;
  readonly #keys = new Map<string, string>();
  readonly #sections = new Map<string, Section>();

  constructor(name: string = 'root') {
    this.name = name;
  }

  get parent(): Section | null {
    return this.#parent;
  }

  hasParent(): boolean {
    return this.#parent !== null;
  }

  get root(): Section {
    let s: Section = this;
    while (s.#parent !== null) {
      s = s.#parent;
    }
    return s;
  }

  // Dotted path of names from the root, '' for the root itself
  get path(): string {
    const names = new Array<string>();
    for (let s: Section = this; s.#parent !== null; s = s.#parent) {
      names.unshift(s.name);
    }
    return names.join('.');
  }

  get keys(): ReadonlyMap<string, string> {
    return this.#keys;
  }

  get sections(): ReadonlyMap<string, Section> {
    return this.#sections;
  }

  setKey(name: string, value: string) {
    this.#keys.set(name, value);
  }

  hasKey(name: string): boolean {
    return this.#keys.has(name);
  }

  getKey(name: string): string;
  getKey<D>(name: string, defaultValue: D): string | D;
  getKey<D>(name: string, ...fallback: [] | [D]): string | D {
    const value = this.#keys.get(name);
    if (value !== undefined) {
      return value;
    }
    if (fallback.length === 1) {
      return fallback[0];
    }
    throw new MissingKeyError(name, this.path);
  }

  removeKey(name: string): boolean {
    return this.#keys.delete(name);
  }

  hasSection(name: string): boolean {
    return this.#sections.has(name);
  }

  getSection(name: string): Section;
  getSection<D>(name: string, defaultValue: D): Section | D;
  getSection<D>(name: string, ...fallback: [] | [D]): Section | D {
    const section = this.#sections.get(name);
    if (section !== undefined) {
      return section;
    }
    if (fallback.length === 1) {
      return fallback[0];
    }
    throw new MissingSectionError(name, this.path);
  }

  // Attaches section as a child, detaching it from any previous parent first
  // A child of the same name already present absorbs it instead: keys overwrite, grandchildren merge
  // Returns whichever section now holds the content
  addSection(section: Section): Section {
    for (let p: Section | null = this; p !== null; p = p.#parent) {
      if (p === section) {
        throw new IniError(`Cannot attach section '${section.name}' below itself`);
      }
    }

    section.#detach();
    const existing = this.#sections.get(section.name);
    if (existing === undefined) {
      this.#sections.set(section.name, section);
      section.#parent = this;
      return section;
    }

    existing.inherit(section);
    for (const child of Array.from(section.#sections.values())) {
      existing.addSection(child);
    }
    return existing;
  }

  removeSection(name: string): Section | null {
    const section = this.#sections.get(name);
    if (section === undefined) {
      return null;
    }
    section.#detach();
    return section;
  }

  // Moves this section under parent; see addSection for name clashes
  setParent(parent: Section): Section {
    return parent.addSection(this);
  }

  #detach() {
    if (this.#parent !== null) {
      this.#parent.#sections.delete(this.name);
      this.#parent = null;
    }
  }

  // Section by dotted path of child names; '' is this section
  getSectionEx(path: string): Section {
    let s: Section = this;
    for (const part of splitPath(path)) {
      s = s.getSection(part);
    }
    return s;
  }

  findSectionEx(path: string): Section | null {
    let s: Section | null = this;
    for (const part of splitPath(path)) {
      s = s.getSection(part, null);
      if (s === null) {
        return null;
      }
    }
    return s;
  }

  // Copies every key of section into this one
  inherit(section: Section) {
    for (const [name, value] of section.#keys) {
      this.#keys.set(name, value);
    }
  }
}
