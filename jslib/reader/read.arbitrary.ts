import fc from 'fast-check';
import type { Arbitrary } from 'fast-check';
import { devAssert } from '#util';

// What the reader should produce for a generated document, minus the line spans
export type Expected =
  { tag: 'section', linum: number, name: string, inherits: string | null } |
  { tag: 'key', linum: number, key: string, value: string };

const LINE_BREAKS = /\r\n|[\n\r]/g;

// Helper to accumulate a generated document to (raw string, expected reader output)
export class Accumulator {
  raw: string;
  linum: number;
  expected: Expected[];
  nl: string;

  constructor(nl: string) {
    this.raw = '';
    this.linum = 1;
    this.expected = new Array();
    this.nl = nl;
  }

  // text may itself span lines
  appendLine(text: string) {
    this.raw += text + this.nl;
    this.linum += 1 + (text.match(LINE_BREAKS)?.length ?? 0);
  }
}

// Names never containing markers, quotes, dots, whitespace or line breaks
export const arbName: Arbitrary<string> = fc.stringMatching(/^[A-Za-z0-9_-]{1,8}$/);

// Mix of spaces and tabs, possibly empty
const arbIndent: Arbitrary<string> = fc.stringMatching(/^[ \t]{0,3}$/);

// Space-separated words; inline ; and # are literal, % is only meaningful to lookups
export const arbPlainValue: Arbitrary<string> =
  fc.array(fc.stringMatching(/^[A-Za-z0-9;#%=_-]{1,6}$/), { maxLength: 4 }).map((w) => w.join(' '));

// Value as written plus value as read
type Rendered = [string, string];

function escape(value: string): string {
  return value.replace(/[\\\n\t"]/g, (c) => c === '\n' ? '\\n' : c === '\t' ? '\\t' : '\\' + c);
}

const arbQuoted: Arbitrary<Rendered> =
  fc.stringMatching(/^[a-z \t\n\\"]{0,12}$/).map((v) => [`"${escape(v)}"`, v]);

// Block contents never contain a quote, so never close early
const arbMultiline: Arbitrary<Rendered> =
  fc.stringMatching(/^[a-z \n]{0,16}$/).map((v) => [`"""${v}"""`, v]);

// Parts joined by trailing \ with the next line indented
const arbContinued: Arbitrary<[string[], string]> =
  fc.array(fc.stringMatching(/^[a-z0-9]{1,4}( [a-z0-9]{1,4}){0,2}$/), { minLength: 2, maxLength: 4 })
    .chain((parts) => fc.array(arbIndent, { minLength: parts.length, maxLength: parts.length }).map((indents): [string[], string] => [
      parts.map((p, i) => indents[i] + p + (i < parts.length - 1 ? ' \\' : '')),
      parts.join(' '),
    ]));

export class FakeEntry {
  indent: string;
  key: string;
  quotedKey: boolean;
  lines: string[]; // value as written, first line following the assignment
  value: string;

  constructor(indent: string, key: string, quotedKey: boolean, lines: string[], value: string) {
    devAssert(lines.length > 0);
    this.indent = indent;
    this.key = key;
    this.quotedKey = quotedKey;
    this.lines = lines;
    this.value = value;
  }

  accumulateTo(acc: Accumulator) {
    acc.expected.push({ tag: 'key', linum: acc.linum, key: this.key, value: this.value });
    const key = this.quotedKey ? `"${this.key}"` : this.key;
    const [first, ...rest] = this.lines;
    acc.appendLine(`${this.indent}${key} = ${first}`);
    rest.forEach((line) => acc.appendLine(line));
  }
}

export const arbEntry: Arbitrary<FakeEntry> = fc.tuple(
  arbIndent,
  arbName,
  fc.boolean(),
  fc.oneof(
    arbPlainValue.map((v): [string[], string] => [[v], v]),
    arbQuoted.map(([w, v]): [string[], string] => [[w], v]),
    arbMultiline.map(([w, v]): [string[], string] => [[w], v]),
    arbContinued,
  ),
).map(([indent, key, quotedKey, [lines, value]]) => new FakeEntry(indent, key, quotedKey, lines, value));

// Blank or comment line, never producing output
const arbFiller: Arbitrary<string> = fc.oneof(
  arbIndent,
  fc.tuple(arbIndent, fc.constantFrom('#', ';'), arbPlainValue).map(([i, m, v]) => `${i}${m}${v}`),
);

export class FakeSection {
  name: string;
  inherits: string | null;
  entries: FakeEntry[];

  constructor(name: string, inherits: string | null, entries: FakeEntry[]) {
    this.name = name;
    this.inherits = inherits;
    this.entries = entries;
  }

  accumulateTo(acc: Accumulator, filler: Iterator<string>) {
    acc.expected.push({ tag: 'section', linum: acc.linum, name: this.name, inherits: this.inherits });
    acc.appendLine(this.inherits === null ? `[${this.name}]` : `[ ${this.name} : ${this.inherits} ]`);
    for (const entry of this.entries) {
      accumulateFiller(acc, filler);
      entry.accumulateTo(acc);
    }
  }
}

// Draws up to 2 filler lines, stopping early on an empty string or once filler runs out
function accumulateFiller(acc: Accumulator, filler: Iterator<string>) {
  for (let i = 0; i < 2; i++) {
    const line = filler.next();
    if (line.done === true || line.value === '') {
      return;
    }
    acc.appendLine(line.value);
  }
}

export const arbSection: Arbitrary<FakeSection> = fc.tuple(
  arbName,
  fc.oneof(fc.constant(null), arbName),
  fc.array(arbEntry, { maxLength: 4 }),
).map((x) => new FakeSection(...x));

// Represents an entire document: keys before the first header, then sections
export class FakeDocument {
  toplevel: FakeEntry[];
  sections: FakeSection[];
  nl: string;

  constructor(toplevel: FakeEntry[], sections: FakeSection[], nl: string) {
    this.toplevel = toplevel;
    this.sections = sections;
    this.nl = nl;
  }

  toInput(filler: Iterator<string>): [string, Expected[]] {
    const acc = new Accumulator(this.nl);
    for (const entry of this.toplevel) {
      accumulateFiller(acc, filler);
      entry.accumulateTo(acc);
    }
    for (const section of this.sections) {
      accumulateFiller(acc, filler);
      section.accumulateTo(acc, filler);
    }
    return [acc.raw, acc.expected];
  }
}

export const arbDocument: Arbitrary<FakeDocument> = fc.tuple(
  fc.array(arbEntry, { maxLength: 4 }),
  fc.array(arbSection, { maxLength: 4 }),
  fc.constantFrom('\n', '\r\n'),
).map((x) => new FakeDocument(...x));

// Raw text and expected output, with blank and comment lines sprinkled in
export const arbInput: Arbitrary<[string, Expected[]]> = fc.tuple(
  arbDocument,
  fc.array(fc.oneof(fc.constant(''), arbFiller), { maxLength: 40 }),
).map(([doc, filler]) => doc.toInput(filler.values()));

// Lines that stop the reader, and whether they must come last (an unclosed block swallows the rest)
export const arbBrokenLine: Arbitrary<[string, boolean]> = fc.oneof(
  arbName.map((n): [string, boolean] => [`[${n}`, false]),
  fc.tuple(arbName, arbName).map(([k, v]): [string, boolean] => [`${k} = "${v}`, false]),
  fc.tuple(arbName, arbName).map(([k, v]): [string, boolean] => [`"${k} = ${v}`, false]),
  fc.tuple(arbName, arbName).map(([k, v]): [string, boolean] => [`${k} = """${v}`, true]),
);
