import { IniError } from '#errors';
import { DEFAULT_READER_OPTIONS, type ReaderOptions } from '#reader/options';
import type { Section } from '#tree/section';

// Writes section back out as text the reader (with the same options) reads into the same keys:
// its own keys first, then a [name] block per child section
// Formatting, comments and inheritance of the original text are not reproduced
// Grandchildren are rejected, since headers always attach to the document root
export function serialize(section: Section, options: ReaderOptions = DEFAULT_READER_OPTIONS): string {
  const out = new Array<string>();
  writeKeys(out, section, options);

  for (const child of section.sections.values()) {
    if (child.sections.size > 0) {
      throw new IniError(`Section '${child.path}' has nested sections, which cannot be written`);
    }
    if (out.length > 0) {
      out.push('');
    }
    out.push(`[${renderName(child)}]`);
    writeKeys(out, child, options);
  }

  return out.length === 0 ? '' : out.join('\n') + '\n';
}

function writeKeys(out: string[], section: Section, options: ReaderOptions) {
  for (const [key, value] of section.keys) {
    out.push(`${renderKey(key, options)} ${options.assignment} ${renderValue(key, value, options)}`);
  }
}

const LINE_BREAK = /[\n\r]/;

function renderName(section: Section): string {
  const { name } = section;
  if (name === '' || name !== name.trim() || name.includes(':') || LINE_BREAK.test(name)) {
    throw new IniError(`Section name '${name}' cannot be written as a header`);
  }
  return name;
}

function renderKey(key: string, options: ReaderOptions): string {
  const { quote, assignment, commentMarkers } = options;
  const plain = key !== '' &&
    key === key.trim() &&
    !key.includes(assignment) &&
    !key.startsWith(quote) &&
    !key.startsWith('[') &&
    !commentMarkers.some((m) => key.startsWith(m));
  if (plain && !LINE_BREAK.test(key)) {
    return key;
  }
  if (key.includes(quote) || LINE_BREAK.test(key)) {
    throw new IniError(`Key '${key}' cannot be written`);
  }
  return quote + key + quote;
}

function renderValue(key: string, value: string, options: ReaderOptions): string {
  const { quote, continuation } = options;
  const plain = value === value.trim() &&
    !LINE_BREAK.test(value) &&
    !value.startsWith(quote) &&
    !(continuation !== null && value.endsWith(continuation));
  if (plain) {
    return value;
  }

  // \r has no escape, and a lone one would split the line
  if (options.escapes && !value.includes('\r')) {
    return quote + escape(value, quote) + quote;
  }
  if (options.multiline && !value.includes(quote)) {
    const tripleQuote = quote.repeat(3);
    return tripleQuote + value + tripleQuote;
  }
  throw new IniError(`Value of key '${key}' cannot be written with these reader options`);
}

function escape(value: string, quote: string): string {
  let out = '';
  for (const c of value) {
    switch (c) {
      case '\\': out += '\\\\'; break;
      case '\n': out += '\\n'; break;
      case '\t': out += '\\t'; break;
      case quote: out += '\\' + quote; break;
      default: out += c;
    }
  }
  return out;
}
