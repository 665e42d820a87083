// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { exhaustive } from '#util';
import { lex, type Tag } from '#lexer/lines';
import type { LexStream, Span } from '#lexer';
import { IniSyntaxError } from '#errors';
import { DEFAULT_READER_OPTIONS, type ReaderOptions } from '#reader/options';

export interface SectionHeader {
  tag: 'section',
  linum: number,
  line: Span,
  name: string,
  inherits: string | null, // dotted path, resolved from the document root
}

export interface KeyValue {
  tag: 'key',
  linum: number, // line the key is on, for values spanning several lines
  line: Span,
  key: string,
  value: string, // fully decoded, before any %lookup% substitution
}

export type IniToken = SectionHeader | KeyValue;

export type IniTokenStream = Iterable<IniToken>;

interface Ready {
  state: 'Ready';
}

// Inside a """ block; value accumulates verbatim, line breaks included
interface Multiline {
  state: 'Multiline';
  linum: number;
  lineStart: number;
  headEnd: number; // end of the line that opened the block, for error reporting
  key: string;
  value: string;
}

// Previous line ended in the continuation marker
interface Continued {
  state: 'Continued';
  linum: number;
  lineStart: number;
  key: string;
  value: string;
}

type State = Ready | Multiline | Continued;

const READY: State = { state: 'Ready' };

// Given a stream of lines:Token<Tag>s (<nl>|<text>, no 2 adjacent <text>), with raw string,
// reads it into section headers and key/value pairs
//
// Per line, judged on the trimmed line:
// - blank, or starting with a comment marker: skipped
// - [name] or [name : parent.path]: section header
// - anything else: key, optionally followed by assignment marker and value
// Comment markers only count at the start of a line; inside a value they are literal
// Value forms: """ verbatim block """, "quoted with escapes", unquoted (with trailing continuation marker)
export function* read(str: string, lines: LexStream<Tag>, options: ReaderOptions = DEFAULT_READER_OPTIONS): IniTokenStream {
  const { commentMarkers, assignment, quote, continuation } = options;
  const tripleQuote = quote.repeat(3);
  const escapes = new Map([['n', '\n'], ['t', '\t'], ['\\', '\\'], [quote, quote]]);

  let linum = 1, lineStart = 0, lineEnd = 0, s = READY;

  function throwError(msg: string): never {
    throw new IniSyntaxError(msg, linum, str.substring(lineStart, lineEnd));
  }

  function marshal(key: string, value: string, at: number, start: number): KeyValue {
    return { tag: 'key', linum: at, line: { start, end: lineEnd }, key, value };
  }

  function isEscaped(value: string, index: number): boolean {
    let backslashes = 0;
    while (index - backslashes - 1 > 0 && value[index - backslashes - 1] === '\\') {
      backslashes += 1;
    }
    return (backslashes & 1) === 1;
  }

  function unescape(value: string): string {
    let out = '';
    for (let i = 0; i < value.length; i++) {
      const c = value[i];
      const decoded = c === '\\' && i + 1 < value.length ? escapes.get(value[i + 1]) : undefined;
      if (decoded === undefined) {
        // unrecognized escapes stay as written
        out += c;
      } else {
        out += decoded;
        i += 1;
      }
    }
    return out;
  }

  function unquote(value: string): string {
    if (value.length < 2 || !value.endsWith(quote) || (options.escapes && isEscaped(value, value.length - 1))) {
      throwError('Unterminated quoted value');
    }
    const inner = value.substring(1, value.length - 1);
    return options.escapes ? unescape(inner) : inner;
  }

  function readHeader(trimmed: string): SectionHeader {
    if (trimmed.length < 2 || !trimmed.endsWith(']')) {
      throwError('Unterminated section header');
    }

    const inner = trimmed.substring(1, trimmed.length - 1);
    const colon = inner.indexOf(':');
    const name = (colon === -1 ? inner : inner.substring(0, colon)).trim();
    const inherits = colon === -1 ? null : inner.substring(colon + 1).trim();
    if (name === '') {
      throwError('Empty section name');
    }
    if (inherits === '') {
      throwError('Empty inheritance target');
    }

    return { tag: 'section', linum, line: { start: lineStart, end: lineEnd }, name, inherits };
  }

  // text is the raw line, trimmed the same without surrounding whitespace
  function* readAssignment(text: string, trimmed: string, nl: string): IniTokenStream {
    let key: string, rest: string;
    if (trimmed.startsWith(quote)) {
      const close = trimmed.indexOf(quote, 1);
      if (close === -1) {
        throwError('Unterminated quoted key');
      }
      key = trimmed.substring(1, close);
      rest = trimmed.substring(close + 1).trimStart();
      if (rest !== '' && !rest.startsWith(assignment)) {
        throwError(`Expected '${assignment}' after quoted key`);
      }
      rest = rest.substring(assignment.length);
    } else {
      const eq = trimmed.indexOf(assignment);
      key = (eq === -1 ? trimmed : trimmed.substring(0, eq)).trim();
      rest = eq === -1 ? '' : trimmed.substring(eq + assignment.length);
      if (key === '') {
        throwError('Missing key name');
      }
    }

    const value = rest.trim();
    if (options.multiline && value.startsWith(tripleQuote)) {
      // first line of the block is taken raw, trailing whitespace included
      const lead = text.length - text.trimStart().length;
      const open = text.indexOf(tripleQuote, lead + trimmed.length - rest.length);
      const body = text.substring(open + tripleQuote.length);
      const close = body.indexOf(tripleQuote);
      if (close === -1) {
        s = { state: 'Multiline', linum, lineStart, headEnd: lineEnd, key, value: body + nl };
      } else if (body.substring(close + tripleQuote.length).trim() !== '') {
        throwError('Unexpected text after closing multi-line quote');
      } else {
        yield marshal(key, body.substring(0, close), linum, lineStart);
      }
    } else if (value.startsWith(quote)) {
      yield marshal(key, unquote(value), linum, lineStart);
    } else if (continuation !== null && value.endsWith(continuation)) {
      s = {
        state: 'Continued',
        linum,
        lineStart,
        key,
        value: value.substring(0, value.length - continuation.length).trimEnd(),
      };
    } else {
      yield marshal(key, value, linum, lineStart);
    }
  }

  // nl is the line break that ended the current line, '' at end of input
  function* endLine(nl: string): IniTokenStream {
    const text = str.substring(lineStart, lineEnd);
    switch (s.state) {
      case 'Ready': {
        const trimmed = text.trim();
        if (trimmed === '' || commentMarkers.some((m) => trimmed.startsWith(m))) {
          break;
        }
        if (trimmed.startsWith('[')) {
          yield readHeader(trimmed);
        } else {
          yield* readAssignment(text, trimmed, nl);
        }
        break;
      }
      case 'Multiline': {
        const close = text.indexOf(tripleQuote);
        if (close === -1) {
          s = { ...s, value: s.value + text + nl };
        } else if (text.substring(close + tripleQuote.length).trim() !== '') {
          throwError('Unexpected text after closing multi-line quote');
        } else {
          yield marshal(s.key, s.value + text.substring(0, close), s.linum, s.lineStart);
          s = READY;
        }
        break;
      }
      case 'Continued': {
        const part = text.trim(), head = s.value;
        const joined = (tail: string) => head === '' || tail === '' ? head + tail : `${head} ${tail}`;
        if (part === '') {
          // blank line ends the value
          yield marshal(s.key, s.value, s.linum, s.lineStart);
          s = READY;
        } else if (continuation !== null && part.endsWith(continuation)) {
          s = { ...s, value: joined(part.substring(0, part.length - continuation.length).trimEnd()) };
        } else {
          yield marshal(s.key, joined(part), s.linum, s.lineStart);
          s = READY;
        }
        break;
      }
      /* v8 ignore next */ default: exhaustive(s);
    }
  }

  for (const { tag, start, end } of lines) {
    switch (tag) {
      case 'text':
        lineEnd = end;
        break;
      case 'nl':
        lineEnd = start;
        yield* endLine(str.substring(start, end));

        linum += 1;
        lineStart = end;
        lineEnd = end;
        break;
      /* v8 ignore next */ default: exhaustive(tag);
    }
  }

  if (lineStart < str.length) {
    yield* endLine('');
  }

  switch (s.state) {
    case 'Ready':
      break;
    case 'Multiline':
      throw new IniSyntaxError('Unterminated multi-line value', s.linum, str.substring(s.lineStart, s.headEnd));
    case 'Continued':
      // input ended on a continued line
      yield marshal(s.key, s.value, s.linum, s.lineStart);
      break;
    /* v8 ignore next */ default: exhaustive(s);
  }

  return;
}

// Convenience function to use the lines lexer
export function readDefault(str: string, options: ReaderOptions = DEFAULT_READER_OPTIONS): IniTokenStream {
  return read(str, lex(str), options);
}
