// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { expect, test } from 'vitest';
import fc from 'fast-check';
import { IniSyntaxError } from '#errors';
import { readerOptions } from '#reader/options';
import { readDefault, type IniToken } from '#reader/read';
import { arbBrokenLine, arbInput, type Expected } from '#reader/read.arbitrary';

function strip(tokens: Iterable<IniToken>): Expected[] {
  return Array.from(tokens, (t) => t.tag === 'section'
    ? { tag: t.tag, linum: t.linum, name: t.name, inherits: t.inherits }
    : { tag: t.tag, linum: t.linum, key: t.key, value: t.value });
}

function values(str: string, options = readerOptions()): [string, string][] {
  return Array.from(readDefault(str, options))
    .flatMap((t): [string, string][] => t.tag === 'key' ? [[t.key, t.value]] : []);
}

function syntaxError(str: string, options = readerOptions()): IniSyntaxError {
  try {
    Array.from(readDefault(str, options));
  } catch (e) {
    if (e instanceof IniSyntaxError) {
      return e;
    }
    throw e;
  }
  throw new Error('no error thrown');
}

test('empty string reads as empty', () => {
  expect(Array.from(readDefault(''))).toEqual([]);
});

test('blank and comment lines are skipped', () => {
  expect(Array.from(readDefault('  \n# a = b\n\t; [c]\n\r\n'))).toEqual([]);
});

test('unquoted value keeps trailing comment text', () => {
  expect(values('test = bar ; comment\nother=a # b')).toEqual([['test', 'bar ; comment'], ['other', 'a # b']]);
});

test('key without assignment has empty value', () => {
  expect(values('empty\nblank =')).toEqual([['empty', ''], ['blank', '']]);
});

test('value splits on first assignment marker only', () => {
  expect(values('url = a=b=c')).toEqual([['url', 'a=b=c']]);
});

test('quoted key loses its quotes', () => {
  expect(values('"quoted key"= VALUE 123')).toEqual([['quoted key', 'VALUE 123']]);
});

test('multi-line value keeps inner line breaks', () => {
  expect(values('quote_multiline = """\n  this is value\n"""')).toEqual([['quote_multiline', '\n  this is value\n']]);
});

test('multi-line value keeps CRLF verbatim', () => {
  expect(values('k = """a\r\nb"""\r\n')).toEqual([['k', 'a\r\nb']]);
});

test('multi-line value may close on its own line', () => {
  expect(values('k = """abc"""')).toEqual([['k', 'abc']]);
});

test('multi-line value keeps trailing whitespace of its first line', () => {
  expect(values('k = """ab  \ncd"""')).toEqual([['k', 'ab  \ncd']]);
});

test('escape sequences are decoded in quoted values', () => {
  expect(values('escape_sequences = "yay\\nboo"')).toEqual([['escape_sequences', 'yay\nboo']]);
  expect(values('k = "a\\tb\\\\c\\"d"')).toEqual([['k', 'a\tb\\c"d']]);
});

test('unrecognized escapes stay as written', () => {
  expect(values('k = "a\\qb"')).toEqual([['k', 'a\\qb']]);
});

test('quoted value keeps surrounding whitespace', () => {
  expect(values('k = "  a  "')).toEqual([['k', '  a  ']]);
});

test('escapes off leaves backslashes alone', () => {
  const options = readerOptions({ escapes: false });
  expect(values('k = "C:\\Path\\n"', options)).toEqual([['k', 'C:\\Path\\n']]);
  expect(values('path=C:\\Path', options)).toEqual([['path', 'C:\\Path']]);
});

test('line continuation joins with a single space', () => {
  expect(values('escaped_newlines = abcd \\\nefg')).toEqual([['escaped_newlines', 'abcd efg']]);
  expect(values('k = a\\\n    b \\\n\tc\nnext = 1')).toEqual([['k', 'a b c'], ['next', '1']]);
});

test('continued line is content even if it looks like a comment', () => {
  expect(values('k = a \\\n# b')).toEqual([['k', 'a # b']]);
});

test('blank line or end of input ends a continued value', () => {
  expect(values('k = a \\\n\nj = b')).toEqual([['k', 'a'], ['j', 'b']]);
  expect(values('k = a \\')).toEqual([['k', 'a']]);
});

test('continuation off keeps the marker', () => {
  expect(values('k = a \\\nb', readerOptions({ continuation: null }))).toEqual([['k', 'a \\'], ['b', '']]);
});

test('multi-line off reads triple quotes as a simple quoted value', () => {
  expect(values('k = """a"""', readerOptions({ multiline: false }))).toEqual([['k', '""a""']]);
});

test('custom markers', () => {
  const options = readerOptions({ commentMarkers: ['//'], assignment: ':', quote: '\'' });
  expect(values('// c\na: \'x\\\'y\'\nb: # not a comment', options)).toEqual([['a', 'x\'y'], ['b', '# not a comment']]);
});

test('section headers', () => {
  expect(strip(readDefault('[a]\n[ various   ]\n[foo : def]\n[ x:y.z ]'))).toEqual([
    { tag: 'section', linum: 1, name: 'a', inherits: null },
    { tag: 'section', linum: 2, name: 'various', inherits: null },
    { tag: 'section', linum: 3, name: 'foo', inherits: 'def' },
    { tag: 'section', linum: 4, name: 'x', inherits: 'y.z' },
  ]);
});

test('tokens carry the span of their lines', () => {
  const str = '[a]\r\nk = """x\ny"""\nj=1';
  const tokens = Array.from(readDefault(str));
  expect(tokens.map(({ linum, line: { start, end } }) => [linum, str.substring(start, end)])).toEqual([
    [1, '[a]'],
    [2, 'k = """x\ny"""'],
    [4, 'j=1'],
  ]);
});

test.for([
  ['[unterminated', 1, 'Unterminated section header'],
  ['a = 1\n[]', 2, 'Empty section name'],
  ['[a : ]', 1, 'Empty inheritance target'],
  ['k = "open', 1, 'Unterminated quoted value'],
  ['k = "open\\"', 1, 'Unterminated quoted value'],
  ['"k = v', 1, 'Unterminated quoted key'],
  ['"k" v', 1, 'Expected \'=\' after quoted key'],
  ['= v', 1, 'Missing key name'],
  ['a = 1\nk = """\nnever closed\n', 2, 'Unterminated multi-line value'],
  ['k = """a""" b', 1, 'Unexpected text after closing multi-line quote'],
  ['k = """a\nb""" c', 2, 'Unexpected text after closing multi-line quote'],
] as const)('%s does not read', ([str, linum, message]) => {
  const e = syntaxError(str);
  expect(e.linum).toBe(linum);
  expect(e.message.startsWith(`${message} at line {${linum}}`)).toBe(true);
});

test('syntax error carries the raw line', () => {
  expect(syntaxError('ok = 1\n  [broken  \nx = 2').line).toBe('  [broken  ');
  expect(syntaxError('k = """\nnever closed').line).toBe('k = """');
});

test('arbitrary document reads as generated', () => {
  fc.assert(
    fc.property(arbInput, ([str, expected]) => {
      expect(strip(readDefault(str))).toEqual(expected);
    }),
  );
});

test('token spans lie within input and start on their own line', () => {
  fc.assert(
    fc.property(arbInput, ([str, _expected]) => {
      for (const { line: { start, end } } of readDefault(str)) {
        expect(start).toBeGreaterThanOrEqual(0);
        expect(end).toBeLessThanOrEqual(str.length);
        expect(end).toBeGreaterThan(start);
        expect(start === 0 || str[start - 1] === '\n' || str[start - 1] === '\r').toBe(true);
      }
    }),
  );
});

test('broken line stops reading at its line', () => {
  fc.assert(
    fc.property(arbInput, arbBrokenLine, fc.boolean(), ([str, _expected], [broken, last], atStart) => {
      // an unclosed block swallows whatever follows, so it only goes last
      const first = atStart && !last;
      const text = first ? `${broken}\n${str}` : str + broken;
      const linum = first ? 1 : 1 + (str.match(/\r\n|[\n\r]/g)?.length ?? 0);

      const e = syntaxError(text);
      expect(e.linum).toBe(linum);
      expect(e.line).toBe(broken);
    }),
  );
});
