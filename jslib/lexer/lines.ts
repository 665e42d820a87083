import type { LexStream } from '#lexer';

export type Tag = 'nl' | 'text';

// Single line break, or maximal run of anything else; irrefutable
// Line breaks are \r\n, \n or a lone \r; a line break ends a line and is not part of it
// Blank lines therefore produce adjacent <nl> tokens
export function* lex(str: string): LexStream<Tag> {
  const re_lexer = /(?<nl>\r\n|[\n\r])|(?<text>[^\n\r]+)/y;

  let last = 0, match: RegExpExecArray | null;
  while ((match = re_lexer.exec(str)) !== null) {
    yield {
      tag: match.groups?.nl !== undefined ? 'nl' : 'text',
      start: last,
      end: re_lexer.lastIndex,
    };

    last = re_lexer.lastIndex;
  }
  return;
}
