// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

// Dotted path into the section tree: 'a.b.c' => ['a', 'b', 'c'], '' => []
export function splitPath(path: string): string[] {
  return path === '' ? [] : path.split('.');
}

/* v8 ignore start */
export class AssertionError extends Error {
  constructor() {
    super('assertion failed');
    this.name = 'AssertionError';
  }
}

export function devAssert(p: unknown): asserts p {
  if (!import.meta.env.PROD && !p) {
    throw new AssertionError();
  }
}

export function exhaustive(_p: never) {
  if (!import.meta.env.PROD) {
    throw new AssertionError();
  }
}
/* v8 ignore stop */
