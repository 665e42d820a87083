// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

export class IniError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IniError';
  }
}

// Malformed input while scanning; parsing stops at the first one
export class IniSyntaxError extends IniError {
  readonly linum: number;
  readonly line: string;

  constructor(message: string, linum: number, line: string, options?: { cause?: unknown }) {
    super(`${message} at line {${linum}}: {${line}}`, options);
    this.name = 'IniSyntaxError';
    this.linum = linum;
    this.line = line;
  }
}

// A dotted reference (inheritance target or %lookup%) names nothing in the tree
export class LookupError extends IniError {
  readonly path: string;
  readonly origin: string;

  constructor(path: string, origin: string, options?: { cause?: unknown }) {
    super(`Unresolved reference '${path}' in ${origin}`, options);
    this.name = 'LookupError';
    this.path = path;
    this.origin = origin;
  }
}

function describeSection(section: string) {
  return section === '' ? 'root section' : `section '${section}'`;
}

export class MissingKeyError extends IniError {
  readonly key: string;
  readonly section: string;

  constructor(key: string, section: string) {
    super(`Key '${key}' does not exist in ${describeSection(section)}`);
    this.name = 'MissingKeyError';
    this.key = key;
    this.section = section;
  }
}

export class MissingSectionError extends IniError {
  readonly child: string;
  readonly section: string;

  constructor(child: string, section: string) {
    super(`Section '${child}' does not exist in ${describeSection(section)}`);
    this.name = 'MissingSectionError';
    this.child = child;
    this.section = section;
  }
}

export class IniConfigError extends IniError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IniConfigError';
  }
}

export class SiphonError extends IniError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SiphonError';
  }
}
