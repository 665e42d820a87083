export { IniError, IniSyntaxError, LookupError, MissingKeyError, MissingSectionError, IniConfigError, SiphonError } from '#errors';
export { readerOptions, DEFAULT_READER_OPTIONS, type ReaderOptions, type ReaderOptionsInput } from '#reader/options';
export { read, readDefault, type IniToken, type IniTokenStream, type SectionHeader, type KeyValue } from '#reader/read';
export { lex } from '#lexer/lines';
export { Section } from '#tree/section';
export { build } from '#tree/build';
export { resolveLookups, substitute } from '#tree/lookup';
export { serialize } from '#tree/serialize';
export { parseInto, parseString, type ParseOptions } from '#ini';
export { parseFile, saveFile } from '#io';
export { siphon } from '#siphon';
