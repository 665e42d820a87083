import fc from 'fast-check';
import type { Arbitrary } from 'fast-check';
import { Section } from '#tree/section';

// Keys and values lean on the characters the writer has to quote or escape; never \r, which only
// a """ block can carry
const arbKey: Arbitrary<string> = fc.string({ unit: fc.constantFrom('a', 'b', ' ', '\t', '=', '#', ';', '[', '\\', '%'), maxLength: 6 });
const arbValue: Arbitrary<string> = fc.string({ unit: fc.constantFrom('a', 'b', ' ', '\t', '\n', '"', '\\', '#', ';', '=', '%'), maxLength: 10 });

// Never empty, no ':' and no surrounding whitespace, so it fits a header
const arbSectionName: Arbitrary<string> = fc.stringMatching(/^[a-z0-9_#\]\[]([a-z0-9 _#\]\[]{0,4}[a-z0-9_#\]\[])?$/);

const arbKeys: Arbitrary<[string, string][]> = fc.uniqueArray(fc.tuple(arbKey, arbValue), { maxLength: 5, selector: ([k]) => k });

// A root with keys of its own and flat child sections
export const arbFlatTree: Arbitrary<Section> = fc.tuple(
  arbKeys,
  fc.uniqueArray(fc.tuple(arbSectionName, arbKeys), { maxLength: 4, selector: ([n]) => n }),
).map(([keys, sections]) => {
  const root = new Section();
  keys.forEach(([k, v]) => root.setKey(k, v));
  for (const [name, sectionKeys] of sections) {
    const section = root.addSection(new Section(name));
    sectionKeys.forEach(([k, v]) => section.setKey(k, v));
  }
  return root;
});

// Names and key/value pairs, sorted, for comparing trees irrespective of order
export type Shape = [[string, string][], [string, [string, string][]][]];

function sorted<T extends [string, unknown]>(entries: Iterable<T>): T[] {
  return Array.from(entries).sort(([a], [b]) => a < b ? -1 : a > b ? 1 : 0);
}

export function shapeOf(root: Section): Shape {
  return [
    sorted(root.keys),
    sorted(Array.from(root.sections, ([name, s]): [string, [string, string][]] => [name, sorted(s.keys)])),
  ];
}
