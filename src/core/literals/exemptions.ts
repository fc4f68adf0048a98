/**
 * Types whose composite literals may use positional elements.
 *
 * Keys are "importPath.TypeName". The set is built once, before a build
 * starts, and is never mutated afterwards.
 */

export type LiteralExemptions = ReadonlySet<string>;

/** Standard types whose field lists are frozen. */
const FROZEN_STANDARD_TYPES = [
  'image/color.Alpha16',
  'image/color.Alpha',
  'image/color.CMYK',
  'image/color.Gray16',
  'image/color.Gray',
  'image/color.NRGBA64',
  'image/color.NRGBA',
  'image/color.NYCbCrA',
  'image/color.RGBA64',
  'image/color.RGBA',
  'image/color.YCbCr',
  'image.Point',
  'image.Rectangle',
  'image.Uniform',
  'unicode.Range16',
  'unicode.Range32',
  // Generated test mains list these positionally.
  'testing.InternalBenchmark',
  'testing.InternalExample',
  'testing.InternalTest',
  'testing.InternalFuzzTarget',
] as const;

/** Types the deployment platform's bootstrap code builds positionally. */
const PLATFORM_LITERAL_EXEMPTIONS = [
  'appengine/datastore.PropertyList',
  'appengine.MultiError',
] as const;

export const DEFAULT_LITERAL_EXEMPTIONS: LiteralExemptions = new Set<string>([
  ...FROZEN_STANDARD_TYPES,
  ...PLATFORM_LITERAL_EXEMPTIONS,
]);

/**
 * Build the exemption set from the defaults plus configured entries.
 */
export function createLiteralExemptions(extra: Iterable<string> = []): LiteralExemptions {
  return new Set<string>([...DEFAULT_LITERAL_EXEMPTIONS, ...extra]);
}

export function literalKey(importPath: string, typeName: string): string {
  return `${importPath}.${typeName}`;
}
