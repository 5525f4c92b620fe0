import type { Displayer, Normalizer, TaggingOptions } from '../models/config.js';
import type { ResolvedTag, TagInput } from '../models/tag.js';
import { ConfigurationError } from './errors.js';

export const DEFAULT_DELIMITER = ',';

/**
 * Canonical slug for a tag name.
 *
 * @example
 * slug('  Foo-Bar  ')  // 'foo-bar'
 * slug('Node.js')      // 'node-js'
 * slug('Café au lait') // 'cafe-au-lait'
 */
export function slug(raw: string): string {
  return raw
    .normalize('NFKD')
    .replace(/\p{M}+/gu, '')
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
}

export function lowercase(raw: string): string {
  return raw.toLowerCase().trim();
}

/** Upper-cases the first letter of every word and lower-cases the rest. */
export function title(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/(^|[^\p{L}\p{N}'])(\p{L})/gu, (_match, lead: string, letter: string) => lead + letter.toUpperCase());
}

export function raw(value: string): string {
  return value.trim();
}

export const NORMALIZERS: Record<string, Normalizer> = {
  slug,
  lower: lowercase,
};

export const DISPLAYERS: Record<string, Displayer> = {
  title,
  raw,
};

/**
 * Splits tag input into individual names. Strings are split on the
 * delimiter, and so is every element of an array.
 */
export function makeTagArray(input: TagInput, delimiter = DEFAULT_DELIMITER): string[] {
  const parts: readonly string[] = typeof input === 'string' ? [input] : input;
  return parts
    .flatMap(part => part.split(delimiter))
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

type Strategies = Pick<TaggingOptions, 'normalizer' | 'displayer' | 'delimiter'>;

function applyStrategy(strategies: Strategies, kind: 'normalizer' | 'displayer', value: string): string {
  try {
    return strategies[kind](value);
  } catch (error) {
    throw new ConfigurationError(
      `Configured ${kind} failed for "${value}": ${error instanceof Error ? error.message : String(error)}`,
      { strategy: kind, input: value },
      { cause: error }
    );
  }
}

/**
 * Parses tag input into unique (slug, name) pairs in input order.
 * Names whose slug comes out empty are dropped. With `display: false`
 * the name is the trimmed input and the displayer is not called.
 */
export function resolveTags(
  input: TagInput,
  strategies: Strategies,
  { display = true }: { display?: boolean } = {}
): ResolvedTag[] {
  const seen = new Map<string, ResolvedTag>();
  for (const name of makeTagArray(input, strategies.delimiter)) {
    const tagSlug = applyStrategy(strategies, 'normalizer', name);
    if (tagSlug.length === 0 || seen.has(tagSlug)) continue;
    seen.set(tagSlug, {
      slug: tagSlug,
      name: display ? applyStrategy(strategies, 'displayer', name) : name,
    });
  }
  return [...seen.values()];
}
