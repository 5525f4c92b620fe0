import { describe, it, expect } from 'vitest';
import {
  lowercase,
  makeTagArray,
  raw,
  resolveTags,
  slug,
  title,
} from '../../src/utils/tags.js';
import { ConfigurationError } from '../../src/utils/errors.js';

const strategies = { normalizer: slug, displayer: title, delimiter: ',' };

describe('tag utilities', () => {
  describe('slug', () => {
    it('lowercases, trims and collapses separators', () => {
      expect(slug('  Foo-Bar  ')).toBe('foo-bar');
      expect(slug('Hello   World')).toBe('hello-world');
      expect(slug('Node.js')).toBe('node-js');
      expect(slug('--a__b--')).toBe('a-b');
    });

    it('strips diacritics', () => {
      expect(slug('Café au lait')).toBe('cafe-au-lait');
    });

    it('keeps non-latin letters', () => {
      expect(slug('Ünïcödé 标签')).toBe('unicode-标签');
    });

    it('is idempotent', () => {
      for (const input of ['  Foo-Bar  ', 'Node.js', 'Café au lait', 'C++ / Rust']) {
        expect(slug(slug(input))).toBe(slug(input));
      }
    });

    it('returns an empty slug for punctuation only', () => {
      expect(slug(' !!! ')).toBe('');
    });
  });

  describe('title', () => {
    it('capitalizes each word', () => {
      expect(title('hello world')).toBe('Hello World');
      expect(title('  fOO-bAR ')).toBe('Foo-Bar');
    });

    it('does not capitalize after an apostrophe', () => {
      expect(title("o'neil's blog")).toBe("O'neil's Blog");
    });
  });

  it('lowercase and raw only trim and fold', () => {
    expect(lowercase('  Foo Bar ')).toBe('foo bar');
    expect(raw('  Foo Bar ')).toBe('Foo Bar');
  });

  describe('makeTagArray', () => {
    it('splits a delimited string and trims each part', () => {
      expect(makeTagArray(' foo , bar,baz ')).toEqual(['foo', 'bar', 'baz']);
    });

    it('drops empty parts', () => {
      expect(makeTagArray('foo,, ,bar,')).toEqual(['foo', 'bar']);
      expect(makeTagArray('')).toEqual([]);
    });

    it('splits array elements too', () => {
      expect(makeTagArray(['a, b', 'c'])).toEqual(['a', 'b', 'c']);
    });

    it('honours a custom delimiter', () => {
      expect(makeTagArray('a;b, c', ';')).toEqual(['a', 'b, c']);
    });
  });

  describe('resolveTags', () => {
    it('normalizes, displays and de-duplicates by slug', () => {
      expect(resolveTags('foo bar, Foo-Bar, baz', strategies)).toEqual([
        { slug: 'foo-bar', name: 'Foo Bar' },
        { slug: 'baz', name: 'Baz' },
      ]);
    });

    it('skips the displayer when display is off', () => {
      expect(resolveTags(['foo bar'], strategies, { display: false })).toEqual([
        { slug: 'foo-bar', name: 'foo bar' },
      ]);
    });

    it('discards names whose slug is empty', () => {
      expect(resolveTags('???, ok', strategies)).toEqual([{ slug: 'ok', name: 'Ok' }]);
    });

    it('wraps a throwing normalizer in a ConfigurationError', () => {
      const broken = {
        ...strategies,
        normalizer: (): string => {
          throw new Error('bad normalizer');
        },
      };
      expect(() => resolveTags('foo', broken)).toThrow(ConfigurationError);
      expect(() => resolveTags('foo', broken)).toThrow('Configured normalizer failed for "foo": bad normalizer');
    });
  });
});
