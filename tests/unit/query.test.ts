import { describe, it, expect, beforeEach } from 'vitest';
import { setupTagging, subject, type TestContext } from '../fixtures/test-helpers.js';

describe('TagQuery', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setupTagging();
    ctx.tagging.attach(subject('note', 1), ['x', 'y']);
    ctx.tagging.attach(subject('note', 2), ['x']);
    ctx.tagging.attach(subject('note', 3), ['z']);
    ctx.tagging.attach(subject('photo', 1), ['x', 'y']);
  });

  describe('withAllTags', () => {
    it('keeps subjects carrying every tag', () => {
      expect(ctx.query.withAllTags('note', ['x', 'y'])).toEqual({ kind: 'ids', ids: ['1'] });
    });

    it('normalizes the names it is given', () => {
      expect(ctx.query.withAllTags('note', ' X , Y ')).toEqual({ kind: 'ids', ids: ['1'] });
    });

    it('returns no ids when one tag is unknown', () => {
      expect(ctx.query.withAllTags('note', ['x', 'nope'])).toEqual({ kind: 'ids', ids: [] });
    });

    it('is unfiltered for an empty tag list', () => {
      expect(ctx.query.withAllTags('note', [])).toEqual({ kind: 'unfiltered' });
      expect(ctx.query.withAllTags('note', ' , ')).toEqual({ kind: 'unfiltered' });
    });
  });

  describe('withAnyTag', () => {
    it('keeps subjects carrying at least one tag', () => {
      expect(ctx.query.withAnyTag('note', ['x', 'y'])).toEqual({ kind: 'ids', ids: ['1', '2'] });
      expect(ctx.query.withAnyTag('note', ['y', 'z'])).toEqual({ kind: 'ids', ids: ['1', '3'] });
    });

    it('only looks at the requested subject type', () => {
      expect(ctx.query.withAnyTag('photo', ['x', 'z'])).toEqual({ kind: 'ids', ids: ['1'] });
    });

    it('matches nothing for an empty tag list', () => {
      expect(ctx.query.withAnyTag('note', [])).toEqual({ kind: 'ids', ids: [] });
    });

    it('accepts more names than SQLite has bind variables', () => {
      const names = Array.from({ length: 40000 }, (_, i) => `unused ${i}`);
      expect(ctx.query.withAnyTag('note', [...names, 'z'])).toEqual({ kind: 'ids', ids: ['3'] });
    });
  });

  describe('toWhereClause', () => {
    beforeEach(() => {
      ctx.db.exec(`
        CREATE TABLE notes (id TEXT PRIMARY KEY, title TEXT NOT NULL);
        INSERT INTO notes (id, title) VALUES ('1', 'first'), ('2', 'second'), ('3', 'third');
      `);
    });

    function titles(where: { sql: string; params: string[] }): string[] {
      return ctx.db
        .prepare<string[], { title: string }>(`SELECT title FROM notes WHERE ${where.sql} ORDER BY id`)
        .all(...where.params)
        .map(row => row.title);
    }

    it('filters the subject table by id', () => {
      const where = ctx.query.toWhereClause(ctx.query.withAnyTag('note', ['x']), 'notes.id');
      expect(where).toEqual({ sql: 'notes.id IN (?,?)', params: ['1', '2'] });
      expect(titles(where)).toEqual(['first', 'second']);
    });

    it('binds a long id list as one JSON parameter', () => {
      const ids = Array.from({ length: 40000 }, (_, i) => String(i + 2));
      const where = ctx.query.toWhereClause({ kind: 'ids', ids }, 'id');

      expect(where.sql).toBe('id IN (SELECT value FROM json_each(?))');
      expect(where.params).toHaveLength(1);
      expect(titles(where)).toEqual(['second', 'third']);
    });

        it('renders vacuous filters as constant conditions', () => {
      expect(titles(ctx.query.toWhereClause({ kind: 'unfiltered' }, 'id'))).toEqual(['first', 'second', 'third']);
      expect(titles(ctx.query.toWhereClause({ kind: 'ids', ids: [] }, 'id'))).toEqual([]);
    });
  });

  it('matches ids against a filter', () => {
    const filter = ctx.query.withAllTags('note', 'x');
    expect(ctx.query.matches(filter, 2)).toBe(true);
    expect(ctx.query.matches(filter, '3')).toBe(false);
    expect(ctx.query.matches({ kind: 'unfiltered' }, 99)).toBe(true);
  });
});
