import type Database from 'better-sqlite3';
import type { TaggingOptions } from '../models/config.js';
import type { SubjectFilter, SubjectId, TagInput, WhereClause } from '../models/tag.js';
import { withStore } from '../utils/errors.js';
import { resolveTags } from '../utils/tags.js';

const MAX_INLINE_IDS = 500;

/**
 * Read-side tag filters. An empty tag list is a vacuous condition:
 * `withAllTags` leaves subjects unfiltered, `withAnyTag` matches none.
 */
export class TagQuery {
  constructor(
    private readonly db: Database.Database,
    private readonly options: Pick<TaggingOptions, 'normalizer' | 'displayer' | 'delimiter'>
  ) {}

  /** Subjects carrying every one of the given tags. */
  withAllTags(subjectType: string, tagNames: TagInput): SubjectFilter {
    const slugs = this.slugs(tagNames);
    if (slugs.length === 0) {
      return { kind: 'unfiltered' };
    }

    return withStore<SubjectFilter>('withAllTags', () => {
      const lookup = this.db.prepare<[string, string], { taggable_id: string }>(`
        SELECT taggable_id FROM tagging_tagged
        WHERE tag_slug = ? AND taggable_type = ?
        ORDER BY taggable_id
      `);
      let ids: string[] | null = null;
      for (const slug of slugs) {
        const found = new Set(lookup.all(slug, subjectType).map(row => row.taggable_id));
        ids = ids === null ? [...found] : ids.filter(id => found.has(id));
        if (ids.length === 0) break;
      }
      return { kind: 'ids', ids: ids ?? [] };
    });
  }

  /** Subjects carrying at least one of the given tags. */
  withAnyTag(subjectType: string, tagNames: TagInput): SubjectFilter {
    const slugs = this.slugs(tagNames);
    if (slugs.length === 0) {
      return { kind: 'ids', ids: [] };
    }

    const rows = withStore('withAnyTag', () =>
      this.db.prepare<[string, string], { taggable_id: string }>(`
        SELECT DISTINCT taggable_id FROM tagging_tagged
        WHERE taggable_type = ? AND tag_slug IN (SELECT value FROM json_each(?))
        ORDER BY taggable_id
      `).all(subjectType, JSON.stringify(slugs))
    );
    return { kind: 'ids', ids: rows.map(row => row.taggable_id) };
  }

  /**
   * Renders a filter as a condition on the subject table's key column,
   * ready to join with the caller's other conditions. Long id lists are
   * bound as a single JSON array so the clause stays under SQLite's
   * bind-variable limit.
   */
  toWhereClause(filter: SubjectFilter, column: string): WhereClause {
    if (filter.kind === 'unfiltered') {
      return { sql: '1 = 1', params: [] };
    }
    if (filter.ids.length === 0) {
      return { sql: '0 = 1', params: [] };
    }
    if (filter.ids.length > MAX_INLINE_IDS) {
      return {
        sql: `${column} IN (SELECT value FROM json_each(?))`,
        params: [JSON.stringify(filter.ids)],
      };
    }
    return {
      sql: `${column} IN (${filter.ids.map(() => '?').join(',')})`,
      params: filter.ids,
    };
  }

  matches(filter: SubjectFilter, id: SubjectId): boolean {
    return filter.kind === 'unfiltered' || filter.ids.includes(String(id));
  }

  private slugs(tagNames: TagInput): string[] {
    return resolveTags(tagNames, this.options, { display: false }).map(tag => tag.slug);
  }
}
