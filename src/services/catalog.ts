import type Database from 'better-sqlite3';
import type { ExistingTag, Tag } from '../models/tag.js';
import { withStore } from '../utils/errors.js';

/**
 * Distinct tags and their global usage counts. Counts are adjusted with
 * single-statement updates so concurrent writers never lose an increment.
 */
export class TagCatalog {
  constructor(private readonly db: Database.Database) {}

  incrementCount(slug: string, displayName: string, delta = 1): void {
    if (delta <= 0) return;
    withStore('incrementCount', () => {
      this.db.prepare(`
        INSERT INTO tagging_tags (slug, name, count)
        VALUES (?, ?, ?)
        ON CONFLICT(slug) DO UPDATE SET
          count = count + excluded.count,
          name = excluded.name
      `).run(slug, displayName, delta);
    });
  }

  // 不做下限截断，清理交给 deleteUnused
  decrementCount(slug: string, delta = 1): void {
    if (delta <= 0) return;
    withStore('decrementCount', () => {
      this.db.prepare('UPDATE tagging_tags SET count = count - ? WHERE slug = ?').run(delta, slug);
    });
  }

  rename(slug: string, displayName: string): void {
    withStore('rename', () => {
      this.db.prepare('UPDATE tagging_tags SET name = ? WHERE slug = ?').run(displayName, slug);
    });
  }

  recordUsage(slug: string, subjectType: string): void {
    withStore('recordUsage', () => {
      this.db.prepare(`
        INSERT OR IGNORE INTO tagging_tag_usage (slug, taggable_type)
        VALUES (?, ?)
      `).run(slug, subjectType);
    });
  }

  /** Tags that have been linked to subjects of this type, ordered by slug. */
  listExisting(subjectType: string): ExistingTag[] {
    return withStore('listExisting', () =>
      this.db.prepare<[string], ExistingTag>(`
        SELECT t.slug, t.name, t.count
        FROM tagging_tag_usage u
        JOIN tagging_tags t ON u.slug = t.slug
        WHERE u.taggable_type = ?
        ORDER BY t.slug ASC
      `).all(subjectType)
    );
  }

  deleteUnused(): number {
    return withStore('deleteUnused', () =>
      this.db.prepare('DELETE FROM tagging_tags WHERE count <= 0').run().changes
    );
  }

  find(slug: string): Tag | null {
    return withStore('find', () =>
      this.db.prepare<[string], Tag>('SELECT * FROM tagging_tags WHERE slug = ?').get(slug) ?? null
    );
  }

  all(): Tag[] {
    return withStore('all', () =>
      this.db.prepare<[], Tag>('SELECT * FROM tagging_tags ORDER BY slug').all()
    );
  }
}
