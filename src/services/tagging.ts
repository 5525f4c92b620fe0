import type Database from 'better-sqlite3';
import type { TaggingOptions } from '../models/config.js';
import type { TagEvent } from '../models/events.js';
import type { ResolvedTag, Tag, Taggable, TaggedLink, TagInput } from '../models/tag.js';
import { withStore } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { resolveTags } from '../utils/tags.js';
import { TagCatalog } from './catalog.js';
import { TagEventBus } from './events.js';

export function subjectKey(subject: Taggable): [string, string] {
  return [subject.taggableType, String(subject.taggableId)];
}

/**
 * Attaches, detaches and replaces tags on subjects.
 *
 * Every public mutation runs in a single transaction, so links and tag
 * counts always move together. Notifications go out only after commit.
 *
 * `detach` emits exactly one `tag-removed` event per call listing the
 * removed slugs, even when that list is empty. `replace` only emits one
 * when it actually removed something.
 */
export class TaggingService {
  readonly catalog: TagCatalog;

  constructor(
    private readonly db: Database.Database,
    readonly options: TaggingOptions,
    readonly events: TagEventBus = new TagEventBus()
  ) {
    this.catalog = new TagCatalog(db);
  }

  attach(subject: Taggable, tagNames: TagInput): void {
    const resolved = resolveTags(tagNames, this.options);
    const pending: TagEvent[] = [];
    withStore('attach', () => {
      this.db.transaction(() => {
        pending.push(...this.attachResolved(subject, resolved));
      })();
    });
    this.dispatch(pending);
  }

  /** Removes the given tags, or every tag on the subject when `tagNames` is null. */
  detach(subject: Taggable, tagNames: TagInput | null = null): void {
    const slugs = tagNames === null
      ? null
      : resolveTags(tagNames, this.options, { display: false }).map(tag => tag.slug);
    const pending: TagEvent[] = [];
    withStore('detach', () => {
      this.db.transaction(() => {
        const removed = this.detachSlugs(subject, slugs ?? this.tagSlugs(subject));
        pending.push({ type: 'tag-removed', subject, slugs: removed });
      })();
    });
    this.dispatch(pending);
  }

  /**
   * Makes the subject's tags equal to `tagNames`, touching only the
   * difference. Tags present before and after keep their links and counts
   * but take the new display name.
   */
  replace(subject: Taggable, tagNames: TagInput): void {
    const target = resolveTags(tagNames, this.options);
    const targetSlugs = new Set(target.map(tag => tag.slug));
    const pending: TagEvent[] = [];

    withStore('replace', () => {
      this.db.transaction(() => {
        const current = new Map(this.links(subject).map(link => [link.tag_slug, link.tag_name]));
        const deletions = [...current.keys()].filter(slug => !targetSlugs.has(slug));
        const additions = target.filter(tag => !current.has(tag.slug));
        const renamed = target.filter(tag => current.has(tag.slug) && current.get(tag.slug) !== tag.name);

        const removed = this.detachSlugs(subject, deletions);
        if (removed.length > 0) pending.push({ type: 'tag-removed', subject, slugs: removed });
        this.renameLinks(subject, renamed);
        pending.push(...this.attachResolved(subject, additions));
      })();
    });
    this.dispatch(pending);
  }

  tagNames(subject: Taggable): string[] {
    return this.links(subject).map(link => link.tag_name);
  }

  tagSlugs(subject: Taggable): string[] {
    return this.links(subject).map(link => link.tag_slug);
  }

  tagNamesString(subject: Taggable): string {
    return this.tagNames(subject).join(', ');
  }

  /** Catalog rows for every tag linked to the subject. */
  tags(subject: Taggable): Tag[] {
    return withStore('tags', () =>
      this.db.prepare<[string, string], Tag>(`
        SELECT t.*
        FROM tagging_tags t
        JOIN tagging_tagged l ON t.slug = l.tag_slug
        WHERE l.taggable_type = ? AND l.taggable_id = ?
        ORDER BY l.id
      `).all(...subjectKey(subject))
    );
  }

  links(subject: Taggable): TaggedLink[] {
    return withStore('links', () =>
      this.db.prepare<[string, string], TaggedLink>(`
        SELECT * FROM tagging_tagged
        WHERE taggable_type = ? AND taggable_id = ?
        ORDER BY id
      `).all(...subjectKey(subject))
    );
  }

  private attachResolved(subject: Taggable, tags: ResolvedTag[]): TagEvent[] {
    const [type, id] = subjectKey(subject);
    const insert = this.db.prepare(`
      INSERT OR IGNORE INTO tagging_tagged (taggable_type, taggable_id, tag_slug, tag_name)
      VALUES (?, ?, ?, ?)
    `);
    const events: TagEvent[] = [];

    for (const tag of tags) {
      // 唯一约束冲突即已存在
      if (insert.run(type, id, tag.slug, tag.name).changes === 0) continue;

      this.catalog.incrementCount(tag.slug, tag.name, 1);
      this.catalog.recordUsage(tag.slug, type);
      events.push({ type: 'tag-added', subject, slug: tag.slug, name: tag.name });
      logger.debug(`tagged ${type}#${id} with ${tag.slug}`);
    }

    return events;
  }

  // 只改显示名，不动计数，也不发事件
  private renameLinks(subject: Taggable, tags: ResolvedTag[]): void {
    const [type, id] = subjectKey(subject);
    const update = this.db.prepare(`
      UPDATE tagging_tagged SET tag_name = ?
      WHERE taggable_type = ? AND taggable_id = ? AND tag_slug = ?
    `);

    for (const tag of tags) {
      update.run(tag.name, type, id, tag.slug);
      this.catalog.rename(tag.slug, tag.name);
      logger.debug(`renamed ${tag.slug} to "${tag.name}" on ${type}#${id}`);
    }
  }

  private detachSlugs(subject: Taggable, slugs: string[]): string[] {
    const [type, id] = subjectKey(subject);
    const remove = this.db.prepare(`
      DELETE FROM tagging_tagged
      WHERE taggable_type = ? AND taggable_id = ? AND tag_slug = ?
    `);
    const removed: string[] = [];

    for (const slug of slugs) {
      const { changes } = remove.run(type, id, slug);
      if (changes > 0) {
        this.catalog.decrementCount(slug, changes);
        removed.push(slug);
        logger.debug(`untagged ${type}#${id} from ${slug}`);
      }
    }

    if (this.options.deleteUnusedTags) {
      this.catalog.deleteUnused();
    }

    return removed;
  }

  private dispatch(events: TagEvent[]): void {
    for (const event of events) {
      this.events.emit(event);
    }
  }
}
