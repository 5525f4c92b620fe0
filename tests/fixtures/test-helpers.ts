import type Database from 'better-sqlite3';
import { openDatabase } from '../../src/db/index.js';
import type { TaggingOptions } from '../../src/models/config.js';
import type { TagEvent } from '../../src/models/events.js';
import type { Taggable } from '../../src/models/tag.js';
import { TagEventBus } from '../../src/services/events.js';
import { TagQuery } from '../../src/services/query.js';
import { TaggingService } from '../../src/services/tagging.js';
import { defaultTaggingOptions } from '../../src/utils/config.js';

export interface TestContext {
  db: Database.Database;
  tagging: TaggingService;
  query: TagQuery;
  events: TagEvent[];
}

export function createTestDb(): Database.Database {
  return openDatabase(':memory:');
}

/** Fresh in-memory database with a service whose events are recorded. */
export function setupTagging(overrides: Partial<TaggingOptions> = {}): TestContext {
  const db = createTestDb();
  const options = defaultTaggingOptions(overrides);
  const bus = new TagEventBus();
  const events: TagEvent[] = [];
  bus.subscribe(event => {
    events.push(event);
  });
  return {
    db,
    tagging: new TaggingService(db, options, bus),
    query: new TagQuery(db, options),
    events,
  };
}

export function subject(type: string, id: string | number): Taggable {
  return { taggableType: type, taggableId: id };
}

export function countLinks(db: Database.Database, slug: string): number {
  const row = db
    .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM tagging_tagged WHERE tag_slug = ?')
    .get(slug);
  return row?.n ?? 0;
}
