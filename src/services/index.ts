import type Database from 'better-sqlite3';
import type { TaggingOptions } from '../models/config.js';
import { loadTaggingOptions } from '../utils/config.js';
import { TagEventBus } from './events.js';
import { TaggableLifecycle } from './lifecycle.js';
import { TagQuery } from './query.js';
import { TaggingService } from './tagging.js';

export interface TaggingContext {
  options: TaggingOptions;
  events: TagEventBus;
  tagging: TaggingService;
  query: TagQuery;
  lifecycle: TaggableLifecycle;
}

/** Builds the tagging components over one database, resolving configuration once. */
export function createTagging(
  db: Database.Database,
  overrides: Partial<TaggingOptions> = {}
): TaggingContext {
  const options = loadTaggingOptions(db, overrides);
  const events = new TagEventBus();
  const tagging = new TaggingService(db, options, events);
  return {
    options,
    events,
    tagging,
    query: new TagQuery(db, options),
    lifecycle: new TaggableLifecycle(tagging),
  };
}

export { TagCatalog } from './catalog.js';
export { TagEventBus, TaggableLifecycle, TagQuery, TaggingService };
