import type { Taggable } from '../models/tag.js';
import { logger } from '../utils/logger.js';
import type { TaggingService } from './tagging.js';

export type SubjectRecord = Record<string, unknown>;

/** Value taken off a record before it is persisted, applied after. */
export interface PendingAutoTag {
  value: unknown;
}

function toTagList(value: unknown): string | string[] | null {
  if (typeof value === 'string') {
    return value.trim().length > 0 ? value : null;
  }
  if (Array.isArray(value)) {
    const names = value.filter((item): item is string => typeof item === 'string');
    return names.length > 0 ? names : null;
  }
  return null;
}

/**
 * Save and delete hooks for subjects owned by another service. The
 * owner calls them around its own persistence; nothing fires implicitly.
 */
export class TaggableLifecycle {
  constructor(private readonly tagging: TaggingService) {}

  /**
   * Takes the auto-tag property off the record so it never reaches the
   * store. Returns null when auto-tagging is not configured.
   */
  beforeSave(record: SubjectRecord): PendingAutoTag | null {
    const prop = this.tagging.options.autoTagFromProp;
    if (!prop) return null;

    const value = record[prop];
    delete record[prop];
    return { value };
  }

  afterSave(subject: Taggable, pending: PendingAutoTag | null): void {
    if (pending === null) return;

    const tags = toTagList(pending.value);
    if (tags !== null) {
      this.tagging.replace(subject, tags);
    } else {
      this.tagging.detach(subject, null);
    }
  }

  beforeDelete(subject: Taggable): void {
    if (!this.tagging.options.untagOnDelete) return;
    logger.debug(`untagging ${subject.taggableType}#${subject.taggableId} before delete`);
    this.tagging.detach(subject, null);
  }

  /**
   * Runs `persist` between the auto-tag hooks. `persist` returns the
   * saved subject, which is what tags get attached to.
   */
  async save<R extends SubjectRecord>(
    record: R,
    persist: (record: R) => Taggable | Promise<Taggable>
  ): Promise<Taggable> {
    const pending = this.beforeSave(record);
    const subject = await persist(record);
    this.afterSave(subject, pending);
    return subject;
  }

  async delete(subject: Taggable, remove: (subject: Taggable) => void | Promise<void>): Promise<void> {
    this.beforeDelete(subject);
    await remove(subject);
  }
}
