import type { Taggable } from './tag.js';

export interface TagAddedEvent {
  type: 'tag-added';
  subject: Taggable;
  slug: string;
  name: string;
}

export interface TagRemovedEvent {
  type: 'tag-removed';
  subject: Taggable;
  slugs: string[];
}

export type TagEvent = TagAddedEvent | TagRemovedEvent;

export type TagEventHandler = (event: TagEvent) => void | Promise<void>;
