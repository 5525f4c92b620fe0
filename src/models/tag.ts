export type SubjectId = string | number;

/**
 * Anything that can carry tags. The type acts as the discriminator that
 * lets one link table serve every kind of subject.
 */
export interface Taggable {
  taggableType: string;
  taggableId: SubjectId;
}

export interface Tag {
  slug: string;
  name: string;
  count: number;
  created_at: string;
}

export interface TaggedLink {
  id: number;
  taggable_type: string;
  taggable_id: string;
  tag_slug: string;
  tag_name: string;
  created_at: string;
}

export interface ExistingTag {
  slug: string;
  name: string;
  count: number;
}

export type TagInput = string | readonly string[];

/** A tag name after normalization and display formatting. */
export interface ResolvedTag {
  slug: string;
  name: string;
}

export type SubjectFilter =
  | { kind: 'unfiltered' }
  | { kind: 'ids'; ids: string[] };

export interface WhereClause {
  sql: string;
  params: string[];
}
