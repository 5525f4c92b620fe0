export interface Config {
  key: string;
  value: string;
}

export type Normalizer = (raw: string) => string;
export type Displayer = (raw: string) => string;

export interface TaggingOptions {
  normalizer: Normalizer;
  displayer: Displayer;
  delimiter: string;
  untagOnDelete: boolean;
  deleteUnusedTags: boolean;
  autoTagFromProp: string | null;
}

export const CONFIG_KEYS = {
  UNTAG_ON_DELETE: 'untag_on_delete',
  DELETE_UNUSED_TAGS: 'delete_unused_tags',
  AUTO_TAG_FROM_PROP: 'auto_tag_from_prop',
  TAG_DELIMITER: 'tag_delimiter',
  NORMALIZER: 'normalizer',
  DISPLAYER: 'displayer',
} as const;

export type ConfigKey = (typeof CONFIG_KEYS)[keyof typeof CONFIG_KEYS];
