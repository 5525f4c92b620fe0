export const SCHEMA = `
-- 标签目录
CREATE TABLE IF NOT EXISTS tagging_tags (
  slug TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  count INTEGER NOT NULL DEFAULT 0,       -- 当前有效关联数
  created_at DATETIME DEFAULT CURRENT_TIMESTAMP
);

-- 标签曾经关联过的主体类型
CREATE TABLE IF NOT EXISTS tagging_tag_usage (
  slug TEXT NOT NULL,
  taggable_type TEXT NOT NULL,
  PRIMARY KEY (slug, taggable_type),
  FOREIGN KEY (slug) REFERENCES tagging_tags(slug) ON DELETE CASCADE
);

-- 主体-标签关联表
CREATE TABLE IF NOT EXISTS tagging_tagged (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  taggable_type TEXT NOT NULL,
  taggable_id TEXT NOT NULL,
  tag_slug TEXT NOT NULL,
  tag_name TEXT NOT NULL,                 -- 关联时的显示名
  created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
  UNIQUE(taggable_type, taggable_id, tag_slug)
);
CREATE INDEX IF NOT EXISTS idx_tagging_tagged_subject ON tagging_tagged(taggable_type, taggable_id);
CREATE INDEX IF NOT EXISTS idx_tagging_tagged_slug ON tagging_tagged(tag_slug, taggable_type);
CREATE INDEX IF NOT EXISTS idx_tagging_tags_count ON tagging_tags(count);

-- 全局配置表
CREATE TABLE IF NOT EXISTS config (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;
