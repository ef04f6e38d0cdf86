export const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS articles (
    id INTEGER PRIMARY KEY,
    title TEXT,
    content TEXT,
    date TEXT,
    source TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS embeddings (
    article_id INTEGER,
    namespace TEXT,
    vector BLOB,
    dim INTEGER,
    PRIMARY KEY (article_id, namespace)
  )`,
  `CREATE INDEX IF NOT EXISTS embeddings_namespace_idx ON embeddings (namespace)`,
  `CREATE TABLE IF NOT EXISTS stories (
    story_id INTEGER PRIMARY KEY,
    representative_article_id INTEGER,
    member_article_ids TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS entity_tags (
    article_id INTEGER PRIMARY KEY,
    companies TEXT,
    sectors TEXT,
    regulators TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS impacts (
    article_id INTEGER PRIMARY KEY,
    impacted_stocks TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS lexical_models (
    namespace TEXT PRIMARY KEY,
    dimensions INTEGER,
    vocabulary TEXT,
    idf TEXT
  )`
];
