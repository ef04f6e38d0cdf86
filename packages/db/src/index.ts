export { openDatabase, closeDatabase, migrate, type SqliteDatabase } from "./client.js";
export { ArticleStore } from "./article-store.js";
export { LexicalModelStore } from "./lexical-model-store.js";
export {
  encodeVector,
  decodeVector,
  encodeList,
  decodeIdList,
  decodeStringList,
  decodeNumberList,
  type DecodeResult
} from "./codecs.js";
export {
  StorageIOFailureError,
  MalformedPersistedRecordError,
  withStorage
} from "./errors.js";
export type {
  Article,
  NewArticle,
  Story,
  EntityTags,
  ImpactType,
  ImpactedStock,
  ArticleImpact,
  LexicalModel
} from "./types.js";
