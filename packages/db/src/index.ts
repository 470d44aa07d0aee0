/**
 * @blogstore/db
 * Single-table data access for users, blogs and comments
 */

// Store contract and implementations
export type {
  AttributeMap,
  EntityStore,
  IndexName,
  ItemKey,
  PutOptions,
  QueryRequest,
  SortKeyCondition,
  StoreCallOptions,
} from "./store/types.js";
export { MemoryEntityStore } from "./store/memory.js";
export {
  DynamoEntityStore,
  createDynamoClient,
  createDocumentClient,
  buildPutInput,
  buildQueryInput,
  mapStoreError,
  type DynamoStoreOptions,
} from "./store/dynamo.js";

// Keys
export {
  ENTITY_TYPE,
  PREFIX,
  GSI,
  userKey,
  blogKey,
  commentKey,
  typeIndexKey,
  indexKeyForUserBlogs,
  indexKeyForUserComments,
  ownerPartition,
  blogPartition,
  keyToString,
  type EntityType,
  type IndexKey,
} from "./keys.js";

// Entities and codec
export * from "./types.js";
export {
  encodeUser,
  encodeBlog,
  encodeComment,
  decodeUser,
  decodeBlog,
  decodeComment,
  type StoredItem,
} from "./codec.js";
export { hashPassword, verifyPassword } from "./password.js";

// Repositories
export {
  createRepositories,
  UserRepository,
  BlogRepository,
  CommentRepository,
  toPublicUser,
  type Repositories,
  type RepositoryDeps,
  type OperationOptions,
} from "./repositories/index.js";
export {
  CascadeCoordinator,
  userRef,
  blogRef,
  commentRef,
  type CascadeResult,
} from "./cascade.js";

// Table administration
export {
  buildCreateTableInput,
  toImportableSchema,
  parseTableSchema,
  toBatchLines,
  parseBatchLine,
  type BatchLine,
} from "./admin/schema.js";
export {
  TableAdmin,
  splitBatchFile,
  SCHEMA_FILE,
  DATA_FILE,
  type SeedProgress,
} from "./admin/table-admin.js";
