/**
 * Identifier validation and parameterized query building
 */

export {
  SYSTEM_TABLES,
  SOURCE_NAME_PATTERN,
  MAX_SOURCE_NAME_LENGTH,
  validateSourceName,
  titlesTable,
  metadataTable,
  systemTable,
  storageObjectName,
  parseStorageObjectName,
  assertColumnName,
  type SourceName,
  type SystemTableName,
  type StorageObject,
} from './identifiers.js'

export {
  buildSelectQuery,
  buildCountQuery,
  buildDeleteQuery,
  buildUpsertQuery,
  escapeLikePattern,
  type SqlValue,
  type ComparisonOperator,
  type Condition,
  type OrderBy,
  type BuiltQuery,
  type SelectQueryOptions,
} from './QueryBuilder.js'
