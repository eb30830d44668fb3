// index.ts

export { PgRecord } from "./pgrecord/pgrecord.js";
export type { ConnectOptions, InsertRecordOptions } from "./pgrecord/pgrecord.js";
export { Schema, view, materializedView, presenter, strict } from "./pgrecord/schema.js";
export type { TableOption } from "./pgrecord/schema.js";
export { RecordType } from "./pgrecord/record.js";
export type { FieldOptions, FieldTags } from "./pgrecord/record.js";
export { Table, buildTable } from "./pgrecord/table.js";
export { createColumn, renderColumnTag, isGenerated } from "./pgrecord/column.js";
export { resolveConfig, readEnv } from "./pgrecord/config.js";
export type { PgRecordConfig } from "./pgrecord/config.js";
export {
  PgRecordError,
  AnnotationError,
  QueryBuildError,
  ReconciliationError,
  ScanError,
  RegistryError,
} from "./pgrecord/errors.js";
export type * from "./pgrecord/model-types.js";

export { DataTypes, parseDataType, isDataType, dataTypeForHost } from "./pgrecord/utils/dataTypes.js";
export type { DataType } from "./pgrecord/utils/dataTypes.js";
export { parseIndexType } from "./pgrecord/utils/indexTypes.js";
export { snakeCase, pascalCase } from "./pgrecord/utils/naming.js";
export { isZero } from "./pgrecord/utils/zero.js";
export { parseAnnotation } from "./pgrecord/utils/annotations.js";

export { extractArguments, extractNonZeroArguments } from "./pgrecord/sql/arguments.js";
export type { Argument, ExtractOptions } from "./pgrecord/sql/arguments.js";
export { buildCreateTableSQL, buildColumnDefinitionSQL } from "./pgrecord/sql/buildCreateTableSQL.js";
export { buildForeignKeysSQL } from "./pgrecord/sql/buildForeignKeysSQL.js";
export { buildInsertSQL } from "./pgrecord/sql/buildInsertSQL.js";
export type { InsertOptions } from "./pgrecord/sql/buildInsertSQL.js";
export { buildUpdateSQL } from "./pgrecord/sql/buildUpdateSQL.js";
export { buildDeleteSQL } from "./pgrecord/sql/buildDeleteSQL.js";
export { buildExistsSQL } from "./pgrecord/sql/buildExistsSQL.js";
export { buildDuplicateSQL } from "./pgrecord/sql/buildDuplicateSQL.js";
export { buildSchemaDumpSQL } from "./pgrecord/sql/buildSchemaDumpSQL.js";

export {
  parseCheckConstraint,
  parseForeignKeyConstraint,
  parseSimpleIndex,
  parseUniqueConstraint,
  parseUniqueIndex,
} from "./pgrecord/catalog/constraintParsers.js";
export { listColumns, listTriggers } from "./pgrecord/catalog/listColumns.js";
export { listTables } from "./pgrecord/catalog/listTables.js";
export type { ListTablesOptions } from "./pgrecord/catalog/listTables.js";
export { checkSchema, reconcileTable } from "./pgrecord/catalog/checkSchema.js";
export { createScanPlan, scanRow, scanRows } from "./pgrecord/scan/scanner.js";
export type { DecodeStep, ScanPlan } from "./pgrecord/scan/scanner.js";
export { createPgExecutor, getSSLConfig } from "./pgrecord/pg.js";
