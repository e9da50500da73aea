export { PgDeclare } from "./pgdeclare/pgdeclare.js";
export type {
  PgDeclareOptions,
  PoolLike,
  TransactionOptions,
} from "./pgdeclare/pgdeclare.js";

export {
  EnumNamespace,
  enumMemberEquals,
  isEnumMember,
} from "./pgdeclare/enums/enumNamespace.js";
export type {
  EnumMember,
  EnumMemberInput,
  EnumNamespaceOptions,
} from "./pgdeclare/enums/enumNamespace.js";

export {
  ModelDeclaration,
  declareEnum,
  declareSchema,
  declareTable,
} from "./pgdeclare/model.js";
export type * from "./pgdeclare/model-types.js";

export { buildColumnSQL, createFieldSpec } from "./pgdeclare/sql/buildColumnSQL.js";
export type { FieldSpec } from "./pgdeclare/sql/buildColumnSQL.js";
export type {
  OrderBy,
  WhereClause,
  WhereOperator,
} from "./pgdeclare/sql/buildDataSQL.js";

export { DDLOrchestrator } from "./pgdeclare/migrations/ddlOrchestrator.js";
export type {
  ApplyReport,
  OrchestratorOptions,
} from "./pgdeclare/migrations/ddlOrchestrator.js";

export {
  ValidationGateway,
  restoreRows,
  validateWrite,
} from "./pgdeclare/gateway/validationGateway.js";
export type {
  InsertOptions,
  SelectOptions,
  TargetOptions,
  WriteCheck,
} from "./pgdeclare/gateway/validationGateway.js";

export * from "./pgdeclare/errors.js";
export { loadConfig, readConfig } from "./pgdeclare/utils/config.js";
export type { PgDeclareConfig } from "./pgdeclare/utils/config.js";
export { setLogLevel } from "./pgdeclare/utils/logger.js";
export type { LogLevel } from "./pgdeclare/utils/logger.js";
