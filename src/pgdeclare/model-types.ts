// model-types.ts

import type { EnumNamespace } from "./enums/enumNamespace.js";

export type IndexMethod = "btree" | "hash" | "gist" | "gin" | "brin" | "spgist";

/** Full replacement of a column definition; rendered as written. */
export interface CustomizedField {
  definition: string;
}

/** Column definitions used by table declarations */
export interface ColumnDefinition {
  name: string;
  /** Raw SQL type, written out as given. */
  type?: string;
  enum?: EnumNamespace;
  primary?: boolean;
  unique?: boolean;
  serial?: boolean;
  notNull?: boolean;
  /** SQL literal or expression, emitted after DEFAULT verbatim. */
  default?: string;
  check?: string;
  generatedAs?: string;
  index?: IndexMethod;
  /** Type and constraints text following the column name. */
  customizedSql?: string;
  customizedField?: CustomizedField;
}

export type InitType = "schema" | "table" | "enum";

export type OneOrMany<T> = T | readonly T[];

export interface SeedHooks {
  /** Statement(s) run right after the table is first created. */
  ifInitialize(schema: string, table: string): string | undefined;
  /** Statement(s) run when the table already exists. */
  elseInitialize?(schema: string, table: string): string | undefined;
}

interface BaseMeta {
  initialize?: boolean;
  conditionalInit?: boolean;
}

export interface SchemaMeta extends BaseMeta {
  initType: "schema";
  schemaName: OneOrMany<string>;
  authorization?: string;
}

export interface TableMeta extends BaseMeta {
  initType: "table";
  schemaName?: OneOrMany<string>;
  tableName: OneOrMany<string>;
  initIndex?: boolean;
  uniqueConstraint?: readonly (readonly string[])[];
  otherConditionsSql?: string;
  /** Statement(s) executed after CREATE TABLE, e.g. partitions. */
  customizedSql?: OneOrMany<string>;
  seed?: SeedHooks;
}

export interface EnumMeta extends BaseMeta {
  initType: "enum";
  schemaName?: OneOrMany<string>;
  enumName: OneOrMany<string>;
  namespace: EnumNamespace;
}

export type DeclarationMeta = SchemaMeta | TableMeta | EnumMeta;

export type Row = Record<string, unknown>;

export interface OperationResult<F = Row> {
  indicator: boolean;
  message: string;
  data: Row[] | number;
  formattedData: F[];
}

export interface ExecutorResult {
  rows: Row[];
  rowCount: number | null;
}

/** Runs one statement. Statements sent to a pool may land on different connections. */
export interface QueryExecutor {
  query(text: string, values?: unknown[]): Promise<ExecutorResult>;
}

/** A checked-out connection, such as `pg.PoolClient`. */
export interface PoolClientLike extends QueryExecutor {
  release(err?: Error | boolean): void;
}

/** Hands out connections, such as `pg.Pool`. */
export interface ClientSource extends QueryExecutor {
  connect(): Promise<PoolClientLike>;
}

/**
 * Where statements go. Transactions run on the client itself, or on one
 * client checked out of the source and released afterwards.
 */
export type Connection = ClientSource | PoolClientLike;
