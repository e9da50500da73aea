// sql/buildDataSQL.ts

import type { Row } from "../model-types.js";

export type WhereOperator = "=" | "<>" | "<" | ">" | "<=" | ">=" | "LIKE";

export const WHERE_OPERATORS: readonly WhereOperator[] = [
  "=",
  "<>",
  "<",
  ">",
  "<=",
  ">=",
  "LIKE",
];

export type WhereClause = readonly [
  column: string,
  operator: WhereOperator,
  value: unknown,
];

export type OrderBy = readonly [column: string, direction: "ASC" | "DESC"];

export interface Statement {
  text: string;
  values: unknown[];
}

export interface SelectSpec {
  columns?: readonly string[] | undefined;
  where?: readonly WhereClause[] | undefined;
  orderBy?: readonly OrderBy[] | undefined;
  limit?: number | undefined;
}

/** Placeholder allocator: `$1`, `$2`, ... in push order. */
class Params {
  readonly values: unknown[] = [];

  push(value: unknown): string {
    this.values.push(value === undefined ? null : value);
    return `$${this.values.length}`;
  }
}

export function buildInsertSQL(
  table: string,
  columns: readonly string[],
  rows: readonly Row[]
): Statement {
  const params = new Params();
  const tuples = rows.map(
    (row) => `(${columns.map((c) => params.push(row[c])).join(", ")})`
  );

  return {
    text: `INSERT INTO ${table} (${columns.join(", ")}) VALUES ${tuples.join(
      ", "
    )} RETURNING *;`,
    values: params.values,
  };
}

export function buildSelectSQL(table: string, spec: SelectSpec = {}): Statement {
  const params = new Params();
  const cols =
    spec.columns && spec.columns.length > 0 ? spec.columns.join(", ") : "*";

  let text = `SELECT ${cols} FROM ${table}`;

  if (spec.where && spec.where.length > 0) {
    text += ` WHERE ${spec.where
      .map(([col, op, value]) => `${col} ${op} ${params.push(value)}`)
      .join(" AND ")}`;
  }

  if (spec.orderBy && spec.orderBy.length > 0) {
    text += ` ORDER BY ${spec.orderBy
      .map(([col, dir]) => `${col} ${dir}`)
      .join(", ")}`;
  }

  if (spec.limit !== undefined) {
    text += ` LIMIT ${params.push(spec.limit)}`;
  }

  return { text: `${text};`, values: params.values };
}

export function buildUpdateSQL(
  table: string,
  row: Row,
  referenceColumns: readonly string[]
): Statement {
  const params = new Params();
  const set = Object.keys(row)
    .map((col) => `${col} = ${params.push(row[col])}`)
    .join(", ");
  const where = referenceColumns
    .map((col) => `${col} = ${params.push(row[col])}`)
    .join(" AND ");

  return {
    text: `UPDATE ${table} SET ${set} WHERE ${where};`,
    values: params.values,
  };
}

export function buildDeleteSQL(
  table: string,
  filter: Row,
  referenceColumns: readonly string[]
): Statement {
  const params = new Params();
  const where = referenceColumns
    .map((col) => `${col} = ${params.push(filter[col])}`)
    .join(" AND ");

  return {
    text: `DELETE FROM ${table} WHERE ${where};`,
    values: params.values,
  };
}
