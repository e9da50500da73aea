// sql/buildTableSQL.ts

import type { IndexMethod } from "../model-types.js";
import { buildColumnSQL, type FieldSpec } from "./buildColumnSQL.js";

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function buildSchemaSQL(name: string, authorization?: string): string {
  const owner = authorization ? ` AUTHORIZATION ${authorization}` : "";
  return `CREATE SCHEMA IF NOT EXISTS ${name}${owner};`;
}

export function buildEnumSQL(
  schema: string,
  name: string,
  values: readonly string[]
): string {
  return `CREATE TYPE ${schema}.${name} AS ENUM (${values
    .map(quoteLiteral)
    .join(", ")});`;
}

export interface TableSQLInput {
  schema: string;
  table: string;
  fields: readonly FieldSpec[];
  uniqueConstraints?: readonly (readonly string[])[];
  otherConditionsSql?: string | undefined;
  ifNotExists?: boolean;
}

function tableBody(input: TableSQLInput): string {
  const parts = input.fields.map(buildColumnSQL);

  for (const cols of input.uniqueConstraints ?? []) {
    parts.push(`UNIQUE(${cols.join(", ")})`);
  }
  if (input.otherConditionsSql) parts.push(input.otherConditionsSql);

  return parts.join(", ");
}

export function buildTableSQL(input: TableSQLInput): string {
  const guard = input.ifNotExists ? "IF NOT EXISTS " : "";
  return `CREATE TABLE ${guard}${input.schema}.${input.table} (${tableBody(
    input
  )});`;
}

export function buildIndexSQL(
  schema: string,
  table: string,
  column: string,
  method: IndexMethod
): string {
  return `CREATE INDEX IF NOT EXISTS idx_${table}_${column} ON ${schema}.${table} USING ${method.toUpperCase()} (${column});`;
}

/**
 * First-creation logic as one anonymous block: create the table and run the
 * seed statements when it is missing, otherwise run the else statements.
 */
export function buildConditionalBlock(
  input: TableSQLInput,
  ifStatements: readonly string[],
  elseStatements: readonly string[]
): string {
  const lines = [
    "DO $$",
    "BEGIN",
    `IF NOT EXISTS (SELECT 1 FROM information_schema.tables WHERE table_schema = ${quoteLiteral(
      input.schema
    )} AND table_name = ${quoteLiteral(input.table)}) THEN`,
    buildTableSQL({ ...input, ifNotExists: false }),
    ...ifStatements,
  ];

  if (elseStatements.length > 0) {
    lines.push("ELSE", ...elseStatements);
  }
  lines.push("END IF;", "END$$;");

  return lines.join("\n");
}
