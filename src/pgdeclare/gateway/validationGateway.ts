// gateway/validationGateway.ts

import {
  isEnumMember,
  type EnumNamespace,
} from "../enums/enumNamespace.js";
import { ExecutionError, IntegrityError, ValidationError } from "../errors.js";
import type { ModelDeclaration } from "../model.js";
import type {
  Connection,
  ExecutorResult,
  OperationResult,
  QueryExecutor,
  Row,
} from "../model-types.js";
import {
  buildDeleteSQL,
  buildInsertSQL,
  buildSelectSQL,
  buildUpdateSQL,
  WHERE_OPERATORS,
  type OrderBy,
  type Statement,
  type WhereClause,
} from "../sql/buildDataSQL.js";
import { logStatement } from "../utils/logger.js";
import { inTransaction } from "../utils/transaction.js";

export type WriteCheck =
  | { ok: true; rows: Row[] }
  | { ok: false; error: ValidationError };

export interface InsertOptions {
  schema?: string;
  /** Columns to write; by default every declared, non-serial, non-generated column the rows carry. */
  columns?: readonly string[];
  /** Write NULL for listed columns a row does not carry. */
  toNull?: boolean;
}

export interface SelectOptions {
  schema?: string;
  columns?: readonly string[];
  where?: readonly WhereClause[];
  orderBy?: readonly OrderBy[];
  limit?: number;
}

export interface TargetOptions {
  schema?: string;
}

const SUCCESS = "Operation succeeded.";

function describe(value: unknown): string {
  if (isEnumMember(value)) return `${value.namespace}.${value.label}`;
  return `"${String(value)}"`;
}

/** Storage text for `value`, or undefined when it does not belong to `ns`. */
function toStored(ns: EnumNamespace, value: unknown): string | undefined {
  if (isEnumMember(value)) return ns.contains(value) ? value.storedValue : undefined;
  if (typeof value === "string") return ns.byValue(value)?.storedValue;
  return undefined;
}

function invalidValue(
  table: string,
  column: string,
  value: unknown,
  ns: EnumNamespace
): ValidationError {
  return new ValidationError(
    `Invalid value for ${table}.${column}: ${describe(value)} is not a member of ${ns.name}`,
    { table, column, namespace: ns.qualifiedName }
  );
}

function failure(message: string): OperationResult {
  return { indicator: false, message, data: [], formattedData: [] };
}

/**
 * Checks every enum column of every row and substitutes the stored text.
 * The first invalid value rejects the whole batch.
 */
export function validateWrite(
  decl: ModelDeclaration,
  rows: readonly Row[],
  table: string = decl.subject
): WriteCheck {
  const enums = decl.enumFields();
  const out: Row[] = [];

  for (const row of rows) {
    const next: Row = { ...row };
    for (const [column, ns] of enums) {
      if (!Object.hasOwn(row, column)) continue;
      const value = row[column];
      if (value === null || value === undefined) continue;

      const stored = toStored(ns, value);
      if (stored === undefined) {
        return { ok: false, error: invalidValue(table, column, value, ns) };
      }
      next[column] = stored;
    }
    out.push(next);
  }

  return { ok: true, rows: out };
}

/**
 * Replaces stored enum text with members. A text no member owns means
 * the write-time check was bypassed and is raised as an IntegrityError.
 */
export function restoreRows(
  decl: ModelDeclaration,
  rows: readonly Row[],
  table: string = decl.subject
): Row[] {
  const enums = decl.enumFields();

  return rows.map((row) => {
    const next: Row = { ...row };
    for (const [column, ns] of enums) {
      if (!Object.hasOwn(row, column)) continue;
      const value = row[column];
      if (value === null || value === undefined) continue;

      const member = typeof value === "string" ? ns.fromStored(value) : undefined;
      if (!member) {
        throw new IntegrityError(
          `Stored value ${describe(value)} in ${table}.${column} is not a member of ${ns.name}`,
          { table, column, value, namespace: ns.qualifiedName }
        );
      }
      next[column] = member;
    }
    return next;
  });
}

/* ===================================================== */
/* ================= GATEWAY =========================== */
/* ===================================================== */

export class ValidationGateway {
  constructor(private readonly connection: Connection) {}

  async insert(
    decl: ModelDeclaration,
    rows: readonly Row[],
    options: InsertOptions = {}
  ): Promise<OperationResult> {
    if (rows.length === 0) return { ...failure("Nothing to add."), indicator: true };
    const table = decl.qualifiedTable(options.schema);

    const unknown = this.unknownColumn(decl, [
      ...(options.columns ?? []),
      ...rows.flatMap((r) => Object.keys(r)),
    ]);
    if (unknown) return failure(`Unknown column ( ${table} ): ${unknown}`);

    const columns =
      options.columns ??
      [...decl.fields.values()]
        .filter((f) => !f.serial && !f.generatedAs)
        .map((f) => f.name)
        .filter((name) => rows.some((r) => Object.hasOwn(r, name)));
    if (columns.length === 0) return failure(`No columns to add ( ${table} ).`);

    const filled: Row[] = [];
    for (const row of rows) {
      const next: Row = {};
      for (const col of columns) {
        if (Object.hasOwn(row, col)) next[col] = row[col];
        else if (options.toNull) next[col] = null;
        else return failure(`Lack of data ( ${table} ): ${col}`);
      }
      filled.push(next);
    }

    const check = validateWrite(decl, filled, table);
    if (!check.ok) return failure(check.error.message);

    const res = await this.execute(table, buildInsertSQL(table, columns, check.rows));
    return {
      indicator: true,
      message: SUCCESS,
      data: res.rows,
      formattedData: restoreRows(decl, res.rows, table),
    };
  }

  async select(
    decl: ModelDeclaration,
    options: SelectOptions = {}
  ): Promise<OperationResult> {
    const table = decl.qualifiedTable(options.schema);
    const where = options.where ?? [];
    const orderBy = options.orderBy ?? [];

    const unknown = this.unknownColumn(decl, [
      ...(options.columns ?? []),
      ...where.map(([col]) => col),
      ...orderBy.map(([col]) => col),
    ]);
    if (unknown) return failure(`Unknown column ( ${table} ): ${unknown}`);

    for (const [col, op] of where) {
      if (!WHERE_OPERATORS.includes(op)) {
        return failure(`Invalid operator ( ${table} ): ${col} ${op}`);
      }
    }
    for (const [col, dir] of orderBy) {
      if (dir !== "ASC" && dir !== "DESC") {
        return failure(`Invalid order ( ${table} ): ${col} ${dir}`);
      }
    }
    if (
      options.limit !== undefined &&
      (!Number.isInteger(options.limit) || options.limit < 0)
    ) {
      return failure(`Invalid limit ( ${table} ): ${options.limit}`);
    }

    // enum conditions compare against stored text
    const conditions: WhereClause[] = [];
    for (const [col, op, value] of where) {
      const check = validateWrite(decl, [{ [col]: value }], table);
      if (!check.ok) return failure(check.error.message);
      conditions.push([col, op, check.rows[0]?.[col]]);
    }

    const res = await this.execute(
      table,
      buildSelectSQL(table, {
        columns: options.columns,
        where: conditions,
        orderBy,
        limit: options.limit,
      })
    );

    return {
      indicator: true,
      message: SUCCESS,
      data: res.rows,
      formattedData: restoreRows(decl, res.rows, table),
    };
  }

  /**
   * Updates each row in turn, matching on `referenceColumns`; every key of
   * the row is written. The batch commits or rolls back as a whole.
   */
  async update(
    decl: ModelDeclaration,
    rows: readonly Row[],
    referenceColumns: readonly string[],
    options: TargetOptions = {}
  ): Promise<OperationResult> {
    if (rows.length === 0) {
      return { ...failure("Nothing to update."), indicator: true };
    }
    return this.perRow(decl, rows, referenceColumns, options, buildUpdateSQL);
  }

  async remove(
    decl: ModelDeclaration,
    filters: readonly Row[],
    referenceColumns: readonly string[],
    options: TargetOptions = {}
  ): Promise<OperationResult> {
    if (filters.length === 0) {
      return { ...failure("Nothing to delete."), indicator: true };
    }
    return this.perRow(decl, filters, referenceColumns, options, buildDeleteSQL);
  }

  private async perRow(
    decl: ModelDeclaration,
    rows: readonly Row[],
    referenceColumns: readonly string[],
    options: TargetOptions,
    build: (table: string, row: Row, refs: readonly string[]) => Statement
  ): Promise<OperationResult> {
    const table = decl.qualifiedTable(options.schema);

    if (referenceColumns.length === 0) return failure("No reference.");
    if (!rows.every((r) => referenceColumns.every((c) => Object.hasOwn(r, c)))) {
      return failure("Mismatch between reference columns and rows.");
    }

    const unknown = this.unknownColumn(decl, [
      ...referenceColumns,
      ...rows.flatMap((r) => Object.keys(r)),
    ]);
    if (unknown) return failure(`Unknown column ( ${table} ): ${unknown}`);

    const check = validateWrite(decl, rows, table);
    if (!check.ok) return failure(check.error.message);

    const affected = await inTransaction(this.connection, async (client) => {
      let count = 0;
      for (const row of check.rows) {
        const res = await this.execute(
          table,
          build(table, row, referenceColumns),
          client
        );
        count += res.rowCount ?? 0;
      }
      return count;
    });

    return { indicator: true, message: SUCCESS, data: affected, formattedData: [] };
  }

  private unknownColumn(
    decl: ModelDeclaration,
    columns: readonly string[]
  ): string | undefined {
    return columns.find((c) => !decl.fields.has(c));
  }

  private async execute(
    table: string,
    stmt: Statement,
    executor: QueryExecutor = this.connection
  ): Promise<ExecutorResult> {
    logStatement("gateway", stmt.text, stmt.values);
    try {
      return await executor.query(stmt.text, stmt.values);
    } catch (err) {
      throw new ExecutionError(table, err);
    }
  }
}
