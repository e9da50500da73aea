// migrations/ddlOrchestrator.ts

import { ConfigurationError, ExecutionError } from "../errors.js";
import type { ModelDeclaration } from "../model.js";
import type { Connection } from "../model-types.js";
import { logSection, logStatement, type LogLine } from "../utils/logger.js";
import { inTransaction } from "../utils/transaction.js";

export interface OrchestratorOptions {
  /** Owner given to schema declarations that do not name one. */
  authorization?: string | undefined;
}

export interface ApplyReport {
  applied: string[];
  skipped: string[];
  seeded: string[];
  statements: number;
}

const KIND_ORDER = { schema: 0, enum: 1, table: 2 } as const;

const TABLE_EXISTS_SQL =
  "SELECT 1 FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2";

const TYPE_EXISTS_SQL =
  "SELECT 1 FROM pg_type t JOIN pg_namespace n ON n.oid = t.typnamespace WHERE n.nspname = $1 AND t.typname = $2";

/**
 * Sequences DDL for a batch of declarations: schemas, then enumeration
 * types, then tables, so a table never runs ahead of a type it uses.
 */
export class DDLOrchestrator {
  private batch: ModelDeclaration[] = [];

  constructor(private readonly options: OrchestratorOptions = {}) {}

  register(...declarations: ModelDeclaration[]): this {
    for (const decl of declarations) {
      if (this.batch.includes(decl)) continue;

      const clash = this.batch.find(
        (d) => d.kind === decl.kind && d.subject === decl.subject
      );
      if (clash) {
        throw new ConfigurationError(
          `${decl.kind} ${decl.subject} is already registered`,
          { declaration: decl.subject }
        );
      }
      this.batch.push(decl);
    }
    return this;
  }

  declarations(): readonly ModelDeclaration[] {
    return this.batch;
  }

  clear() {
    this.batch = [];
  }

  /** Declarations marked `initialize`, in execution order. */
  plan(): ModelDeclaration[] {
    const owner = this.options.authorization;
    const active = this.batch
      .filter((d) => d.initialize)
      .map((d) =>
        d.kind === "schema" && !d.authorization && owner
          ? d.withAuthorization(owner)
          : d
      );

    // stable: registration order is kept within each kind
    const ordered = active
      .map((decl, i) => ({ decl, i }))
      .sort(
        (a, b) =>
          KIND_ORDER[a.decl.kind] - KIND_ORDER[b.decl.kind] || a.i - b.i
      )
      .map(({ decl }) => decl);

    return ordered;
  }

  /** Statements of the plan, without probing for existing objects. */
  render(): string[] {
    return this.plan().flatMap((d) => d.render());
  }

  /**
   * Runs the plan on one client inside a single transaction. Given a pool,
   * a client is checked out for the batch and released afterwards.
   */
  async apply(connection: Connection): Promise<ApplyReport> {
    const report: ApplyReport = {
      applied: [],
      skipped: [],
      seeded: [],
      statements: 0,
    };

    const plan = this.plan();
    this.warnUndeclaredEnums(plan);

    try {
      await inTransaction(connection, async (client) => {
        const run = async (text: string, values?: unknown[]) => {
          logStatement("ddl", text, values);
          report.statements++;
          return client.query(text, values);
        };

        for (const decl of plan) {
          try {
            await this.applyOne(decl, run, report);
          } catch (err) {
            throw err instanceof ExecutionError
              ? err
              : new ExecutionError(decl.subject, err);
          }
        }
      });
    } catch (err) {
      logSection("error", "DDL MIGRATION", [
        {
          tone: "error",
          action: "Failed",
          subject: err instanceof Error ? err.message : String(err),
        },
      ]);
      throw err;
    }

    const lines: LogLine[] = [
      ...report.applied.map((s) => ({ tone: "success" as const, action: "Created", subject: s })),
      ...report.seeded.map((s) => ({ tone: "success" as const, action: "Seeded", subject: s })),
      ...report.skipped.map((s) => ({ tone: "warn" as const, action: "Skipped", subject: s })),
    ];
    logSection("info", "DDL MIGRATION", lines);

    return report;
  }

  private async applyOne(
    decl: ModelDeclaration,
    run: (text: string, values?: unknown[]) => Promise<{ rows: unknown[] }>,
    report: ApplyReport
  ) {
    if (decl.kind === "schema") {
      for (const stmt of decl.render()) await run(stmt);
      report.applied.push(decl.subject);
      return;
    }

    if (decl.kind === "enum") {
      if (decl.conditionalInit) {
        const found = await run(TYPE_EXISTS_SQL, [decl.schemas[0], decl.name]);
        if (found.rows.length > 0) {
          report.skipped.push(decl.subject);
          return;
        }
      }
      for (const stmt of decl.render()) await run(stmt);
      report.applied.push(decl.subject);
      return;
    }

    if (!decl.conditionalInit) {
      for (const stmt of decl.render()) await run(stmt);
      report.applied.push(decl.subject);
      return;
    }

    // conditional tables: post-create, seed and index only on first creation
    const created: string[] = [];
    for (const schema of decl.schemas) {
      const label = `${schema}.${decl.name}`;
      const found = await run(TABLE_EXISTS_SQL, [schema, decl.name]);

      if (found.rows.length > 0) {
        const existing = decl.existingSQL(schema);
        if (existing) await run(existing);
        report.skipped.push(label);
        continue;
      }

      await run(decl.tableStatements(schema).create);
      created.push(schema);
      report.applied.push(label);
    }

    if (created.length === 0) return;

    for (const stmt of decl.postCreateSql) await run(stmt);
    for (const schema of created) {
      const seed = decl.seedSQL(schema);
      if (seed) {
        await run(seed);
        report.seeded.push(`${schema}.${decl.name}`);
      }
    }
    for (const schema of created) {
      for (const idx of decl.tableStatements(schema).indexes) await run(idx);
    }
  }

  private warnUndeclaredEnums(plan: readonly ModelDeclaration[]) {
    const declared = new Set(
      plan.filter((d) => d.kind === "enum").map((d) => d.namespace)
    );

    const lines: LogLine[] = [];
    for (const decl of plan) {
      if (decl.kind !== "table") continue;
      for (const ns of decl.referencedEnums()) {
        if (!declared.has(ns)) {
          lines.push({
            tone: "warn",
            action: "Undeclared enum",
            subject: `${ns.qualifiedName} (used by ${decl.subject})`,
          });
        }
      }
    }
    logSection("warn", "DDL PLAN", lines);
  }
}
