// pgdeclare.ts

import pg from "pg";

import { ConfigurationError, ExecutionError } from "./errors.js";
import {
  ValidationGateway,
  type InsertOptions,
  type SelectOptions,
  type TargetOptions,
} from "./gateway/validationGateway.js";
import {
  DDLOrchestrator,
  type ApplyReport,
} from "./migrations/ddlOrchestrator.js";
import type { ModelDeclaration } from "./model.js";
import type {
  ClientSource,
  OperationResult,
  QueryExecutor,
  Row,
} from "./model-types.js";
import { loadConfig, type PgDeclareConfig } from "./utils/config.js";
import { logSection, setLogLevel } from "./utils/logger.js";
import { getSSLConfig } from "./utils/sslConfig.js";
import { inTransaction } from "./utils/transaction.js";

/** The part of `pg.Pool` this handle uses. */
export interface PoolLike extends ClientSource {
  end(): Promise<void>;
}

export interface TransactionOptions {
  /** lock_timeout in milliseconds */
  maxWait?: number;
  /** statement_timeout in milliseconds */
  timeout?: number;
}

export interface PgDeclareOptions {
  authorization?: string | undefined;
  transaction?: TransactionOptions;
}

export class PgDeclare {
  readonly orchestrator: DDLOrchestrator;
  readonly gateway: ValidationGateway;
  private migrating = false;

  constructor(
    private readonly pool: PoolLike,
    private readonly options: PgDeclareOptions = {}
  ) {
    this.orchestrator = new DDLOrchestrator({
      authorization: options.authorization,
    });
    this.gateway = new ValidationGateway(pool);
  }

  /** Builds a pool from configuration (`.env` and the environment by default). */
  static connect(
    config: PgDeclareConfig = loadConfig(),
    options: Omit<PgDeclareOptions, "authorization"> = {}
  ): PgDeclare {
    if (!config.databaseUrl) {
      throw new ConfigurationError("DATABASE_URL is required to connect", {
        key: "DATABASE_URL",
      });
    }
    setLogLevel(config.logLevel);

    const pool = new pg.Pool({
      connectionString: config.databaseUrl,
      ssl: getSSLConfig({
        nodeEnv: config.nodeEnv,
        allowSSL: config.allowSSL,
        rejectUnauthorized: config.rejectUnauthorized,
        databaseUrl: config.databaseUrl,
      }),
    });

    return new PgDeclare(pool, {
      ...options,
      authorization: config.schemaOwner,
    });
  }

  /* ================================
   * Declarations and DDL
   * ================================ */
  register(...declarations: ModelDeclaration[]): this {
    this.orchestrator.register(...declarations);
    return this;
  }

  /**
   * Applies every registered declaration on one client inside a single
   * transaction. Returns false when a migration is already running.
   */
  async migrate(): Promise<ApplyReport | false> {
    if (this.migrating) return false;
    this.migrating = true;

    try {
      return await this.orchestrator.apply(this.pool);
    } finally {
      this.migrating = false;
    }
  }

  /** Run `fn` in a transaction on a dedicated client */
  transaction<T>(
    fn: (client: QueryExecutor) => Promise<T>,
    config: TransactionOptions = {}
  ): Promise<T> {
    const maxWait = config.maxWait ?? this.options.transaction?.maxWait ?? 2000;
    const timeout = config.timeout ?? this.options.transaction?.timeout ?? 5000;

    return inTransaction(this.pool, fn, [
      `SET LOCAL lock_timeout = '${Math.trunc(maxWait)}ms'`,
      `SET LOCAL statement_timeout = '${Math.trunc(timeout)}ms'`,
    ]);
  }

  /* ================================
   * Data
   * ================================ */
  insert(decl: ModelDeclaration, rows: readonly Row[], options?: InsertOptions) {
    return this.gateway.insert(decl, rows, options);
  }

  select(decl: ModelDeclaration, options?: SelectOptions) {
    return this.gateway.select(decl, options);
  }

  update(
    decl: ModelDeclaration,
    rows: readonly Row[],
    referenceColumns: readonly string[],
    options?: TargetOptions
  ): Promise<OperationResult> {
    return this.gateway.update(decl, rows, referenceColumns, options);
  }

  remove(
    decl: ModelDeclaration,
    filters: readonly Row[],
    referenceColumns: readonly string[],
    options?: TargetOptions
  ): Promise<OperationResult> {
    return this.gateway.remove(decl, filters, referenceColumns, options);
  }

  /* ================================
   * Catalogue
   * ================================ */
  async getTableList(): Promise<string[]> {
    const res = await this.catalogue(
      "SELECT schemaname, tablename FROM pg_catalog.pg_tables WHERE schemaname NOT IN ('pg_catalog', 'information_schema') ORDER BY schemaname, tablename"
    );
    return res.rows.map((r) => `${String(r.schemaname)}.${String(r.tablename)}`);
  }

  /** Column names of a table in ordinal order; `excludeSerial` drops nextval() columns. */
  async getHeaders(
    schema: string,
    table: string,
    options: { excludeSerial?: boolean } = {}
  ): Promise<string[]> {
    let sql =
      "SELECT column_name FROM information_schema.columns WHERE table_schema = $1 AND table_name = $2";
    if (options.excludeSerial) {
      sql += " AND (column_default NOT LIKE 'nextval%' OR column_default IS NULL)";
    }
    const res = await this.catalogue(`${sql} ORDER BY ordinal_position`, [
      schema,
      table,
    ]);
    return res.rows.map((r) => String(r.column_name));
  }

  async close() {
    await this.pool.end();
    logSection("info", "PGDECLARE", [
      { tone: "processing", action: "Closed", subject: "connection pool" },
    ]);
  }

  private async catalogue(text: string, values?: unknown[]) {
    try {
      return await this.pool.query(text, values);
    } catch (err) {
      throw new ExecutionError("catalogue", err);
    }
  }
}
