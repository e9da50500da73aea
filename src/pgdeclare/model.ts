// model.ts

import type { EnumNamespace } from "./enums/enumNamespace.js";
import { ConfigurationError } from "./errors.js";
import type {
  ColumnDefinition,
  DeclarationMeta,
  EnumMeta,
  InitType,
  OneOrMany,
  Row,
  SchemaMeta,
  SeedHooks,
  TableMeta,
} from "./model-types.js";
import {
  createFieldSpec,
  isValidIdentifier,
  type FieldSpec,
} from "./sql/buildColumnSQL.js";
import {
  buildConditionalBlock,
  buildEnumSQL,
  buildIndexSQL,
  buildSchemaSQL,
  buildTableSQL,
  type TableSQLInput,
} from "./sql/buildTableSQL.js";

interface DeclarationState {
  kind: InitType;
  names: readonly string[];
  schemas: readonly string[];
  fields: ReadonlyMap<string, FieldSpec>;
  initialize: boolean;
  conditionalInit: boolean;
  initIndex: boolean;
  uniqueConstraints: readonly (readonly string[])[];
  otherConditionsSql: string | undefined;
  postCreateSql: readonly string[];
  authorization: string | undefined;
  seed: SeedHooks | undefined;
  namespace: EnumNamespace | undefined;
}

export interface TableStatements {
  create: string;
  indexes: string[];
}

function toList(value: OneOrMany<string> | undefined): string[] {
  if (value === undefined) return [];
  return typeof value === "string" ? [value] : [...value];
}

function freezeList<T>(items: T[]): readonly T[] {
  return Object.freeze(items);
}

/**
 * One schema, table or enumeration type. Built and validated once, immutable
 * afterwards; every render method is a pure function of its attributes.
 */
export class ModelDeclaration {
  readonly kind: InitType;
  /** Schema names for a schema declaration, else the single table/enum name. */
  readonly names: readonly string[];
  readonly schemas: readonly string[];
  readonly fields: ReadonlyMap<string, FieldSpec>;
  readonly initialize: boolean;
  readonly conditionalInit: boolean;
  readonly initIndex: boolean;
  readonly uniqueConstraints: readonly (readonly string[])[];
  readonly otherConditionsSql: string | undefined;
  readonly postCreateSql: readonly string[];
  readonly authorization: string | undefined;
  readonly seed: SeedHooks | undefined;
  readonly namespace: EnumNamespace | undefined;

  private constructor(state: DeclarationState) {
    this.kind = state.kind;
    this.names = state.names;
    this.schemas = state.schemas;
    this.fields = state.fields;
    this.initialize = state.initialize;
    this.conditionalInit = state.conditionalInit;
    this.initIndex = state.initIndex;
    this.uniqueConstraints = state.uniqueConstraints;
    this.otherConditionsSql = state.otherConditionsSql;
    this.postCreateSql = state.postCreateSql;
    this.authorization = state.authorization;
    this.seed = state.seed;
    this.namespace = state.namespace;
    Object.freeze(this);
  }

  static from(
    meta: DeclarationMeta,
    columns: readonly ColumnDefinition[] = []
  ): ModelDeclaration {
    switch (meta.initType) {
      case "schema":
        return ModelDeclaration.schema(meta);
      case "enum":
        return ModelDeclaration.enumeration(meta);
      case "table":
        return ModelDeclaration.table(meta, columns);
      default: {
        const unknown: { initType?: unknown } = meta;
        throw new ConfigurationError(
          `Invalid init type ${String(unknown.initType)}`
        );
      }
    }
  }

  /* ================= SCHEMA ================= */

  static schema(meta: SchemaMeta): ModelDeclaration {
    const names = toList(meta.schemaName);
    if (names.length === 0) {
      throw new ConfigurationError("schema declaration needs a schema name");
    }
    names.forEach((n) => assertIdentifier(n, "schema"));

    return new ModelDeclaration({
      ...emptyState("schema", meta),
      names: freezeList(names),
      schemas: freezeList([...names]),
      authorization: meta.authorization,
    });
  }

  /* ================= ENUM ================= */

  static enumeration(meta: EnumMeta): ModelDeclaration {
    const name = singleName(meta.enumName, "enum");
    const namespace = meta.namespace;
    const schemas = toList(meta.schemaName);
    const schema = schemas[0] ?? namespace.schema;

    if (schemas.length > 1) {
      throw new ConfigurationError(
        `${name}: an enum declaration takes one schema`,
        { declaration: name }
      );
    }
    assertIdentifier(schema, "schema");
    if (name !== namespace.name || schema !== namespace.schema) {
      throw new ConfigurationError(
        `${schema}.${name}: declaration does not match enum ${namespace.qualifiedName}`,
        { declaration: name, namespace: namespace.qualifiedName }
      );
    }
    if (namespace.allMembers().length === 0) {
      throw new ConfigurationError(`${schema}.${name}: enum has no members`, {
        declaration: name,
      });
    }

    return new ModelDeclaration({
      ...emptyState("enum", meta),
      names: freezeList([name]),
      schemas: freezeList([schema]),
      namespace,
    });
  }

  /* ================= TABLE ================= */

  static table(
    meta: TableMeta,
    columns: readonly ColumnDefinition[]
  ): ModelDeclaration {
    const table = singleName(meta.tableName, "table");
    const schemas = toList(meta.schemaName);
    if (schemas.length === 0) schemas.push("public");
    schemas.forEach((s) => assertIdentifier(s, "schema"));

    const owner = `${schemas[0]}.${table}`;

    if (columns.length === 0) {
      throw new ConfigurationError(`${owner}: a table needs at least one field`, {
        declaration: owner,
      });
    }

    const fields = new Map<string, FieldSpec>();
    for (const col of columns) {
      if (fields.has(col.name)) {
        throw new ConfigurationError(`${owner}: duplicate field ${col.name}`, {
          declaration: owner,
          column: col.name,
        });
      }
      fields.set(col.name, createFieldSpec(col, owner));
    }

    const uniqueConstraints = (meta.uniqueConstraint ?? []).map((cols) => {
      if (cols.length === 0) {
        throw new ConfigurationError(`${owner}: empty unique constraint`, {
          declaration: owner,
        });
      }
      for (const c of cols) {
        if (!fields.has(c)) {
          throw new ConfigurationError(
            `${owner}: unique constraint references unknown field ${c}`,
            { declaration: owner, column: c }
          );
        }
      }
      return freezeList([...cols]);
    });

    if (meta.seed && !meta.conditionalInit) {
      throw new ConfigurationError(
        `${owner}: seed hooks require conditionalInit`,
        { declaration: owner }
      );
    }

    return new ModelDeclaration({
      ...emptyState("table", meta),
      names: freezeList([table]),
      schemas: freezeList(schemas),
      fields,
      initIndex: meta.initIndex ?? false,
      uniqueConstraints: freezeList(uniqueConstraints),
      otherConditionsSql: meta.otherConditionsSql,
      postCreateSql: freezeList(toList(meta.customizedSql)),
      seed: meta.seed,
    });
  }

  /* ================= ACCESSORS ================= */

  /** Human readable identity used in logs and error messages. */
  get subject(): string {
    if (this.kind === "schema") return this.names.join(", ");
    return this.schemas.map((s) => `${s}.${this.name}`).join(", ");
  }

  get name(): string {
    return this.names[0] ?? "";
  }

  /** Qualified table name for data operations, in the requested schema. */
  qualifiedTable(schema?: string): string {
    if (this.kind !== "table") {
      throw new ConfigurationError(`${this.subject} is not a table`);
    }
    const target = schema ?? this.schemas[0];
    if (target === undefined || !this.schemas.includes(target)) {
      throw new ConfigurationError(
        `${this.name} is not declared in schema ${String(schema)}`,
        { declaration: this.name, schema }
      );
    }
    return `${target}.${this.name}`;
  }

  enumFields(): [string, EnumNamespace][] {
    const out: [string, EnumNamespace][] = [];
    for (const [name, field] of this.fields) {
      if (field.enum) out.push([name, field.enum]);
    }
    return out;
  }

  referencedEnums(): EnumNamespace[] {
    return [...new Set(this.enumFields().map(([, ns]) => ns))];
  }

  withAuthorization(owner: string): ModelDeclaration {
    if (this.kind !== "schema") return this;
    return new ModelDeclaration({ ...this.state(), authorization: owner });
  }

  /**
   * Declared defaults keyed by column. Serial primary keys are left out,
   * `''` becomes "" and `ARRAY[]::type` becomes [].
   */
  defaultRow(): Row {
    const row: Row = {};
    for (const [name, field] of this.fields) {
      if (field.serial && field.primary) continue;
      const def = field.default;
      if (def === undefined) row[name] = null;
      else if (def.startsWith("ARRAY[]::")) row[name] = [];
      else if (def === "''") row[name] = "";
      else row[name] = def;
    }
    return row;
  }

  /* ================= RENDERING ================= */

  tableStatements(schema: string): TableStatements {
    const create = buildTableSQL({
      ...this.tableInput(schema),
      ifNotExists: this.conditionalInit,
    });

    const indexes: string[] = [];
    if (this.initIndex) {
      for (const [name, field] of this.fields) {
        if (field.index) {
          indexes.push(buildIndexSQL(schema, this.name, name, field.index));
        }
      }
    }
    return { create, indexes };
  }

  /** Every DDL statement for this declaration, in execution order. */
  render(): string[] {
    switch (this.kind) {
      case "schema":
        return this.names.map((n) => buildSchemaSQL(n, this.authorization));

      case "enum": {
        const namespace = this.requireNamespace();
        return [
          buildEnumSQL(namespace.schema, namespace.name, namespace.storedValues()),
        ];
      }

      case "table": {
        const perSchema = this.schemas.map((s) => this.tableStatements(s));
        return [
          ...perSchema.map((t) => t.create),
          ...this.postCreateSql,
          ...perSchema.flatMap((t) => t.indexes),
        ];
      }
    }
  }

  /** Seed statements for a table created just now in `schema`. */
  seedSQL(schema: string): string | undefined {
    return this.seed?.ifInitialize(schema, this.name) || undefined;
  }

  /** Statements for a table that already existed in `schema`. */
  existingSQL(schema: string): string | undefined {
    return this.seed?.elseInitialize?.(schema, this.name) || undefined;
  }

  /** One `DO $$` block per schema, for executors that run scripts verbatim. */
  renderConditionalBlock(): string[] {
    if (this.kind !== "table") {
      throw new ConfigurationError(`${this.subject} is not a table`);
    }
    return this.schemas.map((schema) => {
      const seed = this.seedSQL(schema);
      const existing = this.existingSQL(schema);
      return buildConditionalBlock(
        this.tableInput(schema),
        [...this.postCreateSql, ...(seed ? [seed] : [])],
        existing ? [existing] : []
      );
    });
  }

  private tableInput(schema: string): TableSQLInput {
    return {
      schema,
      table: this.name,
      fields: [...this.fields.values()],
      uniqueConstraints: this.uniqueConstraints,
      otherConditionsSql: this.otherConditionsSql,
    };
  }

  private requireNamespace(): EnumNamespace {
    if (!this.namespace) {
      throw new ConfigurationError(`${this.subject} has no enum namespace`);
    }
    return this.namespace;
  }

  private state(): DeclarationState {
    return {
      kind: this.kind,
      names: this.names,
      schemas: this.schemas,
      fields: this.fields,
      initialize: this.initialize,
      conditionalInit: this.conditionalInit,
      initIndex: this.initIndex,
      uniqueConstraints: this.uniqueConstraints,
      otherConditionsSql: this.otherConditionsSql,
      postCreateSql: this.postCreateSql,
      authorization: this.authorization,
      seed: this.seed,
      namespace: this.namespace,
    };
  }
}

/* ================= HELPERS ================= */

function emptyState(
  kind: InitType,
  meta: { initialize?: boolean; conditionalInit?: boolean }
): DeclarationState {
  return {
    kind,
    names: [],
    schemas: [],
    fields: new Map(),
    initialize: meta.initialize ?? false,
    conditionalInit: meta.conditionalInit ?? false,
    initIndex: false,
    uniqueConstraints: [],
    otherConditionsSql: undefined,
    postCreateSql: [],
    authorization: undefined,
    seed: undefined,
    namespace: undefined,
  };
}

function assertIdentifier(name: string, what: string) {
  if (!isValidIdentifier(name)) {
    throw new ConfigurationError(`"${name}" is not a valid ${what} name`, {
      [what]: name,
    });
  }
}

function singleName(value: OneOrMany<string>, what: "table" | "enum"): string {
  const names = toList(value);
  if (names.length !== 1) {
    throw new ConfigurationError(
      `${what} declaration needs exactly one ${what} name, got ${names.length}`
    );
  }
  const [name] = names;
  if (name === undefined) {
    throw new ConfigurationError(`${what} declaration needs a ${what} name`);
  }
  assertIdentifier(name, what);
  return name;
}

/* ================= BUILDERS ================= */

export function declareSchema(meta: Omit<SchemaMeta, "initType">) {
  return ModelDeclaration.schema({ ...meta, initType: "schema" });
}

export function declareEnum(
  namespace: EnumNamespace,
  meta: Partial<Omit<EnumMeta, "initType" | "namespace">> = {}
) {
  return ModelDeclaration.enumeration({
    enumName: namespace.name,
    schemaName: namespace.schema,
    ...meta,
    initType: "enum",
    namespace,
  });
}

export function declareTable(
  meta: Omit<TableMeta, "initType"> & { fields: readonly ColumnDefinition[] }
) {
  const { fields, ...rest } = meta;
  return ModelDeclaration.table({ ...rest, initType: "table" }, fields);
}
