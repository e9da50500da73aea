import { describe, it, expect } from "vitest";
import { EnumNamespace } from "../enums/enumNamespace.js";
import { ConfigurationError } from "../errors.js";
import {
  ModelDeclaration,
  declareEnum,
  declareSchema,
  declareTable,
} from "../model.js";

const priority = new EnumNamespace(
  "priority",
  [
    { label: "HIGH", value: "3" },
    { label: "LOW", value: "1" },
    { label: "MID", value: "2" },
  ],
  { schema: "ops" }
);

describe("schema declarations", () => {
  it("renders one statement per schema name", () => {
    const decl = declareSchema({ schemaName: ["ops", "audit"], authorization: "admin" });
    expect(decl.render()).toEqual([
      "CREATE SCHEMA IF NOT EXISTS ops AUTHORIZATION admin;",
      "CREATE SCHEMA IF NOT EXISTS audit AUTHORIZATION admin;",
    ]);
  });

  it("omits AUTHORIZATION when no owner is set", () => {
    expect(declareSchema({ schemaName: "ops" }).render()).toEqual([
      "CREATE SCHEMA IF NOT EXISTS ops;",
    ]);
  });

  it("returns an owned copy and leaves the declaration as it was", () => {
    const decl = declareSchema({ schemaName: "ops" });
    const owned = decl.withAuthorization("admin");
    expect(owned.render()).toEqual([
      "CREATE SCHEMA IF NOT EXISTS ops AUTHORIZATION admin;",
    ]);
    expect(decl.authorization).toBeUndefined();
  });

  it("requires a schema name", () => {
    expect(() => declareSchema({ schemaName: [] })).toThrow(
      "schema declaration needs a schema name"
    );
  });
});

describe("enum declarations", () => {
  it("lists values in declaration order", () => {
    expect(declareEnum(priority).render()).toEqual([
      "CREATE TYPE ops.priority AS ENUM ('3', '1', '2');",
    ]);
  });

  it("emits mapping values and escapes quotes", () => {
    const mood = new EnumNamespace("mood", [
      { label: "HAPPY", value: "1", mappingValue: "it's fine" },
      { label: "SAD", value: "2" },
    ]);
    expect(declareEnum(mood).render()).toEqual([
      "CREATE TYPE public.mood AS ENUM ('it''s fine', '2');",
    ]);
  });

  it("rejects names that disagree with the namespace", () => {
    expect(() => declareEnum(priority, { enumName: "urgency" })).toThrow(
      "ops.urgency: declaration does not match enum ops.priority"
    );
    expect(() => declareEnum(priority, { schemaName: "public" })).toThrow(
      ConfigurationError
    );
  });

  it("builds from metadata", () => {
    const decl = ModelDeclaration.from({
      initType: "enum",
      enumName: ["priority"],
      schemaName: "ops",
      namespace: priority,
    });
    expect(decl.kind).toBe("enum");
    expect(decl.subject).toBe("ops.priority");
  });
});

describe("table declarations", () => {
  it("renders a serial key and a customised column exactly", () => {
    const decl = declareTable({
      schemaName: "ops",
      tableName: "tasks",
      fields: [
        { name: "id", serial: true, primary: true },
        { name: "weight", customizedSql: "integer NOT NULL CHECK (x > 0)" },
      ],
    });
    expect(decl.render()).toEqual([
      "CREATE TABLE ops.tasks (id SERIAL PRIMARY KEY, weight integer NOT NULL CHECK (x > 0));",
    ]);
  });

  it("appends unique constraints and trailing conditions inside the column list", () => {
    const decl = declareTable({
      tableName: "pairs",
      fields: [
        { name: "a", type: "int" },
        { name: "b", type: "int" },
        { name: "c", type: "int" },
      ],
      uniqueConstraint: [
        ["a", "b"],
        ["b", "c"],
      ],
      otherConditionsSql: "CHECK (a < c)",
    });
    expect(decl.render()).toEqual([
      "CREATE TABLE public.pairs (a int, b int, c int, UNIQUE(a, b), UNIQUE(b, c), CHECK (a < c));",
    ]);
  });

  it("uses IF NOT EXISTS under conditional init", () => {
    const decl = declareTable({
      tableName: "notes",
      conditionalInit: true,
      fields: [{ name: "body", type: "text" }],
    });
    expect(decl.render()).toEqual([
      "CREATE TABLE IF NOT EXISTS public.notes (body text);",
    ]);
  });

  it("references enum columns by their type name", () => {
    const decl = declareTable({
      schemaName: "ops",
      tableName: "tasks",
      fields: [
        { name: "id", serial: true, primary: true },
        { name: "level", enum: priority, notNull: true },
      ],
    });
    expect(decl.render()).toEqual([
      "CREATE TABLE ops.tasks (id SERIAL PRIMARY KEY, level ops.priority NOT NULL);",
    ]);
    expect(decl.referencedEnums()).toEqual([priority]);
    expect(decl.enumFields()).toEqual([["level", priority]]);
  });

  it("follows creation with post-create statements and indexes", () => {
    const decl = declareTable({
      schemaName: "ops",
      tableName: "events",
      initIndex: true,
      fields: [
        { name: "id", type: "bigint", notNull: true },
        { name: "at", type: "timestamptz", index: "brin" },
      ],
      otherConditionsSql: "PRIMARY KEY (id, at)",
      customizedSql: "CREATE TABLE ops.events_2024 PARTITION OF ops.events FOR VALUES FROM ('2024-01-01') TO ('2025-01-01');",
    });
    expect(decl.render()).toEqual([
      "CREATE TABLE ops.events (id bigint NOT NULL, at timestamptz, PRIMARY KEY (id, at));",
      "CREATE TABLE ops.events_2024 PARTITION OF ops.events FOR VALUES FROM ('2024-01-01') TO ('2025-01-01');",
      "CREATE INDEX IF NOT EXISTS idx_events_at ON ops.events USING BRIN (at);",
    ]);
  });

  it("leaves indexes out unless initIndex is set", () => {
    const decl = declareTable({
      tableName: "events",
      fields: [{ name: "at", type: "timestamptz", index: "btree" }],
    });
    expect(decl.render()).toEqual(["CREATE TABLE public.events (at timestamptz);"]);
  });

  it("creates the table in every listed schema", () => {
    const decl = declareTable({
      schemaName: ["east", "west"],
      tableName: "stock",
      fields: [{ name: "sku", type: "text" }],
    });
    expect(decl.render()).toEqual([
      "CREATE TABLE east.stock (sku text);",
      "CREATE TABLE west.stock (sku text);",
    ]);
    expect(decl.qualifiedTable()).toBe("east.stock");
    expect(decl.qualifiedTable("west")).toBe("west.stock");
    expect(() => decl.qualifiedTable("north")).toThrow(
      "stock is not declared in schema north"
    );
  });

  it("renders the same text every time", () => {
    const decl = declareTable({
      tableName: "t",
      fields: [
        { name: "id", serial: true, primary: true },
        { name: "name", type: "text", unique: true },
      ],
    });
    expect(decl.render()).toEqual(decl.render());
    expect(Object.isFrozen(decl)).toBe(true);
  });

  it("renders a conditional block with seed and else statements", () => {
    const decl = declareTable({
      schemaName: "ops",
      tableName: "flags",
      conditionalInit: true,
      fields: [{ name: "name", type: "text" }],
      seed: {
        ifInitialize: (schema, table) =>
          `INSERT INTO ${schema}.${table} (name) VALUES ('beta');`,
        elseInitialize: (schema, table) =>
          `UPDATE ${schema}.${table} SET name = 'beta' WHERE name = 'alpha';`,
      },
    });
    expect(decl.renderConditionalBlock()).toEqual([
      [
        "DO $$",
        "BEGIN",
        "IF NOT EXISTS (SELECT 1 FROM information_schema.tables WHERE table_schema = 'ops' AND table_name = 'flags') THEN",
        "CREATE TABLE ops.flags (name text);",
        "INSERT INTO ops.flags (name) VALUES ('beta');",
        "ELSE",
        "UPDATE ops.flags SET name = 'beta' WHERE name = 'alpha';",
        "END IF;",
        "END$$;",
      ].join("\n"),
    ]);
  });

  it("returns declared defaults as a row", () => {
    const decl = declareTable({
      tableName: "prefs",
      fields: [
        { name: "id", serial: true, primary: true },
        { name: "tags", type: "text[]", default: "ARRAY[]::text[]" },
        { name: "label", type: "text", default: "''" },
        { name: "size", type: "int", default: "10" },
        { name: "note", type: "text" },
      ],
    });
    expect(decl.defaultRow()).toEqual({
      tags: [],
      label: "",
      size: "10",
      note: null,
    });
  });

  describe("validation", () => {
    it("requires exactly one table name", () => {
      expect(() =>
        declareTable({ tableName: ["a", "b"], fields: [{ name: "x", type: "int" }] })
      ).toThrow("table declaration needs exactly one table name, got 2");
    });

    it("requires fields", () => {
      expect(() => declareTable({ tableName: "empty", fields: [] })).toThrow(
        "public.empty: a table needs at least one field"
      );
    });

    it("rejects duplicate fields", () => {
      expect(() =>
        declareTable({
          tableName: "t",
          fields: [
            { name: "x", type: "int" },
            { name: "x", type: "text" },
          ],
        })
      ).toThrow("public.t: duplicate field x");
    });

    it("rejects unique constraints on undeclared fields", () => {
      expect(() =>
        declareTable({
          tableName: "t",
          fields: [{ name: "a", type: "int" }],
          uniqueConstraint: [["a", "z"]],
        })
      ).toThrow("public.t: unique constraint references unknown field z");
    });

    it("requires conditional init for seed hooks", () => {
      expect(() =>
        declareTable({
          tableName: "t",
          fields: [{ name: "a", type: "int" }],
          seed: { ifInitialize: () => "SELECT 1;" },
        })
      ).toThrow("public.t: seed hooks require conditionalInit");
    });

    it("propagates field configuration errors at build time", () => {
      expect(() =>
        declareTable({
          tableName: "t",
          fields: [{ name: "id", type: "uuid", serial: true }],
        })
      ).toThrow("public.t.id: serial is not valid for column type uuid");
    });
  });
});
