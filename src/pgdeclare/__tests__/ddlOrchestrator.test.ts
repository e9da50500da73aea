import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { EnumNamespace } from "../enums/enumNamespace.js";
import { ConfigurationError, ExecutionError } from "../errors.js";
import { DDLOrchestrator } from "../migrations/ddlOrchestrator.js";
import { declareEnum, declareSchema, declareTable } from "../model.js";
import { colors, setLogLevel } from "../utils/logger.js";
import { FakeClient, FakePool, rows } from "./fakeExecutor.js";

const status = new EnumNamespace("status", [
  { label: "OPEN", value: "open" },
  { label: "DONE", value: "done" },
]);

const schema = declareSchema({ schemaName: "ops", initialize: true });
const statusEnum = declareEnum(status, { initialize: true });
const tickets = declareTable({
  tableName: "tickets",
  initialize: true,
  fields: [
    { name: "id", serial: true, primary: true },
    { name: "state", enum: status, notNull: true },
  ],
});

beforeEach(() => {
  setLogLevel("silent");
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("DDLOrchestrator", () => {
  describe("planning", () => {
    it("orders schemas, enums, then tables regardless of registration order", () => {
      const orchestrator = new DDLOrchestrator().register(tickets, statusEnum, schema);
      expect(orchestrator.render()).toEqual([
        "CREATE SCHEMA IF NOT EXISTS ops;",
        "CREATE TYPE public.status AS ENUM ('open', 'done');",
        "CREATE TABLE public.tickets (id SERIAL PRIMARY KEY, state public.status NOT NULL);",
      ]);
    });

    it("keeps registration order within a kind", () => {
      const first = declareTable({
        tableName: "b_first",
        initialize: true,
        fields: [{ name: "x", type: "int" }],
      });
      const second = declareTable({
        tableName: "a_second",
        initialize: true,
        fields: [{ name: "x", type: "int" }],
      });
      const plan = new DDLOrchestrator().register(first, second).plan();
      expect(plan.map((d) => d.subject)).toEqual([
        "public.b_first",
        "public.a_second",
      ]);
    });

    it("leaves out declarations not marked initialize", () => {
      const dormant = declareSchema({ schemaName: "archive" });
      const orchestrator = new DDLOrchestrator().register(dormant, schema);
      expect(orchestrator.declarations()).toHaveLength(2);
      expect(orchestrator.render()).toEqual(["CREATE SCHEMA IF NOT EXISTS ops;"]);
    });

    it("fills in the default owner for schemas without one", () => {
      const owned = declareSchema({
        schemaName: "billing",
        authorization: "billing_owner",
        initialize: true,
      });
      const orchestrator = new DDLOrchestrator({ authorization: "admin" }).register(
        schema,
        owned
      );
      expect(orchestrator.render()).toEqual([
        "CREATE SCHEMA IF NOT EXISTS ops AUTHORIZATION admin;",
        "CREATE SCHEMA IF NOT EXISTS billing AUTHORIZATION billing_owner;",
      ]);
      expect(schema.authorization).toBeUndefined();
    });

    it("ignores a repeated registration of the same declaration", () => {
      const orchestrator = new DDLOrchestrator().register(schema, schema);
      orchestrator.register(schema);
      expect(orchestrator.declarations()).toEqual([schema]);
    });

    it("rejects a different declaration with the same name", () => {
      const orchestrator = new DDLOrchestrator().register(schema);
      expect(() =>
        orchestrator.register(declareSchema({ schemaName: "ops" }))
      ).toThrow(new ConfigurationError("schema ops is already registered"));
    });

    it("forgets everything on clear", () => {
      const orchestrator = new DDLOrchestrator().register(schema, tickets);
      orchestrator.clear();
      expect(orchestrator.declarations()).toEqual([]);
      expect(orchestrator.render()).toEqual([]);
    });

    it("plans without logging", () => {
      setLogLevel("debug");
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const log = vi.spyOn(console, "log").mockImplementation(() => {});

      const orchestrator = new DDLOrchestrator().register(tickets);
      orchestrator.plan();
      orchestrator.render();

      expect(warn).not.toHaveBeenCalled();
      expect(log).not.toHaveBeenCalled();
    });
  });

  describe("apply", () => {
    it("warns once about enums a table uses that the batch does not declare", async () => {
      setLogLevel("warn");
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      await new DDLOrchestrator().register(tickets).apply(new FakeClient());

      expect(warn).toHaveBeenCalledTimes(2);
      expect(warn.mock.calls[0]?.[0]).toBe(
        `${colors.section}${colors.bold}DDL PLAN:${colors.reset}`
      );
      expect(warn.mock.calls[1]?.[0]).toBe(
        `  ${colors.warn}Undeclared enum:${colors.reset} ${colors.subject}public.status (used by public.tickets)${colors.reset}`
      );
    });

    it("stays quiet when every enum is declared", async () => {
      setLogLevel("warn");
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      await new DDLOrchestrator().register(tickets, statusEnum).apply(new FakeClient());

      expect(warn).not.toHaveBeenCalled();
    });

    it("checks a client out of a pool for the whole batch", async () => {
      const pool = new FakePool();

      await new DDLOrchestrator().register(schema, tickets).apply(pool);

      expect(pool.calls).toEqual([]);
      expect(pool.client.statements).toEqual([
        "BEGIN",
        "CREATE SCHEMA IF NOT EXISTS ops;",
        "CREATE TABLE public.tickets (id SERIAL PRIMARY KEY, state public.status NOT NULL);",
        "COMMIT",
      ]);
      expect(pool.client.released).toBe(1);
    });

    it("rolls back on the pooled client and releases it", async () => {
      const pool = new FakePool();
      pool.client.on("CREATE TABLE", new Error("disk full"));

      await expect(
        new DDLOrchestrator().register(schema, tickets).apply(pool)
      ).rejects.toThrow("public.tickets: disk full");

      expect(pool.calls).toEqual([]);
      expect(pool.client.statements.at(-1)).toBe("ROLLBACK");
      expect(pool.client.released).toBe(1);
    });

    it("leaves a client it was given checked out", async () => {
      const client = new FakeClient();
      await new DDLOrchestrator().register(schema).apply(client);
      expect(client.released).toBe(0);
    });

    it("runs the plan inside one transaction", async () => {
      const executor = new FakeClient();
      const report = await new DDLOrchestrator()
        .register(tickets, statusEnum, schema)
        .apply(executor);

      expect(executor.statements).toEqual([
        "BEGIN",
        "CREATE SCHEMA IF NOT EXISTS ops;",
        "CREATE TYPE public.status AS ENUM ('open', 'done');",
        "CREATE TABLE public.tickets (id SERIAL PRIMARY KEY, state public.status NOT NULL);",
        "COMMIT",
      ]);
      expect(report).toEqual({
        applied: ["ops", "public.status", "public.tickets"],
        skipped: [],
        seeded: [],
        statements: 3,
      });
    });

    it("skips a conditional enum that already exists", async () => {
      const conditional = declareEnum(status, {
        initialize: true,
        conditionalInit: true,
      });
      const executor = new FakeClient().on(
        "SELECT 1 FROM pg_type",
        rows({ "?column?": 1 })
      );

      const report = await new DDLOrchestrator().register(conditional).apply(executor);

      expect(executor.calls[1]?.values).toEqual(["public", "status"]);
      expect(executor.statements).toHaveLength(3);
      expect(executor.statements[2]).toBe("COMMIT");
      expect(report.skipped).toEqual(["public.status"]);
      expect(report.applied).toEqual([]);
    });

    it("creates, seeds and indexes a conditional table only where it is missing", async () => {
      const flags = declareTable({
        schemaName: ["east", "west"],
        tableName: "flags",
        initialize: true,
        conditionalInit: true,
        initIndex: true,
        fields: [{ name: "name", type: "text", index: "btree" }],
        customizedSql: "COMMENT ON TABLE west.flags IS 'feature flags';",
        seed: {
          ifInitialize: (s, t) => `INSERT INTO ${s}.${t} (name) VALUES ('beta');`,
          elseInitialize: (s, t) => `DELETE FROM ${s}.${t} WHERE name = 'alpha';`,
        },
      });
      const executor = new FakeClient().on(
        "SELECT 1 FROM information_schema.tables",
        (values) => (values?.[0] === "east" ? rows({ "?column?": 1 }) : rows())
      );

      const report = await new DDLOrchestrator().register(flags).apply(executor);

      expect(executor.statements.slice(1, -1)).toEqual([
        "SELECT 1 FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2",
        "DELETE FROM east.flags WHERE name = 'alpha';",
        "SELECT 1 FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2",
        "CREATE TABLE IF NOT EXISTS west.flags (name text);",
        "COMMENT ON TABLE west.flags IS 'feature flags';",
        "INSERT INTO west.flags (name) VALUES ('beta');",
        "CREATE INDEX IF NOT EXISTS idx_flags_name ON west.flags USING BTREE (name);",
      ]);
      expect(report).toEqual({
        applied: ["west.flags"],
        skipped: ["east.flags"],
        seeded: ["west.flags"],
        statements: 7,
      });
    });

    it("runs only the existence checks when every conditional table exists", async () => {
      const notes = declareTable({
        tableName: "notes",
        initialize: true,
        conditionalInit: true,
        initIndex: true,
        fields: [{ name: "body", type: "text", index: "gin" }],
      });
      const executor = new FakeClient().on(
        "SELECT 1 FROM information_schema.tables",
        rows({ "?column?": 1 })
      );

      const report = await new DDLOrchestrator().register(notes).apply(executor);

      expect(executor.statements).toEqual([
        "BEGIN",
        "SELECT 1 FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2",
        "COMMIT",
      ]);
      expect(report.skipped).toEqual(["public.notes"]);
    });

    it("rolls back and names the failing declaration", async () => {
      const executor = new FakeClient().on(
        "CREATE TABLE",
        new Error('relation "tickets" already exists')
      );
      const orchestrator = new DDLOrchestrator().register(schema, tickets);

      const failure = orchestrator.apply(executor);

      await expect(failure).rejects.toBeInstanceOf(ExecutionError);
      await expect(failure).rejects.toThrow(
        'public.tickets: relation "tickets" already exists'
      );
      expect(executor.statements).toEqual([
        "BEGIN",
        "CREATE SCHEMA IF NOT EXISTS ops;",
        "CREATE TABLE public.tickets (id SERIAL PRIMARY KEY, state public.status NOT NULL);",
        "ROLLBACK",
      ]);
    });
  });
});
