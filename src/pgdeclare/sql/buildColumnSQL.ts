// sql/buildColumnSQL.ts

import { ConfigurationError } from "../errors.js";
import type { ColumnDefinition } from "../model-types.js";

export type FieldSpec = Readonly<ColumnDefinition>;

const SERIAL_TYPES: Record<string, string> = {
  INT: "SERIAL",
  INT4: "SERIAL",
  INTEGER: "SERIAL",
  SMALLINT: "SMALLSERIAL",
  INT2: "SMALLSERIAL",
  BIGINT: "BIGSERIAL",
  INT8: "BIGSERIAL",
};

export function isValidIdentifier(name: string): boolean {
  // SQL-safe unquoted identifier
  return /^[a-zA-Z_][a-zA-Z0-9_]*$/.test(name);
}

function serialType(type: string | undefined): string | undefined {
  if (type === undefined) return "SERIAL";
  return SERIAL_TYPES[type.trim().toUpperCase()];
}

/** `'it''s'` -> `it's`; undefined when the text is not a single quoted literal */
function unquoteLiteral(raw: string): string | undefined {
  const match = /^'((?:[^']|'')*)'$/s.exec(raw.trim());
  return match?.[1]?.replace(/''/g, "'");
}

/**
 * Validates one column and freezes it. Conflicting attributes fail here,
 * so rendering never has to.
 */
export function createFieldSpec(
  col: ColumnDefinition,
  owner: string
): FieldSpec {
  const where = `${owner}.${col.name}`;
  const fail = (message: string) =>
    new ConfigurationError(`${where}: ${message}`, {
      declaration: owner,
      column: col.name,
    });

  if (!isValidIdentifier(col.name)) {
    throw new ConfigurationError(
      `${owner}: "${col.name}" is not a valid column name`,
      { declaration: owner, column: col.name }
    );
  }

  // customised columns carry their own type and constraint text
  if (col.customizedField !== undefined || col.customizedSql !== undefined) {
    return Object.freeze({ ...col });
  }

  if (col.type !== undefined && col.enum !== undefined) {
    throw fail("type and enum cannot both be set");
  }
  if (col.type !== undefined && col.type.trim() === "") {
    throw fail("type cannot be empty");
  }

  if (col.serial) {
    if (col.enum !== undefined) throw fail("an enum column cannot be serial");
    if (serialType(col.type) === undefined) {
      throw fail(`serial is not valid for column type ${col.type}`);
    }
    if (col.default !== undefined) {
      throw fail("a serial column cannot declare a default");
    }
  } else if (col.type === undefined && col.enum === undefined) {
    throw fail("a type, an enum or customised SQL is required");
  }

  if (col.generatedAs !== undefined) {
    if (col.serial) throw fail("a serial column cannot be generated");
    if (col.default !== undefined) {
      throw fail("a generated column cannot declare a default");
    }
  }

  if (col.enum !== undefined && col.default !== undefined) {
    const literal = unquoteLiteral(col.default);
    if (literal !== undefined && col.enum.fromStored(literal) === undefined) {
      throw fail(`default ${col.default} is not a member of ${col.enum.name}`);
    }
  }

  return Object.freeze({ ...col });
}

function typeText(field: FieldSpec): string {
  if (field.serial) return serialType(field.type) ?? "SERIAL";
  if (field.enum) return field.enum.qualifiedName;
  return field.type ?? "";
}

/**
 * Column text in a fixed order:
 * name, type, NOT NULL, UNIQUE, DEFAULT, PRIMARY KEY, CHECK, GENERATED.
 */
export function buildColumnSQL(field: FieldSpec): string {
  if (field.customizedField) return field.customizedField.definition;
  if (field.customizedSql !== undefined) {
    return `${field.name} ${field.customizedSql}`;
  }

  const parts: string[] = [field.name, typeText(field)];

  if (field.notNull) parts.push("NOT NULL");
  if (field.unique) parts.push("UNIQUE");
  if (field.default !== undefined) parts.push(`DEFAULT ${field.default}`);
  if (field.primary) parts.push("PRIMARY KEY");
  if (field.check) parts.push(`CHECK (${field.check})`);
  if (field.generatedAs) {
    parts.push(`GENERATED ALWAYS AS (${field.generatedAs}) STORED`);
  }

  return parts.join(" ");
}
