import { EscapeError } from "./errors.js";

export type Dialect = "warehouse" | "postgres";

const QUOTE: Record<Dialect, string> = {
  warehouse: "`",
  postgres: '"',
};

function assertSafeIdentifier(name: string, dialect: Dialect): void {
  if (typeof name !== "string" || name.length === 0) {
    throw new EscapeError("Identifier must be a non-empty string");
  }
  if (name.includes("\0")) {
    throw new EscapeError("Identifier must not contain a NUL byte", {
      details: { dialect },
    });
  }
  if (name.includes(QUOTE[dialect])) {
    throw new EscapeError(
      `Identifier must not contain the ${QUOTE[dialect]} quote character: ${name}`,
      { details: { dialect } },
    );
  }
}

/**
 * Quote an identifier for interpolation where binding is not available.
 * Never use this for values.
 */
export function quoteIdentifier(dialect: Dialect, name: string): string {
  assertSafeIdentifier(name, dialect);
  const q = QUOTE[dialect];
  return `${q}${name}${q}`;
}

/** `orders` -> `` `orders` `` */
export function escapeName(name: string): string {
  return quoteIdentifier("warehouse", name);
}

/** `orders` -> `"orders"` */
export function escapePgName(name: string): string {
  return quoteIdentifier("postgres", name);
}

function escapeDotted(dialect: Dialect, fullName: string, maxParts: number): string {
  const parts = fullName.split(".");
  if (parts.length > maxParts) {
    throw new EscapeError(
      `Identifier ${fullName} has ${parts.length} parts; at most ${maxParts} allowed`,
    );
  }
  return parts.map((part) => quoteIdentifier(dialect, part)).join(".");
}

/** `catalog.schema.table` -> `` `catalog`.`schema`.`table` `` */
export function escapeFullName(fullName: string): string {
  return escapeDotted("warehouse", fullName, 3);
}

/** `schema.table` -> `"schema"."table"` */
export function escapePgFullName(fullName: string): string {
  return escapeDotted("postgres", fullName, 2);
}

const WHITESPACE = /\s+/g;

/** Collapse whitespace and cut to `maxLength` for log lines. */
export function normalizeSql(sql: string, maxLength = 200): string {
  const flat = sql.replace(WHITESPACE, " ").trim();
  return flat.length > maxLength ? `${flat.slice(0, maxLength)}...` : flat;
}
