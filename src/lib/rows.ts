import { ConversionError } from "./errors.js";

export type SqlValue = string | number | bigint | boolean | Date | null;

export type JsonValue = string | number | boolean | null;

export interface ColumnInfo {
  name: string;
  /** Driver or warehouse type name, e.g. `BIGINT` or `DECIMAL(10,2)`. */
  typeName?: string;
}

/**
 * An immutable result row. Keeps the column order of the result schema, which
 * a plain object cannot promise for integer-like column names.
 */
export class Row {
  readonly columns: readonly string[];
  readonly values: readonly SqlValue[];

  private constructor(columns: readonly string[], values: readonly SqlValue[]) {
    this.columns = columns;
    this.values = values;
    Object.freeze(this);
  }

  static fromValues(columns: readonly string[], values: readonly SqlValue[]): Row {
    if (columns.length !== values.length) {
      throw new ConversionError(
        `Row has ${values.length} values for ${columns.length} columns`,
        { details: { columns: columns.length, values: values.length } },
      );
    }
    return new Row(Object.freeze([...columns]), Object.freeze([...values]));
  }

  get length(): number {
    return this.values.length;
  }

  has(name: string): boolean {
    return this.columns.includes(name);
  }

  /** Value by column name or position; `undefined` when there is no such column. */
  get(key: string | number): SqlValue | undefined {
    const idx = typeof key === "number" ? key : this.columns.indexOf(key);
    if (idx < 0 || idx >= this.values.length) return undefined;
    return this.values[idx];
  }

  asObject(): Record<string, SqlValue> {
    const obj: Record<string, SqlValue> = {};
    this.columns.forEach((col, i) => {
      obj[col] = this.values[i] ?? null;
    });
    return obj;
  }

  toJSON(): Record<string, JsonValue> {
    const obj: Record<string, JsonValue> = {};
    this.columns.forEach((col, i) => {
      obj[col] = toJsonValue(this.values[i] ?? null);
    });
    return obj;
  }
}

/**
 * Convert a value into something JSON.stringify keeps intact.
 *
 * Warehouses return `bigint` for wide integers. We preserve precision by
 * encoding values outside the JS safe-integer range as strings.
 */
export function toJsonValue(value: SqlValue): JsonValue {
  if (typeof value === "bigint") {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  if (value instanceof Date) return value.toISOString();
  return value;
}

type Converter = (raw: string) => SqlValue;

function parseInteger(raw: string): number {
  const n = Number(raw.trim());
  if (!Number.isInteger(n)) throw new Error(`not an integer: ${raw}`);
  return n;
}

function parseWideInteger(raw: string): number | bigint {
  const wide = BigInt(raw.trim());
  const asNumber = Number(wide);
  return Number.isSafeInteger(asNumber) ? asNumber : wide;
}

function parseFloating(raw: string): number {
  const trimmed = raw.trim();
  if (trimmed === "NaN") return Number.NaN;
  if (trimmed === "Infinity") return Number.POSITIVE_INFINITY;
  if (trimmed === "-Infinity") return Number.NEGATIVE_INFINITY;
  const n = Number(trimmed);
  if (trimmed === "" || Number.isNaN(n)) throw new Error(`not a number: ${raw}`);
  return n;
}

function parseDecimal(raw: string): string {
  const trimmed = raw.trim();
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(trimmed)) {
    throw new Error(`not a decimal: ${raw}`);
  }
  return trimmed;
}

function parseDate(raw: string): Date {
  const d = new Date(`${raw.trim().slice(0, 10)}T00:00:00Z`);
  if (Number.isNaN(d.getTime())) throw new Error(`not a date: ${raw}`);
  return d;
}

function parseTimestamp(raw: string): Date {
  let value = raw.trim().replace(" ", "T");
  // Timestamps without an offset are UTC.
  if (!/(Z|[+-]\d{2}:?\d{2})$/.test(value)) value = `${value}Z`;
  const d = new Date(value);
  if (Number.isNaN(d.getTime())) throw new Error(`not a timestamp: ${raw}`);
  return d;
}

function parseBoolean(raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (value === "true") return true;
  if (value === "false") return false;
  throw new Error(`not a boolean: ${raw}`);
}

const WAREHOUSE_CONVERTERS: Record<string, Converter> = {
  BYTE: parseInteger,
  TINYINT: parseInteger,
  SHORT: parseInteger,
  SMALLINT: parseInteger,
  INT: parseInteger,
  INTEGER: parseInteger,
  LONG: parseWideInteger,
  BIGINT: parseWideInteger,
  FLOAT: parseFloating,
  DOUBLE: parseFloating,
  DECIMAL: parseDecimal,
  BOOLEAN: parseBoolean,
  DATE: parseDate,
  TIMESTAMP: parseTimestamp,
  TIMESTAMP_NTZ: parseTimestamp,
};

/** Converter for a warehouse type name; `DECIMAL(10,2)` resolves as `DECIMAL`. */
export function getTypeConverter(typeName: string | undefined): Converter | undefined {
  if (!typeName) return undefined;
  const base = typeName.split("(")[0]?.trim().toUpperCase() ?? "";
  return WAREHOUSE_CONVERTERS[base];
}

/**
 * Convert one warehouse value. Warehouse results arrive as strings; a value
 * the converter cannot parse is kept as the raw string.
 */
export function convertWarehouseValue(raw: string | null, converter: Converter | undefined): SqlValue {
  if (raw === null) return null;
  if (!converter) return raw;
  try {
    return converter(raw);
  } catch {
    return raw;
  }
}

/** Normalise a value returned by the Postgres driver. */
export function convertDriverValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
    case "bigint":
      return value;
    default:
      break;
  }
  if (value instanceof Date) return value;
  if (Buffer.isBuffer(value)) return `\\x${value.toString("hex")}`;
  if (Array.isArray(value) || typeof value === "object") {
    try {
      return JSON.stringify(value, (_k, v: unknown) => (typeof v === "bigint" ? v.toString() : v));
    } catch {
      return String(value);
    }
  }
  return String(value);
}

export type ConversionMode = "warehouse" | "driver";

/**
 * Build a Row from ordered raw values and their column metadata. Fails only on
 * a column/value count mismatch.
 */
export function convertRow(
  values: readonly unknown[],
  columns: readonly ColumnInfo[],
  mode: ConversionMode,
): Row {
  if (values.length !== columns.length) {
    throw new ConversionError(
      `Row has ${values.length} values for ${columns.length} columns`,
      { details: { columns: columns.map((c) => c.name), values: values.length } },
    );
  }
  const names = columns.map((c) => c.name);
  if (mode === "driver") {
    return Row.fromValues(names, values.map(convertDriverValue));
  }
  const converted = values.map((raw, i) => {
    const converter = getTypeConverter(columns[i]?.typeName);
    if (raw === null || raw === undefined) return null;
    return convertWarehouseValue(typeof raw === "string" ? raw : String(raw), converter);
  });
  return Row.fromValues(names, converted);
}

/** A converter bound to one result schema, reused for every row of a result. */
export function rowConverter(
  columns: readonly ColumnInfo[],
  mode: ConversionMode,
): (values: readonly unknown[]) => Row {
  return (values) => convertRow(values, columns, mode);
}
