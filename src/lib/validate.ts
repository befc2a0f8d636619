import { ValidationError } from "./errors.js";
import type { QueryParams, BindValue } from "./backend.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** A JSON object as a record, or an empty record for anything else. */
export function toRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

export function assertNonEmptyString(value: unknown, name: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new ValidationError(`${name} must be a non-empty string`);
  }
  return value;
}

export function assertOptionalString(value: unknown, name: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  return assertNonEmptyString(value, name);
}

export function assertRecord(value: unknown, name: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ValidationError(`${name} must be an object`);
  }
  return value;
}

function parseBindValue(value: unknown, name: string): BindValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`${name} must be a finite number`);
    }
    return value;
  }
  throw new ValidationError(`${name} must be a string, number, boolean or null`);
}

/** Bind values from a JSON body: an ordered array or an object of named values. */
export function parseQueryParams(raw: unknown, name: string): QueryParams | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (Array.isArray(raw)) {
    return raw.map((v, i) => parseBindValue(v, `${name}[${i}]`));
  }
  if (isRecord(raw)) {
    const named: Record<string, BindValue> = {};
    for (const [key, v] of Object.entries(raw)) {
      if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
        throw new ValidationError(`${name}.${key} is not a valid parameter name`);
      }
      named[key] = parseBindValue(v, `${name}.${key}`);
    }
    return named;
  }
  throw new ValidationError(`${name} must be an array or an object`);
}

export interface QueryRequest {
  sql: string;
  params?: QueryParams;
  catalog?: string;
  schema?: string;
}

export function parseQueryRequest(body: unknown): QueryRequest {
  const obj = assertRecord(body, "body");
  return {
    sql: assertNonEmptyString(obj.sql, "sql"),
    params: parseQueryParams(obj.params, "params"),
    catalog: assertOptionalString(obj.catalog, "catalog"),
    schema: assertOptionalString(obj.schema, "schema"),
  };
}
