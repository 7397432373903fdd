/**
 * SQL fragments whose spelling differs between dialects.
 */
import type { SqlDialect } from "./backend.js";

/** Equality that treats two NULLs as equal. */
export function nullSafeEquals(dialect: SqlDialect, left: string, right: string): string {
  return dialect === "sqlite"
    ? `${left} IS ${right}`
    : `${left} IS NOT DISTINCT FROM ${right}`;
}

/** Predicate: the JSON array stored in `column` contains the bound value. */
export function jsonArrayContains(dialect: SqlDialect, column: string): string {
  return dialect === "sqlite"
    ? `EXISTS (SELECT 1 FROM json_each(${column}) WHERE json_each.value = ?)`
    : `EXISTS (SELECT 1 FROM json_array_elements_text(${column}::json) AS e(value) WHERE e.value = ?)`;
}

/** Rows of (row key, element) for every element of a JSON array column. */
export function jsonArrayElements(dialect: SqlDialect, column: string): string {
  return dialect === "sqlite"
    ? `json_each(${column})`
    : `json_array_elements_text(${column}::json) AS value`;
}

export function extractPart(dialect: SqlDialect, part: "year" | "month", column: string): string {
  return dialect === "sqlite"
    ? `CAST(strftime('${part === "year" ? "%Y" : "%m"}', ${column}) AS INTEGER)`
    : `CAST(EXTRACT(${part} FROM ${column}) AS INTEGER)`;
}
