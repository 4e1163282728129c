// src/atlas/query_compiler.ts
//
// FilterSpecification → (WHERE text, ordered parameters). Pure: never touches the store.
// Every user-supplied value travels as a bound parameter; the SQL text only ever
// contains column names and operators chosen here.

import { SLOT_ORDER } from "./filter_spec.js";
import type {
  CategorySlot,
  CompiledPredicate,
  DelimitedListSlot,
  FilterSlot,
  FilterSpecification,
  RangeSlot,
  SetSlot,
  SqlParam,
  TextSlot,
} from "./types.js";

export type SqlCondition = { sql: string; params: SqlParam[] };

export const LIKE_ESCAPE = "\\";

/** Make `%`, `_` and the escape character literal inside a LIKE pattern. */
export function escapeLikeWildcards(value: string): string {
  return value.replace(/[\\%_]/g, ch => LIKE_ESCAPE + ch);
}

/** Integer view of a column that may hold text such as "Unknown"; non-numeric cells become NULL. */
export function numericExpr(column: string): string {
  return `(CASE WHEN ${column} GLOB '[0-9]*' THEN CAST(${column} AS INTEGER) END)`;
}

function orConditions(parts: SqlCondition[]): SqlCondition {
  if (parts.length === 1) return parts[0];
  return {
    sql: `(${parts.map(p => p.sql).join(" OR ")})`,
    params: parts.flatMap(p => p.params),
  };
}

function coversDomain(values: readonly string[], domain: readonly string[]): boolean {
  return domain.length > 0 && domain.every(d => values.includes(d));
}

/* =========================================================================
 * One compiler per slot variant
 * ========================================================================= */

export function compileSetSlot(slot: SetSlot): SqlCondition[] {
  if (!slot.values.length) return [];
  if (slot.domain && coversDomain(slot.values, slot.domain)) return [];
  const placeholders = slot.values.map(() => "?").join(", ");
  return [{ sql: `${slot.column} IN (${placeholders})`, params: [...slot.values] }];
}

export function compileTextSlot(slot: TextSlot): SqlCondition[] {
  const value = slot.value.trim();
  if (!value) return [];
  if (slot.mode === "exact") {
    return [orConditions(slot.columns.map(c => ({ sql: `lower(${c}) = lower(?)`, params: [value] })))];
  }
  const pattern = `%${escapeLikeWildcards(value)}%`;
  return [orConditions(slot.columns.map(c => ({ sql: `${c} LIKE ? ESCAPE '${LIKE_ESCAPE}'`, params: [pattern] })))];
}

export function compileRangeSlot(slot: RangeSlot): SqlCondition[] {
  let { from, to } = slot;
  if (from !== undefined && to !== undefined && from > to) [from, to] = [to, from];
  const expr = numericExpr(slot.column);
  const out: SqlCondition[] = [];
  if (from !== undefined) out.push({ sql: `${expr} >= ?`, params: [from] });
  if (to !== undefined) out.push({ sql: `${expr} <= ?`, params: [to] });
  return out;
}

export function compileCategorySlot(slot: CategorySlot): SqlCondition[] {
  const value = slot.value.trim();
  if (!value || value.toLowerCase() === slot.defaultValue.toLowerCase()) return [];
  return [{ sql: `${slot.column} = ?`, params: [value] }];
}

export function compileDelimitedListSlot(slot: DelimitedListSlot): SqlCondition[] {
  const value = slot.value.replace(/\s+/g, "");
  if (!value) return [];
  if (slot.mode === "exact") {
    // ",p12345,q99999," contains ",p12345," but not ",1234,"
    const d = slot.delimiter;
    return [{
      sql: `instr(? || replace(lower(${slot.column}), ' ', '') || ?, lower(?)) > 0`,
      params: [d, d, `${d}${value}${d}`],
    }];
  }
  return [{ sql: `${slot.column} LIKE ? ESCAPE '${LIKE_ESCAPE}'`, params: [`%${escapeLikeWildcards(slot.value.trim())}%`] }];
}

export function compileSlot(slot: FilterSlot): SqlCondition[] {
  switch (slot.kind) {
    case "set": return compileSetSlot(slot);
    case "text": return compileTextSlot(slot);
    case "range": return compileRangeSlot(slot);
    case "category": return compileCategorySlot(slot);
    case "delimitedList": return compileDelimitedListSlot(slot);
  }
}

/* =========================================================================
 * Composition
 * ========================================================================= */

export function compileFilter(spec: FilterSpecification): CompiledPredicate {
  const conditions: SqlCondition[] = [];
  for (const name of SLOT_ORDER) {
    const slot = spec.slots[name];
    if (slot) conditions.push(...compileSlot(slot));
  }
  const clauses = conditions.map(c => c.sql);
  return Object.freeze({
    where: clauses.length ? clauses.join(" AND ") : "1=1",
    params: Object.freeze(conditions.flatMap(c => c.params)),
    clauses: Object.freeze(clauses),
  });
}

/** Append extra constant conditions to an already compiled predicate. */
export function narrowPredicate(predicate: CompiledPredicate, ...extra: string[]): CompiledPredicate {
  if (!extra.length) return predicate;
  const clauses = [...predicate.clauses, ...extra];
  return Object.freeze({
    where: clauses.join(" AND "),
    params: predicate.params,
    clauses: Object.freeze(clauses),
  });
}
