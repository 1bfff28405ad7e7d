import { addSeconds, isValid, parse } from 'date-fns';
import { and, eq, gte, lt, or, sql, type SQL } from 'drizzle-orm';
import type { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import type { ComplaintFilters, IssueType } from '../types/index.js';
import type { FamilyDef } from './complaint.service.js';

// Dashboard dropdown values that mean "no filter"
const SENTINELS = new Set(['ALL STATUS', 'ALL PRIORITIES', 'ALL TYPES', 'ALL']);

export interface QuerySpec {
  status: string | null;
  priority: string | null;
  issueType: IssueType | null;
  search: string | null;
  from: string | null;   // inclusive, ISO
  until: string | null;  // exclusive, ISO
  includeHidden: boolean;
  // set when the type filter names no known issue type
  matchesNothing: boolean;
}

function normalizeChoice(value: string | undefined): string | null {
  const v = (value || '').trim().toUpperCase();
  return v && !SENTINELS.has(v) ? v : null;
}

export function normalizeIssueType(value: string | undefined): IssueType | null | 'UNKNOWN' {
  const v = normalizeChoice(value);
  if (!v) return null;
  const key = v.replace(/[\s-]+/g, '_');
  if (key === 'POWER_OUTAGE' || key === 'OUTAGE') return 'POWER_OUTAGE';
  if (key === 'BILLING' || key === 'METER') return 'BILLING';
  if (key === 'SERVICE') return 'SERVICE';
  return 'UNKNOWN';
}

function normalizeTime(time: string | undefined, fallback: string, padSeconds: string): string {
  const t = (time || '').trim();
  if (/^\d{1,2}:\d{2}$/.test(t)) return `${t.padStart(5, '0')}:${padSeconds}`;
  if (/^\d{1,2}:\d{2}:\d{2}$/.test(t)) return t.padStart(8, '0');
  return fallback;
}

function parseLocal(date: string | undefined, time: string): Date | null {
  const d = (date || '').trim();
  if (!d) return null;
  const parsed = parse(`${d} ${time}`, 'yyyy-MM-dd HH:mm:ss', new Date());
  return isValid(parsed) ? parsed : null;
}

export interface DateRange {
  from: string | null;
  until: string | null;
}

/** dateFrom at timeFrom (00:00) through dateTo at timeTo (23:59:59), both inclusive. */
export function parseDateRange(filters: Pick<ComplaintFilters, 'dateFrom' | 'dateTo' | 'timeFrom' | 'timeTo'>): DateRange {
  const start = parseLocal(filters.dateFrom, normalizeTime(filters.timeFrom, '00:00:00', '00'));
  const end = parseLocal(filters.dateTo, normalizeTime(filters.timeTo, '23:59:59', '59'));
  return {
    from: start ? start.toISOString() : null,
    // stored timestamps carry milliseconds; the whole last second is included
    until: end ? addSeconds(end, 1).toISOString() : null,
  };
}

export function buildQuerySpec(filters: ComplaintFilters): QuerySpec {
  const issueType = normalizeIssueType(filters.issueType);
  const range = parseDateRange(filters);
  const search = (filters.search || '').trim();
  return {
    status: normalizeChoice(filters.status),
    priority: normalizeChoice(filters.priority),
    issueType: issueType === 'UNKNOWN' ? null : issueType,
    search: search || null,
    from: range.from,
    until: range.until,
    includeHidden: Boolean(filters.includeHidden),
    matchesNothing: issueType === 'UNKNOWN',
  };
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export function containsInsensitive(column: AnySQLiteColumn, term: string): SQL {
  const pattern = `%${escapeLike(term.toLowerCase())}%`;
  return sql`lower(${column}) LIKE ${pattern} ESCAPE '\\'`;
}

/**
 * Translates a query spec into one parametrized condition for a family,
 * or `null` when the family is excluded by the type filter.
 */
export function familyCondition(def: FamilyDef, spec: QuerySpec): SQL | undefined | null {
  if (spec.matchesNothing) return null;
  if (spec.issueType && spec.issueType !== def.issueType) return null;

  const { columns } = def;
  const conditions: (SQL | undefined)[] = [...def.visibleConditions];

  if (!spec.includeHidden) conditions.push(eq(columns.hidden, false));
  if (spec.status) conditions.push(sql`upper(${columns.status}) = ${spec.status}`);
  if (spec.priority) conditions.push(sql`upper(${columns.priority}) = ${spec.priority}`);
  if (spec.from) conditions.push(gte(columns.createdAt, spec.from));
  if (spec.until) conditions.push(lt(columns.createdAt, spec.until));
  if (spec.search) {
    const term = spec.search;
    conditions.push(or(...def.searchColumns.map((col) => containsInsensitive(col, term))));
  }

  return and(...conditions);
}
