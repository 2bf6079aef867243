import type { Bug } from './workItemApi.js';

export const PREFERRED_STATE_ORDER = ['Closed', 'Resolved', 'Active', 'New', 'Deferred', 'Duplicate', 'Rejected'];

export const DEFAULT_BUG_CATEGORIES: Record<string, string> = {
  exploratory: 'exploratory',
  testCaseUpdate: 'test case update',
};

const DAY_MS = 24 * 60 * 60 * 1000;

export interface BurndownOptions {
  start: Date;
  end: Date;
  /** Category name → case-insensitive tag substring. */
  categories?: Record<string, string>;
}

export interface BurndownPoint {
  date: string;
  open: number;
  /** Bugs closed on or before the boundary. */
  closed: number;
  byCategory: Record<string, number>;
}

/** Totals at the last day of a burndown and their change since the day before. */
export interface BurndownSummary {
  date: string;
  open: number;
  openDelta: number;
  closed: number;
  closedDelta: number;
}

export const UNSPECIFIED_SEVERITY = 'Unspecified';
export const HIGH_SEVERITIES = [4, 5];

export interface HighSeverityBug {
  id: number;
  title: string;
  state?: string;
  severity: string;
  severityNumber: number;
}

export interface CountShare {
  label: string;
  count: number;
  percent: number;
}

function parseTime(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const time = Date.parse(value);
  return Number.isNaN(time) ? undefined : time;
}

function utcMidnight(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/** Open at the boundary: created on or before it and not closed by then. */
export function isOpenAt(bug: Bug, boundary: Date): boolean {
  const created = parseTime(bug.createdDate);
  if (created === undefined || created > boundary.getTime()) {
    return false;
  }
  const closed = parseTime(bug.closedDate);
  return closed === undefined || closed > boundary.getTime();
}

export function isClosedBy(bug: Bug, boundary: Date): boolean {
  const closed = parseTime(bug.closedDate);
  return closed !== undefined && closed <= boundary.getTime();
}

export function matchesCategory(bug: Bug, tagFragment: string): boolean {
  const wanted = tagFragment.toLowerCase();
  return bug.tags.some((tag) => tag.toLowerCase().includes(wanted));
}

/**
 * Open-bug counts at each UTC midnight from start to end, inclusive.
 */
export function computeBurndown(bugs: readonly Bug[], options: BurndownOptions): BurndownPoint[] {
  const categories = options.categories ?? DEFAULT_BUG_CATEGORIES;
  const points: BurndownPoint[] = [];
  const last = utcMidnight(options.end);

  for (let day = utcMidnight(options.start); day <= last; day += DAY_MS) {
    const boundary = new Date(day);
    const open = bugs.filter((bug) => isOpenAt(bug, boundary));
    const byCategory: Record<string, number> = {};
    for (const [name, fragment] of Object.entries(categories)) {
      byCategory[name] = open.filter((bug) => matchesCategory(bug, fragment)).length;
    }
    points.push({
      date: boundary.toISOString().slice(0, 10),
      open: open.length,
      closed: bugs.filter((bug) => isClosedBy(bug, boundary)).length,
      byCategory,
    });
  }
  return points;
}

export function summarizeBurndown(points: readonly BurndownPoint[]): BurndownSummary | undefined {
  if (points.length === 0) {
    return undefined;
  }
  const last = points[points.length - 1];
  const previous = points.length > 1 ? points[points.length - 2] : last;
  return {
    date: last.date,
    open: last.open,
    openDelta: last.open - previous.open,
    closed: last.closed,
    closedDelta: last.closed - previous.closed,
  };
}

/** Leading number of a severity label ("2 - High" → 2). */
export function severityNumber(label: string | undefined): number | undefined {
  const match = label?.match(/^\s*(\d+)/);
  return match ? Number(match[1]) : undefined;
}

function countBy(bugs: readonly Bug[], key: (bug: Bug) => string | undefined): Map<string, number> {
  const counts = new Map<string, number>();
  for (const bug of bugs) {
    const label = key(bug);
    if (!label) continue;
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return counts;
}

function toShares(counts: Map<string, number>, order: string[]): CountShare[] {
  const total = [...counts.values()].reduce((sum, count) => sum + count, 0);
  return order.map((label) => {
    const count = counts.get(label) ?? 0;
    return {
      label,
      count,
      percent: total === 0 ? 0 : Math.round((count / total) * 1000) / 10,
    };
  });
}

/**
 * Count and share per state. Well-known states come first in a fixed order; the
 * rest follow by count, then name.
 */
export function summarizeByState(bugs: readonly Bug[]): CountShare[] {
  const counts = countBy(bugs, (bug) => bug.state);
  const preferred = PREFERRED_STATE_ORDER.filter((state) => counts.has(state));
  const others = [...counts.keys()]
    .filter((state) => !PREFERRED_STATE_ORDER.includes(state))
    .sort((a, b) => (counts.get(b) ?? 0) - (counts.get(a) ?? 0) || a.localeCompare(b));
  return toShares(counts, [...preferred, ...others]);
}

/**
 * Count and share per severity, ordered by the label's leading number. Bugs
 * without a severity count as Unspecified; unnumbered labels go last.
 */
export function summarizeBySeverity(bugs: readonly Bug[]): CountShare[] {
  const counts = countBy(bugs, (bug) => bug.severity || UNSPECIFIED_SEVERITY);
  const rank = (label: string) => severityNumber(label) ?? Number.MAX_SAFE_INTEGER;
  return toShares(
    counts,
    [...counts.keys()].sort((a, b) => rank(a) - rank(b) || a.localeCompare(b))
  );
}

/** Severity 4 and 5 bugs, most severe first, then by id. */
export function listHighSeverity(bugs: readonly Bug[]): HighSeverityBug[] {
  const listed: HighSeverityBug[] = [];
  for (const bug of bugs) {
    const level = severityNumber(bug.severity);
    if (level === undefined || !HIGH_SEVERITIES.includes(level)) continue;
    listed.push({
      id: bug.id,
      title: bug.title,
      state: bug.state,
      severity: bug.severity ?? String(level),
      severityNumber: level,
    });
  }
  return listed.sort((a, b) => b.severityNumber - a.severityNumber || a.id - b.id);
}
