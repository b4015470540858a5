/**
 * Fix Registry
 *
 * Holds every known fix and hands out deterministic run orders. Later-dated
 * fixes may rely on earlier ones having normalized their input, so the
 * (date, name) order is part of the contract, not a presentation detail.
 *
 * The registry is assembled explicitly by `createDefaultRegistry()` and is
 * read-only once a run starts.
 */

import { BUILTIN_FIXES } from './fixes/index.js';
import { DuplicateFixError, UnknownFixError } from './errors.js';
import type { Fix, FixSummary } from './types.js';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Edit distance where swapping two adjacent characters costs one edit, the
 * usual slip when typing a fix name.
 */
export function typoDistance(a: string, b: string): number {
  const rows: number[][] = [];
  for (let i = 0; i <= a.length; i++) {
    rows.push([i]);
    for (let j = 1; j <= b.length; j++) {
      if (i === 0) {
        rows[i].push(j);
        continue;
      }
      const same = a[i - 1] === b[j - 1];
      let best = Math.min(rows[i - 1][j] + 1, rows[i][j - 1] + 1, rows[i - 1][j - 1] + (same ? 0 : 1));
      if (i > 1 && j > 1 && a[i - 1] === b[j - 2] && a[i - 2] === b[j - 1]) {
        best = Math.min(best, rows[i - 2][j - 2] + 1);
      }
      rows[i].push(best);
    }
  }
  return rows[a.length][b.length];
}

/**
 * Registered names worth offering for an unknown `name`, closest first:
 * names within one typo per four characters, and names that extend `name`
 * by whole hyphen-separated words (`net-addr` for `net-addr-keyed`).
 */
export function suggestFixNames(name: string, known: readonly string[]): string[] {
  const budget = Math.max(1, Math.floor(name.length / 4));
  const scored: { candidate: string; distance: number }[] = [];
  for (const candidate of known) {
    if (candidate === name) continue;
    const distance = candidate.startsWith(`${name}-`) ? 0 : typoDistance(name, candidate);
    if (distance <= budget) scored.push({ candidate, distance });
  }
  return scored
    .sort((x, y) => x.distance - y.distance || compareCodeUnits(x.candidate, y.candidate))
    .map(({ candidate }) => candidate);
}

/**
 * Order fixes by date, then name.
 */
export function compareFixes(a: Fix, b: Fix): number {
  return compareCodeUnits(a.date, b.date) || compareCodeUnits(a.name, b.name);
}

export class FixRegistry {
  private readonly fixes = new Map<string, Fix>();

  /**
   * Add a fix.
   *
   * @throws DuplicateFixError if the name is taken
   * @throws Error if the date is not a `YYYY-MM-DD` calendar date
   */
  register(fix: Fix): this {
    if (this.fixes.has(fix.name)) {
      throw new DuplicateFixError(fix.name);
    }
    if (!isCalendarDate(fix.date)) {
      throw new Error(`fix "${fix.name}" has invalid date "${fix.date}" (expected YYYY-MM-DD)`);
    }
    this.fixes.set(fix.name, fix);
    return this;
  }

  has(name: string): boolean {
    return this.fixes.has(name);
  }

  get size(): number {
    return this.fixes.size;
  }

  /**
   * Every registered fix in run order.
   */
  all(): readonly Fix[] {
    return [...this.fixes.values()].sort(compareFixes);
  }

  /**
   * The named fixes in run order.
   *
   * @throws UnknownFixError listing every name that is not registered
   */
  select(names: Iterable<string>): readonly Fix[] {
    const requested = new Set(names);
    const unknown = [...requested].filter((name) => !this.fixes.has(name));

    if (unknown.length > 0) {
      const known = [...this.fixes.keys()].sort(compareCodeUnits);
      const suggestions = new Map<string, readonly string[]>();
      for (const name of unknown) {
        const matches = suggestFixNames(name, known);
        if (matches.length > 0) suggestions.set(name, matches);
      }
      throw new UnknownFixError(unknown, suggestions);
    }

    return this.all().filter((fix) => requested.has(fix.name));
  }

  /**
   * Name, date and description of every fix, in run order.
   */
  list(): FixSummary[] {
    return this.all().map(({ name, date, description }) => ({ name, date, description }));
  }
}

/**
 * Registry holding the built-in fixes.
 */
export function createDefaultRegistry(): FixRegistry {
  const registry = new FixRegistry();
  for (const fix of BUILTIN_FIXES) {
    registry.register(fix);
  }
  return registry;
}
