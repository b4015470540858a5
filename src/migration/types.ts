/**
 * Fix contract.
 *
 * A fix is a named, dated, idempotent rewrite. Every fix follows the same
 * shape: a cheap precondition, a walk over the tree that matches the legacy
 * pattern, a local rewrite, and an honest changed flag.
 */

import type { SourceUnit } from '../ast/source-unit.js';

export interface Fix {
  /** Globally unique, stable identifier used by `-r` and in diagnostics */
  readonly name: string;
  /** Calendar date `YYYY-MM-DD`; fixes run in (date, name) order */
  readonly date: string;
  readonly description: string;
  /**
   * Cheap, side-effect-free check that the fix could apply at all. Only a
   * short circuit: `transform` must be safe to run when this is false.
   */
  precondition(unit: SourceUnit): boolean;
  /**
   * Rewrite the unit's tree. Returns true if and only if the tree changed.
   */
  transform(unit: SourceUnit): boolean;
}

export interface FixSummary {
  name: string;
  date: string;
  description: string;
}
