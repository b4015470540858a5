/**
 * Fixed-Point Driver
 *
 * Applies an ordered fix list to one unit until a full pass changes nothing.
 * A fix may rewrite code into a shape that a later fix, or the same fix,
 * then matches, so a single pass would leave chained legacy patterns behind.
 */

import type { SourceUnit } from '../ast/source-unit.js';
import { ConvergenceError, FixError, ParseError } from './errors.js';
import type { Fix } from './types.js';
import { getErrorMessage } from '../utils/error-utils.js';

/** Pass cap. Correct fix sets settle in one or two passes. */
export const DEFAULT_MAX_PASSES = 8;

export interface DriveOptions {
  maxPasses?: number;
}

export interface DriveResult {
  /** Fixes that changed the unit, in the order they first did so */
  appliedFixNames: string[];
  /** Passes run, including the final pass that changed nothing */
  passes: number;
}

function runFix(unit: SourceUnit, fix: Fix): boolean {
  const before = unit.root;
  let changed: boolean;
  try {
    unit.setActiveFix(fix.name);
    if (!fix.precondition(unit)) return false;
    changed = fix.transform(unit);
  } catch (error) {
    throw new FixError(unit.path, fix.name, getErrorMessage(error), { cause: error });
  } finally {
    unit.setActiveFix('');
  }

  const replaced = unit.root !== before;
  if (changed !== replaced) {
    throw new FixError(
      unit.path,
      fix.name,
      changed ? 'reported a change but left the tree untouched' : 'changed the tree without reporting it'
    );
  }
  return changed;
}

function refreshAfter(unit: SourceUnit, fix: Fix): void {
  try {
    unit.refresh();
  } catch (error) {
    if (error instanceof ParseError) {
      throw new FixError(unit.path, fix.name, `produced unparsable output: ${error.detail}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Run `fixes` over `unit` until a pass applies none of them.
 *
 * @throws ConvergenceError if the unit still changes after `maxPasses` passes
 * @throws FixError if a fix throws, misreports a change, or breaks the syntax
 */
export function driveToFixedPoint(
  unit: SourceUnit,
  fixes: readonly Fix[],
  options: DriveOptions = {}
): DriveResult {
  const maxPasses = options.maxPasses ?? DEFAULT_MAX_PASSES;
  const applied: string[] = [];
  let lastFired: string[] = [];

  for (let pass = 1; pass <= maxPasses; pass++) {
    const fired: string[] = [];
    // Only the last pass's warnings survive; their positions match the final text.
    unit.clearWarnings();

    for (const fix of fixes) {
      if (!runFix(unit, fix)) continue;
      fired.push(fix.name);
      if (!applied.includes(fix.name)) applied.push(fix.name);
      refreshAfter(unit, fix);
    }

    if (fired.length === 0) {
      return { appliedFixNames: applied, passes: pass };
    }
    lastFired = fired;
  }

  throw new ConvergenceError(unit.path, maxPasses, lastFired);
}
