/**
 * Batch rewriting over paths and directories.
 *
 * Files are independent: one file's parse, I/O or fix failure is recorded on
 * its own outcome and never stops the rest of the batch.
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { failedOutcome, rewriteFile, type RewriteFileOptions, type RewriteOutcome } from './rewrite.js';
import { IOError } from '../migration/errors.js';
import type { Fix } from '../migration/types.js';
import { getErrorMessage } from '../utils/error-utils.js';

export const DEFAULT_EXTENSIONS: readonly string[] = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

export const DEFAULT_IGNORE: readonly string[] = ['**/node_modules/**'];

export interface DiscoverOptions {
  extensions?: readonly string[];
  ignore?: readonly string[];
}

export interface DiscoveredFiles {
  /** Sorted, without duplicates */
  files: string[];
  /** Paths that could not be inspected */
  errors: IOError[];
}

export interface BatchOptions extends RewriteFileOptions {
  /** Checked before each file; a file already started always finishes */
  signal?: AbortSignal;
  /** Called after each file, in processing order */
  onOutcome?: (outcome: RewriteOutcome) => void;
}

export interface BatchResult {
  /** Sorted by path */
  outcomes: RewriteOutcome[];
  /** True if the signal stopped the batch before every file was processed */
  cancelled: boolean;
}

function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function extensionPattern(extensions: readonly string[]): string {
  const names = extensions.map((ext) => ext.replace(/^\./, ''));
  return names.length === 1 ? `**/*.${names[0]}` : `**/*.{${names.join(',')}}`;
}

/**
 * Expand `paths` into the files to process. Files named explicitly are kept
 * whatever their extension; directories contribute every file under them
 * with a listed extension, skipping dot files and ignored paths.
 */
export async function discoverFiles(paths: readonly string[], options: DiscoverOptions = {}): Promise<DiscoveredFiles> {
  const extensions = options.extensions ?? DEFAULT_EXTENSIONS;
  const ignore = [...DEFAULT_IGNORE, ...(options.ignore ?? [])];
  const found = new Set<string>();
  const errors: IOError[] = [];

  for (const input of paths) {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(input);
    } catch (error) {
      errors.push(new IOError(input, 'stat', getErrorMessage(error), { cause: error }));
      continue;
    }

    if (!stats.isDirectory()) {
      found.add(path.resolve(input));
      continue;
    }

    if (extensions.length === 0) continue;
    const matches = await glob(extensionPattern(extensions), {
      cwd: input,
      absolute: true,
      nodir: true,
      ignore,
    });
    for (const match of matches) {
      found.add(match);
    }
  }

  return { files: [...found].sort(comparePaths), errors };
}

/**
 * Rewrite `files` one after another. Outcomes come back sorted by path, so
 * reports do not depend on processing order.
 */
export async function rewriteFiles(
  files: readonly string[],
  fixes: readonly Fix[],
  options: BatchOptions = {}
): Promise<BatchResult> {
  const { signal, onOutcome, ...fileOptions } = options;
  const outcomes: RewriteOutcome[] = [];
  let cancelled = false;

  for (const file of files) {
    if (signal?.aborted) {
      cancelled = true;
      break;
    }
    const outcome = await rewriteFile(file, fixes, fileOptions);
    outcomes.push(outcome);
    onOutcome?.(outcome);
  }

  outcomes.sort((a, b) => comparePaths(a.path, b.path));
  return { outcomes, cancelled };
}

/**
 * Outcomes for paths discovery could not inspect, so they are reported like
 * any other failed file.
 */
export function discoveryOutcomes(errors: readonly IOError[]): RewriteOutcome[] {
  return errors.map((error) => failedOutcome(error.path, '', error));
}
