/**
 * Unified diff of a rewrite, for diff mode. Display only.
 */

import { createTwoFilesPatch } from 'diff';
import type { RewriteOutcome } from '../api/rewrite.js';

export interface UnifiedDiffOptions {
  /** Lines of context around each hunk */
  context?: number;
  /** Name shown in the headers; defaults to the outcome's path */
  fileName?: string;
}

/**
 * Unified diff between an outcome's original and new text, or the empty
 * string when the file did not change.
 */
export function formatUnifiedDiff(outcome: RewriteOutcome, options: UnifiedDiffOptions = {}): string {
  if (!outcome.changed) return '';
  const fileName = options.fileName ?? outcome.path;
  return createTwoFilesPatch(
    `a/${fileName}`,
    `b/${fileName}`,
    outcome.originalText,
    outcome.newText,
    undefined,
    undefined,
    { context: options.context ?? 3 }
  );
}
