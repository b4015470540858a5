/**
 * Rewrite Pipeline - one file end to end
 *
 * parse -> drive fixes to a fixed point -> render -> compare. Every failure is
 * recorded on the returned outcome; nothing is thrown to the caller.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { SourceUnit, type FixWarning } from '../ast/source-unit.js';
import { driveToFixedPoint } from '../migration/driver.js';
import { FixError, IOError, isFileError, type FileError } from '../migration/errors.js';
import type { Fix } from '../migration/types.js';
import { getErrorCode, getErrorMessage } from '../utils/error-utils.js';

export interface RewriteOutcome {
  readonly path: string;
  readonly originalText: string;
  readonly newText: string;
  readonly appliedFixNames: readonly string[];
  /** Exactly `newText !== originalText` */
  readonly changed: boolean;
  readonly warnings: readonly FixWarning[];
  readonly error?: FileError;
}

export interface ProcessOptions {
  maxPasses?: number;
}

export interface RewriteFileOptions extends ProcessOptions {
  /** Write the new text back when it differs */
  write?: boolean;
}

/**
 * Outcome for a file that could not be processed.
 */
export function failedOutcome(filePath: string, originalText: string, error: FileError): RewriteOutcome {
  return {
    path: filePath,
    originalText,
    newText: originalText,
    appliedFixNames: [],
    changed: false,
    warnings: [],
    error,
  };
}

/**
 * Run `fixes` over one source text.
 *
 * A file no fix applies to comes back byte for byte, without reformatting.
 */
export function processSource(
  filePath: string,
  text: string,
  fixes: readonly Fix[],
  options: ProcessOptions = {}
): RewriteOutcome {
  try {
    const unit = SourceUnit.parse(filePath, text);
    const { appliedFixNames } = driveToFixedPoint(unit, fixes, { maxPasses: options.maxPasses });
    const newText = appliedFixNames.length > 0 ? unit.render() : text;

    return {
      path: filePath,
      originalText: text,
      newText,
      appliedFixNames,
      changed: newText !== text,
      warnings: [...unit.warnings],
    };
  } catch (error) {
    if (isFileError(error)) {
      return failedOutcome(filePath, text, error);
    }
    return failedOutcome(filePath, text, new FixError(filePath, 'unknown', getErrorMessage(error), { cause: error }));
  }
}

function toIOError(filePath: string, operation: IOError['operation'], error: unknown): IOError {
  const code = getErrorCode(error);
  const detail = code ? `${code}: ${getErrorMessage(error)}` : getErrorMessage(error);
  return new IOError(filePath, operation, detail, { cause: error });
}

/**
 * Replace a file's contents through a temporary sibling and a rename, so a
 * reader never sees a partially written file. The original mode is kept.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const { mode } = await fs.stat(filePath);
  const tmp = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomBytes(4).toString('hex')}.tmp`);
  try {
    await fs.writeFile(tmp, content, { encoding: 'utf8', mode });
    // writeFile's mode is filtered through the umask
    await fs.chmod(tmp, mode);
    await fs.rename(tmp, filePath);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

/**
 * Read, rewrite and (optionally) write back one file.
 */
export async function rewriteFile(
  filePath: string,
  fixes: readonly Fix[],
  options: RewriteFileOptions = {}
): Promise<RewriteOutcome> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return failedOutcome(filePath, '', toIOError(filePath, 'read', error));
  }

  const outcome = processSource(filePath, text, fixes, options);
  if (!options.write || !outcome.changed) {
    return outcome;
  }

  try {
    await writeFileAtomic(filePath, outcome.newText);
  } catch (error) {
    return failedOutcome(filePath, text, toIOError(filePath, 'write', error));
  }
  return outcome;
}
