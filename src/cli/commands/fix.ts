/**
 * Fix command - rewrites source files with the registered fixes
 *
 * Without paths, reads standard input and writes the result to standard
 * output. Files are rewritten in place; directories are searched
 * recursively. With --diff nothing is written and a unified diff of each
 * change is printed instead.
 */

import * as path from 'path';
import { discoverFiles, discoveryOutcomes, rewriteFiles } from '../../api/batch.js';
import { processSource, type RewriteOutcome } from '../../api/rewrite.js';
import { loadConfig, parseNameList, parsePositiveInt } from '../../config/loader.js';
import type { CliConfigOverrides, FixConfig } from '../../config/types.js';
import { formatUnifiedDiff } from '../../diff/unified.js';
import { ConfigError, UnknownFixError } from '../../migration/errors.js';
import { createDefaultRegistry, type FixRegistry } from '../../migration/registry.js';
import type { Fix } from '../../migration/types.js';
import { logger } from '../utils/logger.js';

export const STDIN_LABEL = '<stdin>';

export interface FixCommandOptions {
  /** Comma-separated fix names (-r) */
  rewrites?: string;
  diff?: boolean;
  config?: string;
  maxPasses?: string;
}

export interface CommandIO {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  cwd: string;
  env: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  registry: FixRegistry;
}

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

function describeUnknownFixes(error: UnknownFixError): string {
  const lines = [error.message];
  for (const name of error.names) {
    const suggestions = error.suggestions.get(name);
    if (suggestions && suggestions.length > 0) {
      lines.push(`  ${name}: did you mean ${suggestions.join(', ')}?`);
    }
  }
  return lines.join('\n');
}

/**
 * Resolve configuration and the fix list, reporting usage errors.
 * Returns undefined when the run must stop before touching any file.
 */
function resolveFixes(options: FixCommandOptions, io: CommandIO): { config: FixConfig; fixes: readonly Fix[] } | undefined {
  try {
    const overrides: CliConfigOverrides = {};
    if (options.rewrites !== undefined) overrides.fixes = parseNameList(options.rewrites);
    if (options.maxPasses !== undefined) overrides.maxPasses = parsePositiveInt(options.maxPasses, '--max-passes');

    const config = loadConfig(overrides, { configPath: options.config, cwd: io.cwd, env: io.env });
    const fixes = config.fixes ? io.registry.select(config.fixes) : io.registry.all();
    return { config, fixes };
  } catch (error) {
    if (error instanceof UnknownFixError) {
      logger.error(describeUnknownFixes(error));
      return undefined;
    }
    if (error instanceof ConfigError) {
      logger.error(`invalid configuration: ${error.message}`);
      return undefined;
    }
    throw error;
  }
}

/**
 * Report one outcome on the side channel. Returns false if it failed.
 */
function reportOutcome(outcome: RewriteOutcome, label: string): boolean {
  if (outcome.error) {
    logger.error(outcome.error.message);
    return false;
  }
  for (const warning of outcome.warnings) {
    logger.warn(`${label}:${warning.line}:${warning.column}: ${warning.message}`);
  }
  if (outcome.changed) {
    for (const name of outcome.appliedFixNames) {
      logger.success(`${label}: fixed ${name}`);
    }
  }
  return true;
}

/**
 * Stream mode: one unit from stdin to stdout.
 */
async function runStream(fixes: readonly Fix[], config: FixConfig, diff: boolean, io: CommandIO): Promise<number> {
  const text = await readAll(io.stdin);
  const outcome = processSource(STDIN_LABEL, text, fixes, { maxPasses: config.maxPasses });
  if (!reportOutcome(outcome, STDIN_LABEL)) {
    return 1;
  }
  io.stdout.write(diff ? formatUnifiedDiff(outcome, { fileName: STDIN_LABEL }) : outcome.newText);
  return 0;
}

/**
 * Run the fix command. Resolves to the process exit code: 1 if any file
 * failed or the invocation was invalid, 0 otherwise.
 */
export async function fixCommand(
  paths: readonly string[],
  options: FixCommandOptions = {},
  io: Partial<CommandIO> = {}
): Promise<number> {
  const resolvedIO: CommandIO = {
    stdin: io.stdin ?? process.stdin,
    stdout: io.stdout ?? process.stdout,
    cwd: io.cwd ?? process.cwd(),
    env: io.env ?? process.env,
    signal: io.signal,
    registry: io.registry ?? createDefaultRegistry(),
  };
  const diff = options.diff ?? false;

  const resolved = resolveFixes(options, resolvedIO);
  if (!resolved) return 1;
  const { config, fixes } = resolved;
  logger.debug(`fixes: ${fixes.map((fix) => fix.name).join(', ') || '(none)'}`);

  if (paths.length === 0) {
    return runStream(fixes, config, diff, resolvedIO);
  }

  const inputs = paths.map((input) => path.resolve(resolvedIO.cwd, input));
  const discovered = await discoverFiles(inputs, { extensions: config.extensions, ignore: config.ignore });
  logger.debug(`discovered ${discovered.files.length} file(s)`);

  const { outcomes, cancelled } = await rewriteFiles(discovered.files, fixes, {
    write: !diff,
    maxPasses: config.maxPasses,
    signal: resolvedIO.signal,
  });

  let failed = false;
  const all = [...discoveryOutcomes(discovered.errors), ...outcomes];
  for (const outcome of all) {
    const label = path.relative(resolvedIO.cwd, outcome.path) || outcome.path;
    if (!reportOutcome(outcome, label)) {
      failed = true;
      continue;
    }
    if (diff && outcome.changed) {
      resolvedIO.stdout.write(formatUnifiedDiff(outcome, { fileName: label }));
    }
  }

  if (cancelled) {
    logger.warn(`cancelled after ${outcomes.length} of ${discovered.files.length} file(s)`);
    return 1;
  }
  return failed ? 1 : 0;
}
