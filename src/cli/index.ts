/**
 * tsfix CLI
 *
 *   tsfix [-r name,...] [--diff] [path ...]
 *
 * Without a path, reads standard input and writes the result to standard
 * output. The help output lists every fix the tool can apply.
 */

import { Command } from 'commander';
import { fixCommand, type CommandIO, type FixCommandOptions } from './commands/fix.js';
import { logger } from './utils/logger.js';
import { TOOL_NAME, VERSION } from '../constants.js';
import { createDefaultRegistry, type FixRegistry } from '../migration/registry.js';
import { getErrorMessage } from '../utils/error-utils.js';

/**
 * Help section listing each fix with its date and description.
 */
export function formatFixList(registry: FixRegistry): string {
  const fixes = registry.list();
  const width = Math.max(0, ...fixes.map((fix) => fix.name.length));
  const lines = fixes.map((fix) => `  ${fix.name.padEnd(width)}  ${fix.date}  ${fix.description}`);
  return ['', 'Available fixes:', ...lines, ''].join('\n');
}

export function createProgram(io: Partial<CommandIO> = {}): Command {
  const registry = io.registry ?? createDefaultRegistry();
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description('Rewrite TypeScript and JavaScript sources from older API shapes to current ones')
    .version(VERSION, '-v, --version', 'Output the current version')
    .argument('[paths...]', 'files or directories to rewrite; standard input when omitted')
    .option('-r, --rewrites <names>', 'restrict the fixes to this comma-separated list')
    .option('-d, --diff', 'print diffs instead of rewriting files', false)
    .option('-c, --config <path>', 'configuration file (default: tsfix.config.yaml)')
    .option('--max-passes <n>', 'stop with an error after this many fix passes over one file')
    .addHelpText('after', formatFixList(registry))
    .action(async (paths: string[], options: FixCommandOptions) => {
      try {
        const code = await fixCommand(paths, options, { ...io, registry });
        if (code !== 0) process.exitCode = code;
      } catch (error) {
        logger.error(`Command failed: ${getErrorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  program.configureOutput({
    writeErr: (str) => {
      const trimmed = str.replace(/^error:\s*/i, '').trimEnd();
      if (trimmed) {
        logger.error(trimmed);
      }
    },
    writeOut: (str) => {
      (io.stdout ?? process.stdout).write(str);
    },
  });

  return program;
}

/**
 * Entry point: parse `argv`, run, and abort between files on the first SIGINT.
 * A second SIGINT exits immediately.
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.warn('interrupted: finishing the current file');
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);

  try {
    await createProgram({ signal: controller.signal }).parseAsync([...argv]);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
