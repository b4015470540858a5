/* eslint-disable no-console */
/**
 * CLI logging utility with colors.
 *
 * Everything goes to stderr: stdout carries rewritten source in stream mode
 * and diffs in diff mode.
 */

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !process.env.NO_COLOR && process.stderr.isTTY === true;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const GREEN = USE_COLOR ? '\x1b[32m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const YELLOW = USE_COLOR ? '\x1b[33m' : '';
const BLUE = USE_COLOR ? '\x1b[34m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

export const logger = {
  info(message: string): void {
    console.error(`${BLUE}${message}${RESET}`);
  },

  success(message: string): void {
    console.error(`${GREEN}${message}${RESET}`);
  },

  error(message: string): void {
    console.error(`${RED}${message}${RESET}`);
  },

  warn(message: string): void {
    console.error(`${YELLOW}${message}${RESET}`);
  },

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.error(`${DIM}${message}${RESET}`);
    }
  },
};
