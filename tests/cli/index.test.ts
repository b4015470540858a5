/**
 * Tests for the CLI entrypoint (src/cli/index.ts).
 *
 * Commander runs for real with exitOverride, so --version and --help throw
 * instead of exiting the test runner.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Writable } from 'stream';

vi.mock('../../src/cli/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

import { createProgram, formatFixList } from '../../src/cli/index.js';
import { VERSION } from '../../src/constants.js';
import { createDefaultRegistry, FixRegistry } from '../../src/migration/registry.js';
import { createFix } from '../helpers/test-fixtures.js';

let output: string[];

function stdout(): Writable {
  return new Writable({
    write(chunk, _encoding, callback) {
      output.push(String(chunk));
      callback();
    },
  });
}

beforeEach(() => {
  output = [];
  vi.clearAllMocks();
});

describe('formatFixList', () => {
  it('should list every built-in fix with its date and description, in run order', () => {
    const lines = formatFixList(createDefaultRegistry()).split('\n');

    expect(lines).toEqual([
      '',
      'Available fixes:',
      '  net-dial        2011-03-28  Drop the empty local-address argument from three-argument net.dial calls.',
      '  net-addr-keyed  2012-11-26  Use keyed arguments for IPAddr, TCPAddr and UDPAddr constructions from "net".',
      '',
    ]);
  });

  it('should pad names to the longest one', () => {
    const registry = new FixRegistry()
      .register(createFix({ name: 'a', date: '2020-01-02', description: 'one' }))
      .register(createFix({ name: 'abc', date: '2020-01-01', description: 'three' }));

    expect(formatFixList(registry)).toBe('\nAvailable fixes:\n  abc  2020-01-01  three\n  a    2020-01-02  one\n');
  });
});

describe('createProgram', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tsfix-program-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should print the version', async () => {
    const program = createProgram({ stdout: stdout() }).exitOverride();

    await expect(program.parseAsync(['node', 'tsfix', '--version'])).rejects.toThrow();
    expect(output.join('')).toBe(`${VERSION}\n`);
  });

  it('should list the fixes in the help output', () => {
    const program = createProgram({ stdout: stdout() });
    program.outputHelp();
    const help = output.join('');

    expect(help).toContain('--rewrites <names>');
    expect(help).toContain('Available fixes:');
    expect(help).toContain('  net-addr-keyed  2012-11-26');
  });

  it('should pass paths and options through to the fix command', async () => {
    const file = path.join(tempDir, 'a.ts');
    fs.writeFileSync(file, 'import * as net from "net";\nconst d = new net.TCPAddr(ip4, 0);\n');

    const program = createProgram({ stdout: stdout(), cwd: tempDir, env: {} }).exitOverride();
    await program.parseAsync(['node', 'tsfix', '--diff', '-r', 'net-addr-keyed', 'a.ts']);
    const lines = output.join('').split('\n');

    expect(lines).toContain('+const d = new net.TCPAddr({ IP: ip4 });');
    expect(fs.readFileSync(file, 'utf8')).toContain('new net.TCPAddr(ip4, 0)');
  });
});
