/**
 * Tests for file discovery and batch rewriting
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { discoverFiles, discoveryOutcomes, rewriteFiles } from '../../../src/api/batch.js';
import { ConvergenceError, IOError, ParseError } from '../../../src/migration/errors.js';
import { netAddrKeyedFix } from '../../../src/migration/fixes/net-addr-keyed.js';
import { createToggleFix } from '../../helpers/test-fixtures.js';

const LEGACY = 'import * as net from "net";\nconst a = new net.TCPAddr(h, 0);\n';
const MIGRATED = 'import * as net from "net";\nconst a = new net.TCPAddr({ IP: h });\n';

let tempDir: string;

function writeFile(relative: string, content: string): string {
  const file = path.join(tempDir, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
  return file;
}

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tsfix-batch-'));
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('discoverFiles', () => {
  beforeEach(() => {
    writeFile('src/a.ts', '');
    writeFile('src/b.js', '');
    writeFile('src/deep/c.tsx', '');
    writeFile('src/readme.md', '');
    writeFile('src/.hidden.ts', '');
    writeFile('src/node_modules/dep/index.ts', '');
    writeFile('notes.txt', '');
  });

  it('expands directories and keeps explicit files, sorted and deduplicated', async () => {
    const src = path.join(tempDir, 'src');
    const notes = path.join(tempDir, 'notes.txt');

    const { files, errors } = await discoverFiles([src, notes, src]);

    expect(errors).toEqual([]);
    expect(files).toEqual([
      notes,
      path.join(src, 'a.ts'),
      path.join(src, 'b.js'),
      path.join(src, 'deep', 'c.tsx'),
    ]);
  });

  it('restricts directories to the given extensions', async () => {
    const { files } = await discoverFiles([path.join(tempDir, 'src')], { extensions: ['.ts'] });

    expect(files).toEqual([path.join(tempDir, 'src', 'a.ts')]);
  });

  it('applies extra ignore patterns', async () => {
    const { files } = await discoverFiles([path.join(tempDir, 'src')], { ignore: ['deep/**'] });

    expect(files).toEqual([path.join(tempDir, 'src', 'a.ts'), path.join(tempDir, 'src', 'b.js')]);
  });

  it('reports a missing path instead of throwing', async () => {
    const missing = path.join(tempDir, 'nope');
    const { files, errors } = await discoverFiles([missing]);

    expect(files).toEqual([]);
    expect(errors).toHaveLength(1);
    expect(errors[0].path).toBe(missing);
    expect(errors[0].operation).toBe('stat');
  });
});

describe('rewriteFiles', () => {
  it('keeps one broken file from affecting the others', async () => {
    const a = writeFile('a.ts', LEGACY);
    const b = writeFile('b.ts', 'const = ;\n');
    const c = writeFile('c.ts', LEGACY);

    const { outcomes, cancelled } = await rewriteFiles([a, b, c], [netAddrKeyedFix], { write: true });

    expect(cancelled).toBe(false);
    expect(outcomes.map((outcome) => outcome.path)).toEqual([a, b, c]);
    expect(outcomes[0].error).toBeUndefined();
    expect(outcomes[1].error).toBeInstanceOf(ParseError);
    expect(outcomes[2].error).toBeUndefined();
    expect(fs.readFileSync(a, 'utf8')).toBe(MIGRATED);
    expect(fs.readFileSync(b, 'utf8')).toBe('const = ;\n');
    expect(fs.readFileSync(c, 'utf8')).toBe(MIGRATED);
  });

  it('fails only the file that never settles', async () => {
    const a = writeFile('a.ts', LEGACY);
    const b = writeFile('b.ts', 'const flag = true;\n');
    const c = writeFile('c.ts', LEGACY);

    const { outcomes } = await rewriteFiles([a, b, c], [netAddrKeyedFix, createToggleFix()], { write: true });

    expect(outcomes.map((outcome) => outcome.path)).toEqual([a, b, c]);
    expect(outcomes[0].error).toBeUndefined();
    expect(outcomes[1].error).toBeInstanceOf(ConvergenceError);
    expect(outcomes[2].error).toBeUndefined();
    expect(outcomes[0].appliedFixNames).toEqual(['net-addr-keyed']);
    expect(fs.readFileSync(a, 'utf8')).toBe(MIGRATED);
    expect(fs.readFileSync(b, 'utf8')).toBe('const flag = true;\n');
    expect(fs.readFileSync(c, 'utf8')).toBe(MIGRATED);
  });

  it('sorts outcomes by path whatever the input order', async () => {
    const a = writeFile('a.ts', LEGACY);
    const b = writeFile('b.ts', LEGACY);
    const c = writeFile('c.ts', LEGACY);

    const { outcomes } = await rewriteFiles([c, a, b], [netAddrKeyedFix]);

    expect(outcomes.map((outcome) => outcome.path)).toEqual([a, b, c]);
  });

  it('processes nothing once the signal is aborted', async () => {
    const a = writeFile('a.ts', LEGACY);
    const controller = new AbortController();
    controller.abort();

    const result = await rewriteFiles([a], [netAddrKeyedFix], { write: true, signal: controller.signal });

    expect(result).toEqual({ outcomes: [], cancelled: true });
    expect(fs.readFileSync(a, 'utf8')).toBe(LEGACY);
  });

  it('finishes the current file and stops before the next', async () => {
    const a = writeFile('a.ts', LEGACY);
    const b = writeFile('b.ts', LEGACY);
    const c = writeFile('c.ts', LEGACY);
    const controller = new AbortController();

    const { outcomes, cancelled } = await rewriteFiles([a, b, c], [netAddrKeyedFix], {
      write: true,
      signal: controller.signal,
      onOutcome: () => controller.abort(),
    });

    expect(cancelled).toBe(true);
    expect(outcomes.map((outcome) => outcome.path)).toEqual([a]);
    expect(fs.readFileSync(a, 'utf8')).toBe(MIGRATED);
    expect(fs.readFileSync(b, 'utf8')).toBe(LEGACY);
  });
});

describe('discoveryOutcomes', () => {
  it('turns discovery errors into failed outcomes', () => {
    const error = new IOError('/missing', 'stat', 'ENOENT: no such file or directory');
    const [outcome] = discoveryOutcomes([error]);

    expect(outcome.path).toBe('/missing');
    expect(outcome.error).toBe(error);
    expect(outcome.changed).toBe(false);
  });
});
