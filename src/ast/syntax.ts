/**
 * Parser and printer boundary.
 *
 * Source text is parsed with the TypeScript compiler and printed back with
 * its printer, which is the canonical formatter for every rewritten file.
 */

import * as path from 'path';
import ts from 'typescript';
import { ParseError } from '../migration/errors.js';

const SCRIPT_KINDS: Readonly<Record<string, ts.ScriptKind>> = {
  '.ts': ts.ScriptKind.TS,
  '.mts': ts.ScriptKind.TS,
  '.cts': ts.ScriptKind.TS,
  '.tsx': ts.ScriptKind.TSX,
  '.js': ts.ScriptKind.JS,
  '.mjs': ts.ScriptKind.JS,
  '.cjs': ts.ScriptKind.JS,
  '.jsx': ts.ScriptKind.JSX,
};

const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed, removeComments: false });

/**
 * Name under which a file is handed to the compiler. The extension picks the
 * script kind; anything unknown is read as TypeScript.
 */
function virtualFileName(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return `/source${ext in SCRIPT_KINDS ? ext : '.ts'}`;
}

/**
 * Syntactic diagnostics for a single file, through a program whose host
 * serves only that file.
 */
function syntacticDiagnostics(sourceFile: ts.SourceFile): readonly ts.DiagnosticWithLocation[] {
  const options: ts.CompilerOptions = { noLib: true, noResolve: true, allowJs: true, types: [] };
  const host: ts.CompilerHost = {
    getSourceFile: (fileName) => (fileName === sourceFile.fileName ? sourceFile : undefined),
    getDefaultLibFileName: () => '/lib.d.ts',
    writeFile: () => undefined,
    getCurrentDirectory: () => '/',
    getCanonicalFileName: (fileName) => fileName,
    useCaseSensitiveFileNames: () => true,
    getNewLine: () => '\n',
    fileExists: (fileName) => fileName === sourceFile.fileName,
    readFile: () => undefined,
  };
  const program = ts.createProgram({ rootNames: [sourceFile.fileName], options, host });
  return program.getSyntacticDiagnostics(sourceFile);
}

/**
 * Parse `text` into a source file. `filePath` names the file in errors and
 * selects TS, TSX, JS or JSX parsing from its extension.
 *
 * @throws ParseError on the first syntax error
 */
export function parseSource(text: string, filePath: string): ts.SourceFile {
  const fileName = virtualFileName(filePath);
  const sourceFile = ts.createSourceFile(
    fileName,
    text,
    ts.ScriptTarget.Latest,
    true,
    SCRIPT_KINDS[path.extname(fileName)]
  );

  const [first] = syntacticDiagnostics(sourceFile);
  if (first) {
    const { line, character } = sourceFile.getLineAndCharacterOfPosition(first.start);
    throw new ParseError(
      filePath,
      line + 1,
      character + 1,
      ts.flattenDiagnosticMessageText(first.messageText, '\n')
    );
  }

  return sourceFile;
}

/**
 * Print a (possibly rewritten) source file.
 */
export function renderSource(sourceFile: ts.SourceFile): string {
  return printer.printFile(sourceFile);
}
