/**
 * tsfix - source-to-source migration engine
 * @module tsfix
 */

export { parseSource, renderSource } from './ast/syntax.js';
export { SourceUnit } from './ast/source-unit.js';
export type { FixWarning, SourcePosition } from './ast/source-unit.js';
export { walk, findAll, rewrite } from './ast/walk.js';
export type { NodeVisitor, NodeRewriter, RewriteResult } from './ast/walk.js';
export {
  collectImportBindings,
  importsModule,
  resolveImportedName,
  isShadowed,
  unwrapParentheses,
  isZeroLiteral,
  isEmptyString,
} from './ast/imports.js';
export type { ImportBindings } from './ast/imports.js';

export type { Fix, FixSummary } from './migration/types.js';
export { FixRegistry, createDefaultRegistry, compareFixes, suggestFixNames } from './migration/registry.js';
export { driveToFixedPoint, DEFAULT_MAX_PASSES } from './migration/driver.js';
export type { DriveOptions, DriveResult } from './migration/driver.js';
export * from './migration/errors.js';
export { BUILTIN_FIXES, netAddrKeyedFix, netDialFix } from './migration/fixes/index.js';

export { processSource, rewriteFile, writeFileAtomic } from './api/rewrite.js';
export type { RewriteOutcome, ProcessOptions, RewriteFileOptions } from './api/rewrite.js';
export { discoverFiles, rewriteFiles, DEFAULT_EXTENSIONS, DEFAULT_IGNORE } from './api/batch.js';
export type { DiscoverOptions, DiscoveredFiles, BatchOptions, BatchResult } from './api/batch.js';
export { formatUnifiedDiff } from './diff/unified.js';
export type { UnifiedDiffOptions } from './diff/unified.js';

export { loadConfig } from './config/loader.js';
export type { FixConfig, CliConfigOverrides } from './config/types.js';
