/**
 * Import inspection helpers shared by fixes: does a file import a module,
 * and which imported name does an expression refer to.
 *
 * Three import forms bind a module at the top level of a file:
 *
 *   import * as m from "m";  import m from "m";  import { a as b } from "m";
 *   import m = require("m");
 *   const m = require("m");  const { a: b } = require("m");
 */

import ts from 'typescript';

export interface ImportBindings {
  /** Local names bound to the whole module (`import * as m`, `import m`, `m = require(...)`) */
  namespaces: Set<string>;
  /** Local name -> exported name, for `import { a as b }` and `const { a: b } = require(...)` */
  named: Map<string, string>;
}

function moduleSpecifierText(declaration: ts.ImportDeclaration): string | undefined {
  return ts.isStringLiteral(declaration.moduleSpecifier) ? declaration.moduleSpecifier.text : undefined;
}

/**
 * Module name of a `require("m")` call, or undefined for anything else.
 */
function requiredModule(expression: ts.Expression | undefined): string | undefined {
  if (!expression || !ts.isCallExpression(expression)) return undefined;
  const { expression: callee, arguments: args } = expression;
  if (!ts.isIdentifier(callee) || callee.text !== 'require' || args.length !== 1) return undefined;
  const [specifier] = args;
  return ts.isStringLiteral(specifier) || ts.isNoSubstitutionTemplateLiteral(specifier) ? specifier.text : undefined;
}

function externalModuleName(declaration: ts.ImportEqualsDeclaration): string | undefined {
  if (declaration.isTypeOnly || !ts.isExternalModuleReference(declaration.moduleReference)) return undefined;
  const { expression } = declaration.moduleReference;
  return ts.isStringLiteral(expression) ? expression.text : undefined;
}

function propertyNameText(name: ts.PropertyName): string | undefined {
  return ts.isIdentifier(name) || ts.isStringLiteral(name) ? name.text : undefined;
}

function addRequireBindings(declaration: ts.VariableDeclaration, bindings: ImportBindings): void {
  const { name } = declaration;
  if (ts.isIdentifier(name)) {
    bindings.namespaces.add(name.text);
    return;
  }
  if (!ts.isObjectBindingPattern(name)) return;

  for (const element of name.elements) {
    if (element.dotDotDotToken || !ts.isIdentifier(element.name)) continue;
    const exported = element.propertyName ? propertyNameText(element.propertyName) : element.name.text;
    if (exported !== undefined) bindings.named.set(element.name.text, exported);
  }
}

/**
 * Value bindings the file's top-level imports of `moduleName` introduce.
 * Type-only imports bind nothing a `new` or call expression can use.
 */
export function collectImportBindings(root: ts.SourceFile, moduleName: string): ImportBindings {
  const bindings: ImportBindings = { namespaces: new Set(), named: new Map() };

  for (const statement of root.statements) {
    if (ts.isImportEqualsDeclaration(statement)) {
      if (externalModuleName(statement) === moduleName) bindings.namespaces.add(statement.name.text);
      continue;
    }

    if (ts.isVariableStatement(statement)) {
      for (const declaration of statement.declarationList.declarations) {
        if (requiredModule(declaration.initializer) === moduleName) addRequireBindings(declaration, bindings);
      }
      continue;
    }

    if (!ts.isImportDeclaration(statement) || moduleSpecifierText(statement) !== moduleName) continue;
    const clause = statement.importClause;
    if (!clause || clause.isTypeOnly) continue;

    if (clause.name) {
      bindings.namespaces.add(clause.name.text);
    }
    const namedBindings = clause.namedBindings;
    if (!namedBindings) continue;

    if (ts.isNamespaceImport(namedBindings)) {
      bindings.namespaces.add(namedBindings.name.text);
    } else {
      for (const element of namedBindings.elements) {
        if (element.isTypeOnly) continue;
        bindings.named.set(element.name.text, (element.propertyName ?? element.name).text);
      }
    }
  }

  return bindings;
}

/**
 * Whether the file has a value import of `moduleName`. A bare
 * `import "m"` or `require("m")` counts: the module is loaded even if
 * nothing is bound.
 */
export function importsModule(root: ts.SourceFile, moduleName: string): boolean {
  return root.statements.some((statement) => {
    if (ts.isImportDeclaration(statement)) {
      return moduleSpecifierText(statement) === moduleName && !statement.importClause?.isTypeOnly;
    }
    if (ts.isImportEqualsDeclaration(statement)) {
      return externalModuleName(statement) === moduleName;
    }
    if (ts.isVariableStatement(statement)) {
      return statement.declarationList.declarations.some(
        (declaration) => requiredModule(declaration.initializer) === moduleName
      );
    }
    if (ts.isExpressionStatement(statement)) {
      return requiredModule(statement.expression) === moduleName;
    }
    return false;
  });
}

/**
 * Drop any parentheses around `expression`.
 */
export function unwrapParentheses(expression: ts.Expression): ts.Expression {
  let current = expression;
  while (ts.isParenthesizedExpression(current)) {
    current = current.expression;
  }
  return current;
}

function bindsName(name: ts.BindingName, text: string): boolean {
  if (ts.isIdentifier(name)) return name.text === text;
  const elements: readonly ts.ArrayBindingElement[] = name.elements;
  return elements.some((element) => !ts.isOmittedExpression(element) && bindsName(element.name, text));
}

function declaresInList(list: ts.VariableDeclarationList, text: string): boolean {
  return list.declarations.some((declaration) => bindsName(declaration.name, text));
}

function declaresInStatements(statements: readonly ts.Statement[], text: string): boolean {
  return statements.some((statement) => {
    if (ts.isVariableStatement(statement)) return declaresInList(statement.declarationList, text);
    if (
      ts.isFunctionDeclaration(statement) ||
      ts.isClassDeclaration(statement) ||
      ts.isEnumDeclaration(statement)
    ) {
      return statement.name?.text === text;
    }
    return false;
  });
}

/**
 * Whether a `var` anywhere in `body`, outside nested functions, declares `text`.
 */
function hoistsVar(body: ts.Node, text: string): boolean {
  let found = false;
  const visit = (node: ts.Node): void => {
    if (found || ts.isFunctionLike(node) || ts.isClassLike(node)) return;
    if (
      ts.isVariableDeclarationList(node) &&
      (node.flags & ts.NodeFlags.BlockScoped) === 0 &&
      declaresInList(node, text)
    ) {
      found = true;
      return;
    }
    ts.forEachChild(node, visit);
  };
  ts.forEachChild(body, visit);
  return found;
}

/**
 * Whether `scope` introduces a local binding named `text`.
 */
function scopeDeclares(scope: ts.Node, text: string): boolean {
  if (ts.isFunctionLike(scope)) {
    if (scope.parameters.some((parameter) => bindsName(parameter.name, text))) return true;
    if (ts.isFunctionExpression(scope) && scope.name?.text === text) return true;
    const body = 'body' in scope ? scope.body : undefined;
    return body !== undefined && ts.isBlock(body) && hoistsVar(body, text);
  }
  if (ts.isClassExpression(scope)) return scope.name?.text === text;
  if (ts.isBlock(scope) || ts.isModuleBlock(scope)) return declaresInStatements(scope.statements, text);
  if (ts.isCaseBlock(scope)) {
    return scope.clauses.some((clause) => declaresInStatements(clause.statements, text));
  }
  if (ts.isCatchClause(scope)) {
    return scope.variableDeclaration !== undefined && bindsName(scope.variableDeclaration.name, text);
  }
  if (ts.isForStatement(scope) || ts.isForInStatement(scope) || ts.isForOfStatement(scope)) {
    const initializer = scope.initializer;
    return initializer !== undefined && ts.isVariableDeclarationList(initializer) && declaresInList(initializer, text);
  }
  return false;
}

/**
 * Whether some scope enclosing `identifier` rebinds its name, so it no
 * longer refers to the top-level import.
 */
export function isShadowed(identifier: ts.Identifier): boolean {
  for (let scope = identifier.parent; scope !== undefined && !ts.isSourceFile(scope); scope = scope.parent) {
    if (scopeDeclares(scope, identifier.text)) return true;
  }
  return false;
}

/**
 * Exported name that `expression` refers to through `bindings`: `m.Name`
 * for a namespace binding `m`, or a bare identifier bound by a named import.
 * Names rebound by an enclosing scope do not resolve.
 */
export function resolveImportedName(expression: ts.Expression, bindings: ImportBindings): string | undefined {
  const callee = unwrapParentheses(expression);
  if (ts.isPropertyAccessExpression(callee)) {
    const target = unwrapParentheses(callee.expression);
    if (
      ts.isIdentifier(target) &&
      bindings.namespaces.has(target.text) &&
      ts.isIdentifier(callee.name) &&
      !isShadowed(target)
    ) {
      return callee.name.text;
    }
    return undefined;
  }
  if (ts.isIdentifier(callee) && !isShadowed(callee)) {
    return bindings.named.get(callee.text);
  }
  return undefined;
}

/**
 * Whether `expression` is a literal whose value is the zero value of its
 * type: `0` in any numeric spelling, or the empty string.
 */
export function isZeroLiteral(expression: ts.Expression): boolean {
  if (ts.isNumericLiteral(expression)) {
    return Number(expression.text) === 0;
  }
  if (ts.isStringLiteral(expression) || ts.isNoSubstitutionTemplateLiteral(expression)) {
    return expression.text === '';
  }
  return false;
}

/**
 * Whether `expression` is the empty string literal.
 */
export function isEmptyString(expression: ts.Expression): boolean {
  return (ts.isStringLiteral(expression) || ts.isNoSubstitutionTemplateLiteral(expression)) && expression.text === '';
}
