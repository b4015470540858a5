/**
 * net-addr-keyed
 *
 * The address classes of the "net" module gained a third constructor field,
 * so their positional form is ambiguous. Rewrite
 *
 *   new net.TCPAddr(ip, port)  ->  new net.TCPAddr({ IP: ip, Port: port })
 *
 * dropping the second field when it is a zero literal, since zero is its
 * default. A construction with any object literal argument is already keyed
 * and left alone.
 */

import ts from 'typescript';
import { collectImportBindings, importsModule, isZeroLiteral, resolveImportedName } from '../../ast/imports.js';
import type { Fix } from '../types.js';

export const NET_MODULE = 'net';

/** Positional field order of each affected class */
export const ADDRESS_FIELDS: ReadonlyMap<string, readonly string[]> = new Map([
  ['IPAddr', ['IP', 'Zone']],
  ['TCPAddr', ['IP', 'Port']],
  ['UDPAddr', ['IP', 'Port']],
]);

function isPositional(argument: ts.Expression): boolean {
  return !ts.isObjectLiteralExpression(argument) && !ts.isSpreadElement(argument);
}

function keyedArguments(args: readonly ts.Expression[], fields: readonly string[]): ts.ObjectLiteralExpression {
  const properties: ts.PropertyAssignment[] = [];
  args.forEach((argument, index) => {
    if (index === 1 && isZeroLiteral(argument)) return;
    properties.push(ts.factory.createPropertyAssignment(fields[index], argument));
  });
  return ts.factory.createObjectLiteralExpression(properties, false);
}

export const netAddrKeyedFix: Fix = {
  name: 'net-addr-keyed',
  date: '2012-11-26',
  description: 'Use keyed arguments for IPAddr, TCPAddr and UDPAddr constructions from "net".',

  precondition(unit) {
    return importsModule(unit.root, NET_MODULE);
  },

  transform(unit) {
    const bindings = collectImportBindings(unit.root, NET_MODULE);
    if (bindings.namespaces.size === 0 && bindings.named.size === 0) return false;

    return unit.rewrite((node) => {
      if (!ts.isNewExpression(node) || !node.arguments) return undefined;

      const className = resolveImportedName(node.expression, bindings);
      const fields = className === undefined ? undefined : ADDRESS_FIELDS.get(className);
      const args = node.arguments;
      if (!fields || args.length === 0 || args.length > fields.length) return undefined;
      if (!args.every(isPositional)) return undefined;

      return ts.factory.updateNewExpression(node, node.expression, node.typeArguments, [
        keyedArguments(args, fields),
      ]);
    });
  },
};
