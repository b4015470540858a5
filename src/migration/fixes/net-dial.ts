/**
 * net-dial
 *
 * `net.dial` dropped its local-address parameter:
 *
 *   net.dial(network, "", address)  ->  net.dial(network, address)
 *
 * A call that passes a non-empty local address cannot be migrated
 * mechanically; it is left as is and reported.
 */

import ts from 'typescript';
import { collectImportBindings, importsModule, isEmptyString, resolveImportedName } from '../../ast/imports.js';
import { NET_MODULE } from './net-addr-keyed.js';
import type { Fix } from '../types.js';

export const netDialFix: Fix = {
  name: 'net-dial',
  date: '2011-03-28',
  description: 'Drop the empty local-address argument from three-argument net.dial calls.',

  precondition(unit) {
    return importsModule(unit.root, NET_MODULE);
  },

  transform(unit) {
    const bindings = collectImportBindings(unit.root, NET_MODULE);

    return unit.rewrite((node) => {
      if (!ts.isCallExpression(node) || node.arguments.length !== 3) return undefined;
      if (resolveImportedName(node.expression, bindings) !== 'dial') return undefined;

      const [network, localAddress, address] = node.arguments;
      if (!isEmptyString(localAddress)) {
        unit.warn(node, 'call to net.dial with non-empty local address');
        return undefined;
      }
      return ts.factory.updateCallExpression(node, node.expression, node.typeArguments, [network, address]);
    });
  },
};
