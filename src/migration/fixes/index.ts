/**
 * Built-in fixes. Adding a fix means adding it to this list.
 */

import type { Fix } from '../types.js';
import { netAddrKeyedFix } from './net-addr-keyed.js';
import { netDialFix } from './net-dial.js';

export const BUILTIN_FIXES: readonly Fix[] = [netAddrKeyedFix, netDialFix];

export { netAddrKeyedFix, netDialFix };
