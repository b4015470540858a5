/**
 * Package-wide constants
 */

export const TOOL_NAME = 'tsfix';

export const VERSION = '0.1.0';
