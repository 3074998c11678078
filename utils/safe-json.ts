/**
 * Safe JSON Parser - Prototype Pollution Protection
 *
 * Uses secure-json-parse to prevent __proto__ and constructor.prototype attacks.
 * Every response body from the platform and the signing service goes through here.
 *
 * @see https://github.com/fastify/secure-json-parse
 */

import sjson from 'secure-json-parse';

export interface SafeParseOptions {
  protoAction?: 'remove' | 'error' | 'ignore';
  constructorAction?: 'remove' | 'error' | 'ignore';
}

const DEFAULT_OPTIONS: SafeParseOptions = {
  protoAction: 'remove',
  constructorAction: 'remove',
};

/**
 * Safely parse JSON string with prototype pollution protection. Throws on
 * malformed input, like `JSON.parse`.
 *
 * @example
 * ```typescript
 * const data = safeJsonParse('{"__proto__": {"polluted": true}, "name": "test"}');
 * // Result: { name: "test" }
 * ```
 */
export function safeJsonParse(text: string, options: SafeParseOptions = DEFAULT_OPTIONS): unknown {
  const parsed: unknown = sjson.parse(text, undefined, {
    protoAction: options.protoAction || 'remove',
    constructorAction: options.constructorAction || 'remove',
  });
  return parsed;
}

/**
 * Returns `null` instead of throwing when the text is not JSON.
 */
export function safeJsonParseSafe(text: string, options: SafeParseOptions = DEFAULT_OPTIONS): unknown {
  try {
    return safeJsonParse(text, options);
  } catch {
    return null;
  }
}
