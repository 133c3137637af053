/**
 * Utilities Module
 */

export {
  canonicalJson,
  checksumOf,
  decodeBase64,
  deepFreeze,
  delay,
  encodeBase64,
  generateDeterministicResourceId,
  sha256,
  toCamelCase,
} from './helpers.js';

export {
  arrayAt,
  getPath,
  getProperty,
  isNonEmptyString,
  isRecord,
  isString,
  numberAt,
  stringAt,
} from './type-guards.js';
