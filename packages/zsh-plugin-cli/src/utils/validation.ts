/**
 * Input validation utilities for zsh-plugin
 */

import { InvalidNameError } from './error-handler.js';
import type { NameErrorKind, PluginName } from '../types/plugin.js';

const INITIAL_CHAR_REGEX = /^[A-Za-z]/;
const NAME_REGEX = /^[A-Za-z][A-Za-z0-9_-]*$/;

function classifyPluginName(name: string): NameErrorKind | undefined {
  if (name.length === 0) {
    return 'empty';
  }

  if (!INITIAL_CHAR_REGEX.test(name)) {
    return 'invalid-initial-char';
  }

  if (!NAME_REGEX.test(name)) {
    return 'invalid-char';
  }

  return undefined;
}

/**
 * Validates plugin name format
 *
 * Requirements:
 * - Must start with an ASCII letter
 * - Remaining characters are ASCII letters, digits, hyphens or underscores
 *
 * The name is used verbatim in file names, function names and the generated
 * directory, so it is neither trimmed nor lower-cased.
 *
 * @returns true if valid, error message string if invalid
 *
 * @example
 * ```typescript
 * validatePluginName('my-plugin') // true
 * validatePluginName('2plugin') // 'Plugin name must start with an ASCII letter'
 * ```
 */
export function validatePluginName(name: string): true | string {
  switch (classifyPluginName(name)) {
    case 'empty':
      return 'Plugin name is required';
    case 'invalid-initial-char':
      return 'Plugin name must start with an ASCII letter';
    case 'invalid-char':
      return 'Plugin name can only contain ASCII letters, digits, hyphens and underscores';
    default:
      return true;
  }
}

/**
 * Type guard to check if validation result is an error
 */
export function isValidationError(result: true | string): result is string {
  return typeof result === 'string';
}

/**
 * Parse a raw plugin name, throwing InvalidNameError when it is rejected
 */
export function parsePluginName(raw: string): PluginName {
  const kind = classifyPluginName(raw);
  if (kind) {
    throw new InvalidNameError(kind, raw);
  }

  return Object.freeze({
    value: raw,
    shellSafe: raw.replace(/-/g, '_'),
  });
}
