/**
 * Output Type Definitions
 *
 * Types for console logging and planned scaffold output
 */

import type { TemplateId } from './template.js';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  success(message: string, ...args: unknown[]): void;
}

export type OutputEntry =
  | { kind: 'directory'; path: string }
  | { kind: 'file'; path: string; template: TemplateId };
