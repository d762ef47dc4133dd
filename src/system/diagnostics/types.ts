/**
 * Diagnostics type definitions
 */

import type { ChalkInstance } from 'chalk';

/**
 * Where diagnostics lines are printed
 */
export interface DiagnosticsOutput {
  log(message: string): void;
}

/**
 * Diagnostics dependencies
 */
export interface DiagnosticsDependencies {
  output: DiagnosticsOutput;
  /** Chalk instance (level 0 disables colors) */
  colors: ChalkInstance;
}
