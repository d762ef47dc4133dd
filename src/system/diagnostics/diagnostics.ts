/**
 * One-shot diagnostics mode
 * Queries every device once and prints the raw responses
 */

import type { ControlledFan } from '@core';
import { formatReport } from './helpers';
import type { DiagnosticsDependencies } from './types';

/**
 * Print a raw report for every fan, in order
 *
 * A device that cannot be reached is reported and the next one is queried.
 *
 * @param fans - Controlled fans, in control loop order
 * @param deps - Output and colors
 * @returns Process exit status
 */
export async function runDiagnostics(fans: readonly ControlledFan[], deps: DiagnosticsDependencies): Promise<number> {
  deps.output.log(deps.colors.bold('Fetching debug data'));

  for (let i = 0; i < fans.length; i++) {
    const report = await fans[i].debug();
    const lines = formatReport(report, deps.colors);
    for (let j = 0; j < lines.length; j++) {
      deps.output.log(lines[j]);
    }
  }

  return 0;
}
