/**
 * Diagnostics helper functions
 */

import type { ChalkInstance } from 'chalk';
import type { DiagnosticReport } from '@core';
import { APP_CONSTANTS } from '@boot/config';

/**
 * Render one device report
 *
 * @param report - Device report
 * @param colors - Chalk instance
 * @returns Lines to print, ending with a blank separator line
 */
export function formatReport(report: DiagnosticReport, colors: ChalkInstance): string[] {
  if (report.status === null) {
    return [
      colors.red(report.label + ' request to ' + report.url + ' failed: ' + report.error),
      ''
    ];
  }

  const paint = report.status === APP_CONSTANTS.HTTP_OK ? colors.green : colors.yellow;
  return [
    report.label + ' response for: ' + report.url + ' ' + paint(String(report.status)),
    report.body,
    ''
  ];
}
