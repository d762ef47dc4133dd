export { runDiagnostics } from './diagnostics';
export { formatReport } from './helpers';
export type { DiagnosticsDependencies, DiagnosticsOutput } from './types';
