import { DiagnosticCode, DiagnosticsSink, ParseDiagnostic } from './types';

export type Report = (code: DiagnosticCode, message: string, line?: string) => void;

/**
 * Collects the diagnostics of one parse and forwards each to the caller's
 * sink, if any. One collector per parse; nothing is shared between parses.
 */
export class DiagnosticsCollector {
  readonly entries: ParseDiagnostic[] = [];
  handId: string | null = null;

  constructor(private readonly sink?: DiagnosticsSink) {}

  readonly report: Report = (code, message, line) => {
    const entry: ParseDiagnostic = { code, message, handId: this.handId, line: line ?? null };
    this.entries.push(entry);
    this.sink?.(entry);
  };
}
