/**
 * Diagnostics side channel
 */

import type { SourcePos } from '@reshape/ir';

export type Severity = 'info' | 'warning' | 'error';

export type DiagnosticCode =
  | 'ambiguous-rename'
  | 'shape-mismatch'
  | 'unreachable-code'
  | 'unbound-reference'
  | 'unused-literal'
  | 'unused-binding'
  | 'unresolved-early-return';

export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  /** Name of the pass that reported it */
  pass?: string;
  pos?: SourcePos;
}

export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

/**
 * Default sink: keeps everything in arrival order
 */
export class DiagnosticCollector implements DiagnosticSink {
  readonly diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  withSeverity(severity: Severity): Diagnostic[] {
    return this.diagnostics.filter((d) => d.severity === severity);
  }

  hasErrors(): boolean {
    return this.diagnostics.some((d) => d.severity === 'error');
  }
}

export function formatPos(pos: SourcePos | undefined): string {
  if (!pos) return '';
  const location = pos.column === undefined ? `${pos.line}` : `${pos.line}:${pos.column}`;
  return pos.file ? `${pos.file}:${location}` : location;
}
