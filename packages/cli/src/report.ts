/**
 * Terminal rendering of diagnostics
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { formatPos, type Diagnostic, type Severity } from '@reshape/analysis';

export function createPainter(color: boolean): ChalkInstance {
  return new Chalk({ level: color ? 1 : 0 });
}

const SEVERITY_STYLE: Record<Severity, (chalk: ChalkInstance, text: string) => string> = {
  error: (chalk, text) => chalk.red.bold(text),
  warning: (chalk, text) => chalk.yellow(text),
  info: (chalk, text) => chalk.cyan(text),
};

/**
 * `file:line:col severity code: message [pass]`
 */
export function formatDiagnostic(diagnostic: Diagnostic, chalk: ChalkInstance): string {
  const where = formatPos(diagnostic.pos);
  const location = where ? `${chalk.dim(where)} ` : '';
  const pass = diagnostic.pass ? chalk.dim(` [${diagnostic.pass}]`) : '';
  const severity = SEVERITY_STYLE[diagnostic.severity](chalk, diagnostic.severity);
  return `${location}${severity} ${diagnostic.code}: ${diagnostic.message}${pass}`;
}
