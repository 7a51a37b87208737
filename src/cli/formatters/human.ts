/**
 * Human-readable scan report, grouped by file.
 */
import chalk from 'chalk';
import type { Severity } from '../../core/config/schema.js';
import type { Violation } from '../../core/rules/types.js';
import type { ScanResult } from '../../core/scan/types.js';
import type { FormatOptions, IFormatter } from './types.js';

type Color = 'red' | 'yellow' | 'blue' | 'green' | 'dim' | 'bold';

const SEVERITY_COLORS: Record<Severity, Color> = {
  error: 'red',
  warning: 'yellow',
  info: 'blue',
};

const SEVERITY_ICONS: Record<Severity, string> = {
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
};

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatScan(result: ScanResult): string {
    if (result.error) {
      return `${this.colorize('✗', 'red')} Configuration error [${result.error.code}]: ${result.error.message}`;
    }

    const lines: string[] = [];
    for (const [file, violations] of groupByFile(result.violations)) {
      lines.push(this.colorize(file, 'bold'));
      for (const violation of violations) {
        lines.push(this.formatViolation(violation));
      }
      lines.push('');
    }

    lines.push(this.formatSummary(result));
    return lines.join('\n');
  }

  private formatViolation(violation: Violation): string {
    const color = SEVERITY_COLORS[violation.severity];
    const icon = this.colorize(SEVERITY_ICONS[violation.severity], color);
    const location = violation.line !== undefined ? `:${violation.line}` : '';
    const details: string[] = [];
    if (violation.import !== undefined) details.push(`import ${violation.import}`);
    if (violation.package !== undefined) details.push(`package ${violation.package}`);
    const suffix = details.length > 0 ? ` ${this.colorize(`(${details.join(', ')})`, 'dim')}` : '';
    return `  ${icon} ${violation.rule}${location}: ${violation.message}${suffix}`;
  }

  private formatSummary(result: ScanResult): string {
    const { stats } = result;
    const scope = result.scope ? ` in ${result.scope}` : '';
    const header = `Checked ${result.filesChecked} ${result.filesChecked === 1 ? 'file' : 'files'}${scope}`;
    if (stats.total === 0) {
      return `${header}: ${this.colorize('no violations', 'green')}`;
    }

    const parts = [
      this.colorize(`${stats.errors} ${stats.errors === 1 ? 'error' : 'errors'}`, stats.errors > 0 ? 'red' : 'dim'),
      this.colorize(`${stats.warnings} ${stats.warnings === 1 ? 'warning' : 'warnings'}`, stats.warnings > 0 ? 'yellow' : 'dim'),
    ];
    const info = stats.total - stats.errors - stats.warnings;
    if (info > 0 || this.options.verbose) {
      parts.push(this.colorize(`${info} info`, 'blue'));
    }
    return `${header}: ${parts.join(', ')}`;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'green':
        return chalk.green(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}

function groupByFile(violations: readonly Violation[]): Map<string, Violation[]> {
  const groups = new Map<string, Violation[]>();
  for (const violation of violations) {
    const group = groups.get(violation.file) ?? [];
    group.push(violation);
    groups.set(violation.file, group);
  }
  return groups;
}
