/**
 * Formatter type definitions.
 */
import type { ScanResult } from '../../core/scan/types.js';

/**
 * Output format for scan results.
 */
export type OutputFormat = 'human' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'human'];

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Always include the info count in the summary */
  verbose: boolean;
}

/**
 * Interface for scan output formatters.
 */
export interface IFormatter {
  formatScan(result: ScanResult): string;
}
