/**
 * JSON output formatter for machine consumption.
 */
import type { ScanResult } from '../../core/scan/types.js';
import { toScanPayload } from '../../core/scan/payload.js';
import type { IFormatter } from './types.js';

export class JsonFormatter implements IFormatter {
  formatScan(result: ScanResult): string {
    return JSON.stringify(toScanPayload(result), null, 2);
  }
}
