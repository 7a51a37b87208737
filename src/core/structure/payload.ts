/**
 * JSON payload for structural profiles (snake_case on the wire).
 */
import type { DirectoryFileCount, StructureProfile } from './types.js';

export interface StructurePayload {
  raw_structure: string[];
  detected_layers: string[];
  naming_patterns: string[];
  test_gaps: string[];
  file_counts: DirectoryFileCount[];
}

export function toStructurePayload(profile: StructureProfile): StructurePayload {
  return {
    raw_structure: profile.rawStructure,
    detected_layers: profile.detectedLayers,
    naming_patterns: profile.namingPatterns,
    test_gaps: profile.testGaps,
    file_counts: profile.fileCounts,
  };
}
