/**
 * Structural profile types.
 */

export interface DirectoryFileCount {
  dir: string;
  count: number;
}

export interface StructureProfile {
  /** Directories up to three levels deep, sorted */
  rawStructure: string[];
  /** Conventional layer names present as directory names, in layer order */
  detectedLayers: string[];
  /** Most common compound extensions (`.service.ts`), most frequent first */
  namingPatterns: string[];
  /** Source files with no test in their language's conventional layout */
  testGaps: string[];
  /** Files per top-level directory, sorted by directory */
  fileCounts: DirectoryFileCount[];
}
