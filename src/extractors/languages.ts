/**
 * Extension to language mapping.
 */
import * as path from 'node:path';
import type { SourceLanguage } from './types.js';

export const EXTENSION_LANGUAGES: Readonly<Record<string, SourceLanguage>> = {
  '.ts': 'javascript',
  '.tsx': 'javascript',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.py': 'python',
  '.go': 'go',
  '.rs': 'rust',
  '.java': 'java',
  '.dart': 'dart',
  '.kt': 'kotlin',
  '.kts': 'kotlin',
  '.swift': 'swift',
  '.cs': 'csharp',
  '.php': 'php',
  '.rb': 'ruby',
};

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(EXTENSION_LANGUAGES);

/**
 * Language for a file extension (with leading dot, any case), or null.
 */
export function languageForExtension(extension: string): SourceLanguage | null {
  const ext = extension.toLowerCase();
  return Object.prototype.hasOwnProperty.call(EXTENSION_LANGUAGES, ext)
    ? EXTENSION_LANGUAGES[ext]
    : null;
}

export function languageForPath(filePath: string): SourceLanguage | null {
  return languageForExtension(path.extname(filePath));
}
