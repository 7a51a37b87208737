/**
 * Registry of language extractors.
 *
 * The table is keyed by `SourceLanguage`, so a new variant of the union
 * does not type-check until its extractor is listed here.
 */
import { CSharpExtractor } from './csharp.js';
import { DartExtractor } from './dart.js';
import { GoExtractor } from './go.js';
import { JavaExtractor } from './java.js';
import { JavaScriptExtractor } from './javascript.js';
import { KotlinExtractor } from './kotlin.js';
import { languageForPath, SUPPORTED_EXTENSIONS } from './languages.js';
import { PhpExtractor } from './php.js';
import { PythonExtractor } from './python.js';
import { RubyExtractor } from './ruby.js';
import { RustExtractor } from './rust.js';
import { SwiftExtractor } from './swift.js';
import type { ILanguageExtractor, SourceLanguage } from './types.js';

/**
 * Factory function for creating extractors.
 * Used for lazy instantiation.
 */
export type ExtractorFactory = () => ILanguageExtractor;

const EXTRACTOR_FACTORIES: Readonly<Record<SourceLanguage, ExtractorFactory>> = {
  javascript: () => new JavaScriptExtractor(),
  python: () => new PythonExtractor(),
  go: () => new GoExtractor(),
  rust: () => new RustExtractor(),
  java: () => new JavaExtractor(),
  dart: () => new DartExtractor(),
  kotlin: () => new KotlinExtractor(),
  swift: () => new SwiftExtractor(),
  csharp: () => new CSharpExtractor(),
  php: () => new PhpExtractor(),
  ruby: () => new RubyExtractor(),
};

class ExtractorRegistry {
  private instances = new Map<SourceLanguage, ILanguageExtractor>();

  /**
   * Get the extractor for a language, creating it on first use.
   */
  get(language: SourceLanguage): ILanguageExtractor {
    let instance = this.instances.get(language);
    if (!instance) {
      instance = EXTRACTOR_FACTORIES[language]();
      this.instances.set(language, instance);
    }
    return instance;
  }

  /**
   * Get the extractor for a file path, or null for an unsupported extension.
   */
  getForPath(filePath: string): ILanguageExtractor | null {
    const language = languageForPath(filePath);
    return language ? this.get(language) : null;
  }

  getSupportedExtensions(): string[] {
    return [...SUPPORTED_EXTENSIONS];
  }

  getSupportedLanguages(): SourceLanguage[] {
    return Object.keys(EXTRACTOR_FACTORIES).filter(isSourceLanguage);
  }
}

function isSourceLanguage(value: string): value is SourceLanguage {
  return Object.prototype.hasOwnProperty.call(EXTRACTOR_FACTORIES, value);
}

/**
 * Global extractor registry instance.
 */
export const extractorRegistry = new ExtractorRegistry();
