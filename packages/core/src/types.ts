/**
 * Core types for the installer config translation tools
 */

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

/**
 * Receives the non-fatal "Invalid ..." messages reported while walking a config.
 * Defaults to standard output.
 */
export type AdvisorySink = (message: string) => void;

// ============================================================================
// Extraction
// ============================================================================

export interface ExtractOptions {
  logger?: Logger;
  advisorySink?: AdvisorySink;
  outputDir?: string; // Overrides <config dir>/po
}

export interface PotExtractionResult {
  potPath: string;
  entries: string[]; // Extracted msgids in output order
  advisories: string[];
}

// ============================================================================
// Translation update
// ============================================================================

/**
 * Called as each step of an update finishes
 */
export interface UpdateProgress {
  templateWritten?(potPath: string): void;
  catalogMerged?(poPath: string): void;
  compileStarted?(): void;
  binaryCompiled?(moPath: string): void;
}

export interface UpdateTranslationsOptions extends ExtractOptions {
  moFileName?: string; // Defaults to os-installer-config.mo
  progress?: UpdateProgress;
}

export interface CatalogUpdate {
  poPath: string;
  moPath: string;
  language: string;
  translated: number;
  untranslated: number;
}

export interface UpdateTranslationsResult {
  potPath: string;
  catalogs: CatalogUpdate[];
}
