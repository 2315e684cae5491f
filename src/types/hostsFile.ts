/**
 * Types for hosts file parsing and management
 */

/**
 * Outcome of a try-parse operation. Either a fully valid value or a failure
 * with a short reason; never a partially constructed value.
 */
export type ParseResult<T> =
  | { success: true; value: T }
  | { success: false; reason: string };

/**
 * Raw tokens extracted from one hosts file line, before address and
 * hostname validation
 */
export interface ParsedLine {
  /** Address candidate (first token) */
  ip: string;
  /** Hostname candidate (second token) */
  host: string;
  /** Inline comment without its leading marker, or an empty string */
  comment: string;
}

/**
 * Text encodings the hosts file can be read and written with
 */
export type HostsFileEncoding =
  | { kind: 'legacy'; name: LegacyEncoding }
  | { kind: 'unicode'; bom: boolean };

/**
 * Single-byte encodings Node can decode without extra libraries
 */
export type LegacyEncoding = 'latin1' | 'ascii';

/**
 * Result of a load or refresh
 */
export interface LoadResult {
  /** File that was read */
  filePath: string;
  /** Number of entries appended to the collection */
  added: number;
  /** Number of non-blank, non-comment lines that could not be turned into entries */
  skipped: number;
}

/**
 * Result of a save or export
 */
export interface SaveResult {
  /** File that was written */
  filePath: string;
  /** Number of entries written */
  written: number;
  /** Number of invalid entries left out */
  excluded: number;
  /** Whether the header block was written */
  header: boolean;
  /** Path of the backup taken before writing, if any */
  backupPath?: string;
}

/**
 * Result of importing tab-separated rows
 */
export interface TabularImportResult {
  /** Rows turned into entries */
  added: number;
  /** Non-blank rows that did not validate */
  rejected: number;
}
