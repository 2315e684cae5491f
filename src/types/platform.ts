import { LegacyEncoding } from './hostsFile';

/**
 * Platform conventions for the hosts file. Passed to the file manager at
 * construction so it never inspects the environment itself.
 */
export interface PlatformProfile {
  /** Platform identifier, e.g. "win32" or "linux" */
  name: string;
  /** Canonical location of the hosts file */
  hostsFilePath: string;
  /** Encoding used when the user has not switched to Unicode */
  legacyEncoding: LegacyEncoding;
  /** Whether a restored file needs explicit loopback entries */
  localHostEntry: boolean;
  /** Whether the canonical file starts with a descriptive comment block */
  hostsFileHeader: boolean;
  /** Whether Unicode output starts with a byte-order marker */
  hostsFileBom: boolean;
  /** Line terminator written after each line */
  lineEnding: '\n' | '\r\n';
}
