import { ParseResult } from '../types/hostsFile';

const MAX_HOSTNAME_LENGTH = 253;
const MAX_LABEL_LENGTH = 63;
const LABEL_PATTERN = /^[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?$/;

/**
 * A syntactically valid hostname.
 *
 * Labels are letters, digits and hyphens, 1-63 characters each, separated by
 * single dots, with no hyphen at either end of a label. The whole name is at
 * most 253 characters. No DNS lookup is ever made.
 *
 * @example
 * ```typescript
 * const result = Hostname.tryParse('www.example.com');
 * if (result.success) {
 *   console.log(result.value.toString()); // 'www.example.com'
 * }
 * ```
 */
export class Hostname {
  /** The canonical local machine name */
  static readonly LOCALHOST = new Hostname('localhost');

  private readonly value: string;

  private constructor(value: string) {
    this.value = value;
  }

  /**
   * Validate a string and wrap it. Never throws.
   */
  static tryParse(raw: string): ParseResult<Hostname> {
    const reason = Hostname.validate(raw);
    if (reason) {
      return { success: false, reason };
    }
    return { success: true, value: new Hostname(raw) };
  }

  /**
   * Check whether a string would parse
   */
  static isValid(raw: string): boolean {
    return Hostname.validate(raw) === null;
  }

  private static validate(raw: string): string | null {
    if (!raw) {
      return 'Hostname is required';
    }

    if (raw.length > MAX_HOSTNAME_LENGTH) {
      return `Hostname exceeds ${MAX_HOSTNAME_LENGTH} characters`;
    }

    for (const label of raw.split('.')) {
      if (label.length === 0) {
        return 'Hostname contains an empty label';
      }
      if (label.length > MAX_LABEL_LENGTH) {
        return `Hostname label exceeds ${MAX_LABEL_LENGTH} characters: ${label}`;
      }
      if (!LABEL_PATTERN.test(label)) {
        return `Invalid hostname label: ${label}`;
      }
    }

    return null;
  }

  /**
   * DNS names compare case-insensitively
   */
  equals(other: Hostname | null | undefined): boolean {
    return !!other && other.value.toLowerCase() === this.value.toLowerCase();
  }

  compareTo(other: Hostname): number {
    const a = this.value.toLowerCase();
    const b = other.value.toLowerCase();
    return a < b ? -1 : a > b ? 1 : 0;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
