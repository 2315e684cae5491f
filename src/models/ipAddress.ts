import net from 'node:net';
import { ParseResult } from '../types/hostsFile';

/**
 * An IPv4 or IPv6 address.
 *
 * Parsing is purely syntactic. `toString()` always gives the canonical text:
 * IPv4 as dotted decimal, IPv6 in RFC 5952 form, so two spellings of the same
 * address compare equal.
 *
 * @example
 * ```typescript
 * const result = IpAddress.tryParse('0:0:0:0:0:0:0:1');
 * if (result.success) {
 *   console.log(result.value.toString()); // '::1'
 * }
 * ```
 */
export class IpAddress {
  static readonly LOOPBACK = IpAddress.fromParts(4, [127, 0, 0, 1]);
  static readonly IPV6_LOOPBACK = IpAddress.fromParts(6, [0, 0, 0, 0, 0, 0, 0, 1]);

  /** 4 or 6 */
  readonly family: 4 | 6;
  /** Octets for IPv4, 16-bit groups for IPv6 */
  private readonly parts: readonly number[];
  /** IPv6 scope id without the `%`, if one was given */
  readonly zone?: string;
  private readonly text: string;

  private constructor(family: 4 | 6, parts: number[], zone?: string) {
    this.family = family;
    this.parts = parts;
    this.zone = zone;
    this.text = family === 4 ? parts.join('.') : formatIPv6(parts) + (zone ? `%${zone}` : '');
  }

  private static fromParts(family: 4 | 6, parts: number[]): IpAddress {
    return new IpAddress(family, parts);
  }

  /**
   * Validate a string and wrap it. Never throws.
   */
  static tryParse(raw: string): ParseResult<IpAddress> {
    switch (net.isIP(raw)) {
      case 4: {
        const octets = parseIPv4(raw);
        if (octets) {
          return { success: true, value: new IpAddress(4, octets) };
        }
        break;
      }
      case 6: {
        const zoneIndex = raw.indexOf('%');
        const address = zoneIndex === -1 ? raw : raw.slice(0, zoneIndex);
        const zone = zoneIndex === -1 ? undefined : raw.slice(zoneIndex + 1);
        const hextets = parseIPv6(address);
        if (hextets) {
          return { success: true, value: new IpAddress(6, hextets, zone || undefined) };
        }
        break;
      }
    }

    return { success: false, reason: `Invalid IP address: ${raw}` };
  }

  static isValid(raw: string): boolean {
    return IpAddress.tryParse(raw).success;
  }

  isLoopback(): boolean {
    if (this.family === 4) {
      return this.parts[0] === 127;
    }
    return this.parts.slice(0, 7).every(part => part === 0) && this.parts[7] === 1;
  }

  equals(other: IpAddress | null | undefined): boolean {
    return !!other && other.text === this.text;
  }

  /**
   * IPv4 sorts before IPv6; within a family addresses sort numerically
   */
  compareTo(other: IpAddress): number {
    if (this.family !== other.family) {
      return this.family - other.family;
    }
    for (let i = 0; i < this.parts.length; i++) {
      if (this.parts[i] !== other.parts[i]) {
        return this.parts[i] - other.parts[i];
      }
    }
    const a = this.zone ?? '';
    const b = other.zone ?? '';
    return a < b ? -1 : a > b ? 1 : 0;
  }

  toString(): string {
    return this.text;
  }

  toJSON(): string {
    return this.text;
  }
}

function parseIPv4(ip: string): number[] | null {
  const parts = ip.split('.');
  if (parts.length !== 4) return null;
  const octets = parts.map(part => Number(part));
  if (!octets.every(octet => Number.isInteger(octet) && octet >= 0 && octet <= 255)) {
    return null;
  }
  return octets;
}

/**
 * Expand an IPv6 address (without zone) into 8 groups. Supports `::`
 * compression and an embedded IPv4 tail.
 */
function parseIPv6(ip: string): number[] | null {
  const normalized = ip.toLowerCase();
  const splitIndex = normalized.indexOf('::');

  if (splitIndex !== -1) {
    const leftPart = normalized.slice(0, splitIndex);
    const rightPart = normalized.slice(splitIndex + 2);
    const left = expandIPv6Groups(leftPart ? leftPart.split(':') : []);
    const right = expandIPv6Groups(rightPart ? rightPart.split(':') : []);
    if (!left || !right) return null;

    const missing = 8 - (left.length + right.length);
    if (missing < 0) return null;

    return [...left, ...new Array<number>(missing).fill(0), ...right];
  }

  const groups = expandIPv6Groups(normalized.split(':'));
  if (!groups || groups.length !== 8) return null;
  return groups;
}

function expandIPv6Groups(groups: string[]): number[] | null {
  const expanded: number[] = [];

  for (const group of groups) {
    if (group.includes('.')) {
      const octets = parseIPv4(group);
      if (!octets) return null;
      expanded.push((octets[0] << 8) | octets[1], (octets[2] << 8) | octets[3]);
      continue;
    }

    if (!/^[0-9a-f]{1,4}$/.test(group)) return null;
    expanded.push(parseInt(group, 16));
  }

  return expanded;
}

function formatIPv6(hextets: number[]): string {
  const isMapped = hextets.slice(0, 5).every(value => value === 0) && hextets[5] === 0xffff;
  if (isMapped) {
    const [high, low] = [hextets[6], hextets[7]];
    return `::ffff:${high >> 8}.${high & 0xff}.${low >> 8}.${low & 0xff}`;
  }

  // Longest run of zero groups; the first one wins a tie
  let bestStart = -1;
  let bestLength = 0;
  let runStart = -1;
  for (let i = 0; i < hextets.length; i++) {
    if (hextets[i] !== 0) {
      runStart = -1;
      continue;
    }
    if (runStart === -1) {
      runStart = i;
    }
    const runLength = i - runStart + 1;
    if (runLength > bestLength) {
      bestStart = runStart;
      bestLength = runLength;
    }
  }

  const hex = (values: number[]) => values.map(value => value.toString(16)).join(':');

  if (bestLength < 2) {
    return hex(hextets);
  }

  return `${hex(hextets.slice(0, bestStart))}::${hex(hextets.slice(bestStart + bestLength))}`;
}
