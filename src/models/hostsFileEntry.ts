import { Hostname } from './hostname';
import { IpAddress } from './ipAddress';

/**
 * One record of the hosts file.
 *
 * Fields stay writable so an editor can clear or replace them while a row is
 * being edited; `isValid` is recomputed from the current fields on every read.
 */
export class HostsFileEntry {
  /** IP address (e.g. 127.0.0.1), or null while unset */
  ipAddress: IpAddress | null;
  /** Hostname (e.g. localhost), or null while unset */
  hostname: Hostname | null;
  private commentText = '';

  constructor(ipAddress: IpAddress | null, hostname: Hostname | null, comment?: string) {
    this.ipAddress = ipAddress;
    this.hostname = hostname;
    this.comment = comment ?? '';
  }

  /**
   * Free text written after the entry, without the leading marker. Stored
   * trimmed, the same way it reads back from a saved file.
   */
  get comment(): string {
    return this.commentText;
  }

  set comment(value: string) {
    this.commentText = value.trim();
  }

  /**
   * Build an entry from raw strings. Returns null unless both the address and
   * the hostname validate.
   */
  static fromStrings(ip: string, host: string, comment?: string): HostsFileEntry | null {
    const address = IpAddress.tryParse(ip);
    const hostname = Hostname.tryParse(host);
    if (!address.success || !hostname.success) {
      return null;
    }
    return new HostsFileEntry(address.value, hostname.value, comment);
  }

  get isValid(): boolean {
    return this.ipAddress !== null && this.hostname !== null;
  }

  /**
   * Whether the comment has any visible text
   */
  get hasComment(): boolean {
    return this.comment.length > 0;
  }

  equals(other: HostsFileEntry): boolean {
    const sameAddress = this.ipAddress === null
      ? other.ipAddress === null
      : this.ipAddress.equals(other.ipAddress);
    const sameHostname = this.hostname === null
      ? other.hostname === null
      : this.hostname.equals(other.hostname);
    return sameAddress && sameHostname && this.comment === other.comment;
  }

  clone(): HostsFileEntry {
    return new HostsFileEntry(this.ipAddress, this.hostname, this.comment);
  }

  toJSON(): { ipAddress: string | null; hostname: string | null; comment: string } {
    return {
      ipAddress: this.ipAddress?.toString() ?? null,
      hostname: this.hostname?.toString() ?? null,
      comment: this.comment,
    };
  }
}
