import { EventEmitter } from 'node:events';
import { HostsFileEntry } from './hostsFileEntry';

/**
 * Events emitted by the EntryCollection
 */
export enum EntryCollectionEvent {
  CHANGED = 'changed'
}

/**
 * Description of a change, passed to `changed` listeners
 */
export type EntryCollectionChange =
  | { type: 'added'; index: number; entry: HostsFileEntry }
  | { type: 'removed'; index: number; entry: HostsFileEntry }
  | { type: 'cleared' }
  | { type: 'sorted' };

export type EntryField = 'ipAddress' | 'hostname' | 'comment';

export type SortDirection = 'asc' | 'desc';

export type EntryComparator = (a: HostsFileEntry, b: HostsFileEntry) => number;

/**
 * Ordered, mutable list of hosts file entries.
 *
 * Insertion order is file order (or append order for entries added in code).
 * Duplicates are allowed. Sorting reorders the list in memory only.
 */
export class EntryCollection extends EventEmitter implements Iterable<HostsFileEntry> {
  private items: HostsFileEntry[] = [];

  constructor(entries: Iterable<HostsFileEntry> = []) {
    super();
    this.items = [...entries];
  }

  get length(): number {
    return this.items.length;
  }

  get(index: number): HostsFileEntry | undefined {
    return this.items[index];
  }

  add(entry: HostsFileEntry): void {
    this.items.push(entry);
    this.notify({ type: 'added', index: this.items.length - 1, entry });
  }

  insert(index: number, entry: HostsFileEntry): void {
    if (index < 0 || index > this.items.length) {
      throw new RangeError(`Index ${index} is out of range`);
    }
    this.items.splice(index, 0, entry);
    this.notify({ type: 'added', index, entry });
  }

  removeAt(index: number): HostsFileEntry {
    if (index < 0 || index >= this.items.length) {
      throw new RangeError(`Index ${index} is out of range`);
    }
    const [entry] = this.items.splice(index, 1);
    this.notify({ type: 'removed', index, entry });
    return entry;
  }

  /**
   * Remove an entry by identity
   * @returns Whether the entry was in the collection
   */
  remove(entry: HostsFileEntry): boolean {
    const index = this.items.indexOf(entry);
    if (index === -1) {
      return false;
    }
    this.removeAt(index);
    return true;
  }

  clear(): void {
    this.items = [];
    this.notify({ type: 'cleared' });
  }

  indexOf(entry: HostsFileEntry): number {
    return this.items.indexOf(entry);
  }

  /**
   * Entries that would be written on save, in order
   */
  validEntries(): HostsFileEntry[] {
    return this.items.filter(entry => entry.isValid);
  }

  toArray(): HostsFileEntry[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<HostsFileEntry> {
    return this.items[Symbol.iterator]();
  }

  /**
   * Stable sort by a field or a custom comparator. Unset fields sort last
   * regardless of direction.
   */
  sort(selector: EntryField | EntryComparator, direction: SortDirection = 'asc'): void {
    const sign = direction === 'asc' ? 1 : -1;

    if (typeof selector === 'function') {
      this.items.sort((a, b) => sign * selector(a, b));
    } else {
      this.items.sort((a, b) => compareField(a, b, selector, sign));
    }

    this.notify({ type: 'sorted' });
  }

  private notify(change: EntryCollectionChange): void {
    this.emit(EntryCollectionEvent.CHANGED, change);
  }
}

function compareField(a: HostsFileEntry, b: HostsFileEntry, field: EntryField, sign: number): number {
  switch (field) {
    case 'ipAddress':
      return compareNullable(a.ipAddress, b.ipAddress, (x, y) => x.compareTo(y), sign);
    case 'hostname':
      return compareNullable(a.hostname, b.hostname, (x, y) => x.compareTo(y), sign);
    case 'comment':
      return sign * a.comment.localeCompare(b.comment);
  }
}

function compareNullable<T>(
  a: T | null,
  b: T | null,
  compare: (x: T, y: T) => number,
  sign: number
): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return sign * compare(a, b);
}
