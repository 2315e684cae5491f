import { HostsFileEntry } from '../models/hostsFileEntry';

/**
 * Rows parsed from tab-separated text
 */
export interface TabularEntries {
  entries: HostsFileEntry[];
  /** Non-blank rows that were not `address<TAB>hostname<TAB>comment` with a valid address and hostname */
  rejected: number;
}

/**
 * Parse rows of `address<TAB>hostname<TAB>comment`, as copied from a grid.
 * A row needs all three fields; the comment may be empty.
 */
export function parseTabularEntries(text: string): TabularEntries {
  const entries: HostsFileEntry[] = [];
  let rejected = 0;

  for (const row of text.split(/\r?\n/)) {
    if (row.trim().length === 0) {
      continue;
    }

    const fields = row.split('\t');
    const entry = fields.length > 2
      ? HostsFileEntry.fromStrings(fields[0].trim(), fields[1].trim(), fields[2].trim())
      : null;

    if (entry) {
      entries.push(entry);
    } else {
      rejected++;
    }
  }

  return { entries, rejected };
}

/**
 * Format valid entries as tab-separated rows
 */
export function formatTabularEntries(entries: Iterable<HostsFileEntry>): string {
  const rows: string[] = [];
  for (const entry of entries) {
    if (entry.ipAddress && entry.hostname) {
      rows.push([entry.ipAddress.toString(), entry.hostname.toString(), entry.comment].join('\t'));
    }
  }
  return rows.join('\n');
}
