import { Hostname } from '../models/hostname';
import { HostsFileEntry } from '../models/hostsFileEntry';
import { IpAddress } from '../models/ipAddress';
import { ParsedLine, ParseResult } from '../types/hostsFile';

export const COMMENT_MARKER = '#';

// Control characters other than tab, stray byte-order marks and zero-width characters
const UNWANTED_CHARACTERS = /[\u0000-\u0008\u000A-\u001F\u007F-\u009F\uFEFF\u200B-\u200D\u2060]/g;
const WHITESPACE_RUN = /\s+/g;
const LINE_BREAK = /\r\n|\n|\r/;

/**
 * Parsed hosts file content
 */
export interface ParsedHostsContent {
  /** Valid entries in file order */
  entries: HostsFileEntry[];
  /** Non-blank, non-comment lines that did not produce an entry */
  skipped: number;
}

/**
 * Remove unwanted characters, leaving whitespace as it is
 */
export function stripUnwantedCharacters(line: string): string {
  return line.replace(UNWANTED_CHARACTERS, '');
}

/**
 * Strip unwanted characters, collapse whitespace runs to a single space and trim
 */
export function cleanLine(line: string): string {
  return stripUnwantedCharacters(line)
    .replace(WHITESPACE_RUN, ' ')
    .trim();
}

/**
 * Whether a cleaned line carries no entry at all (blank or a comment)
 */
export function isIgnorableLine(cleaned: string): boolean {
  return cleaned.length === 0 || cleaned.startsWith(COMMENT_MARKER);
}

interface Token {
  text: string;
  /** Offset of the token in the stripped line */
  start: number;
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  const pattern = /\S+/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    tokens.push({ text: match[0], start: match.index });
  }
  return tokens;
}

/**
 * Split one line of the hosts file into address, hostname and comment tokens.
 *
 * The first token is the address candidate and the second the hostname
 * candidate. After the hostname, the first token starting with `#` opens the
 * comment, which runs to the end of the line with its inner whitespace kept;
 * any other tokens in between (extra aliases) are dropped. Tokens are not
 * validated here.
 */
export function tryParseLine(line: string): ParseResult<ParsedLine> {
  const stripped = stripUnwantedCharacters(line);
  const tokens = tokenize(stripped);

  if (tokens.length === 0) {
    return { success: false, reason: 'Blank line' };
  }
  if (tokens[0].text.startsWith(COMMENT_MARKER)) {
    return { success: false, reason: 'Comment line' };
  }
  if (tokens.length < 2 || tokens[1].text.startsWith(COMMENT_MARKER)) {
    return { success: false, reason: 'Missing hostname' };
  }

  const [ip, host, ...rest] = tokens;
  const marker = rest.find(token => token.text.startsWith(COMMENT_MARKER));
  const comment = marker
    ? stripped.slice(marker.start + COMMENT_MARKER.length).trim()
    : '';

  return { success: true, value: { ip: ip.text, host: host.text, comment } };
}

/**
 * Turn one line into an entry, or null when it is blank, a comment or invalid
 */
export function parseEntry(line: string): HostsFileEntry | null {
  const parsed = tryParseLine(line);
  if (!parsed.success) {
    return null;
  }

  const address = IpAddress.tryParse(parsed.value.ip);
  const hostname = Hostname.tryParse(parsed.value.host);
  if (!address.success || !hostname.success) {
    return null;
  }

  return new HostsFileEntry(address.value, hostname.value, parsed.value.comment);
}

/**
 * Split text into lines. Accepts LF, CRLF and lone CR terminators.
 */
export function splitLines(content: string): string[] {
  return content.split(LINE_BREAK);
}

/**
 * Parse a whole hosts file. Lines that fail any stage are skipped and counted;
 * blank lines and comments are neither entries nor skips.
 */
export function parseHostsContent(content: string): ParsedHostsContent {
  const entries: HostsFileEntry[] = [];
  let skipped = 0;

  for (const line of splitLines(content)) {
    const entry = parseEntry(line);
    if (entry) {
      entries.push(entry);
    } else if (!isIgnorableLine(cleanLine(line))) {
      skipped++;
    }
  }

  return { entries, skipped };
}
