/**
 * Text templates used when writing the hosts file. Placeholders `{0}`, `{1}`
 * and `{2}` stand for the address, the hostname and the comment.
 */
export interface HostsFileTemplates {
  /** Comment block written at the top of the canonical file on platforms that expect one */
  header: string;
  /** Line for an entry without a comment */
  entrySingle: string;
  /** Line for an entry with a comment */
  entryWithComment: string;
}

export const DEFAULT_HEADER = [
  '# Hosts file.',
  '#',
  '# This file maps hostnames to IP addresses. Each entry is kept on its own',
  '# line: the IP address comes first, followed by the hostname, separated by',
  '# at least one space. A comment may follow the hostname after a \'#\'.',
  '# Lines starting with \'#\' are comments.',
  '#',
  '# For example:',
  '#',
  '#      192.0.2.10     server.example.com     # source server',
  '#      198.51.100.7   client.example.com     # client host',
].join('\n');

export const DEFAULT_TEMPLATES: Readonly<HostsFileTemplates> = {
  header: DEFAULT_HEADER,
  entrySingle: '{0} {1}',
  entryWithComment: '{0} {1} #{2}',
};

/**
 * Substitute positional placeholders. Unknown placeholders are left as they are.
 */
export function formatTemplate(template: string, ...args: string[]): string {
  return template.replace(/\{(\d+)\}/g, (placeholder: string, index: string) => {
    const value = args[Number(index)];
    return value === undefined ? placeholder : value;
  });
}
