import {
  cleanLine,
  isIgnorableLine,
  parseEntry,
  parseHostsContent,
  splitLines,
  stripUnwantedCharacters,
  tryParseLine
} from '../src/services/hostsFileParser';

describe('hostsFileParser', () => {
  describe('cleanLine', () => {
    it('should collapse whitespace runs and trim', () => {
      expect(cleanLine('  10.0.0.1 \t\t host.example   ')).toBe('10.0.0.1 host.example');
    });

    it('should strip control, byte-order-mark and zero-width characters', () => {
      const dirty = '\uFEFF10.0.0.1 host\u200B.exa\u0000mple\u2060';
      expect(cleanLine(dirty)).toBe('10.0.0.1 host.example');
    });

    it('should leave whitespace alone when only stripping', () => {
      expect(stripUnwantedCharacters('a\u200B  b\tc\r')).toBe('a  b\tc');
    });

    it('should drop stray carriage returns', () => {
      expect(cleanLine('10.0.0.1 host.example\r')).toBe('10.0.0.1 host.example');
    });
  });

  describe('isIgnorableLine', () => {
    it('should flag blank and comment lines only', () => {
      expect(isIgnorableLine('')).toBe(true);
      expect(isIgnorableLine('# comment')).toBe(true);
      expect(isIgnorableLine('10.0.0.1 host.example')).toBe(false);
    });
  });

  describe('tryParseLine', () => {
    it('should split address, hostname and comment', () => {
      expect(tryParseLine('  10.0.0.1   host.example   # hi there')).toEqual({
        success: true,
        value: { ip: '10.0.0.1', host: 'host.example', comment: 'hi there' }
      });
    });

    it('should reject comment lines', () => {
      expect(tryParseLine('# just a comment')).toEqual({ success: false, reason: 'Comment line' });
      expect(tryParseLine('   #indented comment')).toEqual({ success: false, reason: 'Comment line' });
    });

    it('should reject blank lines', () => {
      expect(tryParseLine('')).toEqual({ success: false, reason: 'Blank line' });
      expect(tryParseLine(' \t ')).toEqual({ success: false, reason: 'Blank line' });
    });

    it('should require a hostname token', () => {
      expect(tryParseLine('10.0.0.1')).toEqual({ success: false, reason: 'Missing hostname' });
      expect(tryParseLine('10.0.0.1 #host.example')).toEqual({ success: false, reason: 'Missing hostname' });
    });

    it('should accept tabs as separators', () => {
      expect(tryParseLine('10.0.0.1\thost.example\t#tabbed')).toEqual({
        success: true,
        value: { ip: '10.0.0.1', host: 'host.example', comment: 'tabbed' }
      });
    });

    it('should drop alias tokens before the comment', () => {
      expect(tryParseLine('10.0.0.1 host.example alias.one alias.two #note')).toEqual({
        success: true,
        value: { ip: '10.0.0.1', host: 'host.example', comment: 'note' }
      });
    });

    it('should keep later markers and inner whitespace inside the comment', () => {
      expect(tryParseLine('10.0.0.1 host.example #a   #b')).toEqual({
        success: true,
        value: { ip: '10.0.0.1', host: 'host.example', comment: 'a   #b' }
      });
      expect(tryParseLine('10.0.0.1 host.example #  tab\there  ')).toEqual({
        success: true,
        value: { ip: '10.0.0.1', host: 'host.example', comment: 'tab\there' }
      });
    });

    it('should give an empty comment for a bare marker or none at all', () => {
      expect(tryParseLine('10.0.0.1 host.example #')).toEqual({
        success: true,
        value: { ip: '10.0.0.1', host: 'host.example', comment: '' }
      });
      expect(tryParseLine('10.0.0.1 host.example alias#x')).toEqual({
        success: true,
        value: { ip: '10.0.0.1', host: 'host.example', comment: '' }
      });
    });
  });

  describe('parseEntry', () => {
    it('should build a validated entry', () => {
      const entry = parseEntry('::1 localhost # loopback');
      expect(entry?.toJSON()).toEqual({ ipAddress: '::1', hostname: 'localhost', comment: 'loopback' });
    });

    it('should return null for invalid addresses or hostnames', () => {
      expect(parseEntry('300.0.0.1 host.example')).toBeNull();
      expect(parseEntry('10.0.0.1 host#x')).toBeNull();
      expect(parseEntry('10.0.0.1 bad_name.example')).toBeNull();
    });

    it('should return null for comments and blank lines', () => {
      expect(parseEntry('# 10.0.0.1 host.example')).toBeNull();
      expect(parseEntry('')).toBeNull();
    });
  });

  describe('splitLines', () => {
    it('should accept LF, CRLF and lone CR', () => {
      expect(splitLines('a\nb\r\nc\rd')).toEqual(['a', 'b', 'c', 'd']);
    });
  });

  describe('parseHostsContent', () => {
    it('should collect entries in order and count skipped lines', () => {
      const content = [
        '# header',
        '127.0.0.1 localhost',
        '',
        'not-an-address host.example',
        '::1 localhost # v6',
        ''
      ].join('\r\n');

      const { entries, skipped } = parseHostsContent(content);

      expect(entries.map(entry => entry.toJSON())).toEqual([
        { ipAddress: '127.0.0.1', hostname: 'localhost', comment: '' },
        { ipAddress: '::1', hostname: 'localhost', comment: 'v6' },
      ]);
      expect(skipped).toBe(1);
    });

    it('should keep loading past a malformed line', () => {
      const lines = Array.from({ length: 10 }, (_, i) => `10.0.0.${i + 1} host${i + 1}.example`);
      lines.splice(5, 0, '10.0.0.999 broken.example');

      const { entries, skipped } = parseHostsContent(lines.join('\n'));

      expect(entries).toHaveLength(10);
      expect(entries[5].hostname?.toString()).toBe('host6.example');
      expect(skipped).toBe(1);
    });

    it('should return nothing for an empty file', () => {
      expect(parseHostsContent('')).toEqual({ entries: [], skipped: 0 });
    });
  });
});
