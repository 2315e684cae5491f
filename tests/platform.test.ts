import { UnsupportedPlatformError } from '../src/errors';
import { detectPlatformProfile } from '../src/services/platform';

describe('detectPlatformProfile', () => {
  it('should describe Windows', () => {
    expect(detectPlatformProfile('win32', { SystemRoot: 'D:\\Win' })).toEqual({
      name: 'win32',
      hostsFilePath: 'D:\\Win\\System32\\drivers\\etc\\hosts',
      legacyEncoding: 'latin1',
      localHostEntry: false,
      hostsFileHeader: true,
      hostsFileBom: false,
      lineEnding: '\r\n'
    });
  });

  it('should fall back to windir and then the usual system root', () => {
    expect(detectPlatformProfile('win32', { windir: 'E:\\Windows' }).hostsFilePath)
      .toBe('E:\\Windows\\System32\\drivers\\etc\\hosts');
    expect(detectPlatformProfile('win32', {}).hostsFilePath)
      .toBe('C:\\Windows\\System32\\drivers\\etc\\hosts');
  });

  it.each(['linux', 'darwin', 'freebsd'])('should describe %s as Unix-like', (platform) => {
    expect(detectPlatformProfile(platform, {})).toEqual({
      name: platform,
      hostsFilePath: '/etc/hosts',
      legacyEncoding: 'latin1',
      localHostEntry: true,
      hostsFileHeader: false,
      hostsFileBom: false,
      lineEnding: '\n'
    });
  });

  it('should reject other platforms', () => {
    expect(() => detectPlatformProfile('android', {})).toThrow(UnsupportedPlatformError);
    expect(() => detectPlatformProfile('android', {})).toThrow('Unsupported platform: android');
  });
});
