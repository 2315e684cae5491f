import * as path from 'node:path';
import { UnsupportedPlatformError } from '../errors';
import { PlatformProfile } from '../types/platform';

const UNIX_PLATFORMS = ['darwin', 'linux', 'freebsd', 'openbsd', 'netbsd', 'sunos', 'aix'];

/**
 * Describe the hosts file conventions of a platform.
 *
 * Windows keeps the file under the system root, expects the descriptive
 * header and already resolves localhost without an entry. Unix-like systems
 * keep `/etc/hosts` without a header and need the loopback entries written.
 */
export function detectPlatformProfile(
  platform: string = process.platform,
  env: NodeJS.ProcessEnv = process.env
): PlatformProfile {
  if (platform === 'win32') {
    const systemRoot = env.SystemRoot ?? env.windir ?? 'C:\\Windows';
    return {
      name: platform,
      hostsFilePath: path.win32.join(systemRoot, 'System32', 'drivers', 'etc', 'hosts'),
      legacyEncoding: 'latin1',
      localHostEntry: false,
      hostsFileHeader: true,
      hostsFileBom: false,
      lineEnding: '\r\n',
    };
  }

  if (UNIX_PLATFORMS.includes(platform)) {
    return {
      name: platform,
      hostsFilePath: '/etc/hosts',
      legacyEncoding: 'latin1',
      localHostEntry: true,
      hostsFileHeader: false,
      hostsFileBom: false,
      lineEnding: '\n',
    };
  }

  throw new UnsupportedPlatformError(platform);
}
