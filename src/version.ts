/** Package version, recorded in the configuration file */
export const APP_VERSION = '1.0.0';

/** Directory name used under the per-user configuration directory */
export const APP_DIRECTORY = 'hostsfile-editor';
