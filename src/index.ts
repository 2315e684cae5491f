export * from './errors';
export * from './models/hostname';
export * from './models/ipAddress';
export * from './models/hostsFileEntry';
export * from './models/entryCollection';
export * from './resources/templates';
export * from './services/hostsFileParser';
export * from './services/hostsFileWriter';
export * from './services/hostsFileWatcher';
export * from './services/hostsFileManager';
export * from './services/platform';
export * from './services/tabularFormat';
export * from './services/configurationManager';
export * from './main';
export type * from './types/hostsFile';
export type * from './types/platform';
export type * from './types/configuration';
