/**
 * Types for application configuration and preferences
 */

/**
 * Hosts file operation preferences
 */
export interface HostsFilePreferences {
  /** Whether to read and write the file as UTF-8 instead of the platform legacy encoding */
  multiByteEncoding: boolean;
  /** File to edit instead of the platform's hosts file */
  customPath?: string;
  /** Whether to create backups before saving the hosts file */
  createBackups: boolean;
  /** Directory to store backups in (if not specified, uses the configuration directory) */
  backupDirectory?: string;
  /** Maximum number of backup files to keep */
  maxBackups: number;
  /** Whether to reload immediately after external changes */
  autoReloadOnExternalChanges: boolean;
}

/**
 * System integration preferences
 */
export interface SystemPreferences {
  /** Whether to save through an elevation prompt */
  alwaysUseElevatedPermissions: boolean;
}

/**
 * Complete application configuration
 */
export interface AppConfiguration {
  /** Application version when the config was last updated */
  version: string;
  /** When the configuration was last updated */
  lastUpdated: string;
  /** Hosts file operation preferences */
  hostsFile: HostsFilePreferences;
  /** System integration preferences */
  system: SystemPreferences;
}

/**
 * Recursive partial used for configuration updates
 */
export type ConfigurationUpdate = {
  version?: string;
  lastUpdated?: string;
  hostsFile?: Partial<HostsFilePreferences>;
  system?: Partial<SystemPreferences>;
};
