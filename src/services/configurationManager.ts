import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import { AppConfiguration, ConfigurationUpdate } from '../types/configuration';
import { StoredConfigurationSchema } from '../validation/configSchema';
import { APP_DIRECTORY, APP_VERSION } from '../version';

/**
 * Configuration manager events
 */
export enum ConfigManagerEvent {
  /** Emitted when configuration is loaded */
  LOADED = 'loaded',
  /** Emitted when configuration is saved */
  SAVED = 'saved',
  /** Emitted when configuration is changed */
  CHANGED = 'changed',
  /** Emitted when an error occurs */
  ERROR = 'error'
}

/**
 * Per-user configuration directory: %APPDATA% on Windows, XDG_CONFIG_HOME or
 * ~/.config elsewhere
 */
export function getDefaultConfigDirectory(
  platform: string = process.platform,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (platform === 'win32') {
    const appData = env.APPDATA ?? path.win32.join(os.homedir(), 'AppData', 'Roaming');
    return path.win32.join(appData, APP_DIRECTORY);
  }
  return path.join(env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config'), APP_DIRECTORY);
}

/**
 * Manages application configuration and user preferences
 */
export class ConfigurationManager extends EventEmitter {
  /** Path to the configuration file */
  private configFilePath: string;
  /** Version written into saved configuration */
  private readonly appVersion: string;
  /** Current configuration */
  private config: AppConfiguration;
  /** Whether the configuration has been loaded */
  private isLoaded: boolean = false;

  /**
   * @param configDirectory Directory holding the configuration file
   * @param configFilename Optional custom filename for the config file
   * @param appVersion Version recorded in the file
   */
  constructor(
    configDirectory: string = getDefaultConfigDirectory(),
    configFilename: string = 'config.json',
    appVersion: string = APP_VERSION
  ) {
    super();
    this.configFilePath = path.join(configDirectory, configFilename);
    this.appVersion = appVersion;
    this.config = this.createDefaults();
  }

  /**
   * Default configuration values
   */
  createDefaults(): AppConfiguration {
    return {
      version: this.appVersion,
      lastUpdated: new Date().toISOString(),
      hostsFile: {
        multiByteEncoding: false,
        createBackups: true,
        maxBackups: 10,
        autoReloadOnExternalChanges: true,
      },
      system: {
        alwaysUseElevatedPermissions: false,
      }
    };
  }

  /**
   * Loads the configuration from disk. A missing file is created with the
   * defaults; an unreadable or invalid one is reported and replaced by the
   * defaults in memory.
   * @returns Promise that resolves with the loaded configuration
   */
  async loadConfig(): Promise<AppConfiguration> {
    if (!fs.existsSync(this.configFilePath)) {
      this.config = this.createDefaults();
      this.isLoaded = true;
      await this.saveConfig();
      return this.getConfig();
    }

    let raw: unknown;
    try {
      const fileContent = await fs.promises.readFile(this.configFilePath, 'utf-8');
      raw = JSON.parse(fileContent);
    } catch (error) {
      return this.fallBackToDefaults(error);
    }

    const parsed = StoredConfigurationSchema.safeParse(raw);
    if (!parsed.success) {
      return this.fallBackToDefaults(parsed.error);
    }

    // Merge with defaults to ensure all properties exist
    this.config = this.merge(this.createDefaults(), parsed.data);
    this.isLoaded = true;
    this.emit(ConfigManagerEvent.LOADED, this.getConfig());
    return this.getConfig();
  }

  /**
   * Saves the current configuration to disk
   * @returns Promise that resolves when the configuration is saved
   */
  async saveConfig(): Promise<void> {
    try {
      this.config.lastUpdated = new Date().toISOString();

      const configDir = path.dirname(this.configFilePath);
      await fs.promises.mkdir(configDir, { recursive: true });

      await fs.promises.writeFile(
        this.configFilePath,
        JSON.stringify(this.config, null, 2),
        'utf-8'
      );

      this.emit(ConfigManagerEvent.SAVED, this.getConfig());
    } catch (error) {
      this.emitError(error);
      throw error;
    }
  }

  /**
   * Updates specific configuration values
   * @param update Values to change; omitted values are kept
   * @param saveImmediately Whether to save the changes to disk immediately
   * @returns Promise that resolves when the update is complete
   */
  async updateConfig(
    update: ConfigurationUpdate,
    saveImmediately: boolean = true
  ): Promise<AppConfiguration> {
    if (!this.isLoaded) {
      await this.loadConfig();
    }

    this.config = this.merge(this.config, update);
    this.emit(ConfigManagerEvent.CHANGED, this.getConfig());

    if (saveImmediately) {
      await this.saveConfig();
    }

    return this.getConfig();
  }

  /**
   * Gets a copy of the current configuration
   */
  getConfig(): AppConfiguration {
    return {
      ...this.config,
      hostsFile: { ...this.config.hostsFile },
      system: { ...this.config.system },
    };
  }

  /**
   * Resets the configuration to defaults
   * @param saveImmediately Whether to save the changes to disk immediately
   */
  async resetToDefaults(saveImmediately: boolean = true): Promise<AppConfiguration> {
    this.config = this.createDefaults();
    this.emit(ConfigManagerEvent.CHANGED, this.getConfig());

    if (saveImmediately) {
      await this.saveConfig();
    }

    return this.getConfig();
  }

  /**
   * Record the running version in the configuration file when it differs
   */
  async applyVersionUpdates(): Promise<void> {
    if (this.config.version !== this.appVersion) {
      this.config.version = this.appVersion;
      await this.saveConfig();
    }
  }

  /**
   * Get the configuration file path
   */
  getConfigFilePath(): string {
    return this.configFilePath;
  }

  private fallBackToDefaults(error: unknown): AppConfiguration {
    console.error(`Invalid configuration file ${this.configFilePath}, using defaults:`, error);
    this.emitError(error);
    this.config = this.createDefaults();
    this.isLoaded = true;
    return this.getConfig();
  }

  private merge(base: AppConfiguration, update: ConfigurationUpdate): AppConfiguration {
    return {
      version: update.version ?? base.version,
      lastUpdated: update.lastUpdated ?? base.lastUpdated,
      hostsFile: { ...base.hostsFile, ...update.hostsFile },
      system: { ...base.system, ...update.system },
    };
  }

  private emitError(error: unknown): void {
    if (this.listenerCount(ConfigManagerEvent.ERROR) > 0) {
      this.emit(ConfigManagerEvent.ERROR, error);
    }
  }
}
