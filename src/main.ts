import path from 'node:path';
import { HostsFileManager, HostsFileManagerEvent } from './services/hostsFileManager';
import { ConfigurationManager } from './services/configurationManager';
import { detectPlatformProfile } from './services/platform';
import { HostsFileTemplates } from './resources/templates';
import { AppConfiguration } from './types/configuration';
import { PlatformProfile } from './types/platform';
import { WriteOptions } from './services/hostsFileWriter';

export interface HostsEditorOptions {
  /** Directory holding config.json (defaults to the per-user configuration directory) */
  configDirectory?: string;
  /** Platform conventions (defaults to the running platform) */
  platform?: PlatformProfile;
  templates?: HostsFileTemplates;
  /** Start the file watcher when the configuration asks for automatic reloads */
  watch?: boolean;
}

/**
 * A configured file manager together with the configuration it came from
 */
export interface HostsEditor {
  manager: HostsFileManager;
  configManager: ConfigurationManager;
  config: AppConfiguration;
}

/**
 * Write settings for save() derived from the configuration. Backups go to the
 * configured directory, or a `backups` folder next to the configuration file.
 */
export function writeOptionsFromConfig(config: AppConfiguration, configManager: ConfigurationManager): WriteOptions {
  return {
    createBackup: config.hostsFile.createBackups,
    backupDirectory: config.hostsFile.backupDirectory
      ?? path.join(path.dirname(configManager.getConfigFilePath()), 'backups'),
    maxBackups: config.hostsFile.maxBackups,
    useElevatedPermissions: config.system.alwaysUseElevatedPermissions,
  };
}

/**
 * Load the configuration and build a file manager from it. The hosts file
 * itself is not read; call `manager.load()` when ready.
 */
export async function createHostsEditor(options: HostsEditorOptions = {}): Promise<HostsEditor> {
  const configManager = new ConfigurationManager(options.configDirectory);
  const config = await configManager.loadConfig();
  await configManager.applyVersionUpdates();

  const platform = options.platform ?? detectPlatformProfile();
  const manager = new HostsFileManager(platform, {
    filePath: config.hostsFile.customPath,
    multiByteEncoding: config.hostsFile.multiByteEncoding,
    templates: options.templates,
    writeOptions: writeOptionsFromConfig(config, configManager),
  });

  if (options.watch && config.hostsFile.autoReloadOnExternalChanges) {
    manager.on(HostsFileManagerEvent.FILE_CHANGED, () => {
      console.log(`Reloaded ${manager.filePath} after an external change`);
    });
    await manager.startFileWatcher();
  }

  return { manager, configManager, config };
}

/**
 * Switch between the legacy encoding and UTF-8 and remember the choice
 */
export async function setFileEncoding(editor: HostsEditor, unicode: boolean): Promise<void> {
  editor.manager.multiByteEncoding = unicode;
  editor.config = await editor.configManager.updateConfig({ hostsFile: { multiByteEncoding: unicode } });
}

/**
 * Apply new backup and elevation preferences to the manager and persist them
 */
export async function updateWritePreferences(
  editor: HostsEditor,
  update: {
    createBackups?: boolean;
    backupDirectory?: string;
    maxBackups?: number;
    alwaysUseElevatedPermissions?: boolean;
  }
): Promise<void> {
  const { alwaysUseElevatedPermissions, ...hostsFile } = update;
  editor.config = await editor.configManager.updateConfig({
    hostsFile,
    system: alwaysUseElevatedPermissions === undefined ? undefined : { alwaysUseElevatedPermissions },
  });
  editor.manager.setWriteOptions(writeOptionsFromConfig(editor.config, editor.configManager));
}
