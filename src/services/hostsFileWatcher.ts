import * as chokidar from 'chokidar';
import fs from 'node:fs/promises';
import { EventEmitter } from 'node:events';

/**
 * Event types emitted by the HostsFileWatcher
 */
export enum HostsFileWatcherEvent {
  CHANGED = 'changed',
  ERROR = 'error'
}

export interface HostsFileWatcherOptions {
  /** Quiet period before a burst of change notifications is handled (ms) */
  debounceDelay?: number;
}

/**
 * Watches the hosts file for modifications made outside this process
 */
export class HostsFileWatcher extends EventEmitter {
  private watcher: chokidar.FSWatcher | null = null;
  private readonly filePath: string;
  private lastModified: Date | null = null;
  private isWatching: boolean = false;
  private debounceTimer: NodeJS.Timeout | null = null;
  private readonly debounceDelay: number;

  /**
   * @param hostsFilePath Path to the hosts file to watch
   */
  constructor(hostsFilePath: string, options: HostsFileWatcherOptions = {}) {
    super();
    this.filePath = hostsFilePath;
    this.debounceDelay = options.debounceDelay ?? 300;
  }

  /**
   * Start watching the hosts file for changes
   * @returns True if watching started successfully
   */
  public async startWatching(): Promise<boolean> {
    if (this.isWatching) {
      return true;
    }

    try {
      // Baseline for change detection
      const stats = await fs.stat(this.filePath);
      this.lastModified = stats.mtime;

      this.watcher = chokidar.watch(this.filePath, {
        persistent: true,
        ignoreInitial: true,
        awaitWriteFinish: {
          stabilityThreshold: 500,
          pollInterval: 100,
        },
      });

      this.watcher
        .on('change', (changedPath: string) => this.handleFileChanged(changedPath))
        .on('error', (error: Error) => {
          console.error('Error watching hosts file:', error);
          this.emitError(error);
        });

      this.isWatching = true;
      console.log(`Started watching hosts file: ${this.filePath}`);
      return true;
    } catch (error) {
      console.error('Failed to start watching hosts file:', error);
      this.isWatching = false;
      return false;
    }
  }

  /**
   * Stop watching the hosts file
   */
  public async stopWatching(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }

    if (!this.isWatching || !this.watcher) {
      return;
    }

    await this.watcher.close();
    this.watcher = null;
    this.isWatching = false;
    console.log(`Stopped watching hosts file: ${this.filePath}`);
  }

  /**
   * Record the file's current modification time as known, so a write made by
   * this process is not reported as an external change. A notification still
   * waiting out the debounce delay is left to be checked.
   */
  public async markAsSynced(): Promise<void> {
    if (this.debounceTimer) {
      return;
    }

    try {
      const stats = await fs.stat(this.filePath);
      this.lastModified = stats.mtime;
    } catch (error) {
      this.emitError(error);
    }
  }

  /**
   * Debounce rapid notifications into a single check
   */
  private handleFileChanged(changedPath: string): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      void this.checkForChange(changedPath);
    }, this.debounceDelay);
  }

  private async checkForChange(changedPath: string): Promise<void> {
    try {
      const stats = await fs.stat(this.filePath);
      const currentMtime = stats.mtime;

      if (!this.lastModified || currentMtime.getTime() !== this.lastModified.getTime()) {
        this.lastModified = currentMtime;
        console.log(`Hosts file changed externally: ${changedPath}`);
        this.emit(HostsFileWatcherEvent.CHANGED, changedPath);
      }
    } catch (error) {
      console.error('Error checking file stats:', error);
      this.emitError(error);
    }
  }

  private emitError(error: unknown): void {
    if (this.listenerCount(HostsFileWatcherEvent.ERROR) > 0) {
      this.emit(HostsFileWatcherEvent.ERROR, error);
    }
  }

  /**
   * Check if the watcher is currently active
   */
  public isActive(): boolean {
    return this.isWatching;
  }

  /**
   * Get the path of the file being watched
   */
  public getFilePath(): string {
    return this.filePath;
  }
}
