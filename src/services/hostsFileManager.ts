import fs from 'node:fs/promises';
import { EventEmitter } from 'node:events';
import { TextDecoder } from 'node:util';
import {
  HostsFileEncodingError,
  HostsFileIOError,
  HostsFileNotFoundError,
  isErrnoException,
  OperationInProgressError
} from '../errors';
import { EntryCollection } from '../models/entryCollection';
import { Hostname } from '../models/hostname';
import { HostsFileEntry } from '../models/hostsFileEntry';
import { IpAddress } from '../models/ipAddress';
import { DEFAULT_TEMPLATES, HostsFileTemplates } from '../resources/templates';
import { HostsFileEncoding, LoadResult, SaveResult, TabularImportResult } from '../types/hostsFile';
import { PlatformProfile } from '../types/platform';
import { parseHostsContent } from './hostsFileParser';
import { HostsFileWatcher, HostsFileWatcherEvent, HostsFileWatcherOptions } from './hostsFileWatcher';
import { convertToString, encodeContent, HostsFileWriter, WriteOptions } from './hostsFileWriter';
import { formatTabularEntries, parseTabularEntries } from './tabularFormat';

/**
 * Events emitted by the HostsFileManager
 */
export enum HostsFileManagerEvent {
  /** A load or refresh finished; receives a LoadResult */
  LOADED = 'loaded',
  /** A save or export finished; receives a SaveResult */
  SAVED = 'saved',
  /** The watched file changed on disk and was reloaded; receives a LoadResult */
  FILE_CHANGED = 'file_changed',
  ERROR = 'error'
}

export interface HostsFileManagerOptions {
  /** File to work on instead of the platform's canonical hosts file */
  filePath?: string;
  /** Start in Unicode (UTF-8) mode instead of the platform legacy encoding */
  multiByteEncoding?: boolean;
  templates?: HostsFileTemplates;
  writer?: HostsFileWriter;
  /** Backup and elevation settings applied by save(); exports never use them */
  writeOptions?: WriteOptions;
  watcherOptions?: HostsFileWatcherOptions;
}

const UTF8_BOM = [0xef, 0xbb, 0xbf];

/**
 * Loads the hosts file into an ordered entry collection and writes it back.
 *
 * Only one of load, refresh, save, export, restore and importTabular may run at
 * a time on an instance; a second call while one is in flight is rejected with
 * OperationInProgressError.
 */
export class HostsFileManager extends EventEmitter {
  /** Entries in file order */
  public readonly contents = new EntryCollection();

  private readonly platform: PlatformProfile;
  private readonly templates: HostsFileTemplates;
  private readonly writer: HostsFileWriter;
  private readonly watcherOptions: HostsFileWatcherOptions;
  private writeOptions: WriteOptions;
  private hostsFilePath: string;
  private encoding: HostsFileEncoding;
  private currentOperation: string | null = null;
  private fileWatcher: HostsFileWatcher | null = null;
  /** An external change arrived while an operation was running */
  private reloadPending = false;
  private skippedLines = 0;

  constructor(platform: PlatformProfile, options: HostsFileManagerOptions = {}) {
    super();
    this.platform = platform;
    this.hostsFilePath = options.filePath ?? platform.hostsFilePath;
    this.templates = options.templates ?? DEFAULT_TEMPLATES;
    this.writer = options.writer ?? new HostsFileWriter();
    this.writeOptions = options.writeOptions ?? {};
    this.watcherOptions = options.watcherOptions ?? {};
    this.encoding = this.encodingFor(options.multiByteEncoding ?? false);
  }

  /**
   * Path used by load(), refresh() and save() when none is given
   */
  get filePath(): string {
    return this.hostsFilePath;
  }

  /**
   * Whether the file is read and written as UTF-8 rather than the platform
   * legacy encoding. Changing it leaves loaded entries untouched.
   */
  get multiByteEncoding(): boolean {
    return this.encoding.kind === 'unicode';
  }

  set multiByteEncoding(value: boolean) {
    this.encoding = this.encodingFor(value);
  }

  get encodingName(): string {
    if (this.encoding.kind === 'unicode') {
      return this.encoding.bom ? 'Unicode (UTF-8 with BOM)' : 'Unicode (UTF-8)';
    }
    return this.encoding.name === 'latin1' ? 'Western European (ISO-8859-1)' : 'US-ASCII';
  }

  get currentEncoding(): HostsFileEncoding {
    return { ...this.encoding };
  }

  /**
   * Lines the last load or refresh could not turn into entries
   */
  get lastSkippedLines(): number {
    return this.skippedLines;
  }

  /**
   * Name of the operation in progress, or null when idle
   */
  get busyWith(): string | null {
    return this.currentOperation;
  }

  /**
   * Switch to another file. A running watcher follows the new path.
   */
  public async setFilePath(filePath: string): Promise<void> {
    this.assertIdle('change the file path');
    const wasWatching = this.isWatcherActive();
    if (wasWatching) {
      await this.stopFileWatcher();
    }
    this.hostsFilePath = filePath;
    if (wasWatching) {
      await this.startFileWatcher();
    }
  }

  /**
   * Replace the backup and elevation settings used by save()
   */
  public setWriteOptions(options: WriteOptions): void {
    this.writeOptions = { ...options };
  }

  public addEntry(ipAddress: IpAddress, hostname: Hostname, comment: string = ''): HostsFileEntry {
    const entry = new HostsFileEntry(ipAddress, hostname, comment);
    this.contents.add(entry);
    return entry;
  }

  public removeEntry(entry: HostsFileEntry): boolean {
    return this.contents.remove(entry);
  }

  /**
   * Append the entries of a file to the collection without clearing it.
   * Defaults to the current file; reading another file does not change the
   * current path.
   * @throws HostsFileNotFoundError when the file does not exist
   * @throws HostsFileIOError or HostsFileEncodingError on other failures
   */
  public async load(sourceFile: string = this.hostsFilePath): Promise<LoadResult> {
    return this.runExclusive('load', () => this.readHostsFile(sourceFile));
  }

  /**
   * Discard the in-memory entries and read the current file again
   */
  public async refresh(): Promise<LoadResult> {
    return this.runExclusive('refresh', () => {
      this.contents.clear();
      return this.readHostsFile(this.hostsFilePath);
    });
  }

  /**
   * Write the collection to the current file, with the header if the
   * platform expects one
   */
  public async save(): Promise<SaveResult> {
    return this.runExclusive('save', () => this.writeHostsFile(this.hostsFilePath, false, this.writeOptions));
  }

  /**
   * Write the collection to another file, never with the header
   */
  public async export(targetFile: string): Promise<SaveResult> {
    return this.runExclusive('export', () => this.writeHostsFile(targetFile, true, {}));
  }

  /**
   * Reset the collection to the platform default. Nothing is written until
   * save() is called.
   */
  public restore(): void {
    this.assertIdle('restore');
    this.contents.clear();
    if (this.platform.localHostEntry) {
      this.contents.add(new HostsFileEntry(IpAddress.LOOPBACK, Hostname.LOCALHOST, ''));
      this.contents.add(new HostsFileEntry(IpAddress.IPV6_LOOPBACK, Hostname.LOCALHOST, ''));
    }
  }

  /**
   * Append rows of `address<TAB>hostname<TAB>comment` text
   */
  public importTabular(text: string): TabularImportResult {
    this.assertIdle('import');
    const { entries, rejected } = parseTabularEntries(text);
    for (const entry of entries) {
      this.contents.add(entry);
    }
    return { added: entries.length, rejected };
  }

  /**
   * Valid entries (all by default) as tab-separated rows
   */
  public formatTabular(entries: Iterable<HostsFileEntry> = this.contents): string {
    return formatTabularEntries(entries);
  }

  /**
   * Start watching the current file; external modifications trigger refresh()
   */
  public async startFileWatcher(): Promise<boolean> {
    if (this.fileWatcher) {
      await this.stopFileWatcher();
    }

    this.fileWatcher = new HostsFileWatcher(this.hostsFilePath, this.watcherOptions);

    this.fileWatcher.on(HostsFileWatcherEvent.CHANGED, () => {
      void this.handleExternalChange();
    });

    this.fileWatcher.on(HostsFileWatcherEvent.ERROR, (error: unknown) => {
      console.error('File watcher error:', error);
      this.emitError(error);
    });

    return this.fileWatcher.startWatching();
  }

  public async stopFileWatcher(): Promise<void> {
    if (this.fileWatcher) {
      await this.fileWatcher.stopWatching();
      this.fileWatcher.removeAllListeners();
      this.fileWatcher = null;
      this.reloadPending = false;
    }
  }

  public isWatcherActive(): boolean {
    return this.fileWatcher !== null && this.fileWatcher.isActive();
  }

  private async handleExternalChange(): Promise<void> {
    if (this.currentOperation) {
      console.log(`Hosts file changed during ${this.currentOperation}, reloading when it finishes`);
      this.reloadPending = true;
      return;
    }

    console.log('Hosts file changed, reloading...');
    try {
      const result = await this.refresh();
      this.emit(HostsFileManagerEvent.FILE_CHANGED, result);
    } catch (error) {
      // refresh() has already reported the failure
      console.error('Error reloading hosts file:', error);
    }
  }

  private async readFileBytes(sourceFile: string): Promise<Buffer> {
    try {
      const handle = await fs.open(sourceFile, 'r');
      try {
        return await handle.readFile();
      } finally {
        await handle.close();
      }
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new HostsFileNotFoundError(sourceFile, error);
      }
      throw new HostsFileIOError(`Failed to read hosts file ${sourceFile}: ${describeError(error)}`, sourceFile, error);
    }
  }

  private async readHostsFile(sourceFile: string): Promise<LoadResult> {
    const buffer = await this.readFileBytes(sourceFile);
    const { entries, skipped } = parseHostsContent(this.decode(buffer, sourceFile));
    for (const entry of entries) {
      this.contents.add(entry);
    }
    this.skippedLines = skipped;

    const result: LoadResult = { filePath: sourceFile, added: entries.length, skipped };
    this.emit(HostsFileManagerEvent.LOADED, result);
    return result;
  }

  private async writeHostsFile(targetFile: string, skipHeader: boolean, writeOptions: WriteOptions): Promise<SaveResult> {
    const includeHeader = this.platform.hostsFileHeader && !skipHeader;
    const serialized = convertToString(this.contents, {
      templates: this.templates,
      lineEnding: this.platform.lineEnding,
      includeHeader
    });

    const { backupPath } = await this.writer.writeHostsFile(
      targetFile,
      encodeContent(serialized.content, this.encoding),
      writeOptions
    );

    if (this.fileWatcher && targetFile === this.hostsFilePath) {
      await this.fileWatcher.markAsSynced();
    }

    const result: SaveResult = {
      filePath: targetFile,
      written: serialized.written,
      excluded: serialized.excluded,
      header: includeHeader,
      backupPath
    };
    this.emit(HostsFileManagerEvent.SAVED, result);
    return result;
  }

  /**
   * A leading UTF-8 byte-order mark wins over the configured encoding
   */
  private decode(buffer: Buffer, sourceFile: string): string {
    const hasBom = buffer.length >= 3 && UTF8_BOM.every((byte, index) => buffer[index] === byte);

    if (hasBom || this.encoding.kind === 'unicode') {
      try {
        return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(hasBom ? buffer.subarray(3) : buffer);
      } catch (error) {
        throw new HostsFileEncodingError(sourceFile, 'UTF-8', error);
      }
    }

    return buffer.toString(this.encoding.name);
  }

  private encodingFor(unicode: boolean): HostsFileEncoding {
    return unicode
      ? { kind: 'unicode', bom: this.platform.hostsFileBom }
      : { kind: 'legacy', name: this.platform.legacyEncoding };
  }

  private assertIdle(operation: string): void {
    if (this.currentOperation) {
      throw new OperationInProgressError(operation, this.currentOperation);
    }
  }

  private async runExclusive<T>(operation: string, task: () => Promise<T>): Promise<T> {
    this.assertIdle(operation);
    this.currentOperation = operation;
    try {
      return await task();
    } catch (error) {
      console.error(`Hosts file ${operation} failed:`, error);
      this.emitError(error);
      throw error;
    } finally {
      this.currentOperation = null;
      this.reloadIfPending();
    }
  }

  private reloadIfPending(): void {
    if (this.reloadPending && this.fileWatcher) {
      this.reloadPending = false;
      void this.handleExternalChange();
    }
  }

  private emitError(error: unknown): void {
    if (this.listenerCount(HostsFileManagerEvent.ERROR) > 0) {
      this.emit(HostsFileManagerEvent.ERROR, error);
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
