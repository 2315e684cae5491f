import fs from 'node:fs/promises';
import { EventEmitter } from 'node:events';
import * as sudo from 'sudo-prompt';
import path from 'node:path';
import os from 'node:os';
import { v4 as uuidv4 } from 'uuid';
import { HostsFileIOError, isErrnoException } from '../errors';
import { HostsFileEntry } from '../models/hostsFileEntry';
import { formatTemplate, HostsFileTemplates } from '../resources/templates';
import { HostsFileEncoding } from '../types/hostsFile';

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);
const ELEVATION_PROMPT_NAME = 'Hosts File Editor';

/**
 * Events emitted by the HostsFileWriter
 */
export enum HostsFileWriterEvent {
  SUCCESS = 'success',
  ERROR = 'error'
}

/**
 * Result of a write operation
 */
export interface WriteResult {
  filePath: string;
  /** Backup taken before the write, if one was requested and the file existed */
  backupPath?: string;
}

/**
 * Options for writing to the hosts file
 */
export interface WriteOptions {
  /** Whether to make a backup of the existing file before writing */
  createBackup?: boolean;
  /** Directory for backups (defaults to the directory of the file) */
  backupDirectory?: string;
  /** Maximum number of backups to keep for this file; older ones are deleted */
  maxBackups?: number;
  /** Whether to copy the file into place through an elevation prompt */
  useElevatedPermissions?: boolean;
}

/**
 * Options for turning entries into text
 */
export interface SerializeOptions {
  templates: HostsFileTemplates;
  lineEnding: string;
  /** Whether to start with the header block */
  includeHeader: boolean;
}

/**
 * Serialized hosts file text
 */
export interface SerializedHostsFile {
  content: string;
  /** Entries written */
  written: number;
  /** Invalid entries left out */
  excluded: number;
}

/**
 * Format a single entry with the one-field or with-comment template
 */
export function formatEntry(entry: HostsFileEntry, templates: HostsFileTemplates): string {
  const ip = entry.ipAddress?.toString() ?? '';
  const host = entry.hostname?.toString() ?? '';

  if (!entry.hasComment) {
    return formatTemplate(templates.entrySingle, ip, host);
  }

  // One entry, one line
  const comment = entry.comment.replace(/[\r\n]+/g, ' ').trim();
  return formatTemplate(templates.entryWithComment, ip, host, comment);
}

/**
 * Convert entries to hosts file text. Only valid entries are written, in the
 * order given; every line, header lines included, ends with the line ending.
 */
export function convertToString(entries: Iterable<HostsFileEntry>, options: SerializeOptions): SerializedHostsFile {
  const lines: string[] = [];
  let written = 0;
  let excluded = 0;

  if (options.includeHeader) {
    lines.push(...options.templates.header.split(/\r?\n/));
  }

  for (const entry of entries) {
    if (!entry.isValid) {
      excluded++;
      continue;
    }
    lines.push(formatEntry(entry, options.templates));
    written++;
  }

  return {
    content: lines.map(line => line + options.lineEnding).join(''),
    written,
    excluded
  };
}

/**
 * Encode text for disk
 */
export function encodeContent(content: string, encoding: HostsFileEncoding): Buffer {
  if (encoding.kind === 'unicode') {
    const body = Buffer.from(content, 'utf8');
    return encoding.bom ? Buffer.concat([UTF8_BOM, body]) : body;
  }
  return Buffer.from(content, encoding.name);
}

/**
 * Quote a path for the shell that runs the elevated copy. POSIX shells get a
 * single-quoted word. cmd.exe has no escape inside double quotes, so a path
 * with a quote, a percent sign or a line break is rejected.
 * @throws HostsFileIOError for a path cmd.exe cannot take
 */
export function quoteShellArgument(value: string, platform: string = process.platform): string {
  if (platform === 'win32') {
    if (/["%\r\n]/.test(value)) {
      throw new HostsFileIOError(`Path cannot be passed to the elevation prompt: ${value}`, value);
    }
    return `"${value}"`;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Service for writing the hosts file to disk
 */
export class HostsFileWriter extends EventEmitter {
  /**
   * Replace the contents of a file. The data goes to a temporary file next to
   * the target which is then renamed over it, so a failed write leaves the
   * old file in place.
   * @throws HostsFileIOError on any failure
   */
  public async writeHostsFile(filePath: string, data: Buffer, options: WriteOptions = {}): Promise<WriteResult> {
    try {
      let backupPath: string | undefined;
      if (options.createBackup) {
        backupPath = await this.createBackup(filePath, options);
      }

      if (options.useElevatedPermissions) {
        await this.writeWithElevatedPermissions(filePath, data);
      } else {
        await this.writeAtomically(filePath, data);
      }

      const result: WriteResult = { filePath, backupPath };
      this.emit(HostsFileWriterEvent.SUCCESS, result);
      return result;
    } catch (error) {
      const wrapped = error instanceof HostsFileIOError
        ? error
        : new HostsFileIOError(`Failed to write hosts file ${filePath}: ${describeError(error)}`, filePath, error);
      if (this.listenerCount(HostsFileWriterEvent.ERROR) > 0) {
        this.emit(HostsFileWriterEvent.ERROR, wrapped);
      }
      throw wrapped;
    }
  }

  /**
   * Copy the existing file to a timestamped backup and prune old backups.
   * @returns The backup path, or undefined when there was no file to back up
   */
  public async createBackup(filePath: string, options: Pick<WriteOptions, 'backupDirectory' | 'maxBackups'> = {}): Promise<string | undefined> {
    const directory = options.backupDirectory ?? path.dirname(filePath);
    const prefix = `${path.basename(filePath)}.backup.`;

    if (options.backupDirectory) {
      await fs.mkdir(options.backupDirectory, { recursive: true });
    }

    // Two backups in the same millisecond take the next free stamp
    let stamp = Date.now();
    let backupPath = path.join(directory, `${prefix}${stamp}`);
    for (;;) {
      try {
        await fs.copyFile(filePath, backupPath, fs.constants.COPYFILE_EXCL);
        break;
      } catch (error) {
        if (!isErrnoException(error)) {
          throw error;
        }
        if (error.code === 'ENOENT') {
          return undefined;
        }
        if (error.code !== 'EEXIST') {
          throw error;
        }
        stamp++;
        backupPath = path.join(directory, `${prefix}${stamp}`);
      }
    }

    if (options.maxBackups !== undefined) {
      await this.pruneBackups(directory, prefix, options.maxBackups);
    }

    return backupPath;
  }

  /**
   * Delete the oldest backups beyond the limit
   */
  private async pruneBackups(directory: string, prefix: string, maxBackups: number): Promise<void> {
    const names = await fs.readdir(directory);
    const backups = names
      .filter(name => name.startsWith(prefix) && /^\d+$/.test(name.slice(prefix.length)))
      .sort((a, b) => Number(a.slice(prefix.length)) - Number(b.slice(prefix.length)));

    const excess = backups.slice(0, Math.max(0, backups.length - maxBackups));
    for (const name of excess) {
      try {
        await fs.unlink(path.join(directory, name));
      } catch (error) {
        console.warn(`Failed to delete old backup ${name}: ${describeError(error)}`);
      }
    }
  }

  private async writeAtomically(filePath: string, data: Buffer): Promise<void> {
    const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${uuidv4()}.tmp`);
    const mode = await this.existingMode(filePath);

    try {
      const handle = await fs.open(tempPath, 'w');
      try {
        await handle.writeFile(data);
        if (mode !== undefined) {
          await handle.chmod(mode);
        }
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await this.removeTemporaryFile(tempPath);
      throw error;
    }
  }

  /**
   * Permission bits of the file being replaced, if it exists
   */
  private async existingMode(filePath: string): Promise<number | undefined> {
    try {
      const stats = await fs.stat(filePath);
      return stats.mode & 0o777;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  private async removeTemporaryFile(tempPath: string): Promise<void> {
    try {
      await fs.unlink(tempPath);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        console.warn(`Failed to delete temporary file ${tempPath}: ${describeError(error)}`);
      }
    }
  }

  /**
   * Write to a temporary file, then copy it over the target with elevated
   * permissions using sudo-prompt
   */
  private async writeWithElevatedPermissions(filePath: string, data: Buffer): Promise<void> {
    const tempFilePath = path.join(os.tmpdir(), `hosts-${uuidv4()}.tmp`);

    // Rejects unusable paths before anything is written
    quoteShellArgument(filePath, process.platform);

    try {
      await fs.writeFile(tempFilePath, data);
    } catch (error) {
      throw new HostsFileIOError(`Failed to write temporary file: ${describeError(error)}`, filePath, error);
    }

    const command = process.platform === 'win32'
      ? `cmd.exe /c copy /B /Y ${quoteShellArgument(tempFilePath, 'win32')} ${quoteShellArgument(filePath, 'win32')}`
      : `cp ${quoteShellArgument(tempFilePath)} ${quoteShellArgument(filePath)}`;

    try {
      await this.executeWithElevatedPrivileges(command, 'write hosts file');
    } finally {
      await this.removeTemporaryFile(tempFilePath);
    }
  }

  /**
   * Execute a command with elevated privileges using sudo-prompt
   * @param command The full command line to run
   * @param description What the command does, for error messages
   */
  public executeWithElevatedPrivileges(command: string, description: string): Promise<void> {
    return new Promise((resolve, reject) => {
      sudo.exec(command, { name: ELEVATION_PROMPT_NAME }, (error, _stdout, stderr) => {
        if (error) {
          const detail = stderr ? stderr.toString().trim() : '';
          reject(new Error(`Failed to ${description}: ${detail || error.message}`));
        } else {
          resolve();
        }
      });
    });
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
