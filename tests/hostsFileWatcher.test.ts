import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import * as chokidar from 'chokidar';
import { HostsFileWatcher, HostsFileWatcherEvent } from '../src/services/hostsFileWatcher';

// Replace chokidar with an emitter the tests drive by hand
jest.mock('chokidar', () => {
  const { EventEmitter } = jest.requireActual<typeof import('node:events')>('node:events');
  return {
    watch: jest.fn(() => Object.assign(new EventEmitter(), { close: jest.fn(async () => undefined) }))
  };
});

const wait = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('HostsFileWatcher', () => {
  let tempDir: string;
  let hostsPath: string;
  let watcher: HostsFileWatcher;

  const latestWatcher = (): chokidar.FSWatcher => {
    const results = jest.mocked(chokidar.watch).mock.results;
    return results[results.length - 1].value;
  };

  const touch = async (when: Date) => {
    await fs.utimes(hostsPath, when, when);
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hosts-watcher-'));
    hostsPath = path.join(tempDir, 'hosts');
    await fs.writeFile(hostsPath, '127.0.0.1 localhost\n');
    await touch(new Date(2023, 1, 1));
    watcher = new HostsFileWatcher(hostsPath, { debounceDelay: 10 });
  });

  afterEach(async () => {
    await watcher.stopWatching();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should create a watcher instance with the correct file path', () => {
    expect(watcher.getFilePath()).toBe(hostsPath);
    expect(watcher.isActive()).toBe(false);
  });

  it('should start watching when requested', async () => {
    expect(await watcher.startWatching()).toBe(true);
    expect(watcher.isActive()).toBe(true);
    expect(jest.mocked(chokidar.watch)).toHaveBeenCalledWith(
      hostsPath,
      expect.objectContaining({ persistent: true, ignoreInitial: true })
    );
  });

  it('should not start twice', async () => {
    await watcher.startWatching();
    await watcher.startWatching();
    expect(jest.mocked(chokidar.watch)).toHaveBeenCalledTimes(1);
  });

  it('should fail to start for a missing file', async () => {
    const missing = new HostsFileWatcher(path.join(tempDir, 'missing'));
    expect(await missing.startWatching()).toBe(false);
    expect(missing.isActive()).toBe(false);
  });

  it('should stop watching when requested', async () => {
    await watcher.startWatching();
    const fsWatcher = latestWatcher();

    await watcher.stopWatching();

    expect(watcher.isActive()).toBe(false);
    expect(fsWatcher.close).toHaveBeenCalled();
  });

  it('should emit change events when the modification time moves', async () => {
    const onChanged = jest.fn();
    watcher.on(HostsFileWatcherEvent.CHANGED, onChanged);
    await watcher.startWatching();

    await touch(new Date(2023, 1, 2));
    latestWatcher().emit('change', hostsPath);
    await wait(60);

    expect(onChanged).toHaveBeenCalledWith(hostsPath);
  });

  it('should not emit change event if mtime is the same', async () => {
    const onChanged = jest.fn();
    watcher.on(HostsFileWatcherEvent.CHANGED, onChanged);
    await watcher.startWatching();

    latestWatcher().emit('change', hostsPath);
    await wait(60);

    expect(onChanged).not.toHaveBeenCalled();
  });

  it('should debounce a burst of notifications into one event', async () => {
    const onChanged = jest.fn();
    watcher.on(HostsFileWatcherEvent.CHANGED, onChanged);
    await watcher.startWatching();

    await touch(new Date(2023, 1, 3));
    const fsWatcher = latestWatcher();
    fsWatcher.emit('change', hostsPath);
    fsWatcher.emit('change', hostsPath);
    fsWatcher.emit('change', hostsPath);
    await wait(60);

    expect(onChanged).toHaveBeenCalledTimes(1);
  });

  it('should ignore a change recorded with markAsSynced', async () => {
    const onChanged = jest.fn();
    watcher.on(HostsFileWatcherEvent.CHANGED, onChanged);
    await watcher.startWatching();

    await touch(new Date(2023, 1, 4));
    await watcher.markAsSynced();
    latestWatcher().emit('change', hostsPath);
    await wait(60);

    expect(onChanged).not.toHaveBeenCalled();
  });

  it('should still report a change already waiting when markAsSynced is called', async () => {
    const onChanged = jest.fn();
    watcher.on(HostsFileWatcherEvent.CHANGED, onChanged);
    await watcher.startWatching();

    await touch(new Date(2023, 1, 5));
    latestWatcher().emit('change', hostsPath);
    await watcher.markAsSynced();
    await wait(60);

    expect(onChanged).toHaveBeenCalledWith(hostsPath);
  });

  it('should forward watcher errors', async () => {
    const onError = jest.fn();
    watcher.on(HostsFileWatcherEvent.ERROR, onError);
    await watcher.startWatching();

    const failure = new Error('watch failed');
    latestWatcher().emit('error', failure);

    expect(onError).toHaveBeenCalledWith(failure);
  });

  it('should report a file that disappeared before the check', async () => {
    const onError = jest.fn();
    watcher.on(HostsFileWatcherEvent.ERROR, onError);
    await watcher.startWatching();

    await fs.rm(hostsPath);
    latestWatcher().emit('change', hostsPath);
    await wait(60);

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toMatchObject({ code: 'ENOENT' });
  });
});
