import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FileWatcher, type FileChangeEvent } from '../file-watcher.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

const WAIT_OPTIONS = { timeout: 5000, interval: 50 };

describe('FileWatcher', () => {
  let tmpDir: string;
  let watcher: FileWatcher | null;

  beforeEach(async () => {
    // @parcel/watcherは実パスでイベントを返す
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'file-watcher-test-')));
    watcher = null;
  });

  afterEach(async () => {
    if (watcher) {
      await watcher.stop();
    }
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function startWatcher(events: FileChangeEvent[]): Promise<FileWatcher> {
    const started = new FileWatcher({ rootDir: tmpDir });
    started.on('change', (event: FileChangeEvent) => events.push(event));
    await started.start();
    watcher = started;
    return started;
  }

  it('ファイル追加を検出できる', async () => {
    const events: FileChangeEvent[] = [];
    await startWatcher(events);

    await fs.writeFile(path.join(tmpDir, 'test.md'), '# Test');

    await vi.waitFor(() => {
      expect(events.some((event) => event.path === 'test.md' && event.type === 'add')).toBe(true);
    }, WAIT_OPTIONS);
  });

  it('ファイル変更を検出できる', async () => {
    const events: FileChangeEvent[] = [];
    const testFile = path.join(tmpDir, 'test.md');
    await fs.writeFile(testFile, '# Test');
    await startWatcher(events);

    await fs.writeFile(testFile, '# Updated');

    await vi.waitFor(() => {
      expect(events.some((event) => event.path === 'test.md' && event.type === 'change')).toBe(
        true
      );
    }, WAIT_OPTIONS);
  });

  it('ファイル削除を検出できる', async () => {
    const events: FileChangeEvent[] = [];
    const testFile = path.join(tmpDir, 'test.md');
    await fs.writeFile(testFile, '# Test');
    await startWatcher(events);

    await fs.unlink(testFile);

    await vi.waitFor(() => {
      expect(events.some((event) => event.path === 'test.md' && event.type === 'unlink')).toBe(
        true
      );
    }, WAIT_OPTIONS);
  });

  it('Markdown以外やサブディレクトリの変更も通知する', async () => {
    const events: FileChangeEvent[] = [];
    await fs.mkdir(path.join(tmpDir, 'nested'));
    await startWatcher(events);

    await fs.writeFile(path.join(tmpDir, 'image.png'), 'png');
    await fs.writeFile(path.join(tmpDir, 'nested', 'deep.md'), '# Deep');

    await vi.waitFor(() => {
      const paths = events.map((event) => event.path);
      expect(paths).toContain('image.png');
      expect(paths).toContain(path.join('nested', 'deep.md'));
    }, WAIT_OPTIONS);
  });

  it('開始時に ready を発行する', async () => {
    const fileWatcher = new FileWatcher({ rootDir: tmpDir });
    const ready = vi.fn();
    fileWatcher.on('ready', ready);

    await fileWatcher.start();
    watcher = fileWatcher;

    expect(ready).toHaveBeenCalledTimes(1);
  });

  it('存在しないディレクトリでは開始できない', async () => {
    const fileWatcher = new FileWatcher({ rootDir: path.join(tmpDir, 'missing') });

    await expect(fileWatcher.start()).rejects.toThrow();
  });

  it('停止後はイベントを通知しない', async () => {
    const events: FileChangeEvent[] = [];
    const started = await startWatcher(events);
    await started.stop();
    watcher = null;

    await fs.writeFile(path.join(tmpDir, 'after-stop.md'), '# After');
    await new Promise((resolve) => setTimeout(resolve, 300));

    expect(events).toEqual([]);
  });
});
