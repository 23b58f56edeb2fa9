import { on, type EventEmitter } from 'events';
import { stat } from 'fs/promises';
import * as path from 'path';
import { errorMessage, type BuildReport } from '@mdsite/types';
import { FileWatcher, type FileChangeEvent } from '../discovery/file-watcher.js';
import { WatchSetupError } from '../errors.js';

/**
 * 再ビルドを実行するもの（BuildPipeline）
 */
export interface Rebuilder {
  run(): Promise<BuildReport>;
}

/**
 * 'change' イベントで FileChangeEvent を発行する監視（FileWatcher）
 */
export interface ChangeWatcher extends EventEmitter {
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface WatchOrchestratorOptions {
  /** 監視するソースディレクトリ */
  sourceDir: string;
  pipeline: Rebuilder;
  /** 省略時は sourceDir を監視する FileWatcher */
  watcher?: ChangeWatcher;
}

function isFileChangeEvent(value: unknown): value is FileChangeEvent {
  return typeof value === 'object' && value !== null && 'type' in value && 'path' in value;
}

/** 監視ループの終了理由 */
export type WatchExit = { reason: 'stopped' } | { reason: 'failed'; error: Error };

/**
 * ソースディレクトリの変更を監視し、変更ごとにフルビルドを実行する
 *
 * - 監視ループはバックグラウンドタスクとして自身の AbortController を持つ
 * - 1イベントにつき1回、前の再ビルドが終わってから次を実行（同時に1つだけ）
 * - stop() は次の待機地点で反映され、実行中の再ビルドは中断しない
 */
export class WatchOrchestrator {
  private sourceDir: string;
  private pipeline: Rebuilder;
  private watcher: ChangeWatcher;
  private controller: AbortController | null = null;
  private loop: Promise<WatchExit> | null = null;
  private stopping: Promise<void> | null = null;
  private rebuildCount = 0;

  constructor(options: WatchOrchestratorOptions) {
    this.sourceDir = path.resolve(options.sourceDir);
    this.pipeline = options.pipeline;
    this.watcher = options.watcher ?? new FileWatcher({ rootDir: this.sourceDir });
  }

  /** 実行済みの再ビルド回数 */
  get rebuilds(): number {
    return this.rebuildCount;
  }

  /**
   * 監視ループの終了を待つ
   */
  get done(): Promise<WatchExit> {
    if (!this.loop) {
      return Promise.reject(new Error('WatchOrchestrator has not been started'));
    }
    return this.loop;
  }

  /**
   * 監視を開始
   * 監視を確立できない場合は WatchSetupError を投げる
   */
  async start(): Promise<void> {
    if (this.loop) {
      throw new Error('WatchOrchestrator is already started');
    }

    await this.assertSourceDir();

    try {
      await this.watcher.start();
    } catch (error) {
      throw new WatchSetupError(this.sourceDir, errorMessage(error));
    }

    const controller = new AbortController();
    this.controller = controller;

    // start() が戻った時点でイベントの受け取りを開始している
    const changes: AsyncIterable<unknown[]> = on(this.watcher, 'change', {
      signal: controller.signal,
    });
    this.loop = this.runLoop(changes, controller.signal);

    console.log(`[WatchOrchestrator] Watching ${this.sourceDir} for changes`);
  }

  /**
   * 監視を停止
   * 実行中の再ビルドの完了を待ってから監視を解除する
   */
  async stop(): Promise<void> {
    if (!this.controller || !this.loop) {
      return;
    }

    if (!this.stopping) {
      const loop = this.loop;
      this.controller.abort();
      this.stopping = loop.then(async () => {
        await this.watcher.stop();
        console.log('[WatchOrchestrator] File watcher stopped');
      });
    }

    await this.stopping;
  }

  /**
   * イベントごとに再ビルドするループ
   */
  private async runLoop(
    changes: AsyncIterable<unknown[]>,
    signal: AbortSignal
  ): Promise<WatchExit> {
    try {
      for await (const [event] of changes) {
        // 停止後にバッファに残ったイベントは処理しない
        if (signal.aborted) {
          break;
        }
        if (!isFileChangeEvent(event)) {
          continue;
        }

        console.log(`[WatchOrchestrator] Detected ${event.type}: ${event.path}`);
        await this.rebuild();
      }
      return { reason: 'stopped' };
    } catch (error) {
      if (signal.aborted) {
        return { reason: 'stopped' };
      }

      const failure = error instanceof Error ? error : new Error(String(error));
      console.error(`[WatchOrchestrator] Watch loop failed: ${failure.message}`);
      return { reason: 'failed', error: failure };
    }
  }

  /**
   * フルビルドを1回実行（出力の削除はパイプラインが行う）
   * 失敗してもループは続行する
   */
  private async rebuild(): Promise<void> {
    this.rebuildCount++;
    console.log('[WatchOrchestrator] Rebuilding site...');

    try {
      const report = await this.pipeline.run();
      console.log(
        `[WatchOrchestrator] Rebuilt ${report.pages.length} pages` +
          (report.failures.length > 0 ? ` (${report.failures.length} failed)` : '')
      );
    } catch (error) {
      console.error(`[WatchOrchestrator] Rebuild failed: ${errorMessage(error)}`);
    }
  }

  private async assertSourceDir(): Promise<void> {
    try {
      const stats = await stat(this.sourceDir);
      if (!stats.isDirectory()) {
        throw new WatchSetupError(this.sourceDir, 'not a directory');
      }
    } catch (error) {
      if (error instanceof WatchSetupError) {
        throw error;
      }
      throw new WatchSetupError(this.sourceDir, errorMessage(error));
    }
  }
}
