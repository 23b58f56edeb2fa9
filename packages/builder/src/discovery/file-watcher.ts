import * as watcher from '@parcel/watcher';
import { EventEmitter } from 'events';
import { realpath } from 'fs/promises';
import * as path from 'path';

export interface FileWatcherOptions {
  /** 監視するディレクトリ */
  rootDir: string;
}

export interface FileChangeEvent {
  type: 'add' | 'change' | 'unlink';
  /** ルートからの相対パス */
  path: string;
  timestamp: Date;
}

/**
 * ファイル監視クラス
 * @parcel/watcherを使用してディレクトリ配下の作成・変更・削除を監視
 *
 * ファイル種別によるフィルタやデバウンスは行わず、イベントごとに 'change' を発行する
 */
export class FileWatcher extends EventEmitter {
  private subscription: watcher.AsyncSubscription | null = null;
  private rootDir: string;

  constructor(options: FileWatcherOptions) {
    super();
    this.rootDir = path.resolve(options.rootDir);
  }

  /**
   * 監視を開始
   * ディレクトリが存在しない場合などは例外を投げる
   */
  async start(): Promise<void> {
    if (this.subscription) {
      return;
    }

    // @parcel/watcherは実パスでイベントを返す
    this.rootDir = await realpath(this.rootDir);

    this.subscription = await watcher.subscribe(this.rootDir, (err, events) => {
      if (err) {
        this.reportError(err);
        return;
      }

      for (const event of events) {
        const change: FileChangeEvent = {
          type: this.convertEventType(event.type),
          path: path.relative(this.rootDir, event.path),
          timestamp: new Date(),
        };
        this.emit('change', change);
      }
    });

    this.emit('ready');
  }

  /**
   * 監視を停止
   */
  async stop(): Promise<void> {
    if (this.subscription) {
      await this.subscription.unsubscribe();
      this.subscription = null;
    }
  }

  /**
   * 'error' のリスナーがいない状態で emit するとプロセスが落ちるため、その場合はログのみ
   */
  private reportError(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    } else {
      console.error('[FileWatcher] Watch error:', error.message);
    }
  }

  /**
   * @parcel/watcherのイベントタイプを変換
   */
  private convertEventType(type: watcher.EventType): FileChangeEvent['type'] {
    switch (type) {
      case 'create':
        return 'add';
      case 'update':
        return 'change';
      case 'delete':
        return 'unlink';
    }
  }
}
