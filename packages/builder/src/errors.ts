/**
 * ソースディレクトリが存在しない（ビルドの致命的エラー）
 */
export class SourceNotFoundError extends Error {
  constructor(public readonly sourceDir: string) {
    super(`Source directory does not exist: ${sourceDir}`);
    this.name = 'SourceNotFoundError';
  }
}

/**
 * ファイル監視を開始できない（devモードの致命的エラー）
 */
export class WatchSetupError extends Error {
  constructor(
    public readonly sourceDir: string,
    reason: string
  ) {
    super(`Cannot watch ${sourceDir}: ${reason}`);
    this.name = 'WatchSetupError';
  }
}
