import fg from 'fast-glob';
import * as path from 'path';

export interface FileDiscoveryOptions {
  /** 文書のルートディレクトリ */
  rootDir: string;
  /** 含めるファイルパターン（glob） */
  include: string[];
  /** 除外するファイルパターン（glob） */
  exclude: string[];
}

/**
 * ファイル検索クラス
 * Globパターンを使用してMarkdownファイルを再帰的に検索
 */
export class FileDiscovery {
  private rootDir: string;
  private include: string[];
  private exclude: string[];

  constructor(options: FileDiscoveryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.include = options.include;
    this.exclude = options.exclude;
  }

  /**
   * ファイルを検索
   * @returns 見つかったファイルのパス一覧（ルートからの相対パス、ソート済み）
   */
  async findFiles(): Promise<string[]> {
    const files = await fg(this.include, {
      cwd: this.rootDir,
      ignore: this.exclude,
      absolute: false,
      onlyFiles: true,
      dot: true,
    });

    // 処理順を決定的にする
    return files.sort();
  }
}
