/**
 * 設定ファイルの型定義
 */

export interface MdsiteConfig {
  version: string;
  project: ProjectConfig;
  content: ContentConfig;
  server: ServerConfig;
  watcher: WatcherConfig;
}

export interface ProjectConfig {
  /** プロジェクト名 */
  name: string;
  /** プロジェクトルート */
  root: string;
}

export interface ContentConfig {
  /** Markdown文書のディレクトリ（プロジェクトルートからの相対パス） */
  sourceDir: string;
  /** HTMLの出力先ディレクトリ */
  outputDir: string;
  /** 含めるファイルパターン（glob） */
  include: string[];
  /** 除外するファイルパターン（glob） */
  exclude: string[];
}

export interface ServerConfig {
  /** ホスト */
  host: string;
  /** ポート */
  port: number;
  /** ポート使用中の場合に試す最大ポート数 */
  maxPortAttempts: number;
}

export interface WatcherConfig {
  /** devモードでファイル監視を有効にするか */
  enabled: boolean;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: MdsiteConfig = {
  version: '1.0',
  project: {
    name: '',
    root: '.',
  },
  content: {
    sourceDir: 'content/posts',
    outputDir: 'public',
    include: ['**/*.md'],
    exclude: [],
  },
  server: {
    host: 'localhost',
    port: 3000,
    maxPortAttempts: 10,
  },
  watcher: {
    enabled: true,
  },
};
