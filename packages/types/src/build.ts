/**
 * ビルド結果の型定義
 */

/** 失敗した処理段階 */
export type BuildStage = 'convert' | 'render' | 'write';

export interface BuiltPage {
  sourcePath: string;
  slug: string;
  outputPath: string;
  /** メタデータがヘッダー由来かデフォルトか */
  metadataSource: 'header' | 'default';
}

export interface BuildFailure {
  sourcePath: string;
  stage: BuildStage;
  message: string;
}

export interface BuildReport {
  sourceDir: string;
  outputDir: string;
  /** 検出した文書数 */
  discovered: number;
  pages: BuiltPage[];
  failures: BuildFailure[];
  startedAt: Date;
  durationMs: number;
}
