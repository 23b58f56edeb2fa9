/**
 * 文書・ページの型定義
 */

export interface Document {
  /** ソースファイルの絶対パス */
  path: string;
  /** ファイル内容（読み込み後は不変） */
  rawBody: string;
}

export interface Metadata {
  /** タイトル（空にはならない。未指定時はファイル名から導出） */
  title: string;
  /** 日付（未指定・解析不能時はビルド時刻） */
  date: Date;
  /** URLセーフな識別子（未指定時はサニタイズしたファイル名） */
  slug: string;
}

/** デフォルトメタデータにフォールバックした理由 */
export type FallbackReason = 'no-header' | 'malformed-header' | 'read-error';

/**
 * メタデータ抽出の結果
 * 例外ではなく結果型でフォールバックを表す
 */
export type ExtractionResult =
  | {
      kind: 'header';
      metadata: Metadata;
      /** ヘッダーを除いた本文 */
      body: string;
    }
  | {
      kind: 'default';
      reason: FallbackReason;
      metadata: Metadata;
      body: string;
    };

export interface Post {
  readonly document: Readonly<Document>;
  readonly metadata: Readonly<Metadata>;
  /** Markdownから変換済みのHTML本文 */
  readonly html: string;
}

export interface RenderedPage {
  readonly slug: string;
  /** 出力先（<output>/posts/<slug>.html） */
  readonly outputPath: string;
  /** 完成したHTML文書 */
  readonly html: string;
}
