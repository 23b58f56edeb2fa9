import { promises as fs } from 'fs';
import * as path from 'path';
import {
  errorMessage,
  type BuildFailure,
  type BuildReport,
  type BuildStage,
  type BuiltPage,
  type Post,
} from '@mdsite/types';
import { FileDiscovery } from '../discovery/file-discovery.js';
import { SourceNotFoundError } from '../errors.js';
import { loadDocument } from '../metadata/metadata-extractor.js';
import { rewriteLinks } from '../render/link-rewriter.js';
import { renderMarkdown } from '../render/markdown.js';
import { POSTS_DIR, createRenderedPage } from '../render/page-renderer.js';

export interface BuildPipelineOptions {
  /** Markdown文書のルートディレクトリ */
  sourceDir: string;
  /** HTMLの出力先ディレクトリ */
  outputDir: string;
  /** 含めるファイルパターン（デフォルト: **\/*.md） */
  include?: string[];
  /** 除外するファイルパターン */
  exclude?: string[];
  /** ビルド時刻（テスト用） */
  now?: () => Date;
  /** Markdown変換関数（テスト用） */
  renderMarkdown?: (body: string) => string;
}

type DocumentOutcome =
  | { ok: true; page: BuiltPage }
  | { ok: false; failure: BuildFailure };

function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * ビルドパイプライン
 * 全文書を検索し、文書ごとに 読み込み → メタデータ抽出 → リンク書き換え → HTML変換 → ページ生成 → 書き込み を行う
 *
 * 1文書の失敗は記録して続行し、ビルド全体は中断しない
 */
export class BuildPipeline {
  readonly sourceDir: string;
  readonly outputDir: string;
  private discovery: FileDiscovery;
  private now: () => Date;
  private renderMarkdown: (body: string) => string;

  constructor(options: BuildPipelineOptions) {
    this.sourceDir = path.resolve(options.sourceDir);
    this.outputDir = path.resolve(options.outputDir);
    this.discovery = new FileDiscovery({
      rootDir: this.sourceDir,
      include: options.include ?? ['**/*.md'],
      exclude: options.exclude ?? [],
    });
    this.now = options.now ?? (() => new Date());
    this.renderMarkdown = options.renderMarkdown ?? renderMarkdown;
  }

  /**
   * 1回分のフルビルドを実行
   * ソースディレクトリがない場合は何も書き込まず SourceNotFoundError を投げる
   */
  async run(): Promise<BuildReport> {
    const startedAt = this.now();
    const startTime = Date.now();

    await this.assertSourceDir();
    this.assertSeparateDirs();

    // 前回の出力を削除してから作り直す
    await this.cleanOutputDir();
    const postsDir = path.join(this.outputDir, POSTS_DIR);
    await fs.mkdir(postsDir, { recursive: true });

    const files = await this.discovery.findFiles();
    console.log(`[BuildPipeline] Building ${files.length} documents from ${this.sourceDir}`);

    const pages: BuiltPage[] = [];
    const failures: BuildFailure[] = [];
    const writtenSlugs = new Map<string, string>();

    for (const file of files) {
      const sourcePath = path.join(this.sourceDir, file);
      const outcome = await this.buildDocument(sourcePath, postsDir, startedAt, writtenSlugs);

      if (outcome.ok) {
        pages.push(outcome.page);
      } else {
        failures.push(outcome.failure);
      }
    }

    const durationMs = Date.now() - startTime;
    console.log(
      `[BuildPipeline] Generated ${pages.length} pages` +
        (failures.length > 0 ? `, ${failures.length} failed` : '') +
        ` (${durationMs}ms)`
    );

    return {
      sourceDir: this.sourceDir,
      outputDir: this.outputDir,
      discovered: files.length,
      pages,
      failures,
      startedAt,
      durationMs,
    };
  }

  /**
   * 出力ディレクトリの中身をすべて削除（ディレクトリ自体は残す）
   */
  async cleanOutputDir(): Promise<void> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.outputDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return;
      }
      throw error;
    }

    await Promise.all(
      entries.map((entry) =>
        fs.rm(path.join(this.outputDir, entry), { recursive: true, force: true })
      )
    );
  }

  /**
   * 1文書を処理（例外は投げず結果として返す）
   */
  private async buildDocument(
    sourcePath: string,
    postsDir: string,
    now: Date,
    writtenSlugs: Map<string, string>
  ): Promise<DocumentOutcome> {
    // 読み込み失敗はデフォルトメタデータと空の本文に縮退する
    const { document, result } = await loadDocument(sourcePath, now);

    let stage: BuildStage = 'convert';
    try {
      const post: Post = {
        document,
        metadata: result.metadata,
        html: this.renderMarkdown(rewriteLinks(result.body)),
      };

      stage = 'render';
      const page = createRenderedPage(post, postsDir);

      stage = 'write';
      const previous = writtenSlugs.get(page.slug);
      if (previous) {
        console.warn(
          `[BuildPipeline] Duplicate slug "${page.slug}": ${sourcePath} overwrites ${previous}`
        );
      }
      console.log(`[BuildPipeline] Generating ${page.outputPath}`);
      await fs.writeFile(page.outputPath, page.html, 'utf-8');
      writtenSlugs.set(page.slug, sourcePath);

      return {
        ok: true,
        page: {
          sourcePath,
          slug: page.slug,
          outputPath: page.outputPath,
          metadataSource: result.kind,
        },
      };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[BuildPipeline] Error generating ${sourcePath} (${stage}): ${message}`);
      return { ok: false, failure: { sourcePath, stage, message } };
    }
  }

  private async assertSourceDir(): Promise<void> {
    try {
      const stat = await fs.stat(this.sourceDir);
      if (stat.isDirectory()) {
        return;
      }
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code !== 'ENOENT' && code !== 'ENOTDIR') {
        throw error;
      }
    }
    throw new SourceNotFoundError(this.sourceDir);
  }

  /**
   * ソースと出力は互いに入れ子にできない
   */
  private assertSeparateDirs(): void {
    if (isWithin(this.outputDir, this.sourceDir) || isWithin(this.sourceDir, this.outputDir)) {
      throw new Error(
        `Source and output directories must not contain each other: ${this.sourceDir}, ${this.outputDir}`
      );
    }
  }
}
