import * as path from 'path';
import { escapeHtml, type Metadata, type Post, type RenderedPage } from '@mdsite/types';
import { formatDate } from '../date.js';

/** 出力ディレクトリ内の記事ディレクトリ名 */
export const POSTS_DIR = 'posts';

const STYLE = [
  'body { max-width: 800px; margin: 0 auto; padding: 1rem; font-family: system-ui, sans-serif; line-height: 1.5; }',
  '.post-date { display: block; color: #666; margin-bottom: 2rem; }',
  'pre { overflow-x: auto; }',
  'img { max-width: 100%; }',
].join(' ');

export interface PageMetadata {
  title: Metadata['title'];
  /** Date または yyyy-MM-dd 形式の文字列 */
  date: Date | string;
}

/**
 * メタデータとHTML本文から完全なHTML文書を生成
 */
export function renderPage(metadata: PageMetadata, bodyHtml: string): string {
  const title = escapeHtml(metadata.title);
  const date = formatDate(metadata.date);

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${title}</title>
<style>${STYLE}</style>
</head>
<body>
<header>
<h1>${title}</h1>
<time class="post-date" datetime="${date.datetime}">${date.display}</time>
</header>
<main>
<article>
<div class="content">${bodyHtml}</div>
</article>
</main>
</body>
</html>
`;
}

/**
 * 記事から出力ページを生成
 * @param postsDir 記事の出力ディレクトリ（<output>/posts）
 */
export function createRenderedPage(post: Post, postsDir: string): RenderedPage {
  const { slug } = post.metadata;
  return {
    slug,
    outputPath: path.join(postsDir, `${slug}.html`),
    html: renderPage(post.metadata, post.html),
  };
}
