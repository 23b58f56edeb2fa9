import { createHash } from 'crypto';

const MARKDOWN_EXTENSION = /\.md$/;

/**
 * ファイル名からURLセーフな小文字のslugを生成
 * 例: "My Post!.md" -> "my-post"
 */
export function sanitizeSlug(filename: string): string {
  return filename
    .replace(MARKDOWN_EXTENSION, '')
    .replace(/[^\w\s-]/g, '')
    .trim()
    .replace(/\s+/g, '-')
    .toLowerCase();
}

/**
 * ファイル名から表示用タイトルを生成
 * 例: "hello-world.md" -> "Hello world"
 */
export function deriveTitle(filename: string): string {
  const base = filename.replace(MARKDOWN_EXTENSION, '').replace(/-/g, ' ').trim();
  if (base === '') {
    return '';
  }
  return base.charAt(0).toUpperCase() + base.slice(1).toLowerCase();
}

/**
 * URLセーフな文字が残らないファイル名（例: "日本語の記事.md"）のslug
 * ファイル名ごとに安定した "untitled-<hash8>"
 */
export function fallbackSlug(filename: string): string {
  const hash = createHash('sha256').update(filename).digest('hex').slice(0, 8);
  return `untitled-${hash}`;
}

/**
 * ファイル名から空でないslugを生成
 */
export function slugFromFilename(filename: string): string {
  return sanitizeSlug(filename) || fallbackSlug(filename);
}
