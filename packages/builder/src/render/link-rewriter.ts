import { escapeHtml } from '@mdsite/types';

/** サイト内の記事へのリンクの接頭辞 */
export const INTERNAL_LINK_PREFIX = '/posts/';

// 画像記法 ![alt](src) は対象外
const LINK_PATTERN = /(?<!!)\[([^\]]+)\]\(([^)]+)\)/g;

/**
 * インラインリンク [text](url) を書き換える
 * - /posts/ で始まるリンク: そのまま
 * - それ以外: 新しいタブで開くアンカーに変換
 *
 * Markdown変換より前に実行すること
 */
export function rewriteLinks(body: string): string {
  return body.replace(LINK_PATTERN, (link: string, text: string, target: string) => {
    const url = target.trim();
    if (url.startsWith(INTERNAL_LINK_PREFIX)) {
      return link;
    }
    return `<a href="${escapeHtml(url)}" target="_blank" rel="noopener noreferrer">${text}</a>`;
  });
}
