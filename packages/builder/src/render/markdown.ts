import { Marked } from 'marked';

const markdown = new Marked({ gfm: true });

/**
 * MarkdownをHTMLに変換（同期）
 */
export function renderMarkdown(body: string): string {
  const html = markdown.parse(body, { async: false });
  if (typeof html !== 'string') {
    throw new Error('Markdown conversion unexpectedly returned a promise');
  }
  return html;
}
