import { describe, it, expect } from 'vitest';
import { rewriteLinks } from '../link-rewriter.js';

describe('rewriteLinks', () => {
  it('外部リンクを新しいタブで開くアンカーに変換する', () => {
    expect(rewriteLinks('Hi [Google](https://google.com).')).toBe(
      'Hi <a href="https://google.com" target="_blank" rel="noopener noreferrer">Google</a>.'
    );
  });

  it('/posts/ で始まるリンクはそのまま', () => {
    const body = 'See [the other post](/posts/other.html) for details.';
    expect(rewriteLinks(body)).toBe(body);
  });

  it('/posts/ 以外のサイト内パスも外部扱い', () => {
    expect(rewriteLinks('[About](/about)')).toBe(
      '<a href="/about" target="_blank" rel="noopener noreferrer">About</a>'
    );
  });

  it('画像はそのまま', () => {
    const body = '![logo](https://example.com/logo.png)';
    expect(rewriteLinks(body)).toBe(body);
  });

  it('複数のリンクをそれぞれ判定する', () => {
    const body = '[a](/posts/a.html) and [b](https://b.example)';
    expect(rewriteLinks(body)).toBe(
      '[a](/posts/a.html) and <a href="https://b.example" target="_blank" rel="noopener noreferrer">b</a>'
    );
  });

  it('URLの前後の空白を除き、属性値をエスケープする', () => {
    expect(rewriteLinks('[q]( https://a.example/?x=1&y="2" )')).toBe(
      '<a href="https://a.example/?x=1&amp;y=&quot;2&quot;" target="_blank" rel="noopener noreferrer">q</a>'
    );
  });

  it('冪等である', () => {
    const body = 'Read [docs](https://docs.example), [next](/posts/next.html) and ![img](x.png).';
    const once = rewriteLinks(body);
    expect(rewriteLinks(once)).toBe(once);
  });

  it('リンクのない本文は変更しない', () => {
    expect(rewriteLinks('plain [brackets] and (parens)')).toBe('plain [brackets] and (parens)');
  });
});
