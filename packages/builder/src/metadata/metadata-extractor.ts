import { readFile } from 'fs/promises';
import * as path from 'path';
import matter from 'gray-matter';
import { load as loadYaml, JSON_SCHEMA } from 'js-yaml';
import { errorMessage, type Document, type ExtractionResult, type Metadata } from '@mdsite/types';
import { parseIsoDate } from '../date.js';
import { deriveTitle, sanitizeSlug, slugFromFilename } from './slug.js';

/**
 * 先頭のヘッダーブロック
 * 1行目が "---"、任意の行（最短一致）、単独行の "---" で閉じる
 */
const HEADER_PATTERN = /^---\r?\n(?:[\s\S]*?\r?\n)?---[ \t]*(?:\r?\n|$)/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * ヘッダーのYAMLを解析
 * JSONスキーマで読むため日付は文字列のまま残り、parseIsoDate で検証する
 */
function parseHeaderYaml(input: string): Record<string, unknown> {
  const data: unknown = loadYaml(input, { schema: JSON_SCHEMA });
  if (!isRecord(data)) {
    throw new Error('Header is not a key/value mapping');
  }
  return data;
}

// オプションを渡すとgray-matterのキャッシュが無効になる
// （キャッシュはパース失敗した入力も保持してしまうため）
const MATTER_OPTIONS = {
  language: 'yaml',
  delimiters: '---',
  engines: { yaml: parseHeaderYaml },
};

const UNTITLED = 'Untitled';

export interface LoadedDocument {
  document: Document;
  result: ExtractionResult;
}

/**
 * ファイル名から導出するデフォルトメタデータ
 */
export function defaultMetadata(filename: string, now: Date): Metadata {
  return {
    title: deriveTitle(filename) || UNTITLED,
    date: now,
    slug: slugFromFilename(filename),
  };
}

function pickTitle(value: unknown): string | null {
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return value.trim();
  }
  return null;
}

function pickDate(value: unknown): Date | null {
  return typeof value === 'string' ? parseIsoDate(value) : null;
}

function pickSlug(value: unknown): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const slug = sanitizeSlug(String(value));
  return slug === '' ? null : slug;
}

/**
 * 文書本文からメタデータを抽出
 *
 * - ヘッダーなし: デフォルトメタデータ、本文は全体
 * - ヘッダーあり: フィールドごとに値があれば採用、なければデフォルト
 * - ヘッダーが不正: デフォルトメタデータ、本文は空
 */
export function extractMetadata(document: Document, now: Date): ExtractionResult {
  const filename = path.basename(document.path);
  const defaults = defaultMetadata(filename, now);

  const header = HEADER_PATTERN.exec(document.rawBody);
  if (!header) {
    return { kind: 'default', reason: 'no-header', metadata: defaults, body: document.rawBody };
  }

  let data: Record<string, unknown>;
  try {
    data = matter(header[0], MATTER_OPTIONS).data;
  } catch (error) {
    console.warn(`[MetadataExtractor] Malformed header in ${document.path}: ${errorMessage(error)}`);
    return { kind: 'default', reason: 'malformed-header', metadata: defaults, body: '' };
  }

  return {
    kind: 'header',
    metadata: {
      title: pickTitle(data.title) ?? defaults.title,
      date: pickDate(data.date) ?? defaults.date,
      slug: pickSlug(data.slug) ?? defaults.slug,
    },
    body: document.rawBody.slice(header[0].length),
  };
}

/**
 * 文書を読み込んでメタデータを抽出
 * 読み込みに失敗した場合はデフォルトメタデータと空の本文を返す（例外は投げない）
 */
export async function loadDocument(filePath: string, now: Date): Promise<LoadedDocument> {
  try {
    const rawBody = await readFile(filePath, 'utf-8');
    const document: Document = { path: filePath, rawBody };
    return { document, result: extractMetadata(document, now) };
  } catch (error) {
    console.error(`[MetadataExtractor] Error reading ${filePath}: ${errorMessage(error)}`);
    return {
      document: { path: filePath, rawBody: '' },
      result: {
        kind: 'default',
        reason: 'read-error',
        metadata: defaultMetadata(path.basename(filePath), now),
        body: '',
      },
    };
  }
}
