/**
 * プロジェクト設定の解決ユーティリティ
 */

import * as path from 'path';
import { ConfigLoader, type MdsiteConfig } from '@mdsite/types';

/**
 * 各コマンド共通のオプション
 */
export interface SiteCommandOptions {
  /** 設定ファイルのパス */
  config?: string;
  /** ソースディレクトリ（設定より優先） */
  source?: string;
  /** 出力ディレクトリ（設定より優先） */
  out?: string;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
}

export interface SiteContext {
  config: MdsiteConfig;
  configPath: string | null;
  projectRoot: string;
  /** ソースディレクトリ（絶対パス） */
  sourceDir: string;
  /** 出力ディレクトリ（絶対パス） */
  outputDir: string;
}

/**
 * 設定を読み込み、ソースと出力のディレクトリを決定
 * - --source / --out はカレントディレクトリからの相対パス
 * - 設定ファイルの値はプロジェクトルートからの相対パス
 */
export async function resolveSiteContext(options: SiteCommandOptions): Promise<SiteContext> {
  const cwd = options.cwd ?? process.cwd();
  const { config, configPath, projectRoot } = await ConfigLoader.resolve({
    configPath: options.config,
    cwd,
  });

  return {
    config,
    configPath,
    projectRoot,
    sourceDir: options.source
      ? path.resolve(cwd, options.source)
      : path.resolve(projectRoot, config.content.sourceDir),
    outputDir: options.out
      ? path.resolve(cwd, options.out)
      : path.resolve(projectRoot, config.content.outputDir),
  };
}

/**
 * --port オプションを解析
 */
export function parsePort(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}
