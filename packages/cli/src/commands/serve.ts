/**
 * serve コマンド
 */

import { StaticServer } from '@mdsite/server';
import type { BuildReport } from '@mdsite/types';
import { onShutdown } from '../utils/process.js';
import {
  parsePort,
  resolveSiteContext,
  type SiteCommandOptions,
  type SiteContext,
} from '../utils/project.js';
import { createPipeline, formatBuildSummary } from './build.js';

export interface ServeCommandOptions extends SiteCommandOptions {
  /** ポート番号（設定より優先） */
  port?: string;
}

/**
 * 起動中のサイト
 */
export interface SiteSession {
  /** 待ち受けたポート */
  port: number;
  /** 起動時のビルド結果 */
  report: BuildReport;
  stop(): Promise<void>;
}

/**
 * 出力ディレクトリを配信するサーバを作成
 */
export function createServer(context: SiteContext, port?: number): StaticServer {
  return new StaticServer({
    rootDir: context.outputDir,
    host: context.config.server.host,
    port: port ?? context.config.server.port,
    maxPortAttempts: context.config.server.maxPortAttempts,
  });
}

export function printServing(context: SiteContext, port: number): void {
  console.log(`✓ Serving ${context.outputDir}`);
  console.log(`  - URL: http://${context.config.server.host}:${port}/posts/`);
  console.log('Press Ctrl+C to stop.');
}

/**
 * ビルドしてから配信を開始（process.exit()を呼ばない）
 */
export async function startServeSession(options: ServeCommandOptions): Promise<SiteSession> {
  const port = parsePort(options.port);
  const context = await resolveSiteContext(options);

  const report = await createPipeline(context).run();
  console.log(formatBuildSummary(report));

  const server = createServer(context, port);
  const boundPort = await server.start();
  printServing(context, boundPort);

  return {
    port: boundPort,
    report,
    stop: () => server.stop(),
  };
}

/**
 * serve コマンドを実行（CLIエントリポイント）
 */
export async function executeServe(options: ServeCommandOptions): Promise<void> {
  try {
    const session = await startServeSession(options);
    onShutdown(() => session.stop());
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
