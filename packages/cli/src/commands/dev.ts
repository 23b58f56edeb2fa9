/**
 * dev コマンド
 * ビルド・監視・配信を同時に行う
 */

import { WatchOrchestrator } from '@mdsite/builder';
import { onShutdown } from '../utils/process.js';
import { parsePort, resolveSiteContext } from '../utils/project.js';
import { createPipeline, formatBuildSummary } from './build.js';
import {
  createServer,
  printServing,
  type ServeCommandOptions,
  type SiteSession,
} from './serve.js';

export type DevCommandOptions = ServeCommandOptions;

export interface DevSession extends SiteSession {
  /** 監視が無効な場合はnull */
  orchestrator: WatchOrchestrator | null;
}

/**
 * ビルド → 監視開始 → 配信開始（process.exit()を呼ばない）
 * サーバの起動に失敗した場合は監視を停止してから例外を投げる
 */
export async function startDevSession(options: DevCommandOptions): Promise<DevSession> {
  const port = parsePort(options.port);
  const context = await resolveSiteContext(options);
  const pipeline = createPipeline(context);

  const report = await pipeline.run();
  console.log(formatBuildSummary(report));

  let orchestrator: WatchOrchestrator | null = null;
  if (context.config.watcher.enabled) {
    orchestrator = new WatchOrchestrator({ sourceDir: context.sourceDir, pipeline });
    await orchestrator.start();
  } else {
    console.log('File watching is disabled (watcher.enabled: false)');
  }

  const server = createServer(context, port);
  let boundPort: number;
  try {
    boundPort = await server.start();
  } catch (error) {
    if (orchestrator) {
      await orchestrator.stop();
    }
    throw error;
  }
  printServing(context, boundPort);

  const watching = orchestrator;
  return {
    port: boundPort,
    report,
    orchestrator: watching,
    stop: async () => {
      if (watching) {
        await watching.stop();
      }
      await server.stop();
    },
  };
}

/**
 * dev コマンドを実行（CLIエントリポイント）
 */
export async function executeDev(options: DevCommandOptions): Promise<void> {
  try {
    const session = await startDevSession(options);
    onShutdown(() => session.stop());

    if (session.orchestrator) {
      const exit = await session.orchestrator.done;
      if (exit.reason === 'failed') {
        await session.stop();
        throw exit.error;
      }
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
