/**
 * プロセス管理ユーティリティ
 */

/**
 * SIGINT / SIGTERM で停止処理を実行して終了
 */
export function onShutdown(stop: () => Promise<void>): void {
  let shuttingDown = false;

  const shutdown = () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log('\nShutting down...');

    stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
