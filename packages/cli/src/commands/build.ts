/**
 * build コマンド
 */

import { BuildPipeline } from '@mdsite/builder';
import type { BuildReport } from '@mdsite/types';
import { resolveSiteContext, type SiteCommandOptions, type SiteContext } from '../utils/project.js';

export type BuildCommandOptions = SiteCommandOptions;

/**
 * 設定からビルドパイプラインを作成
 */
export function createPipeline(context: SiteContext): BuildPipeline {
  return new BuildPipeline({
    sourceDir: context.sourceDir,
    outputDir: context.outputDir,
    include: context.config.content.include,
    exclude: context.config.content.exclude,
  });
}

/**
 * ビルド結果の要約
 */
export function formatBuildSummary(report: BuildReport): string {
  const lines = [
    `✓ Built ${report.pages.length} of ${report.discovered} pages in ${report.durationMs}ms`,
    `  - Source: ${report.sourceDir}`,
    `  - Output: ${report.outputDir}`,
  ];

  if (report.failures.length > 0) {
    lines.push(`  - Failed: ${report.failures.length}`);
    for (const failure of report.failures) {
      lines.push(`    ${failure.sourcePath} (${failure.stage}): ${failure.message}`);
    }
  }

  return lines.join('\n');
}

/**
 * ビルドの内部ロジック（process.exit()を呼ばない）
 */
export async function runBuild(options: BuildCommandOptions): Promise<BuildReport> {
  const context = await resolveSiteContext(options);
  console.log(`Config: ${context.configPath || 'default config'}`);

  const report = await createPipeline(context).run();
  console.log(formatBuildSummary(report));

  return report;
}

/**
 * build コマンドを実行（CLIエントリポイント）
 */
export async function executeBuild(options: BuildCommandOptions): Promise<void> {
  try {
    await runBuild(options);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
