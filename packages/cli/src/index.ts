#!/usr/bin/env tsx
/**
 * mdsite CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { executeBuild, type BuildCommandOptions } from './commands/build.js';
import { executeServe, type ServeCommandOptions } from './commands/serve.js';
import { executeDev, type DevCommandOptions } from './commands/dev.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as {
  version: string;
};

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const program = new Command();

program
  .name('mdsite')
  .description('Markdown文書から静的サイトを生成する')
  .version(packageJson.version)
  .addOption(
    new Option('-c, --config <path>', '設定ファイルのパス')
      .env('MDSITE_CONFIG')
  )
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

program
  .command('build')
  .description('出力ディレクトリを作り直してサイトを1回ビルド')
  .option('--source <dir>', 'Markdown文書のディレクトリ')
  .option('--out <dir>', 'HTMLの出力先ディレクトリ')
  .action((options: BuildCommandOptions) => {
    void executeBuild({ ...options, config: globalConfigPath });
  });

program
  .command('serve')
  .description('ビルドしてから出力ディレクトリを配信')
  .option('--source <dir>', 'Markdown文書のディレクトリ')
  .option('--out <dir>', 'HTMLの出力先ディレクトリ')
  .option('--port <port>', 'ポート番号')
  .action((options: ServeCommandOptions) => {
    void executeServe({ ...options, config: globalConfigPath });
  });

program
  .command('dev')
  .description('ビルド・ファイル監視・配信を同時に実行（変更ごとに再ビルド）')
  .option('--source <dir>', 'Markdown文書のディレクトリ')
  .option('--out <dir>', 'HTMLの出力先ディレクトリ')
  .option('--port <port>', 'ポート番号')
  .action((options: DevCommandOptions) => {
    void executeDev({ ...options, config: globalConfigPath });
  });

// コマンドラインを解析
program.parse(process.argv);
