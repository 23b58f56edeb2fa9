import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { MdsiteConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig, type PartialConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
}

export interface ResolvedConfig {
  config: MdsiteConfig;
  configPath: string | null;
  projectRoot: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .mdsite.json > mdsite.json
 */
const CONFIG_FILE_NAMES = ['.mdsite.json', 'mdsite.json'] as const;

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス
   * @returns 設定オブジェクト（ファイルが存在しない場合はデフォルト設定）
   */
  static async load(configPath: string): Promise<MdsiteConfig> {
    try {
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      const config = validateConfig(parsed);

      return this.mergeWithDefaults(config);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定
   * - 設定の読み込み
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd() } = options;

    // 1. 設定ファイルパスを解決
    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    if (!configPath) {
      // 設定ファイルが見つからない場合はカレントディレクトリとデフォルト設定
      return {
        config: this.getDefaultConfig(),
        configPath: null,
        projectRoot: await this.normalizeProjectRoot(cwd),
      };
    }

    // 2. 設定を読み込む（バリデーションエラーはそのまま投げる）
    const config = await this.load(configPath);

    // 3. プロジェクトルートを決定（project.rootは設定ファイルからの相対パス）
    const configDir = path.dirname(configPath);
    const projectRoot = await this.normalizeProjectRoot(
      path.resolve(configDir, config.project.root)
    );

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): MdsiteConfig {
    return {
      version: DEFAULT_CONFIG.version,
      project: { ...DEFAULT_CONFIG.project },
      content: {
        ...DEFAULT_CONFIG.content,
        include: [...DEFAULT_CONFIG.content.include],
        exclude: [...DEFAULT_CONFIG.content.exclude],
      },
      server: { ...DEFAULT_CONFIG.server },
      watcher: { ...DEFAULT_CONFIG.watcher },
    };
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(startDir: string, traverseUp: boolean): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 優先順位: 明示指定 > 環境変数 MDSITE_CONFIG > 自動探索
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env.MDSITE_CONFIG;
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - 絶対パスに変換
   * - シンボリックリンクを解決
   * - 末尾のスラッシュを削除
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      const realPath = await realpath(absolutePath);
      return realPath.replace(/\/$/, '');
    } catch (_error) {
      // ディレクトリが存在しない場合は絶対パスをそのまま返す
      return absolutePath.replace(/\/$/, '');
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: PartialConfig): MdsiteConfig {
    const defaults = this.getDefaultConfig();

    return {
      version: config.version ?? defaults.version,
      project: {
        name: config.project?.name ?? defaults.project.name,
        root: config.project?.root ?? defaults.project.root,
      },
      content: {
        sourceDir: config.content?.sourceDir ?? defaults.content.sourceDir,
        outputDir: config.content?.outputDir ?? defaults.content.outputDir,
        include: config.content?.include ?? defaults.content.include,
        exclude: config.content?.exclude ?? defaults.content.exclude,
      },
      server: {
        host: config.server?.host ?? defaults.server.host,
        port: config.server?.port ?? defaults.server.port,
        maxPortAttempts: config.server?.maxPortAttempts ?? defaults.server.maxPortAttempts,
      },
      watcher: {
        enabled: config.watcher?.enabled ?? defaults.watcher.enabled,
      },
    };
  }
}
