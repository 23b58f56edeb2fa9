import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigLoader } from '../loader.js';
import { validateConfig } from '../validator.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';

describe('ConfigLoader', () => {
  let testDir: string;

  beforeEach(async () => {
    // 環境変数の影響を受けないようにする
    delete process.env.MDSITE_CONFIG;
    testDir = await fs.realpath(await fs.mkdtemp(path.join(tmpdir(), 'mdsite-config-test-')));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('デフォルト設定を取得できる', () => {
      const config = ConfigLoader.getDefaultConfig();
      expect(config.version).toBe('1.0');
      expect(config.content.sourceDir).toBe('content/posts');
      expect(config.content.outputDir).toBe('public');
      expect(config.content.include).toEqual(['**/*.md']);
      expect(config.server.port).toBe(3000);
      expect(config.server.maxPortAttempts).toBe(10);
      expect(config.watcher.enabled).toBe(true);
    });

    it('返された設定を変更してもデフォルトに影響しない', () => {
      const config = ConfigLoader.getDefaultConfig();
      config.content.include.push('**/*.markdown');
      config.server.port = 8080;

      const fresh = ConfigLoader.getDefaultConfig();
      expect(fresh.content.include).toEqual(['**/*.md']);
      expect(fresh.server.port).toBe(3000);
    });
  });

  describe('load', () => {
    it('存在しないファイルはデフォルト設定を返す', async () => {
      const config = await ConfigLoader.load(path.join(testDir, 'nonexistent.json'));
      expect(config).toEqual(ConfigLoader.getDefaultConfig());
    });

    it('部分的な設定をデフォルト値とマージする', async () => {
      const configPath = path.join(testDir, 'partial.json');
      await fs.writeFile(
        configPath,
        JSON.stringify({
          content: { sourceDir: 'docs', exclude: ['drafts/**'] },
          server: { port: 4000 },
        })
      );

      const config = await ConfigLoader.load(configPath);
      expect(config.content.sourceDir).toBe('docs');
      expect(config.content.exclude).toEqual(['drafts/**']);
      expect(config.server.port).toBe(4000);
      // 他はデフォルト値
      expect(config.content.outputDir).toBe('public');
      expect(config.content.include).toEqual(['**/*.md']);
      expect(config.server.host).toBe('localhost');
    });

    it('不正なJSON形式でエラー', async () => {
      const configPath = path.join(testDir, 'invalid-json.json');
      await fs.writeFile(configPath, '{ invalid json }');

      await expect(ConfigLoader.load(configPath)).rejects.toThrow();
    });

    it('バリデーションエラーはそのまま投げる', async () => {
      const configPath = path.join(testDir, 'invalid.json');
      await fs.writeFile(configPath, JSON.stringify({ server: { port: 'abc' } }));

      await expect(ConfigLoader.load(configPath)).rejects.toThrow(
        'config.server.port must be an integer'
      );
    });
  });

  describe('resolve', () => {
    it('親ディレクトリの設定ファイルを見つける', async () => {
      const nested = path.join(testDir, 'a', 'b');
      await fs.mkdir(nested, { recursive: true });
      await fs.writeFile(
        path.join(testDir, 'mdsite.json'),
        JSON.stringify({ project: { name: 'blog' } })
      );

      const resolved = await ConfigLoader.resolve({ cwd: nested });
      expect(resolved.configPath).toBe(path.join(testDir, 'mdsite.json'));
      expect(resolved.projectRoot).toBe(testDir);
      expect(resolved.config.project.name).toBe('blog');
    });

    it('.mdsite.json を mdsite.json より優先する', async () => {
      await fs.writeFile(path.join(testDir, 'mdsite.json'), JSON.stringify({ project: { name: 'plain' } }));
      await fs.writeFile(path.join(testDir, '.mdsite.json'), JSON.stringify({ project: { name: 'dot' } }));

      const resolved = await ConfigLoader.resolve({ cwd: testDir });
      expect(resolved.configPath).toBe(path.join(testDir, '.mdsite.json'));
      expect(resolved.config.project.name).toBe('dot');
    });

    it('project.root は設定ファイルのディレクトリからの相対パス', async () => {
      await fs.mkdir(path.join(testDir, 'site'));
      await fs.writeFile(
        path.join(testDir, 'custom.json'),
        JSON.stringify({ project: { root: 'site' } })
      );

      const resolved = await ConfigLoader.resolve({ configPath: 'custom.json', cwd: testDir });
      expect(resolved.configPath).toBe(path.join(testDir, 'custom.json'));
      expect(resolved.projectRoot).toBe(path.join(testDir, 'site'));
    });

    it('環境変数 MDSITE_CONFIG を使う', async () => {
      await fs.writeFile(path.join(testDir, 'env.json'), JSON.stringify({ server: { port: 5000 } }));
      process.env.MDSITE_CONFIG = 'env.json';

      try {
        const resolved = await ConfigLoader.resolve({ cwd: testDir });
        expect(resolved.configPath).toBe(path.join(testDir, 'env.json'));
        expect(resolved.config.server.port).toBe(5000);
      } finally {
        delete process.env.MDSITE_CONFIG;
      }
    });

    it('設定ファイルがなければデフォルト設定とカレントディレクトリ', async () => {
      const resolved = await ConfigLoader.resolve({ cwd: testDir, traverseUp: false });
      expect(resolved.configPath).toBeNull();
      expect(resolved.projectRoot).toBe(testDir);
      expect(resolved.config).toEqual(ConfigLoader.getDefaultConfig());
    });
  });
});

describe('validateConfig', () => {
  it('オブジェクト以外はエラー', () => {
    expect(() => validateConfig(null)).toThrow('Config must be an object');
    expect(() => validateConfig([])).toThrow('Config must be an object');
  });

  it('未知のキーは無視する', () => {
    expect(validateConfig({ version: '1.0', unknown: true })).toEqual({ version: '1.0' });
  });

  it('content.include は文字列配列でなければならない', () => {
    expect(() => validateConfig({ content: { include: '**/*.md' } })).toThrow(
      'config.content.include must be an array'
    );
    expect(() => validateConfig({ content: { include: [1] } })).toThrow(
      'config.content.include must be an array of strings'
    );
  });

  it('content.sourceDir は空文字列を許可しない', () => {
    expect(() => validateConfig({ content: { sourceDir: ' ' } })).toThrow(
      'config.content.sourceDir must not be empty'
    );
  });

  it('server.port は範囲内の整数', () => {
    expect(() => validateConfig({ server: { port: 70000 } })).toThrow(
      'config.server.port must be between 0 and 65535'
    );
    expect(validateConfig({ server: { port: 0 } })).toEqual({ server: { port: 0 } });
  });

  it('server.maxPortAttempts は正の整数', () => {
    expect(() => validateConfig({ server: { maxPortAttempts: 0 } })).toThrow(
      'config.server.maxPortAttempts must be positive'
    );
  });

  it('watcher.enabled は真偽値', () => {
    expect(() => validateConfig({ watcher: { enabled: 'yes' } })).toThrow(
      'config.watcher.enabled must be a boolean'
    );
  });
});
