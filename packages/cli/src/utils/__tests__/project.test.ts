import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { parsePort, resolveSiteContext } from '../project.js';

describe('resolveSiteContext', () => {
  let projectDir: string;
  let configPath: string;

  beforeEach(async () => {
    projectDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'site-context-test-')));
    configPath = path.join(projectDir, '.mdsite.json');
  });

  afterEach(async () => {
    await fs.rm(projectDir, { recursive: true, force: true });
  });

  it('設定のディレクトリはプロジェクトルートからの相対パス', async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({ content: { sourceDir: 'docs', outputDir: 'dist/site' } })
    );

    const context = await resolveSiteContext({ config: configPath, cwd: os.tmpdir() });

    expect(context.configPath).toBe(configPath);
    expect(context.projectRoot).toBe(projectDir);
    expect(context.sourceDir).toBe(path.join(projectDir, 'docs'));
    expect(context.outputDir).toBe(path.join(projectDir, 'dist', 'site'));
  });

  it('設定がなければデフォルトのディレクトリ', async () => {
    await fs.writeFile(configPath, '{}');

    const context = await resolveSiteContext({ config: configPath });

    expect(context.sourceDir).toBe(path.join(projectDir, 'content', 'posts'));
    expect(context.outputDir).toBe(path.join(projectDir, 'public'));
  });

  it('--source / --out はカレントディレクトリからの相対パス', async () => {
    await fs.writeFile(configPath, '{}');
    const cwd = path.join(projectDir, 'work');

    const context = await resolveSiteContext({
      config: configPath,
      source: 'notes',
      out: '../www',
      cwd,
    });

    expect(context.sourceDir).toBe(path.join(cwd, 'notes'));
    expect(context.outputDir).toBe(path.join(projectDir, 'www'));
  });
});

describe('parsePort', () => {
  it('未指定ならundefined', () => {
    expect(parsePort(undefined)).toBeUndefined();
  });

  it('数値に変換する', () => {
    expect(parsePort('8080')).toBe(8080);
    expect(parsePort('0')).toBe(0);
  });

  it('不正な値はエラー', () => {
    expect(() => parsePort('abc')).toThrow('Invalid port: abc');
    expect(() => parsePort('70000')).toThrow('Invalid port: 70000');
    expect(() => parsePort('3.5')).toThrow('Invalid port: 3.5');
  });
});
