import type { MdsiteConfig } from '../config.js';

/** 深さ1までの部分設定（ファイルから読み込んだ設定） */
export type PartialConfig = {
  [K in keyof MdsiteConfig]?: MdsiteConfig[K] extends object
    ? Partial<MdsiteConfig[K]>
    : MdsiteConfig[K];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): PartialConfig {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  const result: PartialConfig = {};

  // バージョンのチェック
  if (config.version !== undefined) {
    if (typeof config.version !== 'string') {
      throw new Error('config.version must be a string');
    }
    result.version = config.version;
  }

  if (config.project !== undefined) {
    result.project = validateProjectConfig(config.project);
  }

  if (config.content !== undefined) {
    result.content = validateContentConfig(config.content);
  }

  if (config.server !== undefined) {
    result.server = validateServerConfig(config.server);
  }

  if (config.watcher !== undefined) {
    result.watcher = validateWatcherConfig(config.watcher);
  }

  return result;
}

function validateProjectConfig(project: unknown): PartialConfig['project'] {
  if (!isRecord(project)) {
    throw new Error('config.project must be an object');
  }

  const result: PartialConfig['project'] = {};

  if (project.name !== undefined) {
    if (typeof project.name !== 'string') {
      throw new Error('config.project.name must be a string');
    }
    result.name = project.name;
  }

  if (project.root !== undefined) {
    if (typeof project.root !== 'string') {
      throw new Error('config.project.root must be a string');
    }
    result.root = project.root;
  }

  return result;
}

function validateContentConfig(content: unknown): PartialConfig['content'] {
  if (!isRecord(content)) {
    throw new Error('config.content must be an object');
  }

  const result: PartialConfig['content'] = {};

  for (const key of ['sourceDir', 'outputDir'] as const) {
    const value = content[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'string') {
      throw new Error(`config.content.${key} must be a string`);
    }
    if (value.trim() === '') {
      throw new Error(`config.content.${key} must not be empty`);
    }
    result[key] = value;
  }

  for (const key of ['include', 'exclude'] as const) {
    const value = content[key];
    if (value === undefined) {
      continue;
    }
    if (!Array.isArray(value)) {
      throw new Error(`config.content.${key} must be an array`);
    }
    if (!isStringArray(value)) {
      throw new Error(`config.content.${key} must be an array of strings`);
    }
    result[key] = value;
  }

  return result;
}

function validateServerConfig(server: unknown): PartialConfig['server'] {
  if (!isRecord(server)) {
    throw new Error('config.server must be an object');
  }

  const result: PartialConfig['server'] = {};

  if (server.host !== undefined) {
    if (typeof server.host !== 'string') {
      throw new Error('config.server.host must be a string');
    }
    result.host = server.host;
  }

  if (server.port !== undefined) {
    if (typeof server.port !== 'number' || !Number.isInteger(server.port)) {
      throw new Error('config.server.port must be an integer');
    }
    if (server.port < 0 || server.port > 65535) {
      throw new Error('config.server.port must be between 0 and 65535');
    }
    result.port = server.port;
  }

  if (server.maxPortAttempts !== undefined) {
    if (typeof server.maxPortAttempts !== 'number' || !Number.isInteger(server.maxPortAttempts)) {
      throw new Error('config.server.maxPortAttempts must be an integer');
    }
    if (server.maxPortAttempts <= 0) {
      throw new Error('config.server.maxPortAttempts must be positive');
    }
    result.maxPortAttempts = server.maxPortAttempts;
  }

  return result;
}

function validateWatcherConfig(watcher: unknown): PartialConfig['watcher'] {
  if (!isRecord(watcher)) {
    throw new Error('config.watcher must be an object');
  }

  const result: PartialConfig['watcher'] = {};

  if (watcher.enabled !== undefined) {
    if (typeof watcher.enabled !== 'boolean') {
      throw new Error('config.watcher.enabled must be a boolean');
    }
    result.enabled = watcher.enabled;
  }

  return result;
}
