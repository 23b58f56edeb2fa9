import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**', // ビルド成果物を除外（重複実行を防止）
    ],
    environment: 'node',
    // 実ファイルシステムとポートを使うテストがあるため直列実行
    fileParallelism: false,
    testTimeout: 20000,
    reporters: ['default'],
  },
});
