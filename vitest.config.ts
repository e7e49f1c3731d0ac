import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolve = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // ワークスペースパッケージのエイリアス設定
      '@redactive/policy': resolve('./packages/redactive-policy/src/index.ts'),
      '@redactive/core': resolve('./packages/redactive-core/src/index.ts'),
      '@redactive/log': resolve('./packages/redactive-log/src/index.ts'),
    },
  },
  test: {
    // グローバル設定
    globals: true,
    environment: 'node',

    // タイムアウト設定（Property-based testは時間がかかる）
    testTimeout: 30000,
    hookTimeout: 30000,

    // `npm run test:pbt` で Property: プレフィックス付きテストのみ実行
    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
