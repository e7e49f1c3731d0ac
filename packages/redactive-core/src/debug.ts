/**
 * Debug 表示
 *
 * production: walk / classify フィールドは "[REDACTED]"
 * testing: 全フィールドの実値
 *
 * モードは起動時の設定で一度だけ決め、呼び出しごとの引数にはしない。
 */

import type { DebugFormatter, RenderMode, SensitiveShape } from './types.js';
import type { Env } from './config/env.js';
import { loadEnv } from './config/env.js';
import { productionFormatter, testingFormatter } from './format.js';

export type DebugRenderer = <T>(value: T, shape: SensitiveShape<T>) => string;

const formatterFor = (mode: RenderMode): DebugFormatter =>
  mode === 'testing' ? testingFormatter : productionFormatter;

export const createDebugRenderer = (mode: RenderMode): DebugRenderer => {
  const formatter = formatterFor(mode);
  return (value, shape) => shape.format(value, formatter);
};

export const renderModeFromEnv = (env: Env): RenderMode =>
  env.REDACTIVE_TESTING ? 'testing' : 'production';

let cachedRenderer: DebugRenderer | null = null;

/** 設定から選ばれた Debug 表示関数 */
export function debugRenderer(): DebugRenderer {
  if (cachedRenderer) return cachedRenderer;
  cachedRenderer = createDebugRenderer(renderModeFromEnv(loadEnv()));
  return cachedRenderer;
}

export const renderDebug = <T>(value: T, shape: SensitiveShape<T>): string =>
  debugRenderer()(value, shape);

/**
 * テスト用: 選択済みの表示関数をクリア
 */
export function resetDebugRenderer(): void {
  cachedRenderer = null;
}
