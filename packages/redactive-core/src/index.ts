/**
 * @redactive/core - 型駆動の秘匿エンジン
 *
 * - Sensitive: 複合値・コンテナの構造的な走査
 * - Classifiable: 分類ポリシーのラッパー越し適用
 * - redact(): 標準戦略による秘匿のエントリポイント
 * - Debug 表示: 起動時設定で production / testing を切り替え
 */

// ========== 型定義 ==========
export type {
  Boxed,
  SelfRedacting,
  RedactionMapper,
  RenderMode,
  DebugFormatter,
  ClassifiableKind,
  ClassifiableShape,
  SensitiveKind,
  SensitiveShape,
  FieldBehaviorTag,
  FieldBehavior,
  FieldTable,
} from './types.js';
export { boxed } from './types.js';

// ========== 葉・スカラー ==========
export type { SensitiveValue } from './value.js';
export { sensitiveValue, textValue } from './value.js';

export type { ScalarKind, ScalarTypes } from './scalar.js';
export { CHAR_SENTINEL, SCALAR_KINDS, redactScalar } from './scalar.js';

// ========== 秘匿戦略 ==========
export { createPolicyMapper, defaultMapper } from './mapper.js';

// ========== Shape ==========
export * as Classifiable from './classifiable.js';
export * as Sensitive from './sensitive.js';
export type { StructOptions, VariantTables } from './sensitive.js';
export { passThrough, walk, walkScalar, classify, classifyText } from './field.js';

// ========== エントリポイント ==========
export type { Redactor } from './redact.js';
export { redact, redactWith, applyClassification, redactor } from './redact.js';

// ========== Debug 表示 ==========
export type { DebugRenderer } from './debug.js';
export {
  createDebugRenderer,
  renderModeFromEnv,
  debugRenderer,
  renderDebug,
  resetDebugRenderer,
} from './debug.js';
export {
  REDACTED_DEBUG,
  productionFormatter,
  testingFormatter,
  formatValue,
  safeJsonStringify,
} from './format.js';

// ========== 設定 ==========
export type { Env } from './config/env.js';
export { parseEnv, loadEnv, clearEnvCache } from './config/env.js';
