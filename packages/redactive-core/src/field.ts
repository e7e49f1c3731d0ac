/**
 * フィールドの振る舞い
 *
 * コード生成段階は複合値のフィールドごとに次のいずれかを選ぶ:
 * | 注釈 | 振る舞い |
 * |------|----------|
 * | なし | passThrough: 変更しない（未知の外部型も含む） |
 * | 注釈のみ | walk / walkScalar: 内側を走査、スカラーは既定値 |
 * | 分類付き | classify: 分類のポリシーを葉に適用 |
 */

import type { Classification } from '@redactive/policy';
import type { ClassifiableShape, FieldBehavior, SensitiveShape } from './types.js';
import type { ScalarKind, ScalarTypes } from './scalar.js';
import { formatValue } from './format.js';
import { text } from './classifiable.js';

export const passThrough = <T>(): FieldBehavior<T> => ({
  _tag: 'PassThrough',
  apply: (value) => value,
  format: (value) => formatValue(value),
});

/** Sensitive な複合値・コンテナへ再帰する */
export const walk = <T>(shape: SensitiveShape<T>): FieldBehavior<T> => ({
  _tag: 'Walk',
  apply: (value, mapper) => shape.redactWith(value, mapper),
  format: (value, formatter) => formatter.sensitive(() => shape.format(value, formatter)),
});

/** スカラーを既定値に置換する */
export const walkScalar = <K extends ScalarKind>(kind: K): FieldBehavior<ScalarTypes[K]> => ({
  _tag: 'Walk',
  apply: (value, mapper) => mapper.mapScalar(kind, value),
  format: (value, formatter) => formatter.sensitive(() => formatValue(value)),
});

/** 分類のポリシーをラッパー越しに葉へ適用する */
export const classify = <T>(
  classification: Classification,
  shape: ClassifiableShape<T>
): FieldBehavior<T> => ({
  _tag: 'Classify',
  apply: (value, mapper) => shape.applyClassification(value, classification, mapper),
  format: (value, formatter) => formatter.sensitive(() => formatValue(value)),
});

/** 文字列フィールドの分類（classify(c, text) の短縮形） */
export const classifyText = (classification: Classification): FieldBehavior<string> =>
  classify(classification, text);
