/**
 * 秘匿のエントリポイント
 *
 * ログ・診断用に秘匿済みのコピーを得る唯一の経路。
 * 入力を消費して同じ形の新しい値を返す（入力と出力の共有は保証しない）。
 */

import type { Classification } from '@redactive/policy';
import type { ClassifiableShape, RedactionMapper, SensitiveShape } from './types.js';
import { defaultMapper } from './mapper.js';

/** 標準の秘匿戦略（スカラー既定値 + 分類ポリシー）で走査する */
export const redact = <T>(value: T, shape: SensitiveShape<T>): T => shape.redactWith(value, defaultMapper);

/** 任意の秘匿戦略で走査する */
export const redactWith = <T>(value: T, shape: SensitiveShape<T>, mapper: RedactionMapper): T =>
  shape.redactWith(value, mapper);

/** 分類のポリシーをラッパー越しに葉へ適用する */
export const applyClassification = <T>(
  value: T,
  shape: ClassifiableShape<T>,
  classification: Classification,
  mapper: RedactionMapper = defaultMapper
): T => shape.applyClassification(value, classification, mapper);

/**
 * Shape を束縛した秘匿関数
 * 同じ型を繰り返し秘匿する呼び出し側向け
 */
export interface Redactor<T> {
  readonly shape: SensitiveShape<T>;
  redact(value: T): T;
}

export const redactor = <T>(shape: SensitiveShape<T>): Redactor<T> => ({
  shape,
  redact: (value) => redact(value, shape),
});
