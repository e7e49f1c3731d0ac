/**
 * @redactive/core 型定義
 *
 * 走査は2系統:
 * - SensitiveShape: 複合値・コンテナを構造的に歩く（フィールドごとに pass-through / walk / classify）
 * - ClassifiableShape: 分類のポリシーをラッパー（optional/array/box/map）越しに葉へ適用する
 *
 * どちらも1層ずつのインターフェースで、合成により任意の深さの入れ子を表す。
 */

import type { Classification } from '@redactive/policy';
import type { ScalarKind, ScalarTypes } from './scalar.js';
import type { SensitiveValue } from './value.js';

// ========== ラッパー型 ==========

/** 所有ボックス（間接参照1層） */
export interface Boxed<T> {
  readonly value: T;
}

export const boxed = <T>(value: T): Boxed<T> => ({ value });

/** 自身の秘匿処理を持つオブジェクト */
export interface SelfRedacting<T> {
  redact(): T;
}

// ========== RedactionMapper ==========

/**
 * 走査中に使われる秘匿戦略
 * 状態を持たず、参照で共有される
 */
export interface RedactionMapper {
  /** スカラー値を既定値に置換 */
  mapScalar<K extends ScalarKind>(kind: K, value: ScalarTypes[K]): ScalarTypes[K];

  /** 分類のポリシーを葉の値に適用 */
  mapSensitive<T>(value: T, leaf: SensitiveValue<T>, classification: Classification): T;
}

// ========== Debug 表示 ==========

/** production: 機密フィールドはプレースホルダー / testing: 実値を表示 */
export type RenderMode = 'production' | 'testing';

export interface DebugFormatter {
  readonly mode: RenderMode;
  /** 機密フィールドの表示（production では show を呼ばない） */
  sensitive(show: () => string): string;
}

// ========== Shape ==========

export type ClassifiableKind =
  | 'value'
  | 'optional'
  | 'nullable'
  | 'option'
  | 'array'
  | 'box'
  | 'map'
  | 'record';

export interface ClassifiableShape<T> {
  readonly kind: ClassifiableKind;
  applyClassification(value: T, classification: Classification, mapper: RedactionMapper): T;
}

export type SensitiveKind =
  | 'passthrough'
  | 'optional'
  | 'nullable'
  | 'option'
  | 'either'
  | 'array'
  | 'box'
  | 'map'
  | 'record'
  | 'set'
  | 'self'
  | 'lazy'
  | 'struct'
  | 'union';

export interface SensitiveShape<T> {
  readonly kind: SensitiveKind;
  redactWith(value: T, mapper: RedactionMapper): T;
  format(value: T, formatter: DebugFormatter): string;
}

// ========== フィールド ==========

/** コード生成段階がフィールドごとに決める振る舞い */
export type FieldBehaviorTag = 'PassThrough' | 'Walk' | 'Classify';

export interface FieldBehavior<T> {
  readonly _tag: FieldBehaviorTag;
  apply(value: T, mapper: RedactionMapper): T;
  format(value: T, formatter: DebugFormatter): string;
}

/** 省略したフィールドは pass-through */
export type FieldTable<T> = { readonly [K in keyof T]?: FieldBehavior<T[K]> };
