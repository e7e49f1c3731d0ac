/**
 * Classifiable - 分類のポリシーをラッパー越しに葉へ適用する
 *
 * 各関数はラッパー1層分だけを担当し、内側は同じインターフェースに委譲する。
 * 合成すれば任意の深さの入れ子になる（例: optional(array(text))）。
 * 層ごとに深さが1減るため、具体的な型ごとに再帰は有限で止まる。
 */

import * as O from 'fp-ts/Option';
import { pipe } from 'fp-ts/function';
import type { Boxed, ClassifiableShape } from './types.js';
import type { SensitiveValue } from './value.js';
import { textValue } from './value.js';

// ========== 葉 ==========

/** 葉: ポリシーを適用して同じ型に復元する */
export const value = <T>(leaf: SensitiveValue<T>): ClassifiableShape<T> => ({
  kind: 'value',
  applyClassification: (v, classification, mapper) => mapper.mapSensitive(v, leaf, classification),
});

export const text: ClassifiableShape<string> = value(textValue);

// ========== ラッパー ==========

/** undefined はそのまま、値があれば内側へ */
export const optional = <T>(inner: ClassifiableShape<T>): ClassifiableShape<T | undefined> => ({
  kind: 'optional',
  applyClassification: (v, classification, mapper) =>
    v === undefined ? v : inner.applyClassification(v, classification, mapper),
});

/** null はそのまま（nullable(optional(x)) で null | undefined の両方を扱う） */
export const nullable = <T>(inner: ClassifiableShape<T>): ClassifiableShape<T | null> => ({
  kind: 'nullable',
  applyClassification: (v, classification, mapper) =>
    v === null ? v : inner.applyClassification(v, classification, mapper),
});

/** fp-ts Option: None はそのまま、Some は内側へ */
export const option = <T>(inner: ClassifiableShape<T>): ClassifiableShape<O.Option<T>> => ({
  kind: 'option',
  applyClassification: (v, classification, mapper) =>
    pipe(
      v,
      O.map((held) => inner.applyClassification(held, classification, mapper))
    ),
});

/** 要素ごとに適用（順序・件数を保持） */
export const array = <T>(inner: ClassifiableShape<T>): ClassifiableShape<T[]> => ({
  kind: 'array',
  applyClassification: (v, classification, mapper) =>
    v.map((item) => inner.applyClassification(item, classification, mapper)),
});

export const box = <T>(inner: ClassifiableShape<T>): ClassifiableShape<Boxed<T>> => ({
  kind: 'box',
  applyClassification: (v, classification, mapper) => ({
    value: inner.applyClassification(v.value, classification, mapper),
  }),
});

/**
 * Map: 値のみに適用し、キーは変更しない
 * キーの型が分類可能であってもキーは秘匿しない
 */
export const map = <K, V>(inner: ClassifiableShape<V>): ClassifiableShape<Map<K, V>> => ({
  kind: 'map',
  applyClassification: (v, classification, mapper) =>
    new Map(
      Array.from(v, ([key, held]): [K, V] => [
        key,
        inner.applyClassification(held, classification, mapper),
      ])
    ),
});

/** Record<string, V>: 値のみに適用し、キーは変更しない */
export const record = <V>(
  inner: ClassifiableShape<V>
): ClassifiableShape<Readonly<Record<string, V>>> => ({
  kind: 'record',
  applyClassification: (v, classification, mapper) =>
    Object.fromEntries(
      Object.entries(v).map(([key, held]) => [
        key,
        inner.applyClassification(held, classification, mapper),
      ])
    ),
});
