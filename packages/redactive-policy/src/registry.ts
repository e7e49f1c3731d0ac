/**
 * 分類レジストリ
 *
 * 分類名 → ポリシーの静的な対応表。分類ごとにポリシーはちょうど1つ。
 * 呼び出しごとにポリシーを変えることはできず、別のポリシーが必要なら別の分類を定義する。
 */

import * as E from 'fp-ts/Either';
import * as O from 'fp-ts/Option';
import type { Classification, TextRedactionPolicy } from './types.js';
import type { RedactionError } from './errors.js';
import { classificationAlreadyDefinedError, raise } from './errors.js';
import { defaultFull } from './text.js';

export interface ClassificationRegistry {
  /** 分類を定義する（同名が登録済みならLeft） */
  define<N extends string>(
    name: N,
    policy: TextRedactionPolicy
  ): E.Either<RedactionError, Classification<N>>;

  /**
   * 分類に対応するポリシーを返す
   * 未登録の分類（別レジストリで定義されたもの等）は Full にフォールバックし、値を漏らさない
   */
  policyFor(classification: Classification): TextRedactionPolicy;

  lookup(name: string): O.Option<Classification>;

  names(): readonly string[];
}

export const createClassificationRegistry = (): ClassificationRegistry => {
  const markers = new Map<string, Classification>();
  const policies = new Map<string, TextRedactionPolicy>();

  return {
    define<N extends string>(
      name: N,
      policy: TextRedactionPolicy
    ): E.Either<RedactionError, Classification<N>> {
      if (policies.has(name)) {
        return E.left(classificationAlreadyDefinedError(name));
      }
      const marker: Classification<N> = Object.freeze({ _tag: 'Classification', name });
      markers.set(name, marker);
      policies.set(name, policy);
      return E.right(marker);
    },

    policyFor(classification) {
      return policies.get(classification.name) ?? defaultFull();
    },

    lookup(name) {
      return O.fromNullable(markers.get(name));
    },

    names() {
      return Array.from(markers.keys());
    },
  };
};

/** 組み込み分類と利用者定義の分類を保持する既定レジストリ */
export const defaultRegistry: ClassificationRegistry = createClassificationRegistry();

/**
 * 既定レジストリに分類を定義する
 * 重複定義は例外を送出する（モジュール初期化時に呼ぶ）
 */
export const defineClassification = <N extends string>(
  name: N,
  policy: TextRedactionPolicy,
  registry: ClassificationRegistry = defaultRegistry
): Classification<N> => {
  const result = registry.define(name, policy);
  return E.isRight(result) ? result.right : raise(result.left);
};

export const policyFor = (classification: Classification): TextRedactionPolicy =>
  defaultRegistry.policyFor(classification);
