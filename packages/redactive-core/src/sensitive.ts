/**
 * Sensitive - 複合値・コンテナの構造的な走査
 *
 * 標準コンテナ（optional / nullable / Option / Either / 配列 / Box / Map / Record / Set）は
 * 内側の Shape へ再帰し、構造と順序を保ったまま新しい値を返す。
 * 葉のプリミティブと文字列は passthrough で、変換されるのは
 * classify と複合値への walk だけ。
 *
 * 走査は失敗しない。宣言された Shape に型が合う値に対して全域。
 */

import * as E from 'fp-ts/Either';
import * as O from 'fp-ts/Option';
import { pipe } from 'fp-ts/function';
import type {
  Boxed,
  DebugFormatter,
  FieldTable,
  RedactionMapper,
  SelfRedacting,
  SensitiveShape,
} from './types.js';
import { formatEntries, formatValue } from './format.js';

// ========== 葉 ==========

/** 変更しない（プリミティブ・文字列・未知の型） */
export const passthrough = <T>(): SensitiveShape<T> => ({
  kind: 'passthrough',
  redactWith: (value) => value,
  format: (value) => formatValue(value),
});

// ========== コンテナ ==========

export const optional = <T>(inner: SensitiveShape<T>): SensitiveShape<T | undefined> => ({
  kind: 'optional',
  redactWith: (value, mapper) => (value === undefined ? value : inner.redactWith(value, mapper)),
  format: (value, formatter) => (value === undefined ? 'undefined' : inner.format(value, formatter)),
});

export const nullable = <T>(inner: SensitiveShape<T>): SensitiveShape<T | null> => ({
  kind: 'nullable',
  redactWith: (value, mapper) => (value === null ? value : inner.redactWith(value, mapper)),
  format: (value, formatter) => (value === null ? 'null' : inner.format(value, formatter)),
});

export const option = <T>(inner: SensitiveShape<T>): SensitiveShape<O.Option<T>> => ({
  kind: 'option',
  redactWith: (value, mapper) =>
    pipe(
      value,
      O.map((held) => inner.redactWith(held, mapper))
    ),
  format: (value, formatter) =>
    pipe(
      value,
      O.match(
        () => 'none',
        (held) => `some(${inner.format(held, formatter)})`
      )
    ),
});

/** 結果型: Left / Right の両方を走査する */
export const either = <L, R>(
  left: SensitiveShape<L>,
  right: SensitiveShape<R>
): SensitiveShape<E.Either<L, R>> => ({
  kind: 'either',
  redactWith: (value, mapper) =>
    pipe(
      value,
      E.bimap(
        (l) => left.redactWith(l, mapper),
        (r) => right.redactWith(r, mapper)
      )
    ),
  format: (value, formatter) =>
    pipe(
      value,
      E.match(
        (l) => `left(${left.format(l, formatter)})`,
        (r) => `right(${right.format(r, formatter)})`
      )
    ),
});

export const array = <T>(inner: SensitiveShape<T>): SensitiveShape<T[]> => ({
  kind: 'array',
  redactWith: (value, mapper) => value.map((item) => inner.redactWith(item, mapper)),
  format: (value, formatter) => `[${value.map((item) => inner.format(item, formatter)).join(', ')}]`,
});

export const box = <T>(inner: SensitiveShape<T>): SensitiveShape<Boxed<T>> => ({
  kind: 'box',
  redactWith: (value, mapper) => ({ value: inner.redactWith(value.value, mapper) }),
  format: (value, formatter) => `Boxed(${inner.format(value.value, formatter)})`,
});

/** Map: 値のみ走査し、キーは構造的にそのまま渡す */
export const map = <K, V>(inner: SensitiveShape<V>): SensitiveShape<Map<K, V>> => ({
  kind: 'map',
  redactWith: (value, mapper) =>
    new Map(Array.from(value, ([key, held]): [K, V] => [key, inner.redactWith(held, mapper)])),
  format: (value, formatter) =>
    `Map ${formatEntries(
      Array.from(value, ([key, held]) => `${formatValue(key)}: ${inner.format(held, formatter)}`)
    )}`,
});

/** Record<string, V>: 値のみ走査し、キーはそのまま */
export const record = <V>(inner: SensitiveShape<V>): SensitiveShape<Readonly<Record<string, V>>> => ({
  kind: 'record',
  redactWith: (value, mapper) =>
    Object.fromEntries(
      Object.entries(value).map(([key, held]) => [key, inner.redactWith(held, mapper)])
    ),
  format: (value, formatter) =>
    formatEntries(
      Object.entries(value).map(
        ([key, held]) => `${JSON.stringify(key)}: ${inner.format(held, formatter)}`
      )
    ),
});

/** Set: 要素ごとに走査する（文字列・プリミティブの要素は passthrough でそのまま） */
export const set = <T>(inner: SensitiveShape<T>): SensitiveShape<Set<T>> => ({
  kind: 'set',
  redactWith: (value, mapper) => new Set(Array.from(value, (item) => inner.redactWith(item, mapper))),
  format: (value, formatter) =>
    `Set [${Array.from(value, (item) => inner.format(item, formatter)).join(', ')}]`,
});

/**
 * 自身の redact() を持つオブジェクト
 * 渡された mapper は使わず、オブジェクト自身の既定の秘匿処理に委ねる
 */
export const selfRedacting = <T extends SelfRedacting<T>>(): SensitiveShape<T> => ({
  kind: 'self',
  redactWith: (value) => value.redact(),
  format: (value) => formatValue(value),
});

/** 再帰的な型（木構造など）のための遅延参照 */
export const lazy = <T>(thunk: () => SensitiveShape<T>): SensitiveShape<T> => {
  let resolved: SensitiveShape<T> | undefined;
  const get = (): SensitiveShape<T> => (resolved ??= thunk());
  return {
    kind: 'lazy',
    redactWith: (value, mapper) => get().redactWith(value, mapper),
    format: (value, formatter) => get().format(value, formatter),
  };
};

// ========== 複合値 ==========

export interface StructOptions<T> {
  /** 独自の Debug 表示（指定時は production/testing どちらでもこれを使う） */
  readonly debug?: (value: T) => string;
}

const hasOwn = (target: unknown, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(target, key);

// プロトタイプを保ったまま自身の列挙可能プロパティを複製する
const cloneRecord = <T>(value: T): T =>
  Object.assign(Object.create(Object.getPrototypeOf(value)), value);

function redactFields<T>(value: T, fields: FieldTable<T>, mapper: RedactionMapper): T {
  const out = cloneRecord(value);
  for (const key in fields) {
    const behavior = fields[key];
    // 省略可能なフィールドが存在しない場合はキーを追加しない
    if (behavior === undefined || !hasOwn(value, key)) continue;
    out[key] = behavior.apply(value[key], mapper);
  }
  return out;
}

function formatFields<T>(
  name: string,
  value: T,
  fields: FieldTable<T>,
  formatter: DebugFormatter
): string {
  const entries: string[] = [];
  for (const key in value) {
    if (!hasOwn(value, key)) continue;
    const behavior = fields[key];
    const shown =
      behavior === undefined ? formatValue(value[key]) : behavior.format(value[key], formatter);
    entries.push(`${key}: ${shown}`);
  }
  return entries.length === 0 ? name : `${name} ${formatEntries(entries)}`;
}

/**
 * レコード型の複合値
 * コード生成段階が出力するフィールド表に従って走査する
 */
export const struct = <T>(
  name: string,
  fields: FieldTable<T>,
  options: StructOptions<T> = {}
): SensitiveShape<T> => ({
  kind: 'struct',
  redactWith: (value, mapper) => redactFields(value, fields, mapper),
  format: (value, formatter) =>
    options.debug ? options.debug(value) : formatFields(name, value, fields, formatter),
});

/** タグ値ごとのフィールド表 */
export type VariantTables<T extends Readonly<Record<Tag, string>>, Tag extends string> = {
  readonly [V in T[Tag]]: FieldTable<Extract<T, Readonly<Record<Tag, V>>>>;
};

/**
 * タグ付きユニオン
 * バリアントはタグフィールドの値で選択し、Debug 表示は "Name::Variant { ... }"
 */
export const union = <T extends Readonly<Record<Tag, string>>, Tag extends string>(
  name: string,
  tag: Tag,
  variants: VariantTables<T, Tag>,
  options: StructOptions<T> = {}
): SensitiveShape<T> => {
  const cases = new Map<string, SensitiveShape<T>>();
  const isVariant = (key: string): key is T[Tag] => hasOwn(variants, key);
  for (const variant of Object.keys(variants).filter(isVariant)) {
    const shape = struct<Extract<T, Readonly<Record<Tag, typeof variant>>>>(
      `${name}::${variant}`,
      variants[variant]
    );
    cases.set(variant, shape);
  }

  return {
    kind: 'union',
    redactWith: (value, mapper) => {
      const shape = cases.get(value[tag]);
      return shape === undefined ? value : shape.redactWith(value, mapper);
    },
    format: (value, formatter) => {
      if (options.debug) return options.debug(value);
      const shape = cases.get(value[tag]);
      return shape === undefined ? `${name}::${value[tag]}` : shape.format(value, formatter);
    },
  };
};
