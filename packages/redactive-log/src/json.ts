/**
 * 秘匿済みの値を構造化ログ用の JSON 値に変換する
 *
 * - 必ず redact() の結果を変換し、元の値はシリアライズしない
 * - 変換失敗はエラーとして伝播させず、プレースホルダー文字列にする
 */

import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { redact } from '@redactive/core';
import type { SensitiveShape } from '@redactive/core';
import type { LogError } from './errors.js';
import { serializationError } from './errors.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export const SERIALIZATION_FAILED_PLACEHOLDER = 'Failed to serialize redacted value';

export interface RedactedJson {
  readonly _tag: 'RedactedJson';
  readonly value: JsonValue;
}

const redactedJson = (value: JsonValue): RedactedJson => ({ _tag: 'RedactedJson', value });

// 変換失敗を表す内部例外（メッセージに値そのものを含めない）
class JsonConversionFailure extends Error {}

const isPlainKey = (key: unknown): key is string | number =>
  typeof key === 'string' || typeof key === 'number';

function convert(value: unknown, seen: Set<object>): JsonValue | undefined {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'undefined':
    case 'function':
    case 'symbol':
      return undefined;
  }
  if (typeof value !== 'object' || value === null) return null;
  if (value instanceof Date) return value.toISOString();

  if (seen.has(value)) {
    throw new JsonConversionFailure('circular structure');
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => convert(item, seen) ?? null);
    }
    if (value instanceof Set) {
      return Array.from(value, (item: unknown) => convert(item, seen) ?? null);
    }
    const out: Record<string, JsonValue> = {};
    const entries: Array<[unknown, unknown]> =
      value instanceof Map ? Array.from(value) : Object.entries(value);
    for (const [key, held] of entries) {
      if (!isPlainKey(key)) {
        throw new JsonConversionFailure(`unsupported map key type: ${typeof key}`);
      }
      const converted = convert(held, seen);
      if (converted !== undefined) out[String(key)] = converted;
    }
    return out;
  } finally {
    seen.delete(value);
  }
}

/**
 * 秘匿済みの値を JSON 値に変換する
 */
export const toJsonValue = (value: unknown): E.Either<LogError, JsonValue> =>
  E.tryCatch(
    () => convert(value, new Set()) ?? null,
    (e) => serializationError(e instanceof Error ? e.message : String(e), e)
  );

/**
 * 秘匿してから JSON 値に変換する
 * 変換に失敗した場合は SERIALIZATION_FAILED_PLACEHOLDER を値とする
 */
export const toRedactedJson = <T>(value: T, shape: SensitiveShape<T>): RedactedJson =>
  pipe(
    toJsonValue(redact(value, shape)),
    E.getOrElse((): JsonValue => SERIALIZATION_FAILED_PLACEHOLDER),
    redactedJson
  );

export const isRedactedJson = (v: unknown): v is RedactedJson =>
  typeof v === 'object' && v !== null && '_tag' in v && v._tag === 'RedactedJson';
