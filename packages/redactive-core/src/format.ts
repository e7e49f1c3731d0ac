/**
 * Debug 表示用の値フォーマット
 *
 * JSON.stringify は BigInt をシリアライズできず、循環参照で例外を投げる。
 * BigInt は文字列化し、失敗時は String() に落とす。
 */

import { REDACTED_PLACEHOLDER } from '@redactive/policy';
import type { DebugFormatter } from './types.js';

/** 機密フィールドの Debug 表示（文字列リテラルとして表示される） */
export const REDACTED_DEBUG = JSON.stringify(REDACTED_PLACEHOLDER);

export const productionFormatter: DebugFormatter = {
  mode: 'production',
  sensitive: () => REDACTED_DEBUG,
};

export const testingFormatter: DebugFormatter = {
  mode: 'testing',
  sensitive: (show) => show(),
};

/**
 * JSON.stringify用のreplacer
 * BigIntを文字列に変換
 */
export function bigIntReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * BigInt対応のJSON.stringify
 * 循環参照などで失敗した場合は undefined
 */
export function safeJsonStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value, bigIntReplacer);
  } catch {
    return undefined;
  }
}

export const formatEntries = (entries: readonly string[]): string =>
  entries.length === 0 ? '{}' : `{ ${entries.join(', ')} }`;

/**
 * 任意の値を Debug 表示する（pass-through フィールド用）
 */
export function formatValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'bigint':
      return `${value}n`;
    case 'function':
      return '[Function]';
    case 'symbol':
      return value.toString();
    case 'number':
    case 'boolean':
    case 'undefined':
      return String(value);
  }
  if (value === null) return 'null';
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => formatValue(item)).join(', ')}]`;
  }
  if (value instanceof Map) {
    const entries = Array.from(value, ([k, v]: [unknown, unknown]) => `${formatValue(k)}: ${formatValue(v)}`);
    return `Map ${formatEntries(entries)}`;
  }
  if (value instanceof Set) {
    return `Set [${Array.from(value, (item: unknown) => formatValue(item)).join(', ')}]`;
  }
  return safeJsonStringify(value) ?? String(value);
}
