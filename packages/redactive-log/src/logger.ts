/**
 * 秘匿済みフィールドを持つ構造化ロガー（JSONL形式）
 *
 * redactedField() で包んだフィールドだけが秘匿・JSON変換の対象。
 * それ以外のフィールドはそのまま出力される。
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { Env, SensitiveShape } from '@redactive/core';
import { loadEnv } from '@redactive/core';
import type { JsonValue } from './json.js';
import { SERIALIZATION_FAILED_PLACEHOLDER, toJsonValue, toRedactedJson } from './json.js';
import * as E from 'fp-ts/Either';

// ========== レベル ==========

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLevelEnabled = (threshold: LogLevel, level: LogLevel): boolean =>
  LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

// ========== 出力先 ==========

export interface LogSink {
  write(line: string): void;
}

/** stderr（既定） */
export const consoleSink: LogSink = {
  write: (line) => console.error(line),
};

/**
 * append-only の JSONL ファイル
 * ディレクトリが存在しない場合は作成
 */
export function createFileSink(path: string): LogSink {
  return {
    write(line) {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      appendFileSync(path, line + '\n', { encoding: 'utf-8' });
    },
  };
}

export interface MemorySink extends LogSink {
  readonly lines: readonly string[];
}

/** テスト用: 出力行を保持する */
export function createMemorySink(): MemorySink {
  const lines: string[] = [];
  return {
    lines,
    write: (line) => {
      lines.push(line);
    },
  };
}

// ========== フィールド ==========

/** 秘匿してから出力するフィールド */
export interface RedactedField {
  readonly _tag: 'RedactedField';
  toJson(): JsonValue;
}

export const redactedField = <T>(value: T, shape: SensitiveShape<T>): RedactedField => ({
  _tag: 'RedactedField',
  toJson: () => toRedactedJson(value, shape).value,
});

const isRedactedField = (v: unknown): v is RedactedField =>
  typeof v === 'object' && v !== null && '_tag' in v && v._tag === 'RedactedField';

export type LogFields = Readonly<Record<string, unknown>>;

const fieldToJson = (value: unknown): JsonValue =>
  isRedactedField(value)
    ? value.toJson()
    : E.getOrElse((): JsonValue => SERIALIZATION_FAILED_PLACEHOLDER)(toJsonValue(value));

// ========== ロガー ==========

export interface RedactedLogger {
  readonly level: LogLevel;
  log(level: LogLevel, msg: string, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  /** 束縛フィールドを追加したロガー */
  child(bindings: LogFields): RedactedLogger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  /** ISO 8601 タイムスタンプ（テストで固定する用） */
  now?: () => string;
  bindings?: LogFields;
}

// ts / level / msg は予約キーで、フィールドでは上書きしない
const RESERVED_KEYS = new Set(['ts', 'level', 'msg']);

export function createRedactedLogger(options: LoggerOptions = {}): RedactedLogger {
  const level = options.level ?? 'info';
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date().toISOString());
  const bindings = options.bindings ?? {};

  const log = (entryLevel: LogLevel, msg: string, fields: LogFields = {}): void => {
    if (!isLevelEnabled(level, entryLevel)) return;

    const record: Record<string, JsonValue> = { ts: now(), level: entryLevel, msg };
    for (const [key, value] of Object.entries({ ...bindings, ...fields })) {
      if (RESERVED_KEYS.has(key)) continue;
      record[key] = fieldToJson(value);
    }

    // JSONL形式（1行1JSON）
    sink.write(JSON.stringify(record));
  };

  return {
    level,
    log,
    debug: (msg, fields) => log('debug', msg, fields),
    info: (msg, fields) => log('info', msg, fields),
    warn: (msg, fields) => log('warn', msg, fields),
    error: (msg, fields) => log('error', msg, fields),
    child: (extra) =>
      createRedactedLogger({ level, sink, now, bindings: { ...bindings, ...extra } }),
  };
}

/**
 * 設定（REDACTIVE_LOG_LEVEL / REDACTIVE_LOG_PATH）からロガーを作る
 */
export function createLoggerFromEnv(env: Env = loadEnv()): RedactedLogger {
  return createRedactedLogger({
    level: env.REDACTIVE_LOG_LEVEL,
    sink: env.REDACTIVE_LOG_PATH ? createFileSink(env.REDACTIVE_LOG_PATH) : consoleSink,
  });
}
