/**
 * @redactive/log - 秘匿済みの値の構造化ログ出力
 */

// ========== JSON変換 ==========
export type { JsonValue, RedactedJson } from './json.js';
export {
  SERIALIZATION_FAILED_PLACEHOLDER,
  toJsonValue,
  toRedactedJson,
  isRedactedJson,
} from './json.js';

// ========== ロガー ==========
export type {
  LogLevel,
  LogSink,
  MemorySink,
  RedactedField,
  LogFields,
  RedactedLogger,
  LoggerOptions,
} from './logger.js';
export {
  isLevelEnabled,
  consoleSink,
  createFileSink,
  createMemorySink,
  redactedField,
  createRedactedLogger,
  createLoggerFromEnv,
} from './logger.js';

// ========== エラー ==========
export type { LogError, LogErrorCode } from './errors.js';
export { logError, serializationError, isLogError } from './errors.js';
