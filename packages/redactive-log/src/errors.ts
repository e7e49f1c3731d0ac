/**
 * @redactive/log エラー型定義
 */

export type LogErrorCode = 'SERIALIZATION_FAILED'; // 秘匿済みの値のJSON変換失敗

export interface LogError {
  readonly _tag: 'LogError';
  readonly code: LogErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

export const logError = (code: LogErrorCode, message: string, cause?: unknown): LogError => ({
  _tag: 'LogError',
  code,
  message,
  cause,
});

export const serializationError = (message: string, cause?: unknown): LogError =>
  logError('SERIALIZATION_FAILED', message, cause);

export const isLogError = (e: unknown): e is LogError =>
  typeof e === 'object' && e !== null && '_tag' in e && e._tag === 'LogError';
