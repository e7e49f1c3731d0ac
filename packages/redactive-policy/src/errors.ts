/**
 * @redactive/policy エラー型定義
 *
 * 走査・マスク処理は全域関数でありエラーを返さない。
 * ここで扱うのは起動時（分類定義・設定読み込み）の契約違反のみ。
 */

export type RedactionErrorCode =
  | 'CLASSIFICATION_ALREADY_DEFINED' // 同名の分類が登録済み
  | 'CLASSIFICATION_DOCUMENT_INVALID' // 分類ドキュメントの検証失敗
  | 'INVALID_MASK_CHAR' // マスク文字が1文字（Unicodeスカラー値）でない
  | 'INVALID_COUNT'; // 文字数が非負整数でない

export interface RedactionError {
  readonly _tag: 'RedactionError';
  readonly code: RedactionErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

export const redactionError = (
  code: RedactionErrorCode,
  message: string,
  cause?: unknown
): RedactionError => ({
  _tag: 'RedactionError',
  code,
  message,
  cause,
});

// ========== ショートカット ==========

export const classificationAlreadyDefinedError = (name: string): RedactionError =>
  redactionError('CLASSIFICATION_ALREADY_DEFINED', `classification already defined: ${name}`);

export const classificationDocumentError = (errors: readonly string[]): RedactionError =>
  redactionError('CLASSIFICATION_DOCUMENT_INVALID', errors.join(', '));

export const invalidMaskCharError = (maskChar: string): RedactionError =>
  redactionError(
    'INVALID_MASK_CHAR',
    `mask char must be exactly one character, got ${Array.from(maskChar).length}`
  );

export const invalidCountError = (field: string, count: number): RedactionError =>
  redactionError('INVALID_COUNT', `${field} must be a non-negative integer, got ${count}`);

/**
 * 起動時の契約違反を例外として送出する
 * メッセージは "CODE: message" 形式
 */
export const raise = (error: RedactionError): never => {
  throw new Error(`${error.code}: ${error.message}`, { cause: error });
};

// ========== 型ガード ==========

export const isRedactionError = (e: unknown): e is RedactionError =>
  typeof e === 'object' &&
  e !== null &&
  '_tag' in e &&
  e._tag === 'RedactionError';
