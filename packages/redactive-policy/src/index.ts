/**
 * @redactive/policy - 分類とテキスト秘匿ポリシー
 *
 * このパッケージは以下を提供します：
 * - Text policy engine (Full / Keep / Mask の純粋な文字列変換)
 * - Classification registry (分類マーカーとポリシーの静的対応表)
 * - Built-in classifications (組み込み分類)
 * - Classification documents (YAMLによる追加分類の定義)
 */

// ========== 型定義 ==========
export type {
  FullPolicy,
  KeepPolicy,
  MaskPolicy,
  TextRedactionPolicy,
  KeepConfig,
  MaskConfig,
  Classification,
  ClassificationDocument,
  ValidationResult,
} from './types.js';

export { REDACTED_PLACEHOLDER, DEFAULT_MASK_CHAR } from './types.js';

// ========== エラー型 ==========
export type { RedactionErrorCode, RedactionError } from './errors.js';
export {
  redactionError,
  classificationAlreadyDefinedError,
  classificationDocumentError,
  invalidMaskCharError,
  invalidCountError,
  isRedactionError,
} from './errors.js';

// ========== Text Policy ==========
export {
  applyTo,
  defaultFull,
  fullWith,
  keepWith,
  keepFirst,
  keepLast,
  keepBoth,
  maskWith,
  maskFirst,
  maskLast,
  maskBoth,
  withMaskChar,
  isSingleScalar,
} from './text.js';

// ========== Registry ==========
export type { ClassificationRegistry } from './registry.js';
export {
  createClassificationRegistry,
  defaultRegistry,
  defineClassification,
  policyFor,
} from './registry.js';

export {
  Secret,
  DateOfBirth,
  AccountId,
  SessionId,
  NationalId,
  CreditCard,
  IpAddress,
  Token,
  Pii,
  BlockchainAddress,
  PhoneNumber,
  Email,
  BUILTIN_CLASSIFICATIONS,
} from './defaults.js';

// ========== Classification Document ==========
export type { ClassificationEntry } from './schemas.js';
export { classificationDocumentSchema, validateClassificationDocument, toPolicy } from './schemas.js';
export {
  parseClassificationDocument,
  registerClassifications,
  loadClassificationDocument,
} from './parser.js';
