/**
 * 文字列秘匿ポリシーの生成と適用
 *
 * 文字数の数え方・切り出しはすべて Unicode スカラー値単位で行う。
 * マルチバイト文字は分断されない。
 */

import type { FullPolicy, KeepConfig, KeepPolicy, MaskConfig, MaskPolicy, TextRedactionPolicy } from './types.js';
import { DEFAULT_MASK_CHAR, REDACTED_PLACEHOLDER } from './types.js';
import { invalidCountError, invalidMaskCharError, raise } from './errors.js';

// ========== 検証 ==========

/** 1つのUnicodeスカラー値かどうか */
export const isSingleScalar = (value: string): boolean => Array.from(value).length === 1;

const checkCount = (field: string, count: number): number =>
  Number.isInteger(count) && count >= 0 ? count : raise(invalidCountError(field, count));

const checkMaskChar = (maskChar: string): string =>
  isSingleScalar(maskChar) ? maskChar : raise(invalidMaskCharError(maskChar));

// ========== Full ==========

export const defaultFull = (): FullPolicy => ({ _tag: 'Full', placeholder: REDACTED_PLACEHOLDER });

export const fullWith = (placeholder: string): FullPolicy => ({ _tag: 'Full', placeholder });

// ========== Keep ==========

export const keepWith = (config: Partial<KeepConfig>): KeepPolicy => ({
  _tag: 'Keep',
  visiblePrefix: checkCount('visiblePrefix', config.visiblePrefix ?? 0),
  visibleSuffix: checkCount('visibleSuffix', config.visibleSuffix ?? 0),
  maskChar: checkMaskChar(config.maskChar ?? DEFAULT_MASK_CHAR),
});

/** 先頭 visiblePrefix 文字のみ残す */
export const keepFirst = (visiblePrefix: number): KeepPolicy => keepWith({ visiblePrefix });

/** 末尾 visibleSuffix 文字のみ残す */
export const keepLast = (visibleSuffix: number): KeepPolicy => keepWith({ visibleSuffix });

export const keepBoth = (visiblePrefix: number, visibleSuffix: number): KeepPolicy =>
  keepWith({ visiblePrefix, visibleSuffix });

// ========== Mask ==========

export const maskWith = (config: Partial<MaskConfig>): MaskPolicy => ({
  _tag: 'Mask',
  maskPrefix: checkCount('maskPrefix', config.maskPrefix ?? 0),
  maskSuffix: checkCount('maskSuffix', config.maskSuffix ?? 0),
  maskChar: checkMaskChar(config.maskChar ?? DEFAULT_MASK_CHAR),
});

/** 先頭 maskPrefix 文字をマスク */
export const maskFirst = (maskPrefix: number): MaskPolicy => maskWith({ maskPrefix });

/** 末尾 maskSuffix 文字をマスク */
export const maskLast = (maskSuffix: number): MaskPolicy => maskWith({ maskSuffix });

export const maskBoth = (maskPrefix: number, maskSuffix: number): MaskPolicy =>
  maskWith({ maskPrefix, maskSuffix });

/**
 * マスク文字を差し替える
 * Full はプレースホルダー置換なので影響を受けない
 */
export const withMaskChar = <P extends TextRedactionPolicy>(policy: P, maskChar: string): P => {
  const checked = checkMaskChar(maskChar);
  return policy._tag === 'Full' ? policy : { ...policy, maskChar: checked };
};

// ========== 適用 ==========

const applyKeep = (policy: KeepPolicy, value: string): string => {
  const chars = Array.from(value);
  const total = chars.length;
  if (total === 0) return '';

  // 表示範囲が全体を覆う場合は変更なし
  if (policy.visiblePrefix + policy.visibleSuffix >= total) return value;

  const head = chars.slice(0, policy.visiblePrefix).join('');
  const tail = chars.slice(total - policy.visibleSuffix).join('');
  const masked = total - policy.visiblePrefix - policy.visibleSuffix;
  return head + policy.maskChar.repeat(masked) + tail;
};

const applyMask = (policy: MaskPolicy, value: string): string => {
  const chars = Array.from(value);
  const total = chars.length;
  if (total === 0) return '';

  // マスク範囲が全体を覆う場合は全体をマスク
  if (policy.maskPrefix + policy.maskSuffix >= total) return policy.maskChar.repeat(total);

  const middle = chars.slice(policy.maskPrefix, total - policy.maskSuffix).join('');
  return policy.maskChar.repeat(policy.maskPrefix) + middle + policy.maskChar.repeat(policy.maskSuffix);
};

/**
 * ポリシーを文字列に適用する
 * 全域・純粋関数（エラーを返さない）
 */
export const applyTo = (policy: TextRedactionPolicy, value: string): string => {
  switch (policy._tag) {
    case 'Full':
      return policy.placeholder;
    case 'Keep':
      return applyKeep(policy, value);
    case 'Mask':
      return applyMask(policy, value);
  }
};
