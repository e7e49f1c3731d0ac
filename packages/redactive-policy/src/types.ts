/**
 * @redactive/policy 型定義
 *
 * 分類（何が機密か）とポリシー（どう秘匿するか）を分離する。
 * ポリシーは純粋な文字列変換で、構造の走査や分類の選択は行わない。
 */

// ========== 定数 ==========

/** Full ポリシーの既定プレースホルダー */
export const REDACTED_PLACEHOLDER = '[REDACTED]';

/** Keep/Mask ポリシーの既定マスク文字 */
export const DEFAULT_MASK_CHAR = '*';

// ========== TextRedactionPolicy ==========

/**
 * 値全体を固定文字列で置換する
 * 入力が空文字列でもプレースホルダーを返す
 */
export interface FullPolicy {
  readonly _tag: 'Full';
  readonly placeholder: string;
}

/**
 * 先頭/末尾の指定文字数を残し、間をマスクする
 * visiblePrefix + visibleSuffix >= 長さ の場合は入力をそのまま返す
 */
export interface KeepPolicy {
  readonly _tag: 'Keep';
  readonly visiblePrefix: number;
  readonly visibleSuffix: number;
  readonly maskChar: string;
}

/**
 * 先頭/末尾の指定文字数をマスクし、間はそのまま残す
 * maskPrefix + maskSuffix >= 長さ の場合は全体をマスクする
 */
export interface MaskPolicy {
  readonly _tag: 'Mask';
  readonly maskPrefix: number;
  readonly maskSuffix: number;
  readonly maskChar: string;
}

/** 文字列秘匿ポリシー（Tagged Union） */
export type TextRedactionPolicy = FullPolicy | KeepPolicy | MaskPolicy;

export type KeepConfig = Omit<KeepPolicy, '_tag'>;
export type MaskConfig = Omit<MaskPolicy, '_tag'>;

// ========== Classification ==========

/**
 * 分類マーカー
 * 実行時の状態を持たず、名前でポリシー表を引くためのタグ
 */
export interface Classification<N extends string = string> {
  readonly _tag: 'Classification';
  readonly name: N;
}

// ========== 分類ドキュメント ==========

export interface ClassificationDocument {
  readonly version: string;
  readonly classifications: Readonly<Record<string, TextRedactionPolicy>>;
}

export interface ValidationResult<T> {
  ok: boolean;
  value?: T;
  errors?: string[];
}
