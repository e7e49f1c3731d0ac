/**
 * スカラー秘匿
 * 数値・真偽値は型の既定値（0 / false）に置換する。
 * 文字（char）は固定の番兵文字 'X' にする。
 */

export interface ScalarTypes {
  number: number;
  bigint: bigint;
  boolean: boolean;
  /** 1つのUnicodeスカラー値 */
  char: string;
}

export type ScalarKind = keyof ScalarTypes;

export const CHAR_SENTINEL = 'X';

const SCALAR_DEFAULTS: { readonly [K in ScalarKind]: ScalarTypes[K] } = {
  number: 0,
  bigint: 0n,
  boolean: false,
  char: CHAR_SENTINEL,
};

export const SCALAR_KINDS: readonly ScalarKind[] = ['number', 'bigint', 'boolean', 'char'];

export const redactScalar = <K extends ScalarKind>(kind: K): ScalarTypes[K] => SCALAR_DEFAULTS[kind];
