/**
 * SensitiveValue - 機密データ「そのもの」である葉の値
 *
 * 分類を直接適用できるのはこの契約を満たす型のみ。
 * 復元は表現を保つ必要はなく、秘匿後の文字列を持つ同じ型の値であればよい。
 */
export interface SensitiveValue<T> {
  readonly _tag: 'SensitiveValue';
  asText(value: T): string;
  fromRedacted(redacted: string): T;
}

export const sensitiveValue = <T>(
  asText: (value: T) => string,
  fromRedacted: (redacted: string) => T
): SensitiveValue<T> => ({
  _tag: 'SensitiveValue',
  asText,
  fromRedacted,
});

export const textValue: SensitiveValue<string> = sensitiveValue(
  (value) => value,
  (redacted) => redacted
);
