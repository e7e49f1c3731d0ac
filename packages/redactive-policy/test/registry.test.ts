/**
 * 分類レジストリのテスト
 */
import { describe, it, expect } from 'vitest';
import * as E from 'fp-ts/Either';
import * as O from 'fp-ts/Option';
import {
  applyTo,
  createClassificationRegistry,
  defaultFull,
  defaultRegistry,
  defineClassification,
  keepFirst,
  keepLast,
  policyFor,
  isRedactionError,
  BUILTIN_CLASSIFICATIONS,
  CreditCard,
  Email,
  PhoneNumber,
  Secret,
  BlockchainAddress,
} from '../src/index.js';

describe('createClassificationRegistry', () => {
  it('定義した分類のポリシーを返す', () => {
    const registry = createClassificationRegistry();
    const result = registry.define('InternalRef', keepLast(3));

    expect(E.isRight(result)).toBe(true);
    if (E.isRight(result)) {
      expect(result.right).toEqual({ _tag: 'Classification', name: 'InternalRef' });
      expect(registry.policyFor(result.right)).toEqual(keepLast(3));
    }
  });

  it('同名の分類はLeftを返す', () => {
    const registry = createClassificationRegistry();
    registry.define('InternalRef', keepLast(3));
    const result = registry.define('InternalRef', keepFirst(1));

    expect(E.isLeft(result)).toBe(true);
    if (E.isLeft(result)) {
      expect(isRedactionError(result.left)).toBe(true);
      expect(result.left.code).toBe('CLASSIFICATION_ALREADY_DEFINED');
      expect(result.left.message).toBe('classification already defined: InternalRef');
    }
    // 最初の定義が残る
    expect(registry.policyFor({ _tag: 'Classification', name: 'InternalRef' })).toEqual(keepLast(3));
  });

  it('未登録の分類は Full にフォールバックする', () => {
    const registry = createClassificationRegistry();
    expect(registry.policyFor({ _tag: 'Classification', name: 'Unknown' })).toEqual(defaultFull());
  });

  it('lookup は登録済みの分類のみ返す', () => {
    const registry = createClassificationRegistry();
    registry.define('A', keepLast(1));

    expect(registry.lookup('A')).toEqual(O.some({ _tag: 'Classification', name: 'A' }));
    expect(O.isNone(registry.lookup('B'))).toBe(true);
  });

  it('names は定義順', () => {
    const registry = createClassificationRegistry();
    registry.define('B', keepLast(1));
    registry.define('A', keepLast(1));
    expect(registry.names()).toEqual(['B', 'A']);
  });
});

describe('defineClassification', () => {
  it('重複定義は例外を送出する', () => {
    const registry = createClassificationRegistry();
    defineClassification('Dup', keepLast(2), registry);

    expect(() => defineClassification('Dup', keepLast(2), registry)).toThrow(
      'CLASSIFICATION_ALREADY_DEFINED: classification already defined: Dup'
    );
  });

  it('組み込み分類名は既定レジストリで再定義できない', () => {
    expect(() => defineClassification('Secret', keepLast(4))).toThrow('CLASSIFICATION_ALREADY_DEFINED');
  });
});

describe('組み込み分類', () => {
  it('既定レジストリに登録されている', () => {
    const names = defaultRegistry.names();
    for (const classification of BUILTIN_CLASSIFICATIONS) {
      expect(names).toContain(classification.name);
    }
    expect(BUILTIN_CLASSIFICATIONS).toHaveLength(12);
  });

  it('Secret は Full', () => {
    expect(policyFor(Secret)).toEqual(defaultFull());
    expect(applyTo(policyFor(Secret), 'test-secret')).toBe('[REDACTED]');
  });

  it('CreditCard は末尾4文字を残す', () => {
    expect(applyTo(policyFor(CreditCard), '4000123412341234')).toBe('************1234');
  });

  it('Email は先頭2文字を残す', () => {
    expect(applyTo(policyFor(Email), 'user@example.com')).toBe('us**************');
  });

  it('PhoneNumber は末尾2文字を残す', () => {
    expect(applyTo(policyFor(PhoneNumber), '5550100')).toBe('*****00');
  });

  it('BlockchainAddress は末尾6文字を残す', () => {
    expect(applyTo(policyFor(BlockchainAddress), '0xabcdef123456')).toBe('********123456');
  });
});
