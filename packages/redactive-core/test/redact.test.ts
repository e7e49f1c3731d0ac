/**
 * 秘匿エントリポイントと秘匿戦略のテスト
 */
import { describe, it, expect } from 'vitest';
import type { Classification } from '@redactive/policy';
import { createClassificationRegistry, defineClassification, keepLast } from '@redactive/policy';
import type { RedactionMapper, ScalarKind, ScalarTypes, SensitiveValue } from '../src/index.js';
import {
  Sensitive,
  classifyText,
  createPolicyMapper,
  defaultMapper,
  redact,
  redactWith,
  redactor,
} from '../src/index.js';
import { redactedUser, sampleUser, userShape } from './fixtures.js';

/** 呼び出し回数を記録する秘匿戦略 */
class CountingMapper implements RedactionMapper {
  scalars: ScalarKind[] = [];
  leaves: string[] = [];

  mapScalar<K extends ScalarKind>(kind: K, value: ScalarTypes[K]): ScalarTypes[K] {
    this.scalars.push(kind);
    return defaultMapper.mapScalar(kind, value);
  }

  mapSensitive<T>(value: T, leaf: SensitiveValue<T>, classification: Classification): T {
    this.leaves.push(classification.name);
    return defaultMapper.mapSensitive(value, leaf, classification);
  }
}

describe('redactWith', () => {
  it('各フィールドに秘匿戦略を1回ずつ適用する', () => {
    const mapper = new CountingMapper();

    const result = redactWith([sampleUser(), sampleUser()], Sensitive.array(userShape), mapper);

    expect(result).toEqual([redactedUser(), redactedUser()]);
    expect(mapper.scalars).toEqual(['number', 'char', 'boolean', 'number', 'char', 'boolean']);
    expect(mapper.leaves).toEqual(['Email', 'Secret', 'Pii', 'Email', 'Secret', 'Pii']);
  });

  it('注釈のないフィールドは秘匿戦略に渡さない', () => {
    interface Plain {
      id: number;
      name: string;
    }
    const mapper = new CountingMapper();

    redactWith({ id: 1, name: 'ann' }, Sensitive.struct<Plain>('Plain', {}), mapper);

    expect(mapper.scalars).toEqual([]);
    expect(mapper.leaves).toEqual([]);
  });
});

describe('createPolicyMapper', () => {
  const registry = createClassificationRegistry();
  const Internal = defineClassification('Internal', keepLast(2), registry);

  interface Ticket {
    ref: string;
  }
  const ticketShape = Sensitive.struct<Ticket>('Ticket', { ref: classifyText(Internal) });

  it('指定したレジストリのポリシーを使う', () => {
    expect(redactWith({ ref: 'abcdef' }, ticketShape, createPolicyMapper(registry))).toEqual({
      ref: '****ef',
    });
  });

  it('レジストリにない分類は Full として扱う', () => {
    expect(redact({ ref: 'abcdef' }, ticketShape)).toEqual({ ref: '[REDACTED]' });
  });
});

describe('redactor', () => {
  it('Shape を束縛して繰り返し使える', () => {
    const redactUser = redactor(userShape);

    expect(redactUser.redact(sampleUser())).toEqual(redactedUser());
    expect(redactUser.redact(sampleUser())).toEqual(redactedUser());
    expect(redactUser.shape).toBe(userShape);
  });
});
