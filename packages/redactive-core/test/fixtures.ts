/**
 * テスト用の複合値と Shape
 * コード生成段階が出力するフィールド表を手書きしたもの
 */

import { Email, Pii, Secret, CreditCard, AccountId } from '@redactive/policy';
import type { SensitiveShape } from '../src/index.js';
import { Sensitive, classifyText, walk, walkScalar } from '../src/index.js';

export interface Address {
  street: string;
  city: string;
}

export const addressShape = Sensitive.struct<Address>('Address', {
  street: classifyText(Pii),
});

export interface User {
  id: number;
  username: string;
  email: string;
  apiKey: string;
  age: number;
  initial: string;
  verified: boolean;
  address: Address;
}

export const userShape = Sensitive.struct<User>('User', {
  email: classifyText(Email),
  apiKey: classifyText(Secret),
  age: walkScalar('number'),
  initial: walkScalar('char'),
  verified: walkScalar('boolean'),
  address: walk(addressShape),
});

export const sampleAddress = (): Address => ({ street: '1 Main St', city: 'Springfield' });

export const sampleUser = (): User => ({
  id: 42,
  username: 'ann',
  email: 'ann@example.com',
  apiKey: 'test-secret',
  age: 37,
  initial: 'A',
  verified: true,
  address: sampleAddress(),
});

/** sampleUser() を redact() した結果 */
export const redactedUser = (): User => ({
  id: 42,
  username: 'ann',
  email: 'an*************',
  apiKey: '[REDACTED]',
  age: 0,
  initial: 'X',
  verified: false,
  address: { street: '*****n St', city: 'Springfield' },
});

export type Payment =
  | { kind: 'card'; number: string; holder: string }
  | { kind: 'bank'; iban: string }
  | { kind: 'cash' };

export const paymentShape = Sensitive.union<Payment, 'kind'>('Payment', 'kind', {
  card: { number: classifyText(CreditCard) },
  bank: { iban: classifyText(AccountId) },
  cash: {},
});

/** 再帰的な木構造 */
export interface TreeNode {
  label: string;
  secret: string;
  children: TreeNode[];
}

export const treeShape: SensitiveShape<TreeNode> = Sensitive.struct<TreeNode>('TreeNode', {
  secret: classifyText(Secret),
  children: walk(Sensitive.array(Sensitive.lazy(() => treeShape))),
});
