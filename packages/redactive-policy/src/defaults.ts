import { defineClassification } from './registry.js';
import { defaultFull, keepFirst, keepLast } from './text.js';

// 組み込み分類（既定レジストリに登録される）

export const Secret = defineClassification('Secret', defaultFull());
export const DateOfBirth = defineClassification('DateOfBirth', defaultFull());

export const AccountId = defineClassification('AccountId', keepLast(4));
export const SessionId = defineClassification('SessionId', keepLast(4));
export const NationalId = defineClassification('NationalId', keepLast(4));
export const CreditCard = defineClassification('CreditCard', keepLast(4));
export const IpAddress = defineClassification('IpAddress', keepLast(4));
export const Token = defineClassification('Token', keepLast(4));
export const Pii = defineClassification('Pii', keepLast(4));

export const BlockchainAddress = defineClassification('BlockchainAddress', keepLast(6));
export const PhoneNumber = defineClassification('PhoneNumber', keepLast(2));
export const Email = defineClassification('Email', keepFirst(2));

export const BUILTIN_CLASSIFICATIONS = [
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
] as const;
