import { applyTo, defaultRegistry } from '@redactive/policy';
import type { Classification, ClassificationRegistry } from '@redactive/policy';
import type { RedactionMapper } from './types.js';
import type { ScalarKind, ScalarTypes } from './scalar.js';
import { redactScalar } from './scalar.js';
import type { SensitiveValue } from './value.js';

/**
 * ポリシー駆動の秘匿戦略
 * スカラーは既定値へ、葉の値は分類に対応するポリシーで変換する
 */
export const createPolicyMapper = (
  registry: ClassificationRegistry = defaultRegistry
): RedactionMapper => ({
  mapScalar<K extends ScalarKind>(kind: K): ScalarTypes[K] {
    return redactScalar(kind);
  },

  mapSensitive<T>(value: T, leaf: SensitiveValue<T>, classification: Classification): T {
    const policy = registry.policyFor(classification);
    return leaf.fromRedacted(applyTo(policy, leaf.asText(value)));
  },
});

/** redact() が使う標準の秘匿戦略 */
export const defaultMapper: RedactionMapper = createPolicyMapper();
