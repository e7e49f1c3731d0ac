import { z } from 'zod';
import type { ClassificationDocument, TextRedactionPolicy, ValidationResult } from './types.js';
import { fullWith, isSingleScalar, keepWith, maskWith } from './text.js';
import { REDACTED_PLACEHOLDER } from './types.js';

const countSchema = z.number().int().nonnegative();

const maskCharSchema = z
  .string()
  .refine(isSingleScalar, { message: 'mask_char must be exactly one character' });

const fullEntrySchema = z.object({
  policy: z.literal('full'),
  placeholder: z.string().default(REDACTED_PLACEHOLDER),
});

const keepEntrySchema = z.object({
  policy: z.literal('keep'),
  visible_prefix: countSchema.default(0),
  visible_suffix: countSchema.default(0),
  mask_char: maskCharSchema.optional(),
});

const maskEntrySchema = z.object({
  policy: z.literal('mask'),
  mask_prefix: countSchema.default(0),
  mask_suffix: countSchema.default(0),
  mask_char: maskCharSchema.optional(),
});

const entrySchema = z.discriminatedUnion('policy', [
  fullEntrySchema,
  keepEntrySchema,
  maskEntrySchema,
]);

export type ClassificationEntry = z.infer<typeof entrySchema>;

// 分類名は識別子形式のみ許可
const nameSchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_]*$/, { message: 'classification name must be an identifier' });

export const classificationDocumentSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String),
  classifications: z.record(nameSchema, entrySchema),
});

export const toPolicy = (entry: ClassificationEntry): TextRedactionPolicy => {
  switch (entry.policy) {
    case 'full':
      return fullWith(entry.placeholder);
    case 'keep':
      return keepWith({
        visiblePrefix: entry.visible_prefix,
        visibleSuffix: entry.visible_suffix,
        maskChar: entry.mask_char,
      });
    case 'mask':
      return maskWith({
        maskPrefix: entry.mask_prefix,
        maskSuffix: entry.mask_suffix,
        maskChar: entry.mask_char,
      });
  }
};

export function validateClassificationDocument(input: unknown): ValidationResult<ClassificationDocument> {
  const result = classificationDocumentSchema.safeParse(input);
  if (!result.success) {
    return {
      ok: false,
      errors: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    };
  }
  const classifications: Record<string, TextRedactionPolicy> = {};
  for (const [name, entry] of Object.entries(result.data.classifications)) {
    classifications[name] = toPolicy(entry);
  }
  return { ok: true, value: { version: result.data.version, classifications } };
}
