import { parse } from 'yaml';
import * as E from 'fp-ts/Either';
import type { Classification, ClassificationDocument, ValidationResult } from './types.js';
import type { RedactionError } from './errors.js';
import { classificationAlreadyDefinedError, classificationDocumentError } from './errors.js';
import type { ClassificationRegistry } from './registry.js';
import { defaultRegistry } from './registry.js';
import { validateClassificationDocument } from './schemas.js';

export function parseClassificationDocument(yamlContent: string): ValidationResult<ClassificationDocument> {
  try {
    const parsed: unknown = parse(yamlContent);
    return validateClassificationDocument(parsed);
  } catch (e: unknown) {
    return { ok: false, errors: [`YAML parse error: ${e instanceof Error ? e.message : String(e)}`] };
  }
}

/**
 * ドキュメントの分類をレジストリに登録する
 * 1件でも既存名と衝突する場合は何も登録せずLeftを返す
 */
export function registerClassifications(
  doc: ClassificationDocument,
  registry: ClassificationRegistry = defaultRegistry
): E.Either<RedactionError, readonly Classification[]> {
  const existing = new Set(registry.names());
  const conflict = Object.keys(doc.classifications).find((name) => existing.has(name));
  if (conflict !== undefined) {
    return E.left(classificationAlreadyDefinedError(conflict));
  }

  const defined: Classification[] = [];
  for (const [name, policy] of Object.entries(doc.classifications)) {
    const result = registry.define(name, policy);
    if (E.isLeft(result)) return result;
    defined.push(result.right);
  }
  return E.right(defined);
}

/**
 * YAML を検証してレジストリに登録する（起動時用）
 */
export function loadClassificationDocument(
  yamlContent: string,
  registry: ClassificationRegistry = defaultRegistry
): E.Either<RedactionError, readonly Classification[]> {
  const result = parseClassificationDocument(yamlContent);
  if (!result.ok || !result.value) {
    return E.left(classificationDocumentError(result.errors ?? []));
  }
  return registerClassifications(result.value, registry);
}
