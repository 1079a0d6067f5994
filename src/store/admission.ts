// src/store/admission.ts
import { errorMessage } from '../errors.js';
import { getSchemaId } from '../loader/document.js';
import type { SchemaStore } from './table.js';
import type { SchemaCandidate, StoreFailure, StoreResult, ValidateFn } from '../types.js';

/**
 * Validate each candidate and insert the ones that pass.
 *
 * Items are independent: a rejected or unparseable candidate is reported
 * and the rest of the batch is still admitted. Input order is preserved.
 */
export function admit(
  store: SchemaStore,
  candidates: readonly SchemaCandidate[],
  validate: ValidateFn,
  idFields?: readonly string[],
): StoreResult {
  const failures: StoreFailure[] = [];

  for (const candidate of candidates) {
    const { sourceKey, mtime } = candidate;

    if ('parseError' in candidate) {
      failures.push({ sourceKey, mtime, reason: 'parse_error', message: candidate.parseError.message });
      continue;
    }
    if ('readError' in candidate) {
      failures.push({ sourceKey, mtime, reason: 'io_error', message: candidate.readError.message });
      continue;
    }

    const { document } = candidate;
    let valid: boolean;
    try {
      valid = validate(document);
    } catch (err) {
      failures.push({ sourceKey, mtime, reason: 'validation_rejected', message: errorMessage(err) });
      continue;
    }

    if (!valid) {
      failures.push({ sourceKey, mtime, reason: 'validation_rejected', message: 'Document failed validation' });
      continue;
    }

    store.insert({ sourceKey, idKey: getSchemaId(document, idFields), mtime, document });
  }

  return failures.length === 0 ? { ok: true } : { ok: false, failures };
}
