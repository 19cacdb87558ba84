/**
 * Payload sanitizer
 *
 * Adapts scalar values to the target's value domains before create:
 * - picklist values outside the domain become 'Other' when allowed, else are removed
 *   (required picklists fall back to the first allowed value)
 * - multipicklist values keep only valid entries, capped at 255 characters
 * - 'True'/'False' strings become booleans on boolean fields
 * - email values get a '.invalid' suffix when masking is on
 */

import type { FieldMap, FieldSpec } from '../../store/types';

export const MULTIPICKLIST_MAX_LENGTH = 255;
export const PICKLIST_FALLBACK_VALUE = 'Other';
export const EMAIL_MASK_SUFFIX = '.invalid';

export interface SanitizeOptions {
  maskEmails?: boolean;
}

export interface SanitizeChange {
  field: string;
  from: unknown;
  to: unknown;
}

export interface SanitizeResult {
  payload: FieldMap;
  changes: SanitizeChange[];
}

function sanitizePicklist(field: FieldSpec, value: string): string | undefined {
  const allowed = field.allowedValues ?? [];
  if (allowed.length === 0 || allowed.includes(value)) {
    return value;
  }
  if (allowed.includes(PICKLIST_FALLBACK_VALUE)) {
    return PICKLIST_FALLBACK_VALUE;
  }
  return field.required ? allowed[0] : undefined;
}

function sanitizeMultipicklist(field: FieldSpec, value: string): string | undefined {
  const allowed = field.allowedValues ?? [];
  const entries = value
    .split(';')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0 && (allowed.length === 0 || allowed.includes(entry)));

  let joined = '';
  for (const entry of entries) {
    const next = joined ? `${joined};${entry}` : entry;
    if (next.length > MULTIPICKLIST_MAX_LENGTH) break;
    joined = next;
  }

  return joined.length > 0 ? joined : undefined;
}

function sanitizeBoolean(value: string): boolean | undefined {
  switch (value.toLowerCase()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      return undefined;
  }
}

export function maskEmail(value: string): string {
  return value.endsWith(EMAIL_MASK_SUFFIX) ? value : `${value}${EMAIL_MASK_SUFFIX}`;
}

export function sanitizePayload(
  payload: FieldMap,
  fields: readonly FieldSpec[],
  options: SanitizeOptions = {}
): SanitizeResult {
  const result: FieldMap = { ...payload };
  const changes: SanitizeChange[] = [];

  for (const field of fields) {
    if (field.kind !== 'scalar') continue;

    const value = result[field.name];
    if (typeof value !== 'string') continue;

    let next: unknown = value;
    switch (field.dataType) {
      case 'picklist':
        next = sanitizePicklist(field, value);
        break;
      case 'multipicklist':
        next = sanitizeMultipicklist(field, value);
        break;
      case 'boolean':
        next = sanitizeBoolean(value);
        break;
      case 'email':
        next = options.maskEmails && value.length > 0 ? maskEmail(value) : value;
        break;
      default:
        continue;
    }

    if (next === value) continue;

    changes.push({ field: field.name, from: value, to: next });
    if (next === undefined) {
      delete result[field.name];
    } else {
      result[field.name] = next;
    }
  }

  return { payload: result, changes };
}
