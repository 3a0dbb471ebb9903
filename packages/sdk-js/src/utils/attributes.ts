import type { AttributeValue, Attributes, AttributesInput } from '../types';

/**
 * Check that a value can be stored as an attribute: a primitive or a
 * homogeneous array of primitives.
 */
export function isAttributeValue(value: unknown): value is AttributeValue {
  if (value === null || value === undefined) return false;
  if (Array.isArray(value)) {
    if (value.length === 0) return true;
    const kind = typeof value[0];
    if (kind !== 'string' && kind !== 'number' && kind !== 'boolean') return false;
    return value.every((item) => typeof item === kind);
  }
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Copy an attribute value so later changes to a caller's array don't leak in
 */
export function copyAttributeValue(value: AttributeValue): AttributeValue {
  if (Array.isArray(value)) {
    return value.slice();
  }
  return value;
}

/**
 * Drop nullish and unsupported values
 */
export function sanitizeAttributes(input: AttributesInput | undefined): Attributes {
  const out: Attributes = {};
  if (!input) return out;
  for (const [key, value] of Object.entries(input)) {
    if (key.length === 0 || !isAttributeValue(value)) continue;
    out[key] = copyAttributeValue(value);
  }
  return out;
}
