/**
 * Request body normalization. JSON and URL-encoded bodies both end up as a
 * flat string map before validation: repeated form fields keep their first
 * value, numbers and booleans are stringified, nested objects are dropped.
 */

export type FormFields = Record<string, string>;

export function firstString(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return firstString(value[0]);
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

export function normalizeBody(body: unknown): FormFields {
  const fields: FormFields = {};
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    return fields;
  }

  for (const [key, value] of Object.entries(body)) {
    const normalized = firstString(value);
    if (normalized !== undefined) {
      fields[key] = normalized;
    }
  }
  return fields;
}
