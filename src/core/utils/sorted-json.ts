/**
 * Stable JSON text
 *
 * Object keys are emitted in sorted order at every depth and non-ASCII
 * characters are written as \uXXXX escapes, so the same value always produces
 * the same bytes regardless of property insertion order.
 */

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, JsonValue> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

/**
 * Serialize with sorted keys and the given indentation (default: 4)
 */
export function toSortedJson(value: JsonValue, indent = 4): string {
  return JSON.stringify(sortKeys(value), null, indent).replace(
    /[\u0080-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

export type { JsonValue };
