import _ from 'lodash';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolves a dot-delimited path ("payload.items", "sessions.0.phrases") against parsed JSON.
 * Numeric segments index arrays; anything that doesn't exist resolves to `undefined`.
 * An empty or missing path returns the root.
 */
export function resolvePath(root: unknown, path?: string): unknown {
  if (!path) return root;

  let current: unknown = root;
  for (const segment of _.toPath(path)) {
    if (segment === '') continue;

    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) return undefined;
      current = current[Number(segment)];
    } else if (isRecord(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, segment)) return undefined;
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

// Scalars become trimmed strings; objects and missing values become ''
export function fieldText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value).trim();
  }
  return '';
}
