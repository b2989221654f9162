const TRUTHY = new Set(['1', 'true', 'yes']);
const FALSY = new Set(['', '0', 'false', 'no']);

/**
 * Read a boolean environment flag. Unset is false; a value outside
 * 1/0, true/false, yes/no (any case) is undefined.
 */
export function parseEnvFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return false;
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return undefined;
}
