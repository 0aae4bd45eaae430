/**
 * Convert a PascalCase or camelCase column name to snake_case
 */
export function toSnakeCase(str: string): string {
  return str
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z])([A-Z][a-z])/g, "$1_$2")
    .toLowerCase();
}

/**
 * Convert a snake_case column name to PascalCase
 */
export function toPascalCase(str: string): string {
  return str
    .split("_")
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

/**
 * Convert object keys from snake_case to PascalCase
 */
export function keysToPascalCase(
  obj: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[toPascalCase(key)] = value;
  }
  return result;
}
