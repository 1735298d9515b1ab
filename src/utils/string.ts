/**
 * String manipulation utilities.
 */

/**
 * Convert a CamelCase name to snake_case.
 *
 * Splits before every capitalised word (`UserAccount` -> `user_account`) and
 * between a lowercase letter or digit and the following capital, so acronyms
 * stay together (`HTTPServer` -> `http_server`).
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/(.)([A-Z][a-z]+)/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase();
}

/**
 * Convert any delimited name to PascalCase.
 * Separators (`-`, `_`, spaces, dots) are dropped and the first letter of
 * each word is upper-cased.
 *
 * @example toPascalCase('send_invoice') // 'SendInvoice'
 */
export function toPascalCase(name: string): string {
  return name
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

/**
 * Package names such as `spec-core` become identifier-friendly `spec_core`.
 */
export function toIdentifier(name: string): string {
  return name.replace(/-/g, '_');
}
