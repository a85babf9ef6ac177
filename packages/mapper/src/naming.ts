/**
 * Translation between property identifiers and directive names
 */

export type NamingFunction = (identifier: string) => string;

export type NamingPolicy = 'preserve' | 'kebab-case' | 'snake-case' | NamingFunction;

/**
 * Split an identifier into lowercase words. Handles camelCase, PascalCase,
 * acronyms and existing `-`/`_` separators.
 *
 * @example
 * words('maxConnections') // ['max', 'connections']
 * words('HTTPServer') // ['http', 'server']
 */
export function words(identifier: string): string[] {
  return identifier
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/[\s_-]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.toLowerCase());
}

/**
 * @example
 * toKebabCase('maxConnections') // 'max-connections'
 */
export function toKebabCase(identifier: string): string {
  return words(identifier).join('-');
}

/**
 * @example
 * toSnakeCase('maxConnections') // 'max_connections'
 */
export function toSnakeCase(identifier: string): string {
  return words(identifier).join('_');
}

/**
 * @example
 * toCamelCase('max-connections') // 'maxConnections'
 */
export function toCamelCase(name: string): string {
  return words(name)
    .map((word, index) => (index === 0 ? word : word.charAt(0).toUpperCase() + word.slice(1)))
    .join('');
}

export function resolveNaming(policy: NamingPolicy): NamingFunction {
  switch (policy) {
    case 'preserve':
      return (identifier) => identifier;
    case 'kebab-case':
      return toKebabCase;
    case 'snake-case':
      return toSnakeCase;
    default:
      return policy;
  }
}
