import { describe, expect, it } from 'vitest';
import { resolveNaming, toCamelCase, toKebabCase, toSnakeCase, words } from '../src/index';

describe('naming', () => {
  it('splits identifiers into words', () => {
    expect(words('maxConnections')).toEqual(['max', 'connections']);
    expect(words('HTTPServer')).toEqual(['http', 'server']);
    expect(words('userID')).toEqual(['user', 'id']);
    expect(words('ipv4Address')).toEqual(['ipv4', 'address']);
    expect(words('already-kebab_or_snake')).toEqual(['already', 'kebab', 'or', 'snake']);
  });

  it('converts to kebab-case', () => {
    expect(toKebabCase('maxConnections')).toBe('max-connections');
    expect(toKebabCase('port')).toBe('port');
  });

  it('converts to snake_case', () => {
    expect(toSnakeCase('maxConnections')).toBe('max_connections');
  });

  it('converts back to camelCase', () => {
    expect(toCamelCase('max-connections')).toBe('maxConnections');
    expect(toCamelCase(toKebabCase('listenAddressV6'))).toBe('listenAddressV6');
  });

  it('resolves naming policies', () => {
    expect(resolveNaming('preserve')('maxConnections')).toBe('maxConnections');
    expect(resolveNaming('kebab-case')('maxConnections')).toBe('max-connections');
    expect(resolveNaming('snake-case')('maxConnections')).toBe('max_connections');
    expect(resolveNaming((id) => id.toUpperCase())('port')).toBe('PORT');
  });
});
