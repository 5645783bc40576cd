/**
 * Role predicates: what kind of thing an exported value is, and which case
 * style its name is conventionally expected to use.
 */
import type { StyleLabel } from '../styles/catalog.js';

export type Role = 'type' | 'callable' | 'module' | 'literal' | 'instance';

export interface RolePredicate {
  readonly role: Role;
  readonly test: (value: unknown) => boolean;
  readonly expected: StyleLabel;
}

const CLASS_SOURCE = /^class[\s{]/;

/**
 * Classes and constructor functions. Native constructors have no class
 * source, so a prototype carrying its own members also counts.
 */
export function isClass(value: unknown): boolean {
  if (typeof value !== 'function') return false;
  if (CLASS_SOURCE.test(Function.prototype.toString.call(value))) return true;
  const proto: unknown = value.prototype;
  if (typeof proto !== 'object' || proto === null) return false;
  return Object.getOwnPropertyNames(proto).some((key) => key !== 'constructor');
}

export function isCallable(value: unknown): boolean {
  return typeof value === 'function';
}

export function isModuleNamespace(value: unknown): boolean {
  return Object.prototype.toString.call(value) === '[object Module]';
}

export function isPlainObject(value: unknown): boolean {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Scalars (symbols included), byte sequences, arrays, sets, maps and plain objects.
 */
export function isLiteral(value: unknown): boolean {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
    case 'symbol':
      return true;
    case 'object':
      return (
        value instanceof ArrayBuffer ||
        ArrayBuffer.isView(value) ||
        Array.isArray(value) ||
        value instanceof Set ||
        value instanceof Map ||
        isPlainObject(value)
      );
    default:
      return false;
  }
}

/**
 * Any other object, plus `null` and `undefined`, so the default table accepts every value.
 */
export function isInstance(value: unknown): boolean {
  return value === null || value === undefined || typeof value === 'object';
}

const predicates: RolePredicate[] = [
  { role: 'type', test: isClass, expected: 'MixedCase' },
  { role: 'callable', test: isCallable, expected: 'snake_case' },
  { role: 'module', test: isModuleNamespace, expected: 'snake_case' },
  { role: 'literal', test: isLiteral, expected: 'UPPER_CASE' },
  // Any other object is read as a global singleton. Broad: many are not constants.
  { role: 'instance', test: isInstance, expected: 'UPPER_CASE' },
];

/** Evaluated in order; first match wins. */
export const ROLE_PREDICATES: readonly RolePredicate[] = Object.freeze(predicates.map((p) => Object.freeze(p)));
