/**
 * Resolves the expected case style of an exported value from its role.
 */
import { NoExpectedStyleError } from '../../utils/errors.js';
import type { StyleLabel } from '../styles/catalog.js';
import { ROLE_PREDICATES, isModuleNamespace, type RolePredicate } from './predicates.js';

/**
 * Runtime type name of a value, used as the type half of a membership pair.
 */
export function runtimeTypeName(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object' && typeof value !== 'function') return typeof value;
  if (isModuleNamespace(value)) return 'Module';

  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== 'object' || proto === null) return 'Object';
  const ctor: unknown = Reflect.get(proto, 'constructor');
  if (typeof ctor === 'function' && ctor.name) return ctor.name;
  return 'Object';
}

/**
 * First predicate accepting the value.
 *
 * @throws NoExpectedStyleError when none does
 */
export function resolveRole(
  value: unknown,
  library: string = '',
  predicates: readonly RolePredicate[] = ROLE_PREDICATES
): RolePredicate {
  const match = predicates.find((p) => p.test(value));
  if (!match) {
    throw new NoExpectedStyleError(runtimeTypeName(value), library);
  }
  return match;
}

export function expectedStyle(
  value: unknown,
  library: string = '',
  predicates: readonly RolePredicate[] = ROLE_PREDICATES
): StyleLabel {
  return resolveRole(value, library, predicates).expected;
}
