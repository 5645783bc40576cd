/**
 * The style census: folds observations into count and membership tables.
 *
 * Storage is one flat map keyed by (library, expected, observed); the nested
 * views are derived on demand. Counts and members always move together, so
 * a cell's member count never exceeds its count.
 */
import { classify } from '../styles/classifier.js';
import { resolveRole, runtimeTypeName } from '../roles/resolver.js';
import { ROLE_PREDICATES, type RolePredicate } from '../roles/predicates.js';
import type { StyleLabel } from '../styles/catalog.js';
import type {
  CensusCell,
  Conformance,
  CountTable,
  LibraryCounts,
  Member,
  MembershipTable,
  Observation,
} from './types.js';

function cellKey(library: string, expected: StyleLabel, observed: StyleLabel): string {
  return JSON.stringify([library, expected, observed]);
}

function memberKey(member: Member): string {
  return JSON.stringify([member.typeName, member.name]);
}

type Nested<V> = Map<string, Map<StyleLabel, Map<StyleLabel, V>>>;

/**
 * Turn grouped maps into plain records. Object.fromEntries defines own
 * properties, so names such as `__proto__` or `constructor` stay ordinary keys.
 */
function toRecords<V>(nested: Nested<V>): Record<string, Partial<Record<StyleLabel, Partial<Record<StyleLabel, V>>>>> {
  return Object.fromEntries(
    [...nested].map(([library, byExpected]) => [
      library,
      Object.fromEntries(
        [...byExpected].map(([expected, byObserved]) => [expected, Object.fromEntries(byObserved)])
      ),
    ])
  );
}

export interface StyleCensusOptions {
  /** Role table used to resolve expected styles */
  predicates?: readonly RolePredicate[];
}

/**
 * Build the observation for one exported symbol without recording it.
 *
 * @throws NoExpectedStyleError if the value's role is unknown
 * @throws NoStyleMatchError if the name matches no style
 */
export function observe(
  library: string,
  value: unknown,
  name: string,
  predicates: readonly RolePredicate[] = ROLE_PREDICATES
): Observation {
  const expected = resolveRole(value, library, predicates).expected;
  const observed = classify(name);
  return Object.freeze({
    library,
    name,
    typeName: runtimeTypeName(value),
    expected,
    observed,
  });
}

export class StyleCensus {
  private readonly table = new Map<string, CensusCell>();
  private readonly predicates: readonly RolePredicate[];
  private observations = 0;

  constructor(options: StyleCensusOptions = {}) {
    this.predicates = options.predicates ?? ROLE_PREDICATES;
  }

  /**
   * Record one exported symbol. Recording the same symbol twice counts it twice.
   */
  record(library: string, value: unknown, name: string): Observation {
    const observation = observe(library, value, name, this.predicates);
    this.add(observation);
    return observation;
  }

  add(observation: Observation): void {
    const cell = this.cellFor(observation.library, observation.expected, observation.observed);
    const member: Member = { typeName: observation.typeName, name: observation.name };
    cell.members.set(memberKey(member), member);
    cell.count += 1;
    this.observations += 1;
  }

  /**
   * Fold another census into this one.
   */
  merge(other: StyleCensus): void {
    for (const cell of other.cells()) {
      const target = this.cellFor(cell.library, cell.expected, cell.observed);
      for (const [key, member] of cell.members) {
        target.members.set(key, member);
      }
      target.count += cell.count;
      this.observations += cell.count;
    }
  }

  get total(): number {
    return this.observations;
  }

  cells(): CensusCell[] {
    return [...this.table.values()];
  }

  cell(library: string, expected: StyleLabel, observed: StyleLabel): CensusCell | undefined {
    return this.table.get(cellKey(library, expected, observed));
  }

  libraries(): string[] {
    return [...new Set(this.cells().map((c) => c.library))].sort();
  }

  counts(): CountTable {
    return toRecords(this.group((cell) => cell.count));
  }

  libraryCounts(library: string): LibraryCounts | undefined {
    const counts = this.group((cell) => cell.count).get(library);
    return counts ? toRecords(new Map([[library, counts]]))[library] : undefined;
  }

  membership(): MembershipTable {
    return toRecords(
      this.group((cell) =>
        [...cell.members.values()].sort(
          (a, b) => a.name.localeCompare(b.name) || a.typeName.localeCompare(b.typeName)
        )
      )
    );
  }

  private group<V>(leaf: (cell: CensusCell) => V): Nested<V> {
    const nested: Nested<V> = new Map();
    for (const cell of this.table.values()) {
      let byExpected = nested.get(cell.library);
      if (!byExpected) {
        byExpected = new Map();
        nested.set(cell.library, byExpected);
      }
      let byObserved = byExpected.get(cell.expected);
      if (!byObserved) {
        byObserved = new Map();
        byExpected.set(cell.expected, byObserved);
      }
      byObserved.set(cell.observed, leaf(cell));
    }
    return nested;
  }

  /**
   * Share of symbols named in their expected style, for one library or all.
   */
  conformance(library?: string): Conformance {
    let total = 0;
    let conforming = 0;
    for (const cell of this.table.values()) {
      if (library !== undefined && cell.library !== library) continue;
      total += cell.count;
      if (cell.expected === cell.observed) conforming += cell.count;
    }
    return { total, conforming, ratio: total === 0 ? 0 : conforming / total };
  }

  private cellFor(library: string, expected: StyleLabel, observed: StyleLabel): CensusCell {
    const key = cellKey(library, expected, observed);
    let cell = this.table.get(key);
    if (!cell) {
      cell = { library, expected, observed, count: 0, members: new Map() };
      this.table.set(key, cell);
    }
    return cell;
  }
}
