/**
 * Aggregate table types.
 */
import type { StyleLabel } from '../styles/catalog.js';

/**
 * One exported symbol as seen by a scan.
 */
export interface Observation {
  readonly library: string;
  readonly name: string;
  /** Runtime type name of the exported value */
  readonly typeName: string;
  readonly expected: StyleLabel;
  readonly observed: StyleLabel;
}

/** A (type, name) membership pair. */
export interface Member {
  readonly typeName: string;
  readonly name: string;
}

/**
 * Everything recorded under one (library, expected, observed) path.
 */
export interface CensusCell {
  readonly library: string;
  readonly expected: StyleLabel;
  readonly observed: StyleLabel;
  count: number;
  readonly members: Map<string, Member>;
}

/** library -> expected -> observed -> count */
export type CountTable = Record<string, LibraryCounts>;
export type LibraryCounts = Partial<Record<StyleLabel, Partial<Record<StyleLabel, number>>>>;

/** library -> expected -> observed -> members */
export type MembershipTable = Record<
  string,
  Partial<Record<StyleLabel, Partial<Record<StyleLabel, Member[]>>>>
>;

export interface Conformance {
  total: number;
  /** Symbols whose observed style equals the expected one */
  conforming: number;
  /** conforming / total, 0 when nothing was recorded */
  ratio: number;
}
