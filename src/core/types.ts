export type DeclKind = 'procedure' | 'struct' | 'enum' | 'union' | 'bit_set' | 'constant';

export type KindGroup = 'constants' | 'types' | 'procedures';

/**
 * One top-level `name :: value` binding together with the comment block
 * written directly above it.
 */
export interface DocEntry {
  readonly name: string;
  readonly kind: DeclKind;
  /** Right-hand side of the binding with any `{ ... }` body removed. */
  readonly signature: string;
  /** Comment text without the `//` markers; empty segments are paragraph breaks. */
  readonly doc: string;
  readonly file: string;
  /** 1-based. */
  readonly line: number;
  readonly isPrivate: boolean;
}

export interface PackageGroups {
  constants: DocEntry[];
  types: DocEntry[];
  procedures: DocEntry[];
}

export type SymbolLookup =
  | { status: 'found'; entry: DocEntry }
  | { status: 'private'; entry: DocEntry }
  | { status: 'not_found' };
