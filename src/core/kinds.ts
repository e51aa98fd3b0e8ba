import type { DeclKind, KindGroup } from './types';

const kindTable: ReadonlyArray<readonly [token: string, kind: DeclKind]> = [
  ['proc', 'procedure'],
  ['struct', 'struct'],
  ['enum', 'enum'],
  ['union', 'union'],
  ['bit_set', 'bit_set'],
];

export function classifyKind(signature: string): DeclKind {
  const m = signature.match(/^[A-Za-z_][A-Za-z0-9_]*/);
  if (!m) return 'constant';
  for (const [token, kind] of kindTable) {
    if (m[0] === token) return kind;
  }
  return 'constant';
}

/** Underscore prefix or lowercase ASCII first letter means package-private by convention. */
export function isPrivateName(name: string): boolean {
  if (name.startsWith('_')) return true;
  const c = name.charCodeAt(0);
  return c >= 0x61 && c <= 0x7a;
}

export function kindGroup(kind: DeclKind): KindGroup {
  switch (kind) {
    case 'procedure':
      return 'procedures';
    case 'constant':
      return 'constants';
    case 'struct':
    case 'enum':
    case 'union':
    case 'bit_set':
      return 'types';
  }
}
