import fs from 'fs-extra';
import { kindGroup } from './kinds';
import { createLogger } from './log';
import { scanSource } from './scanner';
import type { DocEntry, PackageGroups, SymbolLookup } from './types';

export type SourceReader = (file: string) => Promise<string | null>;

const log = createLogger({ component: 'aggregate' });

export const readSourceFile: SourceReader = async (file) => {
  try {
    return await fs.readFile(file, 'utf-8');
  } catch (e) {
    log.debug('skip_unreadable', { file, err: e instanceof Error ? e.message : String(e) });
    return null;
  }
};

/** Scan files one after another, in the order given, and concatenate their entries. */
export async function collectEntries(files: string[], readFile: SourceReader = readSourceFile): Promise<DocEntry[]> {
  const out: DocEntry[] = [];
  for (const file of files) {
    const text = await readFile(file);
    if (text === null) continue;
    out.push(...scanSource(text, file));
  }
  return out;
}

export function dedupeEntries(entries: DocEntry[]): DocEntry[] {
  const seen = new Set<string>();
  const out: DocEntry[] = [];
  for (const e of entries) {
    if (seen.has(e.name)) continue;
    seen.add(e.name);
    out.push(e);
  }
  return out;
}

export function lookupSymbol(entries: DocEntry[], name: string): SymbolLookup {
  const entry = dedupeEntries(entries).find((e) => e.name === name);
  if (!entry) return { status: 'not_found' };
  return entry.isPrivate ? { status: 'private', entry } : { status: 'found', entry };
}

export function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function groupPackage(entries: DocEntry[]): PackageGroups {
  const groups: PackageGroups = { constants: [], types: [], procedures: [] };
  for (const e of dedupeEntries(entries)) {
    if (e.isPrivate) continue;
    groups[kindGroup(e.kind)].push(e);
  }
  groups.constants.sort((a, b) => compareOrdinal(a.name, b.name));
  groups.types.sort((a, b) => compareOrdinal(a.name, b.name));
  groups.procedures.sort((a, b) => compareOrdinal(a.name, b.name));
  return groups;
}

export function isEmptyPackage(groups: PackageGroups): boolean {
  return groups.constants.length + groups.types.length + groups.procedures.length === 0;
}
