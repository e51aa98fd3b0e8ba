import { toPosixPath } from './discovery';
import type { DocEntry, PackageGroups } from './types';

const DOC_INDENT = '    ';
const PREFORMATTED_RE = /^(\t| {2,})/;

function wrapWords(words: string[], width: number, indent: string): string[] {
  const out: string[] = [];
  let current = '';
  for (const word of words) {
    if (!current) {
      current = word;
    } else if (indent.length + current.length + 1 + word.length <= width) {
      current += ' ' + word;
    } else {
      out.push(indent + current);
      current = word;
    }
  }
  if (current) out.push(indent + current);
  return out;
}

/**
 * Re-wrap a doc comment for display. Empty segments separate paragraphs;
 * lines indented by a tab or two or more spaces are kept as written.
 */
export function reflowDoc(doc: string, width: number, indent: string = DOC_INDENT): string[] {
  const paragraphs: string[][] = [];
  let current: string[] = [];
  for (const segment of doc.split('\n')) {
    if (segment.trim() === '') {
      if (current.length > 0) paragraphs.push(current);
      current = [];
    } else {
      current.push(segment);
    }
  }
  if (current.length > 0) paragraphs.push(current);

  const out: string[] = [];
  for (const para of paragraphs) {
    if (out.length > 0) out.push('');
    let words: string[] = [];
    for (const line of para) {
      if (PREFORMATTED_RE.test(line)) {
        out.push(...wrapWords(words, width, indent));
        words = [];
        out.push(indent + line.trimEnd());
      } else {
        words.push(...line.trim().split(/\s+/));
      }
    }
    out.push(...wrapWords(words, width, indent));
  }
  return out;
}

export function renderEntry(entry: DocEntry, width: number): string[] {
  const head = entry.signature ? `${entry.name} :: ${entry.signature}` : `${entry.name} ::`;
  return [head, ...reflowDoc(entry.doc, width)];
}

export function renderPackage(packageName: string, ref: string, groups: PackageGroups, width: number): string {
  const sections: Array<[string, DocEntry[]]> = [
    ['CONSTANTS', groups.constants],
    ['TYPES', groups.types],
    ['PROCEDURES', groups.procedures],
  ];
  const lines = [`package ${packageName} // import "${ref}"`];
  for (const [title, entries] of sections) {
    if (entries.length === 0) continue;
    lines.push('', title);
    for (const e of entries) lines.push('', ...renderEntry(e, width));
  }
  return lines.join('\n');
}

export function renderSymbol(entry: DocEntry, width: number): string {
  return [...renderEntry(entry, width), '', `${DOC_INDENT}Defined in ${toPosixPath(entry.file)}:${entry.line}.`].join('\n');
}

export function emptyPackageMessage(pkg: string): string {
  return `No declarations found in package '${pkg}'`;
}

export function symbolNotFoundMessage(symbol: string, pkg: string): string {
  return `Symbol '${symbol}' not found in package '${pkg}'`;
}

export function symbolPrivateMessage(symbol: string, pkg: string): string {
  return `Symbol '${symbol}' in package '${pkg}' is private`;
}
