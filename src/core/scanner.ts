import { classifyKind, isPrivateName } from './kinds';
import type { DocEntry } from './types';

const BINDING = '::';
const COMMENT = '//';
// `@(private)`, `@(private="file")` and the bare `@private` form.
const PRIVATE_RE = /@(\(\s*)?private\b/;
// One identifier or a comma-separated list of them (`a, b :: 1, 2`).
const BINDING_NAME_RE = /^[\p{L}_][\p{L}\p{N}_]*(\s*,\s*[\p{L}_][\p{L}\p{N}_]*)*$/u;

export type ScannedLine =
  | { type: 'private' }
  | { type: 'comment'; text: string }
  | { type: 'blank' }
  | { type: 'declaration'; name: string; signature: string }
  | { type: 'code' };

interface ScanContext {
  pendingDoc: string[];
  pendingPrivate: boolean;
  lastWasCode: boolean;
}

export function classifyLine(raw: string): ScannedLine {
  if (PRIVATE_RE.test(raw)) return { type: 'private' };

  const trimmed = raw.trim();
  if (trimmed.startsWith(COMMENT)) {
    let text = trimmed.slice(COMMENT.length);
    if (text.startsWith(' ')) text = text.slice(1);
    return { type: 'comment', text };
  }
  if (!trimmed) return { type: 'blank' };

  const at = trimmed.indexOf(BINDING);
  if (at >= 0) {
    const name = trimmed.slice(0, at).trim();
    // `fmt.println("a :: b")` and friends carry the operator but bind nothing.
    if (BINDING_NAME_RE.test(name)) {
      let signature = trimmed.slice(at + BINDING.length).trim();
      const body = signature.indexOf('{');
      if (body >= 0) signature = signature.slice(0, body).trim();
      return { type: 'declaration', name, signature };
    }
  }
  return { type: 'code' };
}

function flushDoc(segments: string[]): string {
  let end = segments.length;
  while (end > 0 && segments[end - 1] === '') end--;
  return segments.slice(0, end).join('\n');
}

/**
 * Scan one source file line by line and return its documented declarations
 * in order of appearance. Never throws; lines it cannot make sense of are
 * treated as ordinary code.
 */
export function scanSource(text: string, file: string): DocEntry[] {
  const out: DocEntry[] = [];
  const ctx: ScanContext = { pendingDoc: [], pendingPrivate: false, lastWasCode: false };
  const lines = text.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i].endsWith('\r') ? lines[i].slice(0, -1) : lines[i];
    const line = classifyLine(raw);

    switch (line.type) {
      case 'private':
        ctx.pendingPrivate = true;
        ctx.lastWasCode = false;
        break;
      case 'comment':
        // A comment right after code trails that statement and documents nothing below it.
        if (!ctx.lastWasCode) ctx.pendingDoc.push(line.text);
        ctx.lastWasCode = false;
        break;
      case 'blank':
        if (ctx.pendingDoc.length > 0) ctx.pendingDoc.push('');
        ctx.lastWasCode = false;
        break;
      case 'declaration':
        out.push({
          name: line.name,
          kind: classifyKind(line.signature),
          signature: line.signature,
          doc: flushDoc(ctx.pendingDoc),
          file,
          line: i + 1,
          isPrivate: ctx.pendingPrivate || isPrivateName(line.name),
        });
        ctx.pendingDoc = [];
        ctx.pendingPrivate = false;
        ctx.lastWasCode = false;
        break;
      case 'code':
        ctx.pendingDoc = [];
        ctx.pendingPrivate = false;
        ctx.lastWasCode = true;
        break;
    }
  }

  return out;
}
