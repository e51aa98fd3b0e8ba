import path from 'path';
import { glob } from 'glob';
import { defaultDocConfig, type DocConfig } from './config';
import { compareOrdinal } from './aggregate';
import { resolveLibraryRoot, type RootResolution } from './root';

export type PackageRef =
  | { type: 'dir'; raw: string; dir: string }
  | { type: 'collection'; raw: string; collection: string; pkg: string };

export interface SourceListing {
  files: string[];
  /** False only when a collection reference could not be tied to a toolchain root. */
  rootResolved: boolean;
  dir: string;
  packageName: string;
  root?: RootResolution;
}

export interface ListOptions {
  config?: DocConfig;
  resolveRoot?: () => RootResolution;
}

export function parsePackageRef(raw: string, config: DocConfig = defaultDocConfig()): PackageRef {
  const colon = raw.indexOf(':');
  if (colon > 0) {
    const collection = raw.slice(0, colon);
    if (config.collections.includes(collection)) {
      return { type: 'collection', raw, collection, pkg: raw.slice(colon + 1) };
    }
  }
  return { type: 'dir', raw, dir: raw };
}

export function toPosixPath(p: string): string {
  return String(p).replace(/\\/g, '/');
}

function splitPosixPath(p: string): string[] {
  return toPosixPath(p).split('/').filter(Boolean);
}

function lastSegment(p: string): string {
  const parts = splitPosixPath(p);
  return parts[parts.length - 1] ?? '';
}

async function listDir(dir: string, config: DocConfig): Promise<string[]> {
  const names = await glob(`*${config.sourceExtension}`, { cwd: dir, nodir: true });
  return names
    .sort(compareOrdinal)
    .map((name) => path.join(dir, name));
}

/**
 * List the source files of one package, non-recursively, in ordinal name
 * order. Missing or unreadable directories produce an empty listing.
 */
export async function listSourceFiles(ref: string, options: ListOptions = {}): Promise<SourceListing> {
  const config = options.config ?? defaultDocConfig();
  const parsed = parsePackageRef(ref, config);

  if (parsed.type === 'dir') {
    const files = await listDir(parsed.dir, config);
    return {
      files,
      rootResolved: true,
      dir: parsed.dir,
      packageName: lastSegment(toPosixPath(path.resolve(parsed.dir))),
    };
  }

  const root = options.resolveRoot ? options.resolveRoot() : resolveLibraryRoot(undefined, config);
  const packageName = lastSegment(parsed.pkg);
  if (!root.found) {
    return { files: [], rootResolved: false, dir: '', packageName, root };
  }
  const dir = path.join(root.path, parsed.collection, ...splitPosixPath(parsed.pkg));
  const files = await listDir(dir, config);
  return { files, rootResolved: true, dir, packageName, root };
}
