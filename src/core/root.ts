import os from 'os';
import path from 'path';
import fs, { type Stats } from 'fs-extra';
import { defaultDocConfig, type DocConfig } from './config';

export interface RootResolution {
  path: string;
  found: boolean;
  /** Every candidate examined, in search order. */
  searched: string[];
}

/** Environment and filesystem access needed to locate the toolchain. */
export interface RootHost {
  env: Record<string, string | undefined>;
  platform: NodeJS.Platform;
  homeDir: string;
  isDirectory(p: string): boolean;
  isFile(p: string): boolean;
  realpath(p: string): string;
}

const platformCandidates: Partial<Record<NodeJS.Platform, string[]>> = {
  linux: ['/usr/lib/odin', '/usr/local/lib/odin', '/usr/share/odin', '/opt/odin', '~/odin', '~/.local/share/odin'],
  darwin: ['/opt/homebrew/opt/odin/libexec', '/usr/local/opt/odin/libexec', '/opt/odin', '~/odin'],
  win32: ['C:\\odin', 'C:\\Program Files\\odin', '%LOCALAPPDATA%\\odin'],
};

function tryStat(p: string): Stats | null {
  try {
    return fs.statSync(p);
  } catch {
    return null;
  }
}

export function nodeRootHost(): RootHost {
  return {
    env: process.env,
    platform: process.platform,
    homeDir: os.homedir(),
    isDirectory: (p) => tryStat(p)?.isDirectory() ?? false,
    isFile: (p) => tryStat(p)?.isFile() ?? false,
    realpath: (p) => {
      try {
        return fs.realpathSync(p);
      } catch {
        return p;
      }
    },
  };
}

function pathApi(platform: NodeJS.Platform): path.PlatformPath {
  return platform === 'win32' ? path.win32 : path.posix;
}

function expandCandidate(raw: string, host: RootHost): string | null {
  if (raw.startsWith('~')) {
    if (!host.homeDir) return null;
    return pathApi(host.platform).join(host.homeDir, raw.slice(1));
  }
  if (raw.includes('%LOCALAPPDATA%')) {
    const local = host.env.LOCALAPPDATA;
    if (!local) return null;
    return raw.replace('%LOCALAPPDATA%', local);
  }
  return raw;
}

function binaryCandidates(host: RootHost, config: DocConfig): string[] {
  const p = pathApi(host.platform);
  const rawPath = host.env.PATH ?? host.env.Path ?? '';
  const out: string[] = [];
  for (const dir of rawPath.split(p.delimiter)) {
    if (!dir) continue;
    for (const name of config.binaryNames) {
      const bin = p.join(dir, name);
      if (!host.isFile(bin)) continue;
      out.push(dir, p.dirname(dir));
      const realDir = p.dirname(host.realpath(bin));
      out.push(realDir, p.dirname(realDir));
    }
  }
  return out;
}

/** Ordered, de-duplicated list of directories that may hold the toolchain. */
export function rootCandidates(host: RootHost, config: DocConfig = defaultDocConfig()): string[] {
  const raw: string[] = [];
  const fromEnv = String(host.env[config.rootEnvVar] ?? '').trim();
  if (fromEnv) raw.push(fromEnv);
  for (const c of platformCandidates[host.platform] ?? []) {
    const expanded = expandCandidate(c, host);
    if (expanded) raw.push(expanded);
  }
  raw.push(...binaryCandidates(host, config));

  const seen = new Set<string>();
  const out: string[] = [];
  for (const c of raw) {
    if (seen.has(c)) continue;
    seen.add(c);
    out.push(c);
  }
  return out;
}

/**
 * Locate the toolchain installation: the first candidate that contains a
 * `core` library directory wins.
 */
export function resolveLibraryRoot(
  host: RootHost = nodeRootHost(),
  config: DocConfig = defaultDocConfig()
): RootResolution {
  const p = pathApi(host.platform);
  const searched: string[] = [];
  for (const candidate of rootCandidates(host, config)) {
    searched.push(candidate);
    if (host.isDirectory(p.join(candidate, 'core'))) {
      return { path: candidate, found: true, searched };
    }
  }
  return { path: '', found: false, searched };
}
