import { clampWrapWidth, loadDocConfig, type DocConfig } from '../core/config';
import type { RootResolution } from '../core/root';

export interface DocTarget {
  packageRef: string;
  symbol?: string;
}

/**
 * Split `<package>.<symbol>` on its only dot. Anything else (no dot, several
 * dots, an empty side, a path after the dot) names a whole package.
 *
 * @example
 * parseTarget('core:fmt.println') // { packageRef: 'core:fmt', symbol: 'println' }
 * parseTarget('./vendor/pkg')     // { packageRef: './vendor/pkg' }
 */
export function parseTarget(raw: string): DocTarget {
  const target = raw.trim();
  const dot = target.lastIndexOf('.');
  if (dot < 0 || target.indexOf('.') !== dot) return { packageRef: target };

  const packageRef = target.slice(0, dot);
  const symbol = target.slice(dot + 1);
  if (!packageRef || !symbol || /[\\/]/.test(symbol)) return { packageRef: target };
  return { packageRef, symbol };
}

export function resolveDocConfig(width?: number): DocConfig {
  const config = loadDocConfig();
  if (width === undefined) return config;
  return { ...config, wrapWidth: clampWrapWidth(width) };
}

/** Diagnostic lines listing where the toolchain root was looked for. */
export function formatSearchPaths(resolution: RootResolution): string[] {
  if (resolution.searched.length === 0) return ['Searched: (no candidate directories)'];
  return ['Searched:', ...resolution.searched.map((p) => `  ${p}`)];
}
