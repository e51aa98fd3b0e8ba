export interface DocConfig {
  /** Environment variable that overrides the toolchain root search. */
  rootEnvVar: string;
  sourceExtension: string;
  /** Library collections addressable as `<collection>:<package>`. */
  collections: string[];
  binaryNames: string[];
  wrapWidth: number;
}

const MIN_WRAP_WIDTH = 40;
const MAX_WRAP_WIDTH = 200;

export function defaultDocConfig(): DocConfig {
  return {
    rootEnvVar: 'ODIN_ROOT',
    sourceExtension: '.odin',
    collections: ['core', 'base', 'vendor'],
    binaryNames: ['odin', 'odin.exe'],
    wrapWidth: 80,
  };
}

export function clampWrapWidth(width: number): number {
  if (!Number.isFinite(width)) return defaultDocConfig().wrapWidth;
  return Math.min(MAX_WRAP_WIDTH, Math.max(MIN_WRAP_WIDTH, Math.floor(width)));
}

export function mergeDocConfig(overrides?: Partial<DocConfig>): DocConfig {
  const defaults = defaultDocConfig();
  if (!overrides) return defaults;
  const merged: DocConfig = { ...defaults, ...overrides };
  merged.wrapWidth = clampWrapWidth(merged.wrapWidth);
  return merged;
}

export function loadDocConfig(env: NodeJS.ProcessEnv = process.env): DocConfig {
  const overrides: Partial<DocConfig> = {};
  const rawWidth = String(env.ODINDOC_WIDTH ?? '').trim();
  if (rawWidth) {
    const width = Number(rawWidth);
    if (Number.isFinite(width)) overrides.wrapWidth = width;
  }
  return mergeDocConfig(overrides);
}
