import path from 'path';
import { resolveLibraryRoot, type RootResolution } from '../../core/root';
import { createLogger } from '../../core/log';
import { formatSearchPaths } from '../helpers';
import type { CLIResult, CLIError } from '../types';
import { success, error, ErrorHints, ErrorReasons } from '../types';

export interface RootDeps {
  resolveRoot?: () => RootResolution;
}

export async function handleRoot(deps: RootDeps = {}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'root' });
  const resolution = (deps.resolveRoot ?? (() => resolveLibraryRoot()))();

  log.debug('resolve_root', { found: resolution.found, candidates: resolution.searched.length });

  if (!resolution.found) {
    return error(ErrorReasons.ROOT_NOT_FOUND, ['Odin root not found.', ...formatSearchPaths(resolution)].join('\n'), {
      hint: ErrorHints.ROOT_NOT_FOUND,
      searched: resolution.searched,
    });
  }

  const lines = [`Odin root: ${resolution.path}`, `core library: ${path.join(resolution.path, 'core')} (found)`];
  return success(lines.join('\n'), { root: resolution.path });
}
