import type { DocInput } from '../schemas/docSchemas';
import type { CLIResult, CLIError } from '../types';
import { success, error, ErrorHints, ErrorReasons } from '../types';
import { formatSearchPaths, parseTarget, resolveDocConfig } from '../helpers';
import { collectEntries, groupPackage, isEmptyPackage, lookupSymbol, type SourceReader } from '../../core/aggregate';
import { listSourceFiles } from '../../core/discovery';
import { createLogger } from '../../core/log';
import type { RootResolution } from '../../core/root';
import {
  emptyPackageMessage,
  renderPackage,
  renderSymbol,
  symbolNotFoundMessage,
  symbolPrivateMessage,
} from '../../core/render';

export interface DocDeps {
  resolveRoot?: () => RootResolution;
  readFile?: SourceReader;
}

export async function handleDoc(input: DocInput, deps: DocDeps = {}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'doc' });
  const config = resolveDocConfig(input.width);
  const target = parseTarget(input.target);
  const pkg = target.packageRef;

  const listing = await listSourceFiles(pkg, { config, resolveRoot: deps.resolveRoot });
  if (!listing.rootResolved) {
    const searched = listing.root?.searched ?? [];
    const message = [`Odin root not found; cannot resolve '${pkg}'.`, ...formatSearchPaths({ path: '', found: false, searched })];
    return error(ErrorReasons.ROOT_NOT_FOUND, message.join('\n'), { hint: ErrorHints.ROOT_NOT_FOUND, searched });
  }

  const entries = await log.span('collect', { pkg, dir: listing.dir, files: listing.files.length }, () =>
    collectEntries(listing.files, deps.readFile)
  );

  if (target.symbol !== undefined) {
    const found = lookupSymbol(entries, target.symbol);
    switch (found.status) {
      case 'found':
        return success(renderSymbol(found.entry, config.wrapWidth), { outcome: 'found', entry: found.entry });
      case 'private':
        return success(symbolPrivateMessage(target.symbol, pkg), { outcome: 'private', entry: found.entry });
      case 'not_found':
        return success(symbolNotFoundMessage(target.symbol, pkg), { outcome: 'not_found' });
    }
  }

  const groups = groupPackage(entries);
  if (isEmptyPackage(groups)) {
    return success(emptyPackageMessage(pkg), { outcome: 'empty' });
  }
  return success(renderPackage(listing.packageName, pkg, groups, config.wrapWidth), { outcome: 'package', groups });
}
