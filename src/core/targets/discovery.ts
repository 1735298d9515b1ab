/**
 * Target discovery.
 *
 * Probes the repository once for the packages scaffolds can be generated
 * into. Everything it looks at is passed in, so the same repository always
 * yields the same targets.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { directoryExistsSync, listDirectoriesSync } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type {
  DiscoveryOptions,
  Target,
  TargetProbeDefinition,
} from './types.js';

const log = logger.child('targets');

/** Templates shipped with this package; the default target uses them. */
export const BUNDLED_TEMPLATES_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../../templates'
);

function makeTarget(fields: Target): Target {
  return Object.freeze({ ...fields });
}

/**
 * Discover the targets available in a repository.
 *
 * The default target and its legacy keys are always registered. A probed
 * target is registered only when its root and template directories both
 * exist right now.
 */
export function discoverTargets(options: DiscoveryOptions): Map<string, Target> {
  const repoRoot = path.resolve(options.repoRoot);
  const targets = new Map<string, Target>();
  const def = options.defaultTarget;

  const defaultRoot = path.resolve(repoRoot, def.root);
  const defaultTemplates = path.resolve(repoRoot, def.templates);
  const defaultKeys = [def.key, ...(options.legacyKeys ?? [])].map((key) => key.toLowerCase());

  for (const key of defaultKeys) {
    targets.set(
      key,
      makeTarget({
        key,
        package: def.package,
        root: defaultRoot,
        templates: defaultTemplates,
        repoRoot,
        projectRoot: repoRoot,
      })
    );
  }

  for (const probe of options.probes ?? []) {
    const key = probe.key.toLowerCase();
    if (targets.has(key)) {
      log.debug(`Skipping probe '${key}': key already registered`);
      continue;
    }
    const target = probeTarget(repoRoot, probe);
    if (target) {
      targets.set(key, target);
    }
  }

  return targets;
}

function probeTarget(repoRoot: string, probe: TargetProbeDefinition): Target | null {
  const sourceRoot = path.resolve(repoRoot, probe.source);
  const templates = path.resolve(repoRoot, probe.templates);

  if (!directoryExistsSync(sourceRoot)) {
    log.debug(`Probe '${probe.key}' skipped: no source root`, { sourceRoot });
    return null;
  }

  const root = probe.first_package_dir ? firstPackageDir(sourceRoot) : sourceRoot;
  if (!root) {
    log.debug(`Probe '${probe.key}' skipped: no package directory`, { sourceRoot });
    return null;
  }

  if (!directoryExistsSync(templates)) {
    log.debug(`Probe '${probe.key}' skipped: no template root`, { templates });
    return null;
  }

  return makeTarget({
    key: probe.key.toLowerCase(),
    package: probe.package,
    root,
    templates,
    repoRoot,
    projectRoot: probe.project ? path.resolve(repoRoot, probe.project) : path.dirname(sourceRoot),
  });
}

/**
 * First sub-directory (alphabetically) that is not a dunder/private dir.
 */
function firstPackageDir(sourceRoot: string): string | null {
  const name = listDirectoriesSync(sourceRoot).find((entry) => !entry.startsWith('__'));
  return name ? path.join(sourceRoot, name) : null;
}
