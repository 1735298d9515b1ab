/**
 * Maps symbolic target names (and their aliases) to discovered targets.
 */
import * as path from 'node:path';
import type { Config } from '../config/schema.js';
import { TargetError, ErrorCodes } from '../../utils/errors.js';
import { BUNDLED_TEMPLATES_DIR, discoverTargets } from './discovery.js';
import { parseTargetSelector } from './selector.js';
import type { AliasTable, Target, TargetSelection } from './types.js';

export class TargetResolver {
  private readonly table: ReadonlyMap<string, Target>;
  private readonly aliasTable: AliasTable;

  constructor(targets: ReadonlyMap<string, Target>, aliasTable: AliasTable) {
    this.table = targets;
    this.aliasTable = {
      defaultTarget: aliasTable.defaultTarget.toLowerCase(),
      aliases: Object.freeze(
        Object.fromEntries(
          Object.entries(aliasTable.aliases).map(([alias, key]) => [alias.toLowerCase(), key.toLowerCase()])
        )
      ),
    };
  }

  /**
   * Discover targets under `repoRoot` using the loaded configuration.
   */
  static fromConfig(repoRoot: string, config: Config): TargetResolver {
    const targets = discoverTargets({
      repoRoot,
      defaultTarget: {
        key: config.default_target,
        package: config.default_package,
        root: config.default_root,
        templates: config.templates ? path.resolve(repoRoot, config.templates) : BUNDLED_TEMPLATES_DIR,
      },
      legacyKeys: config.legacy_targets,
      probes: config.probes,
    });
    return new TargetResolver(targets, {
      aliases: config.aliases,
      defaultTarget: config.default_target,
    });
  }

  get defaultTarget(): string {
    return this.aliasTable.defaultTarget;
  }

  /**
   * Resolve a target name. Empty or missing names select the default target.
   * @throws TargetError when no target matches
   */
  resolve(name?: string | null): Target {
    const key = this.normalizeKey(name);
    const target = this.table.get(key);
    if (!target) {
      const known = this.listTargets();
      throw new TargetError(
        ErrorCodes.UNKNOWN_TARGET,
        `Unknown target '${name ?? ''}'. Known targets: ${known.length > 0 ? known.join(', ') : '<none>'}`,
        { target: name, known }
      );
    }
    return target;
  }

  parseTargetSelector(args: readonly string[]): TargetSelection {
    return parseTargetSelector(args, this.aliasTable.defaultTarget);
  }

  listTargets(): string[] {
    return [...this.table.keys()].sort();
  }

  /**
   * Discovered targets sorted by key, each under its own key. Unlike
   * `resolve`, no alias is applied, so legacy entries stay visible.
   */
  targets(): Target[] {
    return this.listTargets().flatMap((key) => {
      const target = this.table.get(key);
      return target ? [target] : [];
    });
  }

  private normalizeKey(name?: string | null): string {
    if (!name) {
      return this.aliasTable.defaultTarget;
    }
    const key = name.toLowerCase();
    return this.aliasTable.aliases[key] ?? key;
  }
}
