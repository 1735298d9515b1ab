/**
 * Target type definitions.
 */

/**
 * A package that scaffolds are generated into. Built once during discovery
 * and frozen; never mutated afterwards.
 */
export interface Target {
  /** Canonical lowercase id, unique across discovered targets */
  readonly key: string;
  /** Display/package name */
  readonly package: string;
  /** Artifact root: generated files land under here */
  readonly root: string;
  /** Template root */
  readonly templates: string;
  readonly repoRoot: string;
  readonly projectRoot: string;
}

/**
 * Alternate spellings mapped to canonical target keys.
 */
export interface AliasTable {
  readonly aliases: Readonly<Record<string, string>>;
  readonly defaultTarget: string;
}

/**
 * Where the default target lives.
 */
export interface DefaultTargetDefinition {
  key: string;
  package: string;
  /** Artifact root, absolute or relative to the repository root */
  root: string;
  /** Template root, absolute or relative to the repository root */
  templates: string;
}

/**
 * A location probed during discovery for an optional target.
 */
export interface TargetProbeDefinition {
  key: string;
  package: string;
  source: string;
  templates: string;
  project?: string;
  first_package_dir: boolean;
}

export interface DiscoveryOptions {
  repoRoot: string;
  defaultTarget: DefaultTargetDefinition;
  /** Extra keys registered at the default target's location */
  legacyKeys?: string[];
  probes?: TargetProbeDefinition[];
}

/**
 * Result of pulling `--target` / `--self` out of an argument list.
 */
export interface TargetSelection {
  /** Selected target name, undefined when none was given */
  target: string | undefined;
  /** All other arguments, in their original order */
  remaining: string[];
}
