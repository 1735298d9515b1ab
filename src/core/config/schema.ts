/**
 * Schema for .fold/config.yaml.
 */
import { z } from 'zod';

/**
 * Make an object field optional and apply its inner defaults when missing.
 * Both undefined and null are treated as "missing".
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** How unknown `{TOKEN}` placeholders left after substitution are handled. */
export const PlaceholderModeSchema = z.enum(['strict', 'lenient']);

/**
 * A location probed for an optional target. The target is registered only
 * when both its root and template directories exist.
 */
export const TargetProbeSchema = z.object({
  /** Canonical lowercase key */
  key: z.string().min(1).transform((key) => key.toLowerCase()),
  /** Display/package name */
  package: z.string().min(1),
  /** Source root, relative to the repository root */
  source: z.string().min(1),
  /** Template root, relative to the repository root */
  templates: z.string().min(1),
  /** Project root, relative to the repository root (default: parent of source) */
  project: z.string().optional(),
  /** Use the first package directory inside `source` as the artifact root */
  first_package_dir: z.boolean().default(false),
});

/** Generation settings. */
export const GenerationSettingsSchema = z.object({
  /** Extension of generated source files */
  extension: z.string().regex(/^\.[A-Za-z0-9]+$/).default('.ts'),
  placeholders: PlaceholderModeSchema.default('strict'),
  /** Version stamped on newly defined registry-backed classes */
  default_version: z.string().min(1).default('1.0.0'),
});

export const ConfigSchema = z.object({
  default_target: z.string().min(1).default('spec-core'),
  /** Package name of the default target */
  default_package: z.string().min(1).default('spec-core'),
  /** Artifact root of the default target, relative to the repository root */
  default_root: z.string().min(1).default('src/spec'),
  /** Template root of the default target (default: the bundled templates) */
  templates: z.string().optional(),
  /** Backward-compatible keys registered at the default target's location */
  legacy_targets: z.array(z.string()).default(['spec-dev']),
  aliases: z.record(z.string(), z.string()).default({
    spec: 'spec-core',
    'spec-dev': 'spec-core',
    spec_core: 'spec-core',
    'spec-core': 'spec-core',
  }),
  probes: z.array(TargetProbeSchema).default([
    {
      key: 'life-cli',
      package: 'life-cli',
      source: 'life-cli/src',
      templates: 'scripts/life-cli/templates',
      first_package_dir: true,
    },
  ]),
  generation: withDefaults(GenerationSettingsSchema),
});

export type PlaceholderMode = z.infer<typeof PlaceholderModeSchema>;
export type TargetProbe = z.infer<typeof TargetProbeSchema>;
export type GenerationSettings = z.infer<typeof GenerationSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
