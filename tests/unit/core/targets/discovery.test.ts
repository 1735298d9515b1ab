/**
 * Tests for target discovery.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { discoverTargets, BUNDLED_TEMPLATES_DIR } from '../../../../src/core/targets/discovery.js';
import type { DiscoveryOptions, TargetProbeDefinition } from '../../../../src/core/targets/types.js';

const lifeCliProbe: TargetProbeDefinition = {
  key: 'life-cli',
  package: 'life-cli',
  source: 'life-cli/src',
  templates: 'scripts/life-cli/templates',
  first_package_dir: true,
};

describe('discoverTargets', () => {
  let repoRoot: string;

  beforeEach(() => {
    repoRoot = mkdtempSync(join(tmpdir(), 'fold-discovery-'));
  });

  afterEach(() => {
    rmSync(repoRoot, { recursive: true, force: true });
  });

  function options(overrides: Partial<DiscoveryOptions> = {}): DiscoveryOptions {
    return {
      repoRoot,
      defaultTarget: {
        key: 'spec-core',
        package: 'spec-core',
        root: 'src/spec',
        templates: 'templates',
      },
      legacyKeys: ['spec-dev'],
      ...overrides,
    };
  }

  it('should always register the default target and its legacy key', () => {
    const targets = discoverTargets(options());

    expect([...targets.keys()]).toEqual(['spec-core', 'spec-dev']);
    expect(targets.get('spec-core')).toEqual({
      key: 'spec-core',
      package: 'spec-core',
      root: join(repoRoot, 'src', 'spec'),
      templates: join(repoRoot, 'templates'),
      repoRoot,
      projectRoot: repoRoot,
    });
    expect(targets.get('spec-dev')?.root).toBe(join(repoRoot, 'src', 'spec'));
  });

  it('should not create anything on disk', () => {
    discoverTargets(options({ probes: [lifeCliProbe] }));

    expect(existsSync(join(repoRoot, 'src'))).toBe(false);
  });

  it('should freeze targets', () => {
    const target = discoverTargets(options()).get('spec-core');

    expect(Object.isFrozen(target)).toBe(true);
  });

  it('should lowercase keys', () => {
    const targets = discoverTargets(
      options({ defaultTarget: { key: 'Spec-Core', package: 'spec-core', root: 'src', templates: 't' }, legacyKeys: [] })
    );

    expect([...targets.keys()]).toEqual(['spec-core']);
  });

  it('should accept the bundled template directory', () => {
    const targets = discoverTargets(
      options({ defaultTarget: { key: 'spec-core', package: 'spec-core', root: 'src/spec', templates: BUNDLED_TEMPLATES_DIR } })
    );

    expect(targets.get('spec-core')?.templates).toBe(BUNDLED_TEMPLATES_DIR);
    expect(existsSync(join(BUNDLED_TEMPLATES_DIR, 'verbs', 'verb_template.ts.tpl'))).toBe(true);
  });

  describe('probes', () => {
    it('should skip a probe whose source root is missing', () => {
      mkdirSync(join(repoRoot, 'scripts', 'life-cli', 'templates'), { recursive: true });

      expect(discoverTargets(options({ probes: [lifeCliProbe] })).has('life-cli')).toBe(false);
    });

    it('should skip a probe whose template root is missing', () => {
      mkdirSync(join(repoRoot, 'life-cli', 'src', 'life'), { recursive: true });

      expect(discoverTargets(options({ probes: [lifeCliProbe] })).has('life-cli')).toBe(false);
    });

    it('should skip a probe with no package directory', () => {
      mkdirSync(join(repoRoot, 'life-cli', 'src', '__pycache__'), { recursive: true });
      mkdirSync(join(repoRoot, 'scripts', 'life-cli', 'templates'), { recursive: true });

      expect(discoverTargets(options({ probes: [lifeCliProbe] })).has('life-cli')).toBe(false);
    });

    it('should register the first package directory as root', () => {
      mkdirSync(join(repoRoot, 'life-cli', 'src', '__internal'), { recursive: true });
      mkdirSync(join(repoRoot, 'life-cli', 'src', 'zeta'), { recursive: true });
      mkdirSync(join(repoRoot, 'life-cli', 'src', 'life'), { recursive: true });
      mkdirSync(join(repoRoot, 'scripts', 'life-cli', 'templates'), { recursive: true });

      const target = discoverTargets(options({ probes: [lifeCliProbe] })).get('life-cli');

      expect(target).toEqual({
        key: 'life-cli',
        package: 'life-cli',
        root: join(repoRoot, 'life-cli', 'src', 'life'),
        templates: join(repoRoot, 'scripts', 'life-cli', 'templates'),
        repoRoot,
        projectRoot: join(repoRoot, 'life-cli'),
      });
    });

    it('should use the source root directly when asked', () => {
      mkdirSync(join(repoRoot, 'tools', 'src'), { recursive: true });
      mkdirSync(join(repoRoot, 'tools', 'templates'), { recursive: true });
      const probe: TargetProbeDefinition = {
        key: 'tools',
        package: 'tools',
        source: 'tools/src',
        templates: 'tools/templates',
        project: '.',
        first_package_dir: false,
      };

      const target = discoverTargets(options({ probes: [probe] })).get('tools');

      expect(target?.root).toBe(join(repoRoot, 'tools', 'src'));
      expect(target?.projectRoot).toBe(repoRoot);
    });

    it('should not let a probe replace the default target', () => {
      mkdirSync(join(repoRoot, 'other', 'src'), { recursive: true });
      mkdirSync(join(repoRoot, 'other', 'templates'), { recursive: true });
      const probe: TargetProbeDefinition = {
        key: 'spec-core',
        package: 'other',
        source: 'other/src',
        templates: 'other/templates',
        first_package_dir: false,
      };

      expect(discoverTargets(options({ probes: [probe] })).get('spec-core')?.package).toBe('spec-core');
    });
  });
});
