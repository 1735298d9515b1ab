/**
 * Tests for the registry-backed class flow.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { writeFileSync, mkdirSync } from 'fs';
import { parse } from 'yaml';
import { createWorkspace, createGenerator, FIXED_TIME, type Workspace } from '../../../helpers/workspace.js';
import { importSpecifier } from '../../../../src/core/scaffold/class.js';
import { RegistryStore } from '../../../../src/core/registry/store.js';
import type { ScaffoldGenerator } from '../../../../src/core/scaffold/generator.js';

describe('defineClass', () => {
  let ws: Workspace;
  let generator: ScaffoldGenerator;

  beforeEach(() => {
    ws = createWorkspace();
    generator = createGenerator(ws);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    ws.cleanup();
  });

  it('should create the class directory, module and registry', async () => {
    const dir = ws.at('user_account');

    const outcome = await generator.defineClass('UserAccount');

    expect(outcome.status).toBe('success');
    expect(outcome.message).toBe(`Defined UserAccount in spec-core -> ${dir}`);
    expect(outcome.notes).toEqual(['Created: user_account_class.ts, user_account_registry.yml', 'Version: 1.0.0']);
    expect(outcome.created).toEqual([
      ws.at('user_account', 'index.ts'),
      ws.at('user_account', 'user_account_class.ts'),
      ws.at('user_account', 'user_account_registry.yml'),
    ]);
    expect(ws.read('user_account', 'index.ts')).toBe(
      "// UserAccount module\nexport * from './user_account_class.js';\n"
    );
  });

  it('should render the bundled class module', async () => {
    await generator.defineClass('UserAccount');

    const module = ws.read('user_account', 'user_account_class.ts');
    expect(module).toContain('export class UserAccount {');
    expect(module).toContain('export class UserAccountRegistry {');
    expect(module).toContain("registry_type: 'useraccount',");
    expect(module).toContain(` * Created: ${FIXED_TIME}`);
    expect(module).toContain("'user_account_registry.yml'");
    expect(module).not.toMatch(/\{[A-Z][A-Z0-9_]*\}/);
  });

  it('should write an empty registry document', async () => {
    await generator.defineClass('UserAccount');

    expect(parse(ws.read('user_account', 'user_account_registry.yml'))).toEqual({
      registry_version: '1.0.0',
      registry_type: 'useraccount',
      target: 'spec-core',
      created_at: FIXED_TIME,
      updated_at: FIXED_TIME,
      items: {},
      metadata: {
        description: 'Registry for UserAccount instances',
        class_name: 'UserAccount',
        target: 'spec-core',
        auto_backup: true,
      },
    });
  });

  it('should produce a registry the store can load', async () => {
    await generator.defineClass('UserAccount', { version: '2.1.0' });
    const store = new RegistryStore({ path: ws.at('user_account', 'user_account_registry.yml'), registryType: 'x' });

    expect(await store.load()).toBe(true);
    expect(store.registryVersion).toBe('2.1.0');
    expect(store.type).toBe('useraccount');
    expect(store.size).toBe(0);
  });

  it('should stamp the requested version', async () => {
    const outcome = await generator.defineClass('UserAccount', { version: '2.1.0' });

    expect(outcome.notes).toContain('Version: 2.1.0');
    expect(ws.read('user_account', 'user_account_class.ts')).toContain(" * Version: 2.1.0");
  });

  it('should place domain classes under classes/', async () => {
    const outcome = await generator.defineClass('LedgerEntry', { domain: 'billing' });

    expect(outcome.path).toBe(ws.at('domains', 'billing', 'classes', 'ledger_entry'));
    expect(ws.exists('domains', 'billing', 'classes', 'ledger_entry', 'ledger_entry_class.ts')).toBe(true);
  });

  it('should mark every directory it creates for a domain class', async () => {
    const outcome = await generator.defineClass('LedgerEntry', { domain: 'billing' });

    expect(outcome.created.slice(0, 4)).toEqual([
      ws.at('domains', 'index.ts'),
      ws.at('domains', 'billing', 'index.ts'),
      ws.at('domains', 'billing', 'classes', 'index.ts'),
      ws.at('domains', 'billing', 'classes', 'ledger_entry', 'index.ts'),
    ]);
    expect(ws.read('domains', 'index.ts')).toBe('// spec_core domains\n');
    expect(ws.read('domains', 'billing', 'classes', 'index.ts')).toBe('');
  });

  it('should prefer the target class module template', async () => {
    ws.writeTemplate('class_module_template.ts.tpl', '// {CLASS_NAME} v{VERSION}\n');

    await generator.defineClass('UserAccount');

    expect(ws.read('user_account', 'user_account_class.ts')).toBe('// UserAccount v1.0.0\n');
  });

  describe('conflicts', () => {
    it('should warn and write nothing when the registry exists', async () => {
      const registry = ws.at('user_account', 'user_account_registry.yml');
      mkdirSync(ws.at('user_account'), { recursive: true });
      writeFileSync(registry, 'hand written\n');

      const outcome = await generator.defineClass('UserAccount');

      expect(outcome.status).toBe('warning');
      expect(outcome.message).toBe(`Class 'UserAccount' already exists, not overwriting: ${registry}`);
      expect(ws.exists('user_account', 'user_account_class.ts')).toBe(false);
      expect(ws.exists('user_account', 'index.ts')).toBe(false);
      expect(ws.read('user_account', 'user_account_registry.yml')).toBe('hand written\n');
    });

    it('should warn on a second definition', async () => {
      await generator.defineClass('UserAccount');

      const outcome = await generator.defineClass('UserAccount');

      expect(outcome.status).toBe('warning');
      expect(outcome.path).toBe(ws.at('user_account', 'user_account_class.ts'));
    });
  });

  it('should remove the module when the registry cannot be written', async () => {
    vi.spyOn(RegistryStore.prototype, 'save').mockRejectedValue(new Error('disk full'));

    const outcome = await generator.defineClass('UserAccount');

    expect(outcome.status).toBe('error');
    expect(outcome.code).toBe('S001');
    expect(outcome.message).toBe('Failed to write registry for UserAccount: disk full');
    expect(ws.exists('user_account', 'user_account_class.ts')).toBe(false);
    expect(ws.exists('user_account', 'user_account_registry.yml')).toBe(false);
  });

  describe('reverse', () => {
    it('should remove the class directory', async () => {
      await generator.defineClass('UserAccount');

      const outcome = await generator.defineClass('UserAccount', { reverse: true });

      expect(outcome.status).toBe('success');
      expect(outcome.message).toBe(`Removed UserAccount from spec-core -> ${ws.at('user_account')}`);
      expect(ws.exists('user_account')).toBe(false);
    });

    it('should warn when there is nothing to remove', async () => {
      const outcome = await generator.defineClass('UserAccount', { reverse: true });

      expect(outcome.status).toBe('warning');
      expect(outcome.message).toBe(`Class directory does not exist: ${ws.at('user_account')}`);
    });
  });

  it('should reject invalid class names', async () => {
    const outcome = await generator.defineClass('user-account');

    expect(outcome.status).toBe('error');
    expect(outcome.message).toBe("Invalid class name: 'user-account'");
  });
});

describe('importSpecifier', () => {
  it('should map TypeScript sources to their runtime extension', () => {
    expect(importSpecifier('user_account_class', '.ts')).toBe('./user_account_class.js');
    expect(importSpecifier('user_account_class', '.mts')).toBe('./user_account_class.mjs');
    expect(importSpecifier('user_account_class', '.js')).toBe('./user_account_class.js');
  });
});
