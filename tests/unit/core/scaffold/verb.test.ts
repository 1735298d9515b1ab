/**
 * Tests for the verb flow.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { createWorkspace, createGenerator, type Workspace } from '../../../helpers/workspace.js';
import type { ScaffoldGenerator } from '../../../../src/core/scaffold/generator.js';

const VERB_TEMPLATE = [
  "// {PACKAGE_NAME}",
  'export class {VERB_TYPE_NAME} {',
  "  readonly name = '{VERB_NAME}';",
  "  readonly domain = '{DOMAIN_NAME}';",
  '',
  '  async execute(): Promise<number> {',
  '    // #region execute',
  '    return 0;',
  '    // #endregion execute',
  '  }',
  '}',
  '',
].join('\n');

describe('registerVerb', () => {
  let ws: Workspace;
  let generator: ScaffoldGenerator;

  beforeEach(() => {
    ws = createWorkspace();
    generator = createGenerator(ws);
    ws.writeTemplate('verbs/verb_template.ts.tpl', VERB_TEMPLATE);
  });

  afterEach(() => {
    ws.cleanup();
  });

  it('should render a domain verb from the generic template', async () => {
    const outcome = await generator.registerVerb('billing.invoice');
    const file = ws.at('domains', 'billing', 'verbs', 'invoice.ts');

    expect(outcome.status).toBe('success');
    expect(outcome.message).toBe(`Registered verb 'billing.invoice' in spec-core -> ${file}`);
    expect(outcome.path).toBe(file);
    expect(outcome.created).toEqual([
      ws.at('domains', 'index.ts'),
      ws.at('domains', 'billing', 'index.ts'),
      ws.at('domains', 'billing', 'verbs', 'index.ts'),
      file,
    ]);
    expect(ws.read('domains', 'billing', 'verbs', 'invoice.ts')).toBe(
      VERB_TEMPLATE.replace('{PACKAGE_NAME}', 'spec-core')
        .replace('{VERB_TYPE_NAME}', 'InvoiceVerb')
        .replace('{VERB_NAME}', 'invoice')
        .replace('{DOMAIN_NAME}', 'billing')
    );
  });

  it('should place bare verbs under verbs/', async () => {
    const outcome = await generator.registerVerb('send_invoice');

    expect(outcome.path).toBe(ws.at('verbs', 'send_invoice.ts'));
    expect(ws.read('verbs', 'send_invoice.ts')).toContain('export class SendInvoiceVerb {');
    expect(ws.read('verbs', 'send_invoice.ts')).toContain("readonly domain = '';");
  });

  it('should warn and leave the file alone when the verb exists', async () => {
    await generator.registerVerb('billing.invoice');
    const file = ws.at('domains', 'billing', 'verbs', 'invoice.ts');
    const before = ws.read('domains', 'billing', 'verbs', 'invoice.ts');
    ws.writeTemplate('verbs/verb_template.ts.tpl', 'changed\n');

    const outcome = await generator.registerVerb('billing.invoice');

    expect(outcome.status).toBe('warning');
    expect(outcome.message).toBe(`Verb 'billing.invoice' already exists, not overwriting: ${file}`);
    expect(ws.read('domains', 'billing', 'verbs', 'invoice.ts')).toBe(before);
  });

  describe('template precedence', () => {
    it('should prefer the domain-specific template', async () => {
      ws.writeTemplate('domains/billing/verbs/invoice.ts.tpl', 'specific {VERB_NAME}\n');
      ws.writeTemplate('verbs/invoice.ts.tpl', 'top {VERB_NAME}\n');

      await generator.registerVerb('billing.invoice');

      expect(ws.read('domains', 'billing', 'verbs', 'invoice.ts')).toBe('specific invoice\n');
    });

    it('should fall back to the top-level verb template', async () => {
      ws.writeTemplate('verbs/invoice.ts.tpl', 'top {VERB_NAME}\n');

      await generator.registerVerb('billing.invoice');

      expect(ws.read('domains', 'billing', 'verbs', 'invoice.ts')).toBe('top invoice\n');
    });

    it('should not use another domain\'s template', async () => {
      ws.writeTemplate('domains/shipping/verbs/invoice.ts.tpl', 'shipping\n');

      await generator.registerVerb('billing.invoice');

      expect(ws.read('domains', 'billing', 'verbs', 'invoice.ts')).toContain('export class InvoiceVerb {');
    });

    it('should report the generic template path when nothing matches', async () => {
      const empty = createWorkspace();
      try {
        const outcome = await createGenerator(empty).registerVerb('billing.invoice');

        expect(outcome.status).toBe('error');
        expect(outcome.code).toBe('E002');
        expect(outcome.message).toBe(
          `Template file not found: ${join(empty.templates, 'verbs', 'verb_template.ts.tpl')}`
        );
        expect(empty.exists('domains', 'billing', 'verbs', 'invoice.ts')).toBe(false);
      } finally {
        empty.cleanup();
      }
    });
  });

  describe('inline content', () => {
    it('should become the body of execute', async () => {
      const outcome = await generator.registerVerb('billing.invoice', { inline: 'const total = 42;\nreturn total;' });

      expect(outcome.notes).toEqual(['Inline code placed in the body of execute']);
      expect(ws.read('domains', 'billing', 'verbs', 'invoice.ts')).toContain(
        '    // #region execute\n    const total = 42;\n    return total;\n    // #endregion execute\n'
      );
    });

    it('should be noted and ignored when the template has no execute region', async () => {
      const template = ws.writeTemplate('verbs/plain.ts.tpl', 'export const {VERB_NAME} = 1;\n');

      const outcome = await generator.registerVerb('plain', { inline: 'return 1;' });

      expect(outcome.status).toBe('success');
      expect(outcome.notes).toEqual([`Inline code ignored: template has no execute region (${template})`]);
      expect(ws.read('verbs', 'plain.ts')).toBe('export const plain = 1;\n');
    });
  });

  describe('names', () => {
    it.each(['.foo', 'foo.', 'a.b.c'])('should reject %s', async (name) => {
      const outcome = await generator.registerVerb(name);

      expect(outcome.status).toBe('error');
      expect(outcome.code).toBe('E003');
      expect(outcome.message).toBe(`Invalid domain.verb name: ${name}`);
      expect(ws.exists('verbs')).toBe(false);
      expect(ws.exists('domains')).toBe(false);
    });
  });

  it('should reject templates using tokens from other kinds', async () => {
    ws.writeTemplate('verbs/verb_template.ts.tpl', 'export class {CLASS_NAME} {}\n');

    const outcome = await generator.registerVerb('ping');

    expect(outcome.status).toBe('error');
    expect(outcome.code).toBe('E004');
    expect(ws.exists('verbs', 'ping.ts')).toBe(false);
  });

  it('should keep unknown tokens in lenient mode', async () => {
    ws.writeTemplate('verbs/verb_template.ts.tpl', '{VERB_NAME} {TOTAL}\n');

    const outcome = await createGenerator(ws, 'lenient').registerVerb('ping');

    expect(outcome.status).toBe('success');
    expect(ws.read('verbs', 'ping.ts')).toBe('ping {TOTAL}\n');
  });
});
