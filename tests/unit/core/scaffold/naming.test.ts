/**
 * Tests for name validation and derived names.
 */
import { describe, it, expect } from 'vitest';
import {
  assertSegment,
  parseVerbName,
  assertClassName,
  verbTypeName,
  classArtifactNames,
} from '../../../../src/core/scaffold/naming.js';
import { NamingError } from '../../../../src/utils/errors.js';

describe('parseVerbName', () => {
  it('should accept bare verbs', () => {
    expect(parseVerbName('invoice')).toEqual({ verb: 'invoice' });
  });

  it('should split domain.verb', () => {
    expect(parseVerbName('billing.invoice')).toEqual({ domain: 'billing', verb: 'invoice' });
  });

  it.each(['.foo', 'foo.', 'a.b.c', '.'])('should reject %s', (name) => {
    expect(() => parseVerbName(name)).toThrow(`Invalid domain.verb name: ${name}`);
  });

  it('should reject path separators', () => {
    expect(() => parseVerbName('billing/invoice')).toThrow(NamingError);
    expect(() => parseVerbName('billing.in\\voice')).toThrow("Invalid verb name: 'in\\voice'");
  });

  it('should reject empty names', () => {
    expect(() => parseVerbName('')).toThrow("Invalid verb name: ''");
  });
});

describe('assertSegment', () => {
  it.each(['..', ' padded', 'a/b', ''])('should reject %j', (name) => {
    expect(() => assertSegment(name, 'domain')).toThrow(NamingError);
  });

  it('should accept ordinary names', () => {
    expect(() => assertSegment('user_accounts', 'domain')).not.toThrow();
  });
});

describe('assertClassName', () => {
  it('should accept identifiers', () => {
    expect(() => assertClassName('UserAccount')).not.toThrow();
  });

  it('should reject non-identifiers', () => {
    expect(() => assertClassName('user-account')).toThrow("Invalid class name: 'user-account'");
    expect(() => assertClassName('9Lives')).toThrow(NamingError);
  });
});

describe('derived names', () => {
  it('should build verb type names', () => {
    expect(verbTypeName('invoice')).toBe('InvoiceVerb');
    expect(verbTypeName('send_invoice')).toBe('SendInvoiceVerb');
  });

  it('should build class artifact names', () => {
    expect(classArtifactNames('UserAccount', '.ts')).toEqual({
      snake: 'user_account',
      directory: 'user_account',
      module: 'user_account_class.ts',
      registry: 'user_account_registry.yml',
    });
  });
});
