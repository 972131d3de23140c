import { describe, expect, it } from 'vitest';

import { DomainError, ExternalDependencyError, InternalFaultError, RuleParameterError, StructuralError } from '../index.js';

describe('DomainError hierarchy', () => {
  it('should carry code, severity and context', () => {
    const error = new StructuralError('bad shape', { additionalContext: { field: 'email' } });

    expect(error).toBeInstanceOf(DomainError);
    expect(error.code).toBe('STRUCTURAL_ERROR');
    expect(error.name).toBe('StructuralError');
    expect(error.context).toEqual({ field: 'email' });
  });

  it('should keep the cause of external failures', () => {
    const cause = new Error('connection refused');
    const error = new ExternalDependencyError('database', 'lookup failed', { cause });

    expect(error.dependency).toBe('database');
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('EXTERNAL_DEPENDENCY_FAILURE');
  });

  it('should name the rule in parameter errors', () => {
    const error = new RuleParameterError('max', 'invalid bound "x"');

    expect(error).toBeInstanceOf(InternalFaultError);
    expect(error.message).toBe('rule "max": invalid bound "x"');
    expect(error.code).toBe('RULE_PARAMETER_ERROR');
  });

  it('should serialize to JSON', () => {
    const json = new StructuralError('bad shape').toJSON();

    expect(json.code).toBe('STRUCTURAL_ERROR');
    expect(json.message).toBe('bad shape');
    expect(json.severity).toBe('error');
    expect(typeof json.timestamp).toBe('string');
  });
});
