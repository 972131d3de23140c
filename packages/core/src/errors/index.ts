/**
 * Error hierarchy shared by the rulechain packages.
 *
 * Every error carries a stable code and severity so callers can branch on
 * failures without parsing messages.
 */

export interface DomainErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  cause?: unknown;
}

/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: DomainErrorContext) {
    super(message, context?.cause === undefined ? undefined : { cause: context.cause });
    this.timestamp = new Date().toISOString();
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Caller handed the engine something that is not a record, or a malformed shape.
 */
export class StructuralError extends DomainError {
  readonly code = 'STRUCTURAL_ERROR';
  readonly severity = 'error' as const;
}

/**
 * A collaborator outside the process (database, file store) failed.
 */
export class ExternalDependencyError extends DomainError {
  readonly code = 'EXTERNAL_DEPENDENCY_FAILURE';
  readonly severity = 'error' as const;

  constructor(
    public readonly dependency: string,
    message: string,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * Unexpected failure while evaluating a single field. Never escapes the field.
 */
export class InternalFaultError extends DomainError {
  readonly code: string = 'INTERNAL_FAULT';
  readonly severity = 'error' as const;
}

export class RuleParameterError extends InternalFaultError {
  override readonly code = 'RULE_PARAMETER_ERROR';

  constructor(
    public readonly rule: string,
    message: string
  ) {
    super(`rule "${rule}": ${message}`, { additionalContext: { rule } });
  }
}
