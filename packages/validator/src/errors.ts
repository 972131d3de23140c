import { ExternalDependencyError, InternalFaultError } from '@rulechain/core';

export class UniquenessCheckError extends ExternalDependencyError {
  constructor(table: string, column: string, cause: Error) {
    super('uniqueness-checker', `uniqueness check on ${table}.${column} failed: ${cause.message}`, {
      additionalContext: { column, table },
      cause,
    });
  }
}

export class MissingCollaboratorError extends InternalFaultError {
  override readonly code = 'MISSING_COLLABORATOR';

  constructor(collaborator: string, rule: string) {
    super(`rule "${rule}" needs a ${collaborator}, but none is configured`);
  }
}

export class NestingDepthError extends InternalFaultError {
  override readonly code = 'NESTING_DEPTH_EXCEEDED';

  constructor(maxDepth: number) {
    super(`nested records exceed the maximum depth of ${maxDepth}`);
  }
}
