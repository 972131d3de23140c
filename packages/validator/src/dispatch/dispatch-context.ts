import type { Logger } from '@rulechain/logger';

import type { ContentSniffer, UniquenessChecker } from '../collaborators.js';
import type { Report } from '../evaluation/report.js';
import type { RecordShape } from '../shape/field-spec.js';

import type { ElementViolation } from './violation.js';

/**
 * What rule handlers may reach beyond the value under test. One context per
 * record level; it is read-only for the handlers.
 */
export interface DispatchContext {
  /** Raw value of the sibling field with this wire label, undefined when there is none */
  siblingValue(label: string): unknown;
  readonly uniqueness: UniquenessChecker | undefined;
  readonly sniffer: ContentSniffer;
  /** Run external I/O under the call's concurrency limit */
  limit<T>(task: () => Promise<T>): Promise<T>;
  /** Validate a nested record one level deeper */
  validateNested(shape: RecordShape, value: Record<string, unknown>): Promise<Report>;
  readonly logger: Logger;
}

/**
 * Per-field scratch state. Nested reports are computed once per field even
 * though every rule in the chain reaches them.
 */
export interface FieldScope {
  nested?: Promise<Report> | undefined;
  elements?: Promise<ElementViolation[]> | undefined;
}
