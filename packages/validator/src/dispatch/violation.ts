import type { Report } from '../evaluation/report.js';

export interface RuleViolation {
  type: 'rule';
  /** Message key: the rule name, or `category.subtype` for kind-specific messages */
  key: string;
  params: readonly string[];
}

export interface NestedViolation {
  type: 'nested';
  report: Report;
}

export interface ElementViolation {
  /** Zero-based position in the list */
  index: number;
  violation: RuleViolation | NestedViolation;
}

export interface ElementsViolation {
  type: 'elements';
  entries: readonly ElementViolation[];
}

export type Violation = RuleViolation | NestedViolation | ElementsViolation;

export function ruleViolation(key: string, ...params: string[]): RuleViolation {
  return { type: 'rule', key, params };
}
