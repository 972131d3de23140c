import type { DispatchContext, FieldScope } from '../dispatch/dispatch-context.js';
import { dispatchRule } from '../dispatch/dispatcher.js';
import type { ElementViolation, Violation } from '../dispatch/violation.js';
import { formatFieldName } from '../messages/format-field-name.js';
import type { MessageSynthesizer } from '../messages/message-synthesizer.js';
import { isEmpty } from '../predicates/presence.js';
import { REQUIRED_RULE, parseRuleChain, type RuleSpec } from '../rules/rule-parser.js';
import type { FieldSpec } from '../shape/field-spec.js';
import { toFieldValue } from '../shape/field-value.js';

import type { FieldOutcome, Report } from './report.js';

export interface EligibleField {
  property: string;
  label: string;
  rules: string;
  spec: FieldSpec;
}

export interface EvaluationContext extends DispatchContext {
  readonly locale: string;
  readonly messages: MessageSynthesizer;
}

const PASSED: FieldOutcome = { status: 'passed' };

function renderElement(
  entry: ElementViolation,
  rule: RuleSpec,
  label: string,
  ctx: EvaluationContext
): string | Report {
  if (entry.violation.type === 'nested') {
    return entry.violation.report;
  }
  return ctx.messages.render(entry.violation.key, {
    label: `${label} (${entry.index + 1})`,
    locale: ctx.locale,
    override: rule.message,
    params: entry.violation.params,
  });
}

function toOutcome(violation: Violation, rule: RuleSpec, label: string, ctx: EvaluationContext): FieldOutcome {
  switch (violation.type) {
    case 'rule':
      return {
        status: 'violated',
        key: violation.key,
        message: ctx.messages.render(violation.key, {
          label,
          locale: ctx.locale,
          override: rule.message,
          params: violation.params,
        }),
      };
    case 'nested':
      return { status: 'violated', key: 'record', message: violation.report };
    case 'elements':
      return {
        status: 'violated',
        key: 'list',
        message: violation.entries.map((entry) => renderElement(entry, rule, label, ctx)),
      };
  }
}

/**
 * Drive one field's rule chain.
 *
 * Rules run left to right and the first violation ends the chain. While the
 * value is empty only `required` can fire; every other rule is skipped.
 */
export async function evaluateField(field: EligibleField, raw: unknown, ctx: EvaluationContext): Promise<FieldOutcome> {
  const value = toFieldValue(field.spec, raw);
  const rules = parseRuleChain(field.rules);
  const label = formatFieldName(field.label);
  const empty = isEmpty(value);
  const scope: FieldScope = {};

  for (const rule of rules) {
    if (rule.name === REQUIRED_RULE && empty) {
      // booleans are "accepted" rather than "present"
      const key = value.kind === 'bool' ? 'bool' : 'required';
      return {
        status: 'violated',
        key,
        message: ctx.messages.render(key, { label, locale: ctx.locale, override: rule.message }),
      };
    }

    if (empty) continue;

    const violation = await dispatchRule(value, rule, ctx, scope);
    if (violation) {
      return toOutcome(violation, rule, label, ctx);
    }
  }

  return PASSED;
}
