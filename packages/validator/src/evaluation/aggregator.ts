import { ExternalDependencyError, getErrorMessage } from '@rulechain/core';
import type { Logger } from '@rulechain/logger';
import { err, ok, type Result } from 'neverthrow';

import type { ContentSniffer, UniquenessChecker } from '../collaborators.js';
import { NestingDepthError } from '../errors.js';
import type { MessageSynthesizer } from '../messages/message-synthesizer.js';
import { checkShape, eligibleFields, type RecordShape } from '../shape/field-spec.js';

import { evaluateField, type EligibleField, type EvaluationContext } from './field-evaluator.js';
import type { ConcurrencyLimiter } from './limiter.js';
import type { FieldOutcome, Report } from './report.js';

/**
 * Settings and collaborators shared by every level of one validation call.
 */
export interface CallContext {
  locale: string;
  maxDepth: number;
  messages: MessageSynthesizer;
  uniqueness: UniquenessChecker | undefined;
  sniffer: ContentSniffer;
  limiter: ConcurrencyLimiter;
  logger: Logger;
}

export const FAULT_KEY = 'fault';

function labelIndex(shape: RecordShape): Map<string, string> {
  const index = new Map<string, string>();
  for (const [property, spec] of Object.entries(shape)) {
    if (spec.label !== undefined && !index.has(spec.label)) {
      index.set(spec.label, property);
    }
  }
  return index;
}

/**
 * One field's task. Internal faults become the field's message; only
 * external dependency failures leave the task, as an `err`.
 */
async function runFieldTask(
  field: EligibleField,
  input: Record<string, unknown>,
  ctx: EvaluationContext
): Promise<Result<FieldOutcome, ExternalDependencyError>> {
  try {
    return ok(await evaluateField(field, input[field.property], ctx));
  } catch (error) {
    if (error instanceof ExternalDependencyError) {
      return err(error);
    }
    ctx.logger.warn({ error, field: field.label }, 'Field evaluation fault');
    return ok({ status: 'violated', key: FAULT_KEY, message: `validation fault: ${getErrorMessage(error)}` });
  }
}

/**
 * Evaluate every eligible field of one record concurrently and join the
 * outcomes into a report. Throws the first ExternalDependencyError once all
 * field tasks have settled.
 */
export async function collectReport(
  shape: RecordShape,
  input: Record<string, unknown>,
  call: CallContext,
  depth: number
): Promise<Report> {
  const labels = labelIndex(shape);

  const ctx: EvaluationContext = {
    locale: call.locale,
    messages: call.messages,
    uniqueness: call.uniqueness,
    sniffer: call.sniffer,
    logger: call.logger,
    limit: (task) => call.limiter.run(task),
    siblingValue: (label) => {
      const property = labels.get(label);
      return property === undefined ? undefined : input[property];
    },
    validateNested: async (nestedShape, value) => {
      if (depth + 1 > call.maxDepth) {
        throw new NestingDepthError(call.maxDepth);
      }
      const checked = checkShape(nestedShape);
      if (checked.isErr()) {
        throw checked.error;
      }
      return collectReport(nestedShape, value, call, depth + 1);
    },
  };

  const fields = eligibleFields(shape);
  const results = await Promise.all(fields.map((field) => runFieldTask(field, input, ctx)));

  const report: Report = {};
  for (const [index, result] of results.entries()) {
    if (result.isErr()) {
      throw result.error;
    }
    const field = fields[index];
    if (field && result.value.status === 'violated') {
      report[field.label] = result.value.message;
    }
  }
  return report;
}
