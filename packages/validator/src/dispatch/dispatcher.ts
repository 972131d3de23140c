import { Decimal } from '@rulechain/core';

import type { RuleSpec } from '../rules/rule-parser.js';
import { formatFieldName } from '../messages/format-field-name.js';
import {
  IMAGE_EXTENSIONS,
  byteLength,
  isDateLayout,
  isEmpty,
  isNotAllowedExtension,
  isNotAlpha,
  isNotAlphaNumeric,
  isNotAscii,
  isNotBetween,
  isNotDatetime,
  isNotEmail,
  isNotEnum,
  isNotEqual,
  isNotFloat,
  isNotFrom,
  isNotGhCard,
  isNotGhGps,
  isNotInt,
  isNotMax,
  isNotMin,
  isNotNumeric,
  isNotPhone,
  isNotPhoneWithCode,
  isNotReadable,
  isNotSame,
  isNotString,
  isNotUint,
  isNotUsername,
  isOverSizeLimit,
  parseBound,
  parseExtensions,
  parseRange,
  parseSizeLimit,
} from '../predicates/index.js';
import { stringForm, toFieldValue, type FieldValue, type FieldValueOf, type UploadedFile } from '../shape/field-value.js';
import { UniquenessCheckError, MissingCollaboratorError } from '../errors.js';

import type { DispatchContext, FieldScope } from './dispatch-context.js';
import {
  ruleViolation,
  type ElementViolation,
  type ElementsViolation,
  type NestedViolation,
  type RuleViolation,
  type Violation,
} from './violation.js';

type Handler<K extends FieldValue['kind'], V extends Violation> = (
  value: FieldValueOf<K>,
  rule: RuleSpec,
  ctx: DispatchContext,
  scope: FieldScope
) => Promise<V | undefined>;

interface KindHandlers {
  text: Handler<'text', RuleViolation>;
  int: Handler<'int', RuleViolation>;
  uint: Handler<'uint', RuleViolation>;
  float: Handler<'float', RuleViolation>;
  bool: Handler<'bool', RuleViolation>;
  file: Handler<'file', RuleViolation>;
  list: Handler<'list', RuleViolation | ElementsViolation>;
  record: Handler<'record', NestedViolation>;
}

const COMPARATIVE_RULES: ReadonlySet<string> = new Set(['min', 'max', 'equal', 'size', 'from', 'between']);

/**
 * min / max / equal / size / from / between against a measure: text byte
 * length, integer or float value.
 */
function checkComparative(
  measure: Decimal,
  rule: RuleSpec,
  category: 'string' | 'numeric',
  integral: boolean
): RuleViolation | undefined {
  switch (rule.name) {
    case 'min':
    case 'max':
    case 'equal':
    case 'size': {
      const raw = rule.params[0];
      const bound = parseBound(rule.name, raw, integral);
      const violates =
        rule.name === 'min'
          ? isNotMin(measure, bound)
          : rule.name === 'max'
            ? isNotMax(measure, bound)
            : isNotEqual(measure, bound);
      return violates ? ruleViolation(`${rule.name}.${category}`, raw ?? '') : undefined;
    }
    case 'from':
    case 'between': {
      const [min, max] = parseRange(rule.name, rule.params, integral);
      const violates = rule.name === 'from' ? isNotFrom(measure, min, max) : isNotBetween(measure, min, max);
      return violates ? ruleViolation(`${rule.name}.${category}`, rule.params[0] ?? '', rule.params[1] ?? '') : undefined;
    }
    default:
      return undefined;
  }
}

/**
 * enum / same / match, shared by text and numeric kinds.
 */
function checkMembership(text: string, rule: RuleSpec, ctx: DispatchContext): RuleViolation | undefined {
  switch (rule.name) {
    case 'enum':
      return isNotEnum(text, rule.params) ? ruleViolation('enum', rule.args ?? '') : undefined;
    case 'same': {
      const other = rule.args ?? '';
      return isNotSame(text, stringForm(ctx.siblingValue(other)))
        ? ruleViolation('same', formatFieldName(other))
        : undefined;
    }
    case 'match':
      return isNotSame(text, stringForm(ctx.siblingValue(rule.args ?? ''))) ? ruleViolation('match') : undefined;
    default:
      return undefined;
  }
}

async function checkUnique(value: string, rule: RuleSpec, ctx: DispatchContext): Promise<RuleViolation | undefined> {
  const [table, column] = rule.params;
  if (table === undefined || column === undefined) {
    return undefined;
  }
  const checker = ctx.uniqueness;
  if (!checker) {
    throw new MissingCollaboratorError('uniqueness checker', rule.raw);
  }

  const result = await ctx.limit(() => checker.exists({ table, column }, value));
  if (result.isErr()) {
    ctx.logger.error({ column, error: result.error, table }, 'Uniqueness check failed');
    throw new UniquenessCheckError(table, column, result.error);
  }
  return result.value ? ruleViolation('unique') : undefined;
}

function checkTextShape(value: string, name: string): RuleViolation | undefined {
  const test = (violates: boolean, key = name) => (violates ? ruleViolation(key) : undefined);

  switch (name) {
    case 'string':
      return test(isNotString(value));
    case 'ascii':
      return test(isNotAscii(value));
    case 'alpha':
      return test(isNotAlpha(value));
    case 'numeric':
      return test(isNotNumeric(value));
    case 'alpha_numeric':
      return test(isNotAlphaNumeric(value));
    case 'email':
      return test(isNotEmail(value));
    case 'phone':
      return test(isNotPhone(value));
    case 'phone_with_code':
      return test(isNotPhoneWithCode(value));
    case 'username':
      return test(isNotUsername(value));
    case 'gh_card':
      return test(isNotGhCard(value));
    case 'gh_gps':
      return test(isNotGhGps(value));
    default:
      return isDateLayout(name) ? test(isNotDatetime(value, name), `date.${name}`) : undefined;
  }
}

const checkText: KindHandlers['text'] = async ({ value }, rule, ctx) => {
  if (rule.args === undefined) {
    return checkTextShape(value, rule.name);
  }
  if (rule.name === 'unique') {
    return checkUnique(value, rule, ctx);
  }
  if (COMPARATIVE_RULES.has(rule.name)) {
    return checkComparative(new Decimal(byteLength(value)), rule, 'string', true);
  }
  return checkMembership(value, rule, ctx);
};

function checkNumericParams(
  value: number | bigint,
  rule: RuleSpec,
  ctx: DispatchContext,
  integral: boolean
): RuleViolation | undefined {
  if (COMPARATIVE_RULES.has(rule.name)) {
    const measure = new Decimal(typeof value === 'bigint' ? value.toString() : value);
    return checkComparative(measure, rule, 'numeric', integral);
  }
  return checkMembership(value.toString(), rule, ctx);
}

const checkInteger = async (
  { value }: FieldValueOf<'int'> | FieldValueOf<'uint'>,
  rule: RuleSpec,
  ctx: DispatchContext
): Promise<RuleViolation | undefined> => {
  if (rule.args === undefined) {
    if (rule.name === 'int') return isNotInt(value) ? ruleViolation('int') : undefined;
    if (rule.name === 'uint') return isNotUint(value) ? ruleViolation('uint') : undefined;
    return undefined;
  }
  return checkNumericParams(value, rule, ctx, true);
};

const checkFloat: KindHandlers['float'] = async ({ value }, rule, ctx) => {
  if (rule.args === undefined) {
    return rule.name === 'float' && isNotFloat(value) ? ruleViolation('float') : undefined;
  }
  return checkNumericParams(value, rule, ctx, false);
};

async function hasDisallowedType(file: UploadedFile, allowed: readonly string[], ctx: DispatchContext): Promise<boolean> {
  let bytes: Uint8Array;
  try {
    bytes = await ctx.limit(() => file.read());
  } catch (error) {
    // unreadable content cannot be of an allowed type
    ctx.logger.debug({ error, file: file.name }, 'File could not be read for type detection');
    return true;
  }
  return isNotAllowedExtension(await ctx.sniffer.detectExtension(bytes), allowed);
}

const checkFile: KindHandlers['file'] = async ({ value: file }, rule, ctx) => {
  if (file === undefined) return undefined;

  if (rule.args === undefined) {
    switch (rule.name) {
      case 'image':
        return (await hasDisallowedType(file, IMAGE_EXTENSIONS, ctx)) ? ruleViolation('image') : undefined;
      case 'file':
        return (await ctx.limit(() => isNotReadable(file))) ? ruleViolation('file') : undefined;
      default:
        return undefined;
    }
  }

  switch (rule.name) {
    case 'image':
    case 'file':
    case 'mimes': {
      const key = rule.name === 'mimes' ? 'mimes' : `${rule.name}_type`;
      const disallowed = await hasDisallowedType(file, parseExtensions(rule.params), ctx);
      return disallowed ? ruleViolation(key, rule.args) : undefined;
    }
    case 'size': {
      const limit = parseSizeLimit(rule.args);
      if (!limit) return undefined;
      if (limit.bytes === undefined) {
        ctx.logger.warn({ rule: rule.raw }, 'File size rule in terabytes sets no limit and never rejects');
        return undefined;
      }
      return isOverSizeLimit(file.size, limit) ? ruleViolation(`size.file_${limit.unit}`, limit.amount) : undefined;
    }
    default:
      return undefined;
  }
};

const checkBool: KindHandlers['bool'] = () => Promise.resolve(undefined);

const checkRecord: KindHandlers['record'] = async ({ shape, value }, _rule, ctx, scope) => {
  if (value === undefined) return undefined;
  scope.nested ??= ctx.validateNested(shape, value);
  const report = await scope.nested;
  return Object.keys(report).length > 0 ? { type: 'nested', report } : undefined;
};

/**
 * Run one rule against every non-empty element of a list of scalars or files.
 */
async function checkScalarElements(
  list: FieldValueOf<'list'>,
  rule: RuleSpec,
  ctx: DispatchContext
): Promise<ElementViolation[]> {
  const results = await Promise.all(
    list.items.map(async (item, index): Promise<ElementViolation | undefined> => {
      const element = toFieldValue(list.of, item);
      if (isEmpty(element)) return undefined;
      const violation = await dispatchScalar(element, rule, ctx);
      return violation ? { index, violation } : undefined;
    })
  );
  return results.filter((entry): entry is ElementViolation => entry !== undefined);
}

/**
 * Validate every record element; only elements with a non-empty report count.
 */
async function checkRecordElements(list: FieldValueOf<'list'>, ctx: DispatchContext): Promise<ElementViolation[]> {
  const results = await Promise.all(
    list.items.map(async (item, index): Promise<ElementViolation | undefined> => {
      const element = toFieldValue(list.of, item);
      if (element.kind !== 'record' || element.value === undefined) return undefined;
      const report = await ctx.validateNested(element.shape, element.value);
      return Object.keys(report).length > 0 ? { index, violation: { type: 'nested', report } } : undefined;
    })
  );
  return results.filter((entry): entry is ElementViolation => entry !== undefined);
}

const checkList: KindHandlers['list'] = async (list, rule, ctx, scope) => {
  if (rule.name === 'slice') {
    const [direction, amount] = rule.params;
    if (direction === 'min' || direction === 'max') {
      const measure = new Decimal(list.items.length);
      const bound = parseBound(`slice:${direction}`, amount, true);
      const violates = direction === 'min' ? isNotMin(measure, bound) : isNotMax(measure, bound);
      if (violates) return ruleViolation(`${direction}.slice`, amount ?? '');
    }
  }

  let entries: ElementViolation[];
  if (list.of.kind === 'record') {
    scope.elements ??= checkRecordElements(list, ctx);
    entries = await scope.elements;
  } else if (rule.name === 'slice') {
    entries = [];
  } else {
    entries = await checkScalarElements(list, rule, ctx);
  }

  return entries.length > 0 ? { type: 'elements', entries } : undefined;
};

/**
 * Kind-indexed dispatch table.
 */
const handlers: KindHandlers = {
  text: checkText,
  int: checkInteger,
  uint: checkInteger,
  float: checkFloat,
  bool: checkBool,
  file: checkFile,
  list: checkList,
  record: checkRecord,
};

function dispatchScalar(value: FieldValue, rule: RuleSpec, ctx: DispatchContext): Promise<RuleViolation | undefined> {
  switch (value.kind) {
    case 'text':
      return handlers.text(value, rule, ctx, {});
    case 'int':
      return handlers.int(value, rule, ctx, {});
    case 'uint':
      return handlers.uint(value, rule, ctx, {});
    case 'float':
      return handlers.float(value, rule, ctx, {});
    case 'bool':
      return handlers.bool(value, rule, ctx, {});
    case 'file':
      return handlers.file(value, rule, ctx, {});
    case 'list':
    case 'record':
      return Promise.resolve(undefined);
  }
}

/**
 * Route one rule to the handler for the value's kind. Rule names a kind
 * does not know are no-ops.
 */
export function dispatchRule(
  value: FieldValue,
  rule: RuleSpec,
  ctx: DispatchContext,
  scope: FieldScope
): Promise<Violation | undefined> {
  switch (value.kind) {
    case 'list':
      return handlers.list(value, rule, ctx, scope);
    case 'record':
      return handlers.record(value, rule, ctx, scope);
    default:
      return dispatchScalar(value, rule, ctx);
  }
}
