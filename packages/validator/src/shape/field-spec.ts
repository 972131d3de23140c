import { StructuralError } from '@rulechain/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

/**
 * Value kinds a field can declare. `file` and `record` are the two reference
 * kinds: a file handle, or a nested record with its own shape.
 */
export const FIELD_KINDS = ['text', 'int', 'uint', 'float', 'bool', 'list', 'file', 'record'] as const;
export type FieldKind = (typeof FIELD_KINDS)[number];

export type ScalarKind = 'text' | 'int' | 'uint' | 'float' | 'bool' | 'file';

interface Annotated {
  /** Wire label used as the report key. Fields without one are skipped. */
  label?: string | undefined;
  /** Rule chain, e.g. `required|string|max:64`. Fields without one are skipped. */
  rules?: string | undefined;
}

export interface ScalarFieldSpec extends Annotated {
  kind: ScalarKind;
}

export interface ListFieldSpec extends Annotated {
  kind: 'list';
  of: ElementSpec;
}

export interface RecordFieldSpec extends Annotated {
  kind: 'record';
  shape: RecordShape;
}

export type FieldSpec = ScalarFieldSpec | ListFieldSpec | RecordFieldSpec;

export type ElementSpec = { kind: ScalarKind } | { kind: 'record'; shape: RecordShape };

/**
 * Declared shape of a record: property name to field spec, in declaration order.
 */
export interface RecordShape {
  readonly [property: string]: FieldSpec;
}

/**
 * Builders for field specs.
 *
 * @example
 * const signup = {
 *   email: field.text('email', 'required|email'),
 *   age: field.uint('age', 'min:18'),
 *   tags: field.list('tags', 'slice:max:5', { kind: 'text' }),
 * } satisfies RecordShape;
 */
export const field = {
  text: (label: string, rules: string): ScalarFieldSpec => ({ kind: 'text', label, rules }),
  int: (label: string, rules: string): ScalarFieldSpec => ({ kind: 'int', label, rules }),
  uint: (label: string, rules: string): ScalarFieldSpec => ({ kind: 'uint', label, rules }),
  float: (label: string, rules: string): ScalarFieldSpec => ({ kind: 'float', label, rules }),
  bool: (label: string, rules: string): ScalarFieldSpec => ({ kind: 'bool', label, rules }),
  file: (label: string, rules: string): ScalarFieldSpec => ({ kind: 'file', label, rules }),
  list: (label: string, rules: string, of: ElementSpec): ListFieldSpec => ({ kind: 'list', label, rules, of }),
  record: (label: string, rules: string, shape: RecordShape): RecordFieldSpec => ({
    kind: 'record',
    label,
    rules,
    shape,
  }),
};

// Nested shapes are checked when the engine descends into them, so a
// self-referencing shape never sends the schema into a loop.
const nestedShapeSchema = z.record(z.string(), z.unknown());

const elementSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.enum(['text', 'int', 'uint', 'float', 'bool', 'file']) }),
  z.object({ kind: z.literal('record'), shape: nestedShapeSchema }),
]);

const annotations = {
  label: z.string().min(1).optional(),
  rules: z.string().optional(),
};

export const fieldSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.enum(['text', 'int', 'uint', 'float', 'bool', 'file']), ...annotations }),
  z.object({ kind: z.literal('list'), of: elementSpecSchema, ...annotations }),
  z.object({ kind: z.literal('record'), shape: nestedShapeSchema, ...annotations }),
]);

/**
 * Check one level of a shape. Callers typed against `RecordShape` always
 * pass; this guards shapes built at run time from untyped sources.
 */
export function checkShape(shape: unknown): Result<void, StructuralError> {
  const outer = nestedShapeSchema.safeParse(shape);
  if (!outer.success) {
    return err(new StructuralError('validate: a record shape object is expected'));
  }

  for (const [property, spec] of Object.entries(outer.data)) {
    const parsed = fieldSpecSchema.safeParse(spec);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${[property, ...issue.path].join('.')}: ${issue.message}`);
      return err(
        new StructuralError(`validate: malformed field spec "${property}"`, {
          additionalContext: { issues },
        })
      );
    }
  }

  return ok(undefined);
}

/**
 * Fields the engine evaluates: those carrying both a wire label and a rule chain.
 */
export function eligibleFields(shape: RecordShape): { property: string; label: string; rules: string; spec: FieldSpec }[] {
  const fields: { property: string; label: string; rules: string; spec: FieldSpec }[] = [];
  for (const [property, spec] of Object.entries(shape)) {
    if (spec.label === undefined || spec.label === '' || spec.rules === undefined) continue;
    fields.push({ property, label: spec.label, rules: spec.rules, spec });
  }
  return fields;
}
