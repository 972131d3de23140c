import { InternalFaultError, isObject, isPlainRecord } from '@rulechain/core';

import type { ElementSpec, FieldSpec, RecordShape } from './field-spec.js';

/**
 * File handle produced by the payload decoder. `read` rejects when the
 * underlying content cannot be opened.
 */
export interface UploadedFile {
  readonly name: string;
  readonly size: number;
  read(): Promise<Uint8Array>;
}

export function isUploadedFile(value: unknown): value is UploadedFile {
  return (
    isObject(value) &&
    typeof value['name'] === 'string' &&
    typeof value['size'] === 'number' &&
    typeof value['read'] === 'function'
  );
}

/**
 * In-memory file, for callers that already hold the bytes.
 */
export function bufferFile(name: string, bytes: Uint8Array): UploadedFile {
  return {
    name,
    size: bytes.byteLength,
    read: () => Promise.resolve(bytes),
  };
}

export type IntegerValue = number | bigint;

/**
 * Runtime value of one field, tagged with its declared kind.
 */
export type FieldValue =
  | { kind: 'text'; value: string }
  | { kind: 'int'; value: IntegerValue }
  | { kind: 'uint'; value: IntegerValue }
  | { kind: 'float'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'list'; of: ElementSpec; items: readonly unknown[] }
  | { kind: 'file'; value: UploadedFile | undefined }
  | { kind: 'record'; shape: RecordShape; value: Record<string, unknown> | undefined };

export type FieldValueOf<K extends FieldValue['kind']> = Extract<FieldValue, { kind: K }>;

export class FieldKindMismatchError extends InternalFaultError {
  override readonly code = 'FIELD_KIND_MISMATCH';

  constructor(expected: string, actual: unknown) {
    super(`expected ${expected} value, got ${describe(actual)}`);
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'number' && !Number.isInteger(value)) return `number ${value}`;
  if ((typeof value === 'number' || typeof value === 'bigint') && value < 0) return `negative number ${value}`;
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function isInteger(value: unknown): value is IntegerValue {
  return typeof value === 'bigint' || Number.isInteger(value);
}

function isUnsignedInteger(value: unknown): value is IntegerValue {
  return isInteger(value) && value >= 0;
}

/**
 * Tag a raw property value with the kind its spec declares. `null` and
 * `undefined` become the kind's zero value.
 */
export function toFieldValue(spec: FieldSpec | ElementSpec, raw: unknown): FieldValue {
  const absent = raw === null || raw === undefined;

  switch (spec.kind) {
    case 'text':
      if (absent) return { kind: 'text', value: '' };
      if (typeof raw === 'string') return { kind: 'text', value: raw };
      throw new FieldKindMismatchError('text', raw);
    case 'int':
      if (absent) return { kind: 'int', value: 0 };
      if (isInteger(raw)) return { kind: 'int', value: raw };
      throw new FieldKindMismatchError('integer', raw);
    case 'uint':
      if (absent) return { kind: 'uint', value: 0 };
      if (isUnsignedInteger(raw)) return { kind: 'uint', value: raw };
      throw new FieldKindMismatchError('unsigned integer', raw);
    case 'float':
      if (absent) return { kind: 'float', value: 0 };
      if (typeof raw === 'number') return { kind: 'float', value: raw };
      throw new FieldKindMismatchError('float', raw);
    case 'bool':
      if (absent) return { kind: 'bool', value: false };
      if (typeof raw === 'boolean') return { kind: 'bool', value: raw };
      throw new FieldKindMismatchError('boolean', raw);
    case 'list':
      if (absent) return { kind: 'list', of: spec.of, items: [] };
      if (Array.isArray(raw)) return { kind: 'list', of: spec.of, items: raw };
      throw new FieldKindMismatchError('list', raw);
    case 'file':
      if (absent) return { kind: 'file', value: undefined };
      if (isUploadedFile(raw)) return { kind: 'file', value: raw };
      throw new FieldKindMismatchError('file', raw);
    case 'record':
      if (absent) return { kind: 'record', shape: spec.shape, value: undefined };
      if (isPlainRecord(raw)) return { kind: 'record', shape: spec.shape, value: raw };
      throw new FieldKindMismatchError('record', raw);
  }
}

/**
 * String form used by cross-field comparisons.
 */
export function stringForm(raw: unknown): string {
  if (typeof raw === 'string') return raw;
  if (typeof raw === 'number' || typeof raw === 'bigint' || typeof raw === 'boolean') return String(raw);
  return '';
}
