import type { FieldValue } from '../shape/field-value.js';

/**
 * Zero-value test per kind: empty text or list, `false`, numeric zero,
 * or an absent file/record reference.
 */
export function isEmpty(value: FieldValue): boolean {
  switch (value.kind) {
    case 'text':
      return value.value.length === 0;
    case 'list':
      return value.items.length === 0;
    case 'bool':
      return !value.value;
    case 'int':
    case 'uint':
      return typeof value.value === 'bigint' ? value.value === 0n : value.value === 0;
    case 'float':
      return value.value === 0;
    case 'file':
    case 'record':
      return value.value === undefined;
  }
}
