import { StructuralError } from '@rulechain/core';
import { err, ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import type { ContentSniffer, UniquenessChecker } from '../collaborators.js';
import { UniquenessCheckError } from '../errors.js';
import { field, type FieldSpec, type RecordShape } from '../shape/field-spec.js';
import { bufferFile } from '../shape/field-value.js';
import { createValidator, type ValidatorOptions } from '../validator.js';

const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const fakeSniffer: ContentSniffer = {
  detectExtension: (bytes) => Promise.resolve(bytes[0] === 0x89 ? 'png' : undefined),
};

function validatorFor(options: ValidatorOptions = {}) {
  return createValidator({ sniffer: fakeSniffer, ...options })._unsafeUnwrap();
}

async function reportFor(shape: RecordShape, input: Record<string, unknown>, options?: ValidatorOptions) {
  const result = await validatorFor(options).validate(shape, input);
  return result._unsafeUnwrap();
}

describe('Validator', () => {
  describe('valid records', () => {
    it('returns an empty report when every rule holds', async () => {
      const shape = {
        email: field.text('email', 'required|email'),
        userName: field.text('userName', 'required|alpha_numeric|from:3,16'),
        age: field.uint('age', 'required|min:18'),
        role: field.text('role', 'enum:admin,user'),
        terms: field.bool('terms', 'required'),
      } satisfies RecordShape;

      const report = await reportFor(shape, {
        email: 'kofi@mail.test',
        userName: 'kofi99',
        age: 30,
        role: 'user',
        terms: true,
      });

      expect(report).toEqual({});
    });

    it('skips fields without a label or rule chain', async () => {
      const shape: RecordShape = {
        internal: { kind: 'text', rules: 'required' },
        note: { kind: 'text', label: 'note' },
      };

      expect(await reportFor(shape, {})).toEqual({});
    });
  });

  describe('required', () => {
    it('reports only the required violation wherever required sits in the chain', async () => {
      const shape = {
        name: field.text('name', 'string|from:1,5|required'),
        nickname: field.text('nickname', 'alpha'),
      } satisfies RecordShape;

      const report = await reportFor(shape, { nickname: 'Kojo' });

      expect(report).toEqual({ name: 'The name field is required.' });
    });

    it('reports required alone for an empty value under required|string|from:1,5', async () => {
      const shape = { name: field.text('name', 'required|string|from:1,5') } satisfies RecordShape;

      expect(await reportFor(shape, { name: '' })).toEqual({ name: 'The name field is required.' });
    });

    it('reports a false boolean as not accepted', async () => {
      const shape = { terms: field.bool('terms', 'required') } satisfies RecordShape;

      expect(await reportFor(shape, { terms: false })).toEqual({ terms: 'The terms field must be accepted.' });
    });

    it('uses the override message', async () => {
      const shape = { name: field.text('fullName', 'required>Tell us your name') } satisfies RecordShape;

      expect(await reportFor(shape, {})).toEqual({ fullName: 'Tell us your name' });
    });
  });

  describe('comparative rules', () => {
    const between = { score: field.int('score', 'between:1,5') } satisfies RecordShape;
    const from = { score: field.int('score', 'from:1,5') } satisfies RecordShape;

    it('between excludes its bounds', async () => {
      expect(await reportFor(between, { score: 1 })).toEqual({ score: 'The score field must be between 1 and 5.' });
      expect(await reportFor(between, { score: 5 })).toEqual({ score: 'The score field must be between 1 and 5.' });
      for (const score of [2, 3, 4]) {
        expect(await reportFor(between, { score })).toEqual({});
      }
    });

    it('from includes its bounds', async () => {
      expect(await reportFor(from, { score: 1 })).toEqual({});
      expect(await reportFor(from, { score: 5 })).toEqual({});
      expect(await reportFor(from, { score: 6 })).toEqual({ score: 'The score field must be from 1 to 5.' });
      expect(await reportFor(from, { score: -1 })).toEqual({ score: 'The score field must be from 1 to 5.' });
    });

    it('measures text in bytes', async () => {
      const shape = { code: field.text('code', 'max:4') } satisfies RecordShape;

      expect(await reportFor(shape, { code: 'abcd' })).toEqual({});
      expect(await reportFor(shape, { code: 'abcé' })).toEqual({
        code: 'The code field may not be longer than 4 characters.',
      });
    });

    it('compares integers beyond the safe range exactly', async () => {
      const shape = { id: field.int('id', 'max:9007199254740992') } satisfies RecordShape;

      expect(await reportFor(shape, { id: 9007199254740992n })).toEqual({});
      expect(await reportFor(shape, { id: 9007199254740993n })).toEqual({
        id: 'The id field may not be greater than 9007199254740992.',
      });
    });
  });

  describe('format rules', () => {
    const shape = { email: field.text('email', 'required|email') } satisfies RecordShape;

    it('rejects blacklisted email domains', async () => {
      for (const email of ['user@localhost', 'user@localhost.com', 'user@example.com', 'a@example.com']) {
        expect(await reportFor(shape, { email })).toEqual({ email: 'The email field must be a valid email address.' });
      }
    });

    it('rejects values outside an enum', async () => {
      const roles = { role: field.text('role', 'enum:admin,user') } satisfies RecordShape;

      expect(await reportFor(roles, { role: 'admins' })).toEqual({ role: 'The role field must be one of: admin,user.' });
      expect(await reportFor(roles, { role: 'admin' })).toEqual({});
    });

    it('names the other field in same violations', async () => {
      const passwords = {
        password: field.text('password', 'required'),
        confirm: field.text('confirmPassword', 'required|same:password'),
      } satisfies RecordShape;

      expect(await reportFor(passwords, { password: 's3cret', confirm: 'other' })).toEqual({
        confirmPassword: 'The confirm password field must match the password field.',
      });
      expect(await reportFor(passwords, { password: 's3cret', confirm: ' s3cret ' })).toEqual({});
    });

    it('reports date layouts under their own key', async () => {
      const dates = { born: field.text('born', 'dateonly') } satisfies RecordShape;

      expect(await reportFor(dates, { born: '2023-02-29' })).toEqual({
        born: 'The born field must be a date formatted as YYYY-MM-DD.',
      });
    });
  });

  describe('report stability', () => {
    it('does not depend on field declaration order', async () => {
      const email = field.text('email', 'required|email');
      const age = field.uint('age', 'min:18');
      const role = field.text('role', 'enum:admin,user');
      const input = { email: 'nope', age: 12, role: 'guest' };

      const forward = await reportFor({ email, age, role }, input);
      const reversed = await reportFor({ role, age, email }, input);

      expect(reversed).toEqual(forward);
      expect(Object.keys(forward)).toHaveLength(3);
    });
  });

  describe('files', () => {
    const twoMegabytes = 2 * 1024 * 1024;
    const sized = { avatar: field.file('avatar', 'size:2mb') } satisfies RecordShape;

    it('accepts a file of exactly the size limit', async () => {
      const avatar = bufferFile('a.png', new Uint8Array(twoMegabytes));

      expect(await reportFor(sized, { avatar })).toEqual({});
    });

    it('rejects a file one byte over the size limit', async () => {
      const avatar = bufferFile('a.png', new Uint8Array(twoMegabytes + 1));

      expect(await reportFor(sized, { avatar })).toEqual({
        avatar: 'The avatar field may not be larger than 2 megabytes.',
      });
    });

    it('never rejects on a terabyte limit', async () => {
      const shape = { avatar: field.file('avatar', 'size:1tb') } satisfies RecordShape;
      const avatar = { name: 'huge.bin', size: Number.MAX_SAFE_INTEGER, read: () => Promise.resolve(PNG_BYTES) };

      expect(await reportFor(shape, { avatar })).toEqual({});
    });

    it('checks image content', async () => {
      const shape = { avatar: field.file('avatar', 'image') } satisfies RecordShape;

      expect(await reportFor(shape, { avatar: bufferFile('a.png', PNG_BYTES) })).toEqual({});
      expect(await reportFor(shape, { avatar: bufferFile('a.png', new TextEncoder().encode('hello')) })).toEqual({
        avatar: 'The avatar field must be an image.',
      });
    });

    it('checks allowed types', async () => {
      const shape = { doc: field.file('document', 'mimes:pdf,docx') } satisfies RecordShape;

      expect(await reportFor(shape, { doc: bufferFile('a.pdf', PNG_BYTES) })).toEqual({
        document: 'The document field must be a file of type: pdf,docx.',
      });
    });

    it('reports unreadable files', async () => {
      const shape = { doc: field.file('document', 'file') } satisfies RecordShape;
      const broken = { name: 'gone.txt', size: 4, read: () => Promise.reject(new Error('ENOENT')) };

      expect(await reportFor(shape, { doc: broken })).toEqual({ document: 'The document field must be a readable file.' });
    });
  });

  describe('nested records and lists', () => {
    const address = {
      city: field.text('city', 'required'),
      postCode: field.text('postCode', 'numeric'),
    } satisfies RecordShape;

    it('reports nested violations as a nested report', async () => {
      const shape = { address: field.record('address', 'required', address) } satisfies RecordShape;

      expect(await reportFor(shape, { address: { postCode: 'AB1' } })).toEqual({
        address: {
          city: 'The city field is required.',
          postCode: 'The post code field may only contain digits.',
        },
      });
    });

    it('recurses into a present record even with an empty chain', async () => {
      const shape = { address: field.record('address', '', address) } satisfies RecordShape;

      expect(await reportFor(shape, { address: { city: 'Accra', postCode: 'X' } })).toEqual({
        address: { postCode: 'The post code field may only contain digits.' },
      });
      expect(await reportFor(shape, {})).toEqual({});
    });

    it('applies slice bounds to lists', async () => {
      const shape = { tags: field.list('tags', 'slice:max:2', { kind: 'text' }) } satisfies RecordShape;

      expect(await reportFor(shape, { tags: ['a', 'b', 'c'] })).toEqual({
        tags: 'The tags field may not have more than 2 items.',
      });
    });

    it('applies scalar rules to each element', async () => {
      const shape = { tags: field.list('tags', 'alpha', { kind: 'text' }) } satisfies RecordShape;

      expect(await reportFor(shape, { tags: ['ok', 'no1', '', 'fine'] })).toEqual({
        tags: ['The tags (2) field may only contain letters.'],
      });
    });

    it('validates record elements', async () => {
      const shape = {
        items: field.list('items', 'slice:min:1', { kind: 'record', shape: { sku: field.text('sku', 'required') } }),
      } satisfies RecordShape;

      expect(await reportFor(shape, { items: [{ sku: 'A1' }, {}] })).toEqual({
        items: [{ sku: 'The sku field is required.' }],
      });
    });

    it('stops at the maximum nesting depth', async () => {
      const node: Record<string, FieldSpec> = { name: field.text('name', 'required') };
      node['child'] = field.record('child', '', node);

      const report = await reportFor(
        node,
        { name: 'a', child: { name: 'b', child: { name: 'c', child: { name: 'd' } } } },
        { maxDepth: 2 }
      );

      expect(report).toEqual({
        child: { child: { child: 'validation fault: nested records exceed the maximum depth of 2' } },
      });
    });
  });

  describe('faults', () => {
    it('turns a malformed rule parameter into that field message', async () => {
      const shape = {
        name: field.text('name', 'max:abc'),
        email: field.text('email', 'email'),
      } satisfies RecordShape;

      expect(await reportFor(shape, { name: 'Ama', email: 'nope' })).toEqual({
        name: 'validation fault: rule "max": invalid bound "abc"',
        email: 'The email field must be a valid email address.',
      });
    });

    it('turns a value of the wrong kind into a fault', async () => {
      const shape = { count: field.int('count', 'min:1') } satisfies RecordShape;

      expect(await reportFor(shape, { count: '12' })).toEqual({
        count: 'validation fault: expected integer value, got string',
      });
    });

    it('faults integer fields holding fractional numbers', async () => {
      const shape = { count: field.int('count', 'required|min:1|max:2') } satisfies RecordShape;

      expect(await reportFor(shape, { count: 1.5 })).toEqual({
        count: 'validation fault: expected integer value, got number 1.5',
      });
      expect(await reportFor(shape, { count: Number.NaN })).toEqual({
        count: 'validation fault: expected integer value, got number NaN',
      });
    });

    it('faults unsigned fields holding negative numbers', async () => {
      const shape = { age: field.uint('age', 'required|max:10') } satisfies RecordShape;

      expect(await reportFor(shape, { age: -5 })).toEqual({
        age: 'validation fault: expected unsigned integer value, got negative number -5',
      });
    });
  });

  describe('uniqueness', () => {
    const shape = { email: field.text('email', 'required|unique:users.email') } satisfies RecordShape;

    it('reports taken values', async () => {
      const uniqueness: UniquenessChecker = { exists: vi.fn().mockResolvedValue(ok(true)) };

      expect(await reportFor(shape, { email: 'kofi@mail.test' }, { uniqueness })).toEqual({
        email: 'The email has already been taken.',
      });
      expect(uniqueness.exists).toHaveBeenCalledWith({ table: 'users', column: 'email' }, 'kofi@mail.test');
    });

    it('accepts free values', async () => {
      const uniqueness: UniquenessChecker = { exists: () => Promise.resolve(ok(false)) };

      expect(await reportFor(shape, { email: 'kofi@mail.test' }, { uniqueness })).toEqual({});
    });

    it('fails the call when the checker fails', async () => {
      const uniqueness: UniquenessChecker = {
        exists: () => Promise.resolve(err(new Error('connection refused'))),
      };

      const result = await validatorFor({ uniqueness }).validate(shape, { email: 'kofi@mail.test' });

      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(UniquenessCheckError);
      expect(error.message).toBe('uniqueness check on users.email failed: connection refused');
    });

    it('faults the field when no checker is configured', async () => {
      expect(await reportFor(shape, { email: 'kofi@mail.test' })).toEqual({
        email: 'validation fault: rule "unique:users.email" needs a uniqueness checker, but none is configured',
      });
    });

    it('keeps lookups under the concurrency limit', async () => {
      let active = 0;
      let peak = 0;
      const uniqueness: UniquenessChecker = {
        exists: async () => {
          active++;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active--;
          return ok(false);
        },
      };
      const wide: RecordShape = Object.fromEntries(
        ['a', 'b', 'c', 'd', 'e'].map((name) => [name, field.text(name, 'unique:users.email')])
      );
      const input = { a: '1', b: '2', c: '3', d: '4', e: '5' };

      expect(await reportFor(wide, input, { uniqueness, maxConcurrency: 2 })).toEqual({});
      expect(peak).toBe(2);
    });
  });

  describe('arguments and options', () => {
    const shape = { name: field.text('name', 'required') } satisfies RecordShape;

    it('rejects input that is not a record', async () => {
      const validator = validatorFor();

      for (const input of ['nope', null, [1, 2]]) {
        const error = (await validator.validate(shape, input))._unsafeUnwrapErr();
        expect(error).toBeInstanceOf(StructuralError);
        expect(error.message).toBe('validate: a record object is expected as an argument');
      }
    });

    it('rejects a malformed shape before evaluating fields', async () => {
      const uniqueness: UniquenessChecker = { exists: vi.fn().mockResolvedValue(ok(false)) };
      const name = field.text('name', 'unique:users.name');
      // shapes assembled at run time can carry kinds the types never allow
      Reflect.set(name, 'kind', 'date');
      const malformed: RecordShape = { name };

      const result = await validatorFor({ uniqueness }).validate(malformed, { name: 'x' });

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(StructuralError);
      expect(uniqueness.exists).not.toHaveBeenCalled();
    });

    it('renders messages in the configured locale', async () => {
      expect(await reportFor(shape, {}, { locale: 'fr' })).toEqual({ name: 'Le champ name est obligatoire.' });
    });

    it('lets a call pick its own locale', async () => {
      const result = await validatorFor().validate(shape, {}, { locale: 'fr' });

      expect(result._unsafeUnwrap()).toEqual({ name: 'Le champ name est obligatoire.' });
    });

    it('falls back to English for unknown locales', async () => {
      expect(await reportFor(shape, {}, { locale: 'sw' })).toEqual({ name: 'The name field is required.' });
    });

    it('rejects out-of-range options', () => {
      const result = createValidator({ maxConcurrency: 0 });

      expect(result._unsafeUnwrapErr().message).toContain('Invalid validator options: maxConcurrency');
    });

    it('applies defaults', () => {
      const validator = createValidator()._unsafeUnwrap();

      expect(validator.locale).toBe('en');
    });
  });
});
