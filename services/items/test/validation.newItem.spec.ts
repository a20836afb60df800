import { describe, expect, it } from 'vitest';
import { bindNewItemInput, validateNewItem } from '../src/validation/newItem';

const JSON_TYPE = 'application/json';
const FORM_TYPE = 'application/x-www-form-urlencoded';

describe('validateNewItem', () => {
  it('accepts names of 3 to 10 letters', () => {
    expect(validateNewItem({ name: 'Foo', isActive: true })).toEqual({
      ok: true,
      value: { name: 'Foo', isActive: true },
    });
    expect(validateNewItem({ name: 'Abcdefghij', isActive: false }).ok).toBe(true);
  });

  it.each([
    ['', 'required', 'name is required'],
    ['Ab', 'too_short', 'name must be at least 3 characters long'],
    ['TooLongName', 'too_long', 'name must be at most 10 characters long'],
    ['Foo1', 'not_alpha', 'name must contain only alphabetic characters'],
    ['Foo Bar', 'not_alpha', 'name must contain only alphabetic characters'],
    ['Café', 'not_alpha', 'name must contain only alphabetic characters'],
  ])('rejects %j as %s', (name, kind, message) => {
    expect(validateNewItem({ name, isActive: false })).toEqual({
      ok: false,
      failure: { field: 'name', kind, message },
    });
  });

  it('reports only the first broken rule', () => {
    // both too short and not alphabetic
    const result = validateNewItem({ name: '1', isActive: false });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.failure.kind).toBe('too_short');

    // both too long and not alphabetic
    const long = validateNewItem({ name: '12345678901', isActive: false });
    if (!long.ok) expect(long.failure.kind).toBe('too_long');
  });
});

describe('bindNewItemInput', () => {
  it('binds a JSON body and defaults isActive to false', () => {
    expect(bindNewItemInput({ name: 'Foo' }, JSON_TYPE)).toEqual({
      ok: true,
      input: { name: 'Foo', isActive: false },
    });
    expect(bindNewItemInput({ name: 'Foo', isActive: true }, JSON_TYPE)).toEqual({
      ok: true,
      input: { name: 'Foo', isActive: true },
    });
  });

  it('treats a missing name as empty so validation reports it', () => {
    expect(bindNewItemInput({}, JSON_TYPE)).toEqual({ ok: true, input: { name: '', isActive: false } });
  });

  it('fails on wrongly typed JSON fields and keeps what it could read', () => {
    expect(bindNewItemInput({ name: 'Foo', isActive: 'yes' }, JSON_TYPE)).toEqual({
      ok: false,
      input: { name: 'Foo', isActive: false },
      message: 'isActive must be a boolean',
    });
    expect(bindNewItemInput({ name: 12 }, JSON_TYPE)).toEqual({
      ok: false,
      input: { name: '', isActive: false },
      message: 'name must be a string',
    });
  });

  it('fails when the JSON body is not an object', () => {
    expect(bindNewItemInput(['Foo'], JSON_TYPE)).toEqual({
      ok: false,
      input: { name: '', isActive: false },
      message: 'request body must be a JSON object',
    });
    expect(bindNewItemInput(undefined, undefined)).toEqual({
      ok: false,
      input: { name: '', isActive: false },
      message: 'request body is required',
    });
  });

  it('binds checkbox values from a form body', () => {
    expect(bindNewItemInput({ name: 'Foo', isActive: 'on' }, FORM_TYPE)).toEqual({
      ok: true,
      input: { name: 'Foo', isActive: true },
    });
    expect(bindNewItemInput({ name: 'Foo', isActive: 'true' }, `${FORM_TYPE}; charset=utf-8`)).toEqual({
      ok: true,
      input: { name: 'Foo', isActive: true },
    });
    expect(bindNewItemInput({ name: 'Foo' }, FORM_TYPE)).toEqual({
      ok: true,
      input: { name: 'Foo', isActive: false },
    });
  });

  it('takes the first value of a repeated form field', () => {
    expect(bindNewItemInput({ name: ['Foo', 'Bar'] }, FORM_TYPE)).toEqual({
      ok: true,
      input: { name: 'Foo', isActive: false },
    });
  });

  it('rejects a checkbox value that is not a boolean', () => {
    expect(bindNewItemInput({ name: 'Foo', isActive: 'maybe' }, FORM_TYPE)).toEqual({
      ok: false,
      input: { name: 'Foo', isActive: false },
      message: 'isActive must be a boolean',
    });
  });
});
