import { z } from 'zod';
import type { NewItemInput } from '../types';

export const NAME_MIN_LENGTH = 3;
export const NAME_MAX_LENGTH = 10;

// ---------- Binding ----------

const jsonInputSchema = z.object(
  {
    name: z.string({ invalid_type_error: 'name must be a string' }).optional(),
    isActive: z.boolean({ invalid_type_error: 'isActive must be a boolean' }).optional(),
  },
  {
    required_error: 'request body is required',
    invalid_type_error: 'request body must be a JSON object',
  },
);

const FORM_TRUE = new Set(['on', 'true', '1']);
const FORM_FALSE = new Set(['', 'off', 'false', '0']);

// repeated form fields arrive as arrays; the first value wins
const formField = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value[0] ?? '' : value));

const formInputSchema = z.object(
  {
    name: formField.optional(),
    isActive: formField
      .refine((value) => FORM_TRUE.has(value.toLowerCase()) || FORM_FALSE.has(value.toLowerCase()), {
        message: 'isActive must be a boolean',
      })
      .transform((value) => FORM_TRUE.has(value.toLowerCase()))
      .optional(),
  },
  { required_error: 'form body is required' },
);

export type BindResult =
  | { ok: true; input: NewItemInput }
  | { ok: false; input: NewItemInput; message: string };

export function isFormContentType(contentType: string | undefined): boolean {
  return (contentType ?? '').toLowerCase().startsWith('application/x-www-form-urlencoded');
}

/**
 * Decodes a create payload (JSON or form-encoded) into a `NewItemInput`.
 * On failure the fields that could still be read are returned alongside the
 * message, so an HTML form can be filled back in.
 */
export function bindNewItemInput(body: unknown, contentType: string | undefined): BindResult {
  const parsed = isFormContentType(contentType)
    ? formInputSchema.safeParse(body)
    : jsonInputSchema.safeParse(body);

  if (parsed.success) {
    return {
      ok: true,
      input: { name: parsed.data.name ?? '', isActive: parsed.data.isActive ?? false },
    };
  }

  const [issue] = parsed.error.issues;
  return {
    ok: false,
    input: salvageInput(body),
    message: issue ? issue.message : 'request body could not be decoded',
  };
}

function salvageInput(body: unknown): NewItemInput {
  if (typeof body !== 'object' || body === null) return { name: '', isActive: false };
  const name: unknown = Reflect.get(body, 'name');
  const isActive: unknown = Reflect.get(body, 'isActive');
  return {
    name: typeof name === 'string' ? name : '',
    isActive: isActive === true || (typeof isActive === 'string' && FORM_TRUE.has(isActive.toLowerCase())),
  };
}

// ---------- Validation ----------

export type ValidationFailureKind = 'required' | 'too_short' | 'too_long' | 'not_alpha';

export interface ValidationFailure {
  field: keyof NewItemInput;
  kind: ValidationFailureKind;
  message: string;
}

interface NameRule {
  kind: ValidationFailureKind;
  message: string;
  accepts(name: string): boolean;
}

const nameLength = (name: string) => [...name].length;

// Evaluated in order; the first rule that rejects decides the failure.
const NAME_RULES: readonly NameRule[] = [
  {
    kind: 'required',
    message: 'name is required',
    accepts: (name) => name.length > 0,
  },
  {
    kind: 'too_short',
    message: `name must be at least ${NAME_MIN_LENGTH} characters long`,
    accepts: (name) => nameLength(name) >= NAME_MIN_LENGTH,
  },
  {
    kind: 'too_long',
    message: `name must be at most ${NAME_MAX_LENGTH} characters long`,
    accepts: (name) => nameLength(name) <= NAME_MAX_LENGTH,
  },
  {
    kind: 'not_alpha',
    message: 'name must contain only alphabetic characters',
    accepts: (name) => /^[A-Za-z]+$/.test(name),
  },
];

export type ValidationResult =
  | { ok: true; value: NewItemInput }
  | { ok: false; failure: ValidationFailure };

export function validateNewItem(input: NewItemInput): ValidationResult {
  const broken = NAME_RULES.find((rule) => !rule.accepts(input.name));
  if (broken) {
    return { ok: false, failure: { field: 'name', kind: broken.kind, message: broken.message } };
  }
  return { ok: true, value: { name: input.name, isActive: input.isActive } };
}
