/**
 * Minimal form framework for declarative input validation
 *
 * A list of Field definitions is the schema. validateForm checks every
 * field in one pass and reports all failures at once.
 */

import { reduce } from "#fp";

export type FieldType = "text" | "textarea" | "email" | "url" | "number";

export interface Field {
  name: string;
  label: string;
  type: FieldType;
  required?: boolean;
  /** Maximum length for text-like fields */
  maxLength?: number;
  /** Minimum value for number fields */
  min?: number;
  /** Regex source the whole trimmed value must match */
  pattern?: string;
  /** Custom rule: return an error message or null */
  validate?: (value: string) => string | null;
}

export interface FieldValues {
  [key: string]: string | number | null;
}

/** Field name -> ordered list of violated rule messages */
export type FieldErrors = Record<string, string[]>;

/** Raw caller input: a parsed form body or a decoded JSON object */
export type RawInput = URLSearchParams | Record<string, unknown>;

export type ValidationResult =
  | { valid: true; values: FieldValues }
  | { valid: false; errors: FieldErrors };

type FieldValidationResult =
  | { valid: true; value: string | number | null }
  | { valid: false; errors: string[] };

/** Read a field's raw value; unknown keys are never looked at */
const readRaw = (input: RawInput, name: string): unknown =>
  input instanceof URLSearchParams ? input.get(name) : input[name];

/** Absent, null and whitespace-only strings count as missing */
const isMissing = (raw: unknown): boolean =>
  raw === undefined || raw === null ||
  (typeof raw === "string" && raw.trim() === "");

const isNumericString = (value: string): boolean =>
  /^-?\d+(\.\d+)?$/.test(value);

/** Convert a present raw value to the field's type, or return an error */
const coerce = (
  field: Field,
  raw: unknown,
): { ok: true; value: string | number } | { ok: false; error: string } => {
  if (field.type === "number") {
    if (typeof raw === "number" && Number.isFinite(raw)) return { ok: true, value: raw };
    if (typeof raw === "string" && isNumericString(raw.trim())) {
      return { ok: true, value: Number(raw.trim()) };
    }
    return { ok: false, error: `${field.label} must be a number` };
  }
  return typeof raw === "string"
    ? { ok: true, value: raw.trim() }
    : { ok: false, error: `${field.label} must be text` };
};

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/** Format implied by the field type (email, url) */
const formatError = (field: Field, text: string): string | null => {
  if (field.type === "email" && !EMAIL_PATTERN.test(text)) {
    return `${field.label} must be a valid email address`;
  }
  if (field.type === "url" && !(/^https?:\/\//i.test(text) && URL.canParse(text))) {
    return `${field.label} must be a valid URL`;
  }
  return null;
};

/** Rules applied to a coerced value, in reporting order */
const ruleErrors = (field: Field, value: string | number): string[] => {
  const text = String(value);
  const errors: (string | null)[] = [
    formatError(field, text),
    field.maxLength !== undefined && typeof value === "string" &&
      value.length > field.maxLength
      ? `${field.label} must be at most ${field.maxLength} characters`
      : null,
    field.min !== undefined && typeof value === "number" && value < field.min
      ? `${field.label} must be at least ${field.min}`
      : null,
    field.pattern !== undefined && !new RegExp(`^(?:${field.pattern})$`).test(text)
      ? `${field.label} has an invalid format`
      : null,
    field.validate ? field.validate(text) : null,
  ];
  return errors.filter((e): e is string => e !== null);
};

/**
 * Validate a single field and return its normalized value
 */
const validateSingleField = (
  input: RawInput,
  field: Field,
): FieldValidationResult => {
  const raw = readRaw(input, field.name);

  if (isMissing(raw)) {
    return field.required
      ? { valid: false, errors: [`${field.label} is required`] }
      : { valid: true, value: null };
  }

  const coerced = coerce(field, raw);
  if (!coerced.ok) return { valid: false, errors: [coerced.error] };

  const errors = ruleErrors(field, coerced.value);
  return errors.length > 0
    ? { valid: false, errors }
    : { valid: true, value: coerced.value };
};

type Accumulated = { values: FieldValues; errors: FieldErrors };

/**
 * Parse and validate input against field definitions.
 * Every field is checked; the result lists all failing fields.
 */
export const validateForm = (
  input: RawInput,
  fields: Field[],
): ValidationResult => {
  const { values, errors } = reduce<Field, Accumulated>(
    (acc: Accumulated, field: Field) => {
      const result = validateSingleField(input, field);
      if (result.valid) {
        acc.values[field.name] = result.value;
      } else {
        acc.errors[field.name] = result.errors;
      }
      return acc;
    },
    { values: {}, errors: {} },
  )(fields);

  return Object.keys(errors).length > 0
    ? { valid: false, errors }
    : { valid: true, values };
};
