import {
  type ArrayFieldSchema,
  type FieldSchema,
  type IntegerFieldSchema,
  type NumberFieldSchema,
  type ObjectFieldSchema,
  type StringFieldSchema,
  type StringFormat,
  type UnsupportedFieldSchema,
  type ValidationError,
  type ValidationErrorCode,
  describeType,
  valueToText,
} from '@marquee/shared';
import { FORMAT_CHECKS } from './formats.js';

const FORMAT_ERRORS: Record<StringFormat, { code: ValidationErrorCode; message: string }> = {
  'date': { code: 'INVALID_DATE_FORMAT', message: 'Invalid date format, expected YYYY-MM-DD' },
  'uri': { code: 'INVALID_URI_FORMAT', message: 'Invalid URI format' },
  'email': { code: 'INVALID_EMAIL_FORMAT', message: 'Invalid email format' },
  'date-time': { code: 'INVALID_DATETIME_FORMAT', message: 'Invalid date-time format, expected ISO 8601' },
};

export function itemPath(field: string, index: number): string {
  return `${field}[${index}]`;
}

export function propertyPath(field: string, name: string): string {
  return `${field}.${name}`;
}

function error(field: string, value: unknown, code: ValidationErrorCode, message: string): ValidationError {
  return { field, value: valueToText(value), message, code };
}

function typeMismatch(field: string, value: unknown, expected: string): ValidationError {
  const actual = typeof value === 'number' && !Number.isFinite(value) ? 'non-finite number' : describeType(value);
  return error(field, value, 'TYPE_MISMATCH', `Expected ${expected}, got ${actual}`);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function declaredKind(schema: unknown): string | undefined {
  if (typeof schema === 'object' && schema !== null && 'type' in schema) {
    return String(schema.type);
  }
  return undefined;
}

/**
 * Single dispatch point over the field-schema union. Containers call back into
 * this function for their children.
 */
export function validateField(field: string, value: unknown, schema: FieldSchema): ValidationError[] {
  switch (schema.type) {
    case 'string':
      return validateString(field, value, schema);
    case 'integer':
      return validateInteger(field, value, schema);
    case 'number':
      return validateNumber(field, value, schema);
    case 'boolean':
      return typeof value === 'boolean' ? [] : [typeMismatch(field, value, 'boolean')];
    case 'array':
      return validateArray(field, value, schema);
    case 'object':
      return validateObject(field, value, schema);
    case 'unsupported':
      return validateUnsupported(field, value, schema);
    default: {
      const unhandled: never = schema;
      const kind = declaredKind(unhandled);
      return [error(field, value, 'UNSUPPORTED_TYPE', `Unsupported field type: ${kind ?? 'unknown'}`)];
    }
  }
}

export function validateString(field: string, value: unknown, schema: StringFieldSchema): ValidationError[] {
  if (typeof value !== 'string') {
    return [typeMismatch(field, value, 'string')];
  }

  const errors: ValidationError[] = [];

  if (schema.enum && !schema.enum.includes(value)) {
    errors.push(error(field, value, 'INVALID_ENUM_VALUE', `Value must be one of: ${schema.enum.join(', ')}`));
  }

  const length = Array.from(value).length;
  if (schema.minLength !== undefined && length < schema.minLength) {
    errors.push(error(field, value, 'STRING_TOO_SHORT', `String length must be at least ${schema.minLength} characters`));
  }
  if (schema.maxLength !== undefined && length > schema.maxLength) {
    errors.push(error(field, value, 'STRING_TOO_LONG', `String length must be at most ${schema.maxLength} characters`));
  }

  if (schema.pattern !== undefined) {
    const regex = compilePattern(schema.pattern);
    if (!regex) {
      errors.push(error(field, value, 'INVALID_PATTERN', `Invalid regex pattern: ${schema.pattern}`));
    } else if (!regex.test(value)) {
      errors.push(error(field, value, 'PATTERN_MISMATCH', `Value does not match pattern: ${schema.pattern}`));
    }
  }

  if (schema.format && !FORMAT_CHECKS[schema.format](value)) {
    const { code, message } = FORMAT_ERRORS[schema.format];
    errors.push(error(field, value, code, message));
  }

  return errors;
}

function compilePattern(pattern: string): RegExp | null {
  try {
    return new RegExp(pattern);
  } catch {
    // Reported to the caller as INVALID_PATTERN
    return null;
  }
}

export function validateInteger(field: string, value: unknown, schema: IntegerFieldSchema): ValidationError[] {
  if (!isFiniteNumber(value)) {
    return [typeMismatch(field, value, 'integer')];
  }
  if (!Number.isInteger(value)) {
    return [error(field, value, 'NOT_INTEGER', 'Expected integer, got decimal number')];
  }
  return checkBounds(field, value, schema);
}

export function validateNumber(field: string, value: unknown, schema: NumberFieldSchema): ValidationError[] {
  if (!isFiniteNumber(value)) {
    return [typeMismatch(field, value, 'number')];
  }
  return checkBounds(field, value, schema);
}

function checkBounds(
  field: string,
  value: number,
  schema: IntegerFieldSchema | NumberFieldSchema,
): ValidationError[] {
  const errors: ValidationError[] = [];
  if (schema.minimum !== undefined && value < schema.minimum) {
    errors.push(error(field, value, 'VALUE_TOO_SMALL', `Value must be at least ${schema.minimum}`));
  }
  if (schema.maximum !== undefined && value > schema.maximum) {
    errors.push(error(field, value, 'VALUE_TOO_LARGE', `Value must be at most ${schema.maximum}`));
  }
  return errors;
}

export function validateArray(field: string, value: unknown, schema: ArrayFieldSchema): ValidationError[] {
  if (!Array.isArray(value)) {
    return [typeMismatch(field, value, 'array')];
  }

  const errors: ValidationError[] = [];
  const summary = `array with ${value.length} items`;

  if (schema.minItems !== undefined && value.length < schema.minItems) {
    errors.push({
      field,
      value: summary,
      message: `Array must have at least ${schema.minItems} items`,
      code: 'ARRAY_TOO_SHORT',
    });
  }
  if (schema.maxItems !== undefined && value.length > schema.maxItems) {
    errors.push({
      field,
      value: summary,
      message: `Array must have at most ${schema.maxItems} items`,
      code: 'ARRAY_TOO_LONG',
    });
  }

  const items = schema.items;
  if (items) {
    value.forEach((item: unknown, index) => {
      errors.push(...validateField(itemPath(field, index), item, items));
    });
  }

  return errors;
}

export function validateObject(field: string, value: unknown, schema: ObjectFieldSchema): ValidationError[] {
  if (!isPlainObject(value)) {
    return [typeMismatch(field, value, 'object')];
  }

  const errors: ValidationError[] = [];
  const properties = schema.properties;

  // Undeclared sub-properties are tolerated; only declared ones are checked
  if (properties) {
    for (const [name, propValue] of Object.entries(value)) {
      if (!Object.hasOwn(properties, name)) continue;
      errors.push(...validateField(propertyPath(field, name), propValue, properties[name]));
    }
  }

  for (const name of schema.required ?? []) {
    if (!Object.hasOwn(value, name)) {
      errors.push({
        field: propertyPath(field, name),
        value: '',
        message: `Required property '${name}' is missing`,
        code: 'REQUIRED_PROPERTY_MISSING',
      });
    }
  }

  return errors;
}

function validateUnsupported(field: string, value: unknown, schema: UnsupportedFieldSchema): ValidationError[] {
  if (schema.declaredType === undefined) {
    return [error(field, value, 'MISSING_TYPE', 'Field schema missing type')];
  }
  return [error(field, value, 'UNSUPPORTED_TYPE', `Unsupported field type: ${schema.declaredType}`)];
}
