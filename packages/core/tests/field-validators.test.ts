import { describe, it, expect } from 'vitest';
import type { FieldSchema } from '@marquee/shared';
import { validateField, itemPath, propertyPath } from '../src/field-validators.js';
import { isValidDate, isValidDateTime, isValidEmail, isValidUri } from '../src/formats.js';

function codes(value: unknown, schema: FieldSchema): string[] {
  return validateField('f', value, schema).map(e => e.code);
}

describe('validateField', () => {
  describe('string', () => {
    it('reports the actual JSON kind on type mismatch', () => {
      expect(validateField('title', 7, { type: 'string' })).toEqual([{
        field: 'title',
        value: '7',
        message: 'Expected string, got number',
        code: 'TYPE_MISMATCH',
      }]);
      expect(validateField('title', null, { type: 'string' })[0].message).toBe('Expected string, got null');
      expect(validateField('title', ['a'], { type: 'string' })[0].message).toBe('Expected string, got array');
    });

    it('checks enum membership', () => {
      const schema: FieldSchema = { type: 'string', enum: ['asc', 'desc'] };

      expect(codes('asc', schema)).toEqual([]);
      expect(validateField('order', 'up', schema)).toEqual([{
        field: 'order',
        value: 'up',
        message: 'Value must be one of: asc, desc',
        code: 'INVALID_ENUM_VALUE',
      }]);
    });

    it('measures length in characters rather than UTF-16 units', () => {
      const schema: FieldSchema = { type: 'string', maxLength: 2 };

      expect(codes('🎬🎥', schema)).toEqual([]);
      expect(codes('🎬🎥🎞', schema)).toEqual(['STRING_TOO_LONG']);
    });

    it('reports every failing constraint', () => {
      const schema: FieldSchema = { type: 'string', enum: ['x@y.io'], minLength: 5, format: 'email' };

      expect(codes('ab', schema)).toEqual(['INVALID_ENUM_VALUE', 'STRING_TOO_SHORT', 'INVALID_EMAIL_FORMAT']);
    });

    it('reports an invalid pattern instead of throwing', () => {
      expect(validateField('q', 'abc', { type: 'string', pattern: '(' })).toEqual([{
        field: 'q',
        value: 'abc',
        message: 'Invalid regex pattern: (',
        code: 'INVALID_PATTERN',
      }]);
    });

    it('maps each format to its own code', () => {
      expect(codes('2024-13-01', { type: 'string', format: 'date' })).toEqual(['INVALID_DATE_FORMAT']);
      expect(codes('poster.jpg', { type: 'string', format: 'uri' })).toEqual(['INVALID_URI_FORMAT']);
      expect(codes('someone', { type: 'string', format: 'email' })).toEqual(['INVALID_EMAIL_FORMAT']);
      expect(codes('2024-01-01', { type: 'string', format: 'date-time' })).toEqual(['INVALID_DATETIME_FORMAT']);
    });
  });

  describe('numbers', () => {
    it('treats bounds as inclusive', () => {
      const schema: FieldSchema = { type: 'number', minimum: 0, maximum: 10 };

      expect(codes(0, schema)).toEqual([]);
      expect(codes(10, schema)).toEqual([]);
      expect(codes(-0.5, schema)).toEqual(['VALUE_TOO_SMALL']);
      expect(validateField('rating', -0.5, schema)[0].message).toBe('Value must be at least 0');
    });

    it('rejects booleans and numeric strings', () => {
      expect(codes(true, { type: 'number' })).toEqual(['TYPE_MISMATCH']);
      expect(codes('5', { type: 'integer' })).toEqual(['TYPE_MISMATCH']);
    });

    it('rejects non-finite values', () => {
      expect(validateField('n', Number.NaN, { type: 'number' })[0].message).toBe('Expected number, got non-finite number');
      expect(codes(Number.POSITIVE_INFINITY, { type: 'integer' })).toEqual(['TYPE_MISMATCH']);
    });

    it('does not check bounds on a decimal integer', () => {
      expect(codes(0.5, { type: 'integer', minimum: 1 })).toEqual(['NOT_INTEGER']);
    });
  });

  it('checks booleans strictly', () => {
    expect(codes(false, { type: 'boolean' })).toEqual([]);
    expect(validateField('flag', 'true', { type: 'boolean' })[0].message).toBe('Expected boolean, got string');
  });

  describe('array', () => {
    it('summarises the array in size errors', () => {
      expect(validateField('genres', ['a', 'b', 'c'], { type: 'array', maxItems: 2 })).toEqual([{
        field: 'genres',
        value: 'array with 3 items',
        message: 'Array must have at most 2 items',
        code: 'ARRAY_TOO_LONG',
      }]);
      expect(validateField('genres', [], { type: 'array', minItems: 1 })[0]).toMatchObject({
        value: 'array with 0 items',
        code: 'ARRAY_TOO_SHORT',
      });
    });

    it('validates items with indexed paths', () => {
      const errors = validateField('ids', [1, 'two', 3.5], { type: 'array', items: { type: 'integer' } });

      expect(errors.map(e => [e.field, e.code])).toEqual([
        ['ids[1]', 'TYPE_MISMATCH'],
        ['ids[2]', 'NOT_INTEGER'],
      ]);
    });

    it('skips item checks when no item schema is declared', () => {
      expect(codes([1, 'a', null], { type: 'array' })).toEqual([]);
    });
  });

  describe('object', () => {
    const movie: FieldSchema = {
      type: 'object',
      properties: {
        title: { type: 'string', minLength: 1 },
        year: { type: 'integer' },
      },
      required: ['title', 'year'],
    };

    it('validates declared properties and tolerates undeclared ones', () => {
      expect(codes({ title: 'Heat', year: 1995, studio: 'WB' }, movie)).toEqual([]);
    });

    it('prefixes nested paths and reports missing properties', () => {
      const errors = validateField('movies[0]', { title: '' }, movie);

      expect(errors).toEqual([
        {
          field: 'movies[0].title',
          value: '',
          message: 'String length must be at least 1 characters',
          code: 'STRING_TOO_SHORT',
        },
        {
          field: 'movies[0].year',
          value: '',
          message: "Required property 'year' is missing",
          code: 'REQUIRED_PROPERTY_MISSING',
        },
      ]);
    });

    it('rejects arrays and null', () => {
      expect(validateField('o', [], movie)[0].message).toBe('Expected object, got array');
      expect(validateField('o', null, movie)[0].message).toBe('Expected object, got null');
    });

    it('recurses through arrays of objects', () => {
      const schema: FieldSchema = { type: 'array', items: movie };
      const errors = validateField('movies', [{ title: 'Heat', year: 1995 }, { year: 'soon' }], schema);

      expect(errors.map(e => [e.field, e.code])).toEqual([
        ['movies[1].year', 'TYPE_MISMATCH'],
        ['movies[1].title', 'REQUIRED_PROPERTY_MISSING'],
      ]);
    });
  });

  it('reports a kind outside the union loaded from raw JSON', () => {
    const schema: FieldSchema = JSON.parse('{"type":"tuple"}');

    expect(validateField('x', [1], schema)).toEqual([{
      field: 'x',
      value: '[1]',
      message: 'Unsupported field type: tuple',
      code: 'UNSUPPORTED_TYPE',
    }]);
  });

  it('reports unsupported and missing kinds per field', () => {
    expect(validateField('x', 1, { type: 'unsupported', declaredType: 'tuple' })).toEqual([{
      field: 'x',
      value: '1',
      message: 'Unsupported field type: tuple',
      code: 'UNSUPPORTED_TYPE',
    }]);
    expect(validateField('x', 1, { type: 'unsupported' })[0]).toMatchObject({
      message: 'Field schema missing type',
      code: 'MISSING_TYPE',
    });
  });
});

describe('path helpers', () => {
  it('formats item and property paths', () => {
    expect(itemPath('genres', 2)).toBe('genres[2]');
    expect(propertyPath(itemPath('movies', 0), 'title')).toBe('movies[0].title');
  });
});

describe('format checks', () => {
  it('accepts structurally valid dates', () => {
    expect(isValidDate('1995-12-15')).toBe(true);
    expect(isValidDate('2024-02-31')).toBe(true);
  });

  it('rejects malformed dates', () => {
    expect(isValidDate('1995-1-15')).toBe(false);
    expect(isValidDate('0999-01-01')).toBe(false);
    expect(isValidDate('1995-00-10')).toBe(false);
    expect(isValidDate('1995-01-32')).toBe(false);
    expect(isValidDate('19a5-01-01')).toBe(false);
    expect(isValidDate('1995/01/01')).toBe(false);
  });

  it('recognises URIs by scheme, absolute path or mailto', () => {
    expect(isValidUri('https://example.com/a.jpg')).toBe(true);
    expect(isValidUri('/posters/a.jpg')).toBe(true);
    expect(isValidUri('mailto:someone@example.com')).toBe(true);
    expect(isValidUri('posters/a.jpg')).toBe(false);
    expect(isValidUri('')).toBe(false);
  });

  it('checks email and date-time shapes', () => {
    expect(isValidEmail('critic@example.org')).toBe(true);
    expect(isValidEmail('critic@localhost')).toBe(false);
    expect(isValidDateTime('2024-05-01T10:00:00Z')).toBe(true);
    expect(isValidDateTime('2024-05-01T10:00:00+02:00')).toBe(true);
    expect(isValidDateTime('2024-05-01 10:00:00')).toBe(false);
  });
});
