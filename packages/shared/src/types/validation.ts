export type ValidationErrorCode =
  | 'UNKNOWN_TOOL'
  | 'REQUIRED_FIELD_MISSING'
  | 'UNKNOWN_FIELD'
  | 'TYPE_MISMATCH'
  | 'INVALID_ENUM_VALUE'
  | 'STRING_TOO_SHORT'
  | 'STRING_TOO_LONG'
  | 'INVALID_PATTERN'
  | 'PATTERN_MISMATCH'
  | 'INVALID_DATE_FORMAT'
  | 'INVALID_DATETIME_FORMAT'
  | 'INVALID_URI_FORMAT'
  | 'INVALID_EMAIL_FORMAT'
  | 'NOT_INTEGER'
  | 'VALUE_TOO_SMALL'
  | 'VALUE_TOO_LARGE'
  | 'ARRAY_TOO_SHORT'
  | 'ARRAY_TOO_LONG'
  | 'REQUIRED_PROPERTY_MISSING'
  | 'UNSUPPORTED_TYPE'
  | 'MISSING_TYPE';

export interface ValidationError {
  field: string;
  /** Offending value rendered as text; empty for missing fields. */
  value: string;
  message: string;
  code: ValidationErrorCode;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}
