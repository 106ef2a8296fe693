import {
  type CallSchema,
  type ValidationError,
  type ValidationResult,
  TOOL_NAME_FIELD,
  valueToText,
} from '@marquee/shared';
import { validateField } from './field-validators.js';

export interface ToolSchemaEntry {
  name: string;
  inputSchema: CallSchema;
}

/**
 * Checks tool invocations against the call schemas supplied at construction.
 * Every violation is reported, never just the first, and nothing is thrown for
 * bad input. Holds no mutable state after construction.
 */
export class ToolValidator {
  private readonly schemas: ReadonlyMap<string, CallSchema>;

  constructor(tools: Iterable<ToolSchemaEntry>) {
    const schemas = new Map<string, CallSchema>();
    for (const tool of tools) {
      schemas.set(tool.name, tool.inputSchema);
    }
    this.schemas = schemas;
  }

  has(toolName: string): boolean {
    return this.schemas.has(toolName);
  }

  getSchemas(): ToolSchemaEntry[] {
    return Array.from(this.schemas, ([name, inputSchema]) => ({ name, inputSchema }));
  }

  validate(toolName: string, args: Readonly<Record<string, unknown>>): ValidationResult {
    const schema = this.schemas.get(toolName);
    if (!schema) {
      return {
        valid: false,
        errors: [{
          field: TOOL_NAME_FIELD,
          value: toolName,
          message: `Unknown tool: ${toolName}`,
          code: 'UNKNOWN_TOOL',
        }],
      };
    }

    const errors = validateArguments(args, schema);
    return { valid: errors.length === 0, errors };
  }
}

export function validateArguments(
  args: Readonly<Record<string, unknown>>,
  schema: CallSchema,
): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const name of schema.required) {
    if (!Object.hasOwn(args, name)) {
      errors.push({
        field: name,
        value: '',
        message: `Required field '${name}' is missing`,
        code: 'REQUIRED_FIELD_MISSING',
      });
    }
  }

  for (const [name, value] of Object.entries(args)) {
    if (!Object.hasOwn(schema.properties, name)) {
      errors.push({
        field: name,
        value: valueToText(value),
        message: `Unknown field '${name}'`,
        code: 'UNKNOWN_FIELD',
      });
      continue;
    }

    errors.push(...validateField(name, value, schema.properties[name]));
  }

  return errors;
}
