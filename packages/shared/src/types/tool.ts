export type StringFormat = 'date' | 'uri' | 'email' | 'date-time';

interface FieldSchemaBase {
  description?: string;
  default?: unknown;
}

export interface StringFieldSchema extends FieldSchemaBase {
  type: 'string';
  minLength?: number;
  maxLength?: number;
  enum?: readonly string[];
  format?: StringFormat;
  pattern?: string;
}

export interface IntegerFieldSchema extends FieldSchemaBase {
  type: 'integer';
  minimum?: number;
  maximum?: number;
}

export interface NumberFieldSchema extends FieldSchemaBase {
  type: 'number';
  minimum?: number;
  maximum?: number;
}

export interface BooleanFieldSchema extends FieldSchemaBase {
  type: 'boolean';
}

export interface ArrayFieldSchema extends FieldSchemaBase {
  type: 'array';
  minItems?: number;
  maxItems?: number;
  items?: FieldSchema;
}

export interface ObjectFieldSchema extends FieldSchemaBase {
  type: 'object';
  properties?: Readonly<Record<string, FieldSchema>>;
  required?: readonly string[];
}

/**
 * Placeholder for a kind the validator does not know, as read from a catalog
 * file. `declaredType` is absent when the source schema had no `type` at all.
 */
export interface UnsupportedFieldSchema extends FieldSchemaBase {
  type: 'unsupported';
  declaredType?: string;
}

export type FieldSchema =
  | StringFieldSchema
  | IntegerFieldSchema
  | NumberFieldSchema
  | BooleanFieldSchema
  | ArrayFieldSchema
  | ObjectFieldSchema
  | UnsupportedFieldSchema;

export interface CallSchema {
  required: readonly string[];
  properties: Readonly<Record<string, FieldSchema>>;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: CallSchema;
  tags?: string[];
}

/** Wire shape of a tool as MCP advertises it. */
export interface McpToolDescriptor {
  name: string;
  description?: string;
  inputSchema: {
    type: 'object';
    properties?: Record<string, Record<string, unknown>>;
    required?: string[];
  };
}
