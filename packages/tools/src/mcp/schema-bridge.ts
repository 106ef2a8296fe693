import type {
  ArrayFieldSchema,
  BooleanFieldSchema,
  CallSchema,
  FieldSchema,
  IntegerFieldSchema,
  McpToolDescriptor,
  NumberFieldSchema,
  ObjectFieldSchema,
  StringFieldSchema,
  StringFormat,
  ToolDefinition,
  UnsupportedFieldSchema,
} from '@marquee/shared';

const STRING_FORMATS: readonly StringFormat[] = ['date', 'uri', 'email', 'date-time'];

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberKeyword(schema: JsonObject, key: string): number | undefined {
  const value = schema[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((v): v is string => typeof v === 'string');
}

function isStringFormat(value: unknown): value is StringFormat {
  return typeof value === 'string' && STRING_FORMATS.some(f => f === value);
}

function withoutUndefined<T extends object>(obj: T): T {
  for (const key of Object.keys(obj)) {
    if (Reflect.get(obj, key) === undefined) Reflect.deleteProperty(obj, key);
  }
  return obj;
}

/**
 * Converts a JSON Schema property into the validator's field schema.
 * Keywords of the wrong JS type are dropped; an unknown or missing `type`
 * becomes the `unsupported` kind so validation can report it per field.
 * Unknown string formats are ignored, as JSON Schema allows.
 */
export function jsonSchemaToFieldSchema(schema: unknown): FieldSchema {
  if (!isJsonObject(schema)) {
    return { type: 'unsupported' };
  }

  const description = typeof schema.description === 'string' ? schema.description : undefined;
  const base = { description, default: schema.default };
  const type = schema.type;

  switch (type) {
    case 'string': {
      const field: StringFieldSchema = {
        ...base,
        type: 'string',
        minLength: numberKeyword(schema, 'minLength'),
        maxLength: numberKeyword(schema, 'maxLength'),
        enum: Array.isArray(schema.enum) ? schema.enum.map(v => String(v)) : undefined,
        format: isStringFormat(schema.format) ? schema.format : undefined,
        pattern: typeof schema.pattern === 'string' ? schema.pattern : undefined,
      };
      return withoutUndefined(field);
    }
    case 'integer': {
      const field: IntegerFieldSchema = {
        ...base,
        type: 'integer',
        minimum: numberKeyword(schema, 'minimum'),
        maximum: numberKeyword(schema, 'maximum'),
      };
      return withoutUndefined(field);
    }
    case 'number': {
      const field: NumberFieldSchema = {
        ...base,
        type: 'number',
        minimum: numberKeyword(schema, 'minimum'),
        maximum: numberKeyword(schema, 'maximum'),
      };
      return withoutUndefined(field);
    }
    case 'boolean': {
      const field: BooleanFieldSchema = { ...base, type: 'boolean' };
      return withoutUndefined(field);
    }
    case 'array': {
      const field: ArrayFieldSchema = {
        ...base,
        type: 'array',
        minItems: numberKeyword(schema, 'minItems'),
        maxItems: numberKeyword(schema, 'maxItems'),
        items: schema.items === undefined ? undefined : jsonSchemaToFieldSchema(schema.items),
      };
      return withoutUndefined(field);
    }
    case 'object': {
      const field: ObjectFieldSchema = {
        ...base,
        type: 'object',
        properties: isJsonObject(schema.properties) ? convertProperties(schema.properties) : undefined,
        required: stringList(schema.required),
      };
      return withoutUndefined(field);
    }
    default: {
      const field: UnsupportedFieldSchema = {
        ...base,
        type: 'unsupported',
        declaredType: type === undefined ? undefined : String(type),
      };
      return withoutUndefined(field);
    }
  }
}

function convertProperties(properties: JsonObject): Record<string, FieldSchema> {
  const result: Record<string, FieldSchema> = {};
  for (const [name, property] of Object.entries(properties)) {
    result[name] = jsonSchemaToFieldSchema(property);
  }
  return result;
}

export function jsonSchemaToCallSchema(inputSchema: McpToolDescriptor['inputSchema']): CallSchema {
  return {
    required: [...(inputSchema.required ?? [])],
    properties: convertProperties(inputSchema.properties ?? {}),
  };
}

/** Reverse direction, used when advertising tools over MCP. */
export function fieldSchemaToJsonSchema(schema: FieldSchema): Record<string, unknown> {
  const { description, default: defaultValue } = schema;
  const common = withoutUndefined({ description, default: defaultValue });

  switch (schema.type) {
    case 'string':
      return withoutUndefined({
        type: 'string',
        ...common,
        minLength: schema.minLength,
        maxLength: schema.maxLength,
        enum: schema.enum ? [...schema.enum] : undefined,
        format: schema.format,
        pattern: schema.pattern,
      });
    case 'integer':
    case 'number':
      return withoutUndefined({ type: schema.type, ...common, minimum: schema.minimum, maximum: schema.maximum });
    case 'boolean':
      return { type: 'boolean', ...common };
    case 'array':
      return withoutUndefined({
        type: 'array',
        ...common,
        minItems: schema.minItems,
        maxItems: schema.maxItems,
        items: schema.items ? fieldSchemaToJsonSchema(schema.items) : undefined,
      });
    case 'object': {
      const properties = schema.properties;
      return withoutUndefined({
        type: 'object',
        ...common,
        properties: properties
          ? Object.fromEntries(Object.entries(properties).map(([k, v]) => [k, fieldSchemaToJsonSchema(v)]))
          : undefined,
        required: schema.required ? [...schema.required] : undefined,
      });
    }
    case 'unsupported':
      return schema.declaredType === undefined ? { ...common } : { type: schema.declaredType, ...common };
  }
}

export function callSchemaToJsonSchema(schema: CallSchema): McpToolDescriptor['inputSchema'] {
  return {
    type: 'object',
    properties: Object.fromEntries(
      Object.entries(schema.properties).map(([name, field]) => [name, fieldSchemaToJsonSchema(field)]),
    ),
    required: [...schema.required],
  };
}

/**
 * Converts an MCP tool descriptor to a catalog tool definition.
 */
export function mcpToolToToolDefinition(tool: McpToolDescriptor, tags: string[] = []): ToolDefinition {
  return {
    name: tool.name,
    description: tool.description ?? `Catalog tool: ${tool.name}`,
    inputSchema: jsonSchemaToCallSchema(tool.inputSchema),
    tags,
  };
}

export function toolDefinitionToMcpTool(tool: ToolDefinition): McpToolDescriptor {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: callSchemaToJsonSchema(tool.inputSchema),
  };
}
